/**
 * URL-safe slug: accents stripped, lowercase, runs of anything else collapsed to "-".
 * "Tinta para Tecido" -> "tinta-para-tecido", "Número" -> "numero".
 */
export function slugify(input: string): string {
    return input
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .trim()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

/** Case/whitespace-insensitive form used to compare option values and filter groups. */
export function normalizeValue(input: string): string {
    return input.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * First-seen disambiguation: the first "base" stays as-is, later ones get -1, -2, ...
 */
export function uniqueSlug(base: string, taken: Set<string>): string {
    if (!taken.has(base)) {
        return base;
    }
    let counter = 1;
    while (taken.has(`${base}-${counter}`)) {
        counter++;
    }
    return `${base}-${counter}`;
}
