import { createHash } from 'crypto';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * JSON.stringify with object keys sorted at every depth, so that two facets that
 * differ only in key order produce the same text. Undefined object members are dropped
 * the same way JSON.stringify drops them.
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (value !== null && typeof value === 'object') {
        const sorted: Record<string, unknown> = {};
        for (const key of Object.keys(value).sort()) {
            const member: unknown = Reflect.get(value, key);
            if (member !== undefined) {
                sorted[key] = sortKeys(member);
            }
        }
        return sorted;
    }
    return value;
}

export function stableHash(value: unknown): string {
    return createHash('sha256').update(canonicalJson(value)).digest('hex');
}
