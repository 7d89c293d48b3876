import { Injectable, Logger } from '@nestjs/common';
import { FacetName, RowIssue, ValidationError } from '../../common/errors/catalog.errors';
import { slugify } from '../../common/utils/slugify';
import {
    AttributeSpec,
    CategoryLevel,
    CategorySpec,
    GroupMembersSpec,
    GroupSpec,
    MemberFilter,
    ParsedFacets,
    RawFacets,
    VariantKey,
    VariantSpec,
} from '../types/facet-specs.types';

const VARIANT_RESERVED_KEYS = new Set(['id', 'name', 'sku', 'purchase_price', 'sale_price', 'stock_qty', 'images']);
const MAX_CATEGORY_DEPTH = 32;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scalarText(value: unknown): string | null {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return null;
}

/** Blank strings are not numbers; Number("") would be 0. */
function parseNumeric(text: string): number {
    const trimmed = text.trim();
    return trimmed ? Number(trimmed) : Number.NaN;
}

/**
 * Structural validation of the four facets. Runs before any read of stored state so
 * that a malformed row never opens a transaction. All issues of one product are
 * collected and raised together.
 */
@Injectable()
export class FacetParser {
    private readonly logger = new Logger(FacetParser.name);

    parse(raw: RawFacets): ParsedFacets {
        const issues: RowIssue[] = [];
        const parsed: ParsedFacets = {};

        const attributes = this.asRows('attributes', raw.attributes_json, issues);
        if (attributes) parsed.attributes = this.parseAttributes(attributes, issues);

        const variants = this.asRows('variants', raw.variants_json, issues);
        if (variants) parsed.variants = this.parseVariants(variants, issues);

        const groups = this.asRows('groups', raw.groups_json, issues);
        if (groups) parsed.groups = this.parseGroups(groups, issues);

        const categories = this.asRows('categories', raw.categories_json, issues);
        if (categories) parsed.categories = this.parseCategories(categories, issues);

        if (issues.length > 0) {
            this.logger.warn(`Rejected facets with ${issues.length} structural issue(s)`);
            throw new ValidationError(`Facet payload is malformed (${issues.length} issue(s)).`, issues);
        }
        return parsed;
    }

    private asRows(facet: FacetName, value: unknown, issues: RowIssue[]): unknown[] | undefined {
        if (value === undefined) return undefined;
        if (value === null) return [];
        if (!Array.isArray(value)) {
            issues.push({ facet, message: `${facet}_json must be an array or null.` });
            return undefined;
        }
        return value;
    }

    private parseAttributes(rows: unknown[], issues: RowIssue[]): AttributeSpec[] {
        const specs: AttributeSpec[] = [];
        rows.forEach((row, index) => {
            if (!isRecord(row)) {
                issues.push({ facet: 'attributes', row: index, message: 'Attribute entry must be an object.' });
                return;
            }
            const name = scalarText(row.attribute ?? row.attribute_name);
            if (!name) {
                issues.push({ facet: 'attributes', row: index, field: 'attribute', message: 'Attribute name is required.' });
                return;
            }
            if (!Array.isArray(row.values)) {
                issues.push({ facet: 'attributes', row: index, field: 'values', message: `Values of "${name}" must be a list.` });
                return;
            }
            const values: string[] = [];
            for (const raw of row.values) {
                const text = scalarText(raw);
                if (text === null) {
                    issues.push({ facet: 'attributes', row: index, field: 'values', message: `Values of "${name}" must be strings or numbers.` });
                    return;
                }
                if (text) values.push(text);
            }
            const rawScope = row.scope;
            let scope: AttributeSpec['scope'] = null;
            if (rawScope === 'global' || rawScope === 'product') {
                scope = rawScope;
            } else if (rawScope !== undefined && rawScope !== null) {
                issues.push({ facet: 'attributes', row: index, field: 'scope', message: 'Scope must be "global" or "product".' });
                return;
            }
            specs.push({ row: index, name, values, scope });
        });
        return specs;
    }

    private parseVariants(rows: unknown[], issues: RowIssue[]): VariantSpec[] {
        const specs: VariantSpec[] = [];
        rows.forEach((row, index) => {
            if (!isRecord(row)) {
                issues.push({ facet: 'variants', row: index, message: 'Variant entry must be an object.' });
                return;
            }
            const before = issues.length;
            const spec: VariantSpec = { row: index, attributes: [] };

            if (row.name !== undefined && row.name !== null) {
                const name = scalarText(row.name);
                if (name === null) issues.push({ facet: 'variants', row: index, field: 'name', message: 'Name must be a string.' });
                else if (name) spec.name = name;
            }
            if (row.sku !== undefined && row.sku !== null) {
                const sku = scalarText(row.sku);
                if (sku === null) issues.push({ facet: 'variants', row: index, field: 'sku', message: 'SKU must be a string.' });
                else if (sku) spec.sku = sku;
            }
            if (row.purchase_price !== undefined) {
                if (row.purchase_price === null) spec.purchasePrice = null;
                else {
                    const price = this.parsePrice(row.purchase_price);
                    if (price === null) issues.push({ facet: 'variants', row: index, field: 'purchase_price', message: 'purchase_price must be a non-negative number.' });
                    else spec.purchasePrice = price;
                }
            }
            if (row.sale_price !== undefined && row.sale_price !== null) {
                const price = this.parsePrice(row.sale_price);
                if (price === null) issues.push({ facet: 'variants', row: index, field: 'sale_price', message: 'sale_price must be a non-negative number.' });
                else spec.salePrice = price;
            }
            if (row.stock_qty !== undefined && row.stock_qty !== null) {
                const stock = typeof row.stock_qty === 'string' ? parseNumeric(row.stock_qty) : row.stock_qty;
                if (typeof stock !== 'number' || !Number.isInteger(stock)) {
                    issues.push({ facet: 'variants', row: index, field: 'stock_qty', message: 'stock_qty must be an integer.' });
                } else {
                    spec.stockQty = stock;
                }
            }
            if (row.images !== undefined && row.images !== null) {
                const images = this.parseImages(row.images);
                if (!images) issues.push({ facet: 'variants', row: index, field: 'images', message: 'images must be a list of strings.' });
                else spec.images = images;
            }

            for (const [key, value] of Object.entries(row)) {
                if (VARIANT_RESERVED_KEYS.has(key) || value === null || value === undefined) continue;
                const text = scalarText(value);
                if (text === null) {
                    issues.push({ facet: 'variants', row: index, field: key, message: `Attribute "${key}" must be a single string or number.` });
                    continue;
                }
                if (text) spec.attributes.push({ key: key.trim(), value: text });
            }

            if (issues.length === before) specs.push(spec);
        });
        return specs;
    }

    private parseGroups(rows: unknown[], issues: RowIssue[]): GroupSpec[] {
        const specs: GroupSpec[] = [];
        rows.forEach((row, index) => {
            if (!isRecord(row)) {
                issues.push({ facet: 'groups', row: index, message: 'Group entry must be an object.' });
                return;
            }
            const name = scalarText(row.name);
            if (!name) {
                issues.push({ facet: 'groups', row: index, field: 'name', message: 'Group name is required.' });
                return;
            }
            const spec: Omit<GroupSpec, 'members'> = { row: index, name };
            const slug = scalarText(row.slug);
            if (slug) spec.slug = slugify(slug);
            if (typeof row.description === 'string') spec.description = row.description;
            if (row.images !== undefined && row.images !== null) {
                const images = this.parseImages(row.images);
                if (!images) {
                    issues.push({ facet: 'groups', row: index, field: 'images', message: 'images must be a list of strings.' });
                    return;
                }
                spec.images = images;
            }
            const members = this.parseMembers(row.members, index, issues);
            if (members) specs.push({ ...spec, members });
        });
        return specs;
    }

    private parseMembers(value: unknown, row: number, issues: RowIssue[]): GroupMembersSpec | null {
        if (Array.isArray(value)) {
            const keys: VariantKey[] = [];
            for (const item of value) {
                const sku = scalarText(item);
                if (sku) {
                    keys.push({ kind: 'sku', sku });
                    continue;
                }
                const selection = isRecord(item) ? this.parseStringMap(item) : null;
                if (!selection || Object.keys(selection).length === 0) {
                    issues.push({ facet: 'groups', row, field: 'members', message: 'Each member must be a SKU or an attribute selection object.' });
                    return null;
                }
                keys.push({ kind: 'selection', values: selection });
            }
            if (keys.length === 0) {
                issues.push({ facet: 'groups', row, field: 'members', message: 'A group needs at least one member.' });
                return null;
            }
            return { kind: 'explicit', keys };
        }
        if (isRecord(value)) {
            const hasClauses = 'match' in value || 'exclude' in value;
            const match = hasClauses ? this.parseCriteria(value.match) : this.parseCriteria(value);
            const exclude = hasClauses ? this.parseCriteria(value.exclude) : {};
            if (!match || !exclude) {
                issues.push({ facet: 'groups', row, field: 'members', message: 'Filter values must be strings or lists of strings.' });
                return null;
            }
            const filter: MemberFilter = { match, exclude };
            return { kind: 'filter', filter };
        }
        issues.push({ facet: 'groups', row, field: 'members', message: 'members must be a list of variant keys or a filter object.' });
        return null;
    }

    private parseCriteria(value: unknown): Record<string, string[]> | null {
        if (value === undefined || value === null) return {};
        if (!isRecord(value)) return null;
        const criteria: Record<string, string[]> = {};
        for (const [key, raw] of Object.entries(value)) {
            const list = Array.isArray(raw) ? raw : [raw];
            const texts: string[] = [];
            for (const item of list) {
                const text = scalarText(item);
                if (text === null) return null;
                if (text) texts.push(text);
            }
            if (texts.length > 0) criteria[key.trim()] = texts;
        }
        return criteria;
    }

    private parseCategories(rows: unknown[], issues: RowIssue[]): CategorySpec[] {
        const specs: CategorySpec[] = [];
        rows.forEach((row, index) => {
            if (!isRecord(row)) {
                issues.push({ facet: 'categories', row: index, message: 'Category entry must be an object.' });
                return;
            }
            const levels = this.categoryLevels(row, index, issues);
            if (levels) specs.push({ row: index, levels });
        });
        return specs;
    }

    private categoryLevels(row: JsonRecord, index: number, issues: RowIssue[]): CategoryLevel[] | null {
        const leafName = scalarText(row.name);
        const leafSlugText = scalarText(row.slug);
        const leafSlug = leafSlugText ? slugify(leafSlugText) : undefined;

        if (row.path !== undefined && row.path !== null) {
            if (!Array.isArray(row.path)) {
                issues.push({ facet: 'categories', row: index, field: 'path', message: 'path must be a list.' });
                return null;
            }
            const levels: CategoryLevel[] = [];
            for (const element of row.path) {
                const level = this.categoryLevel(element);
                if (!level) {
                    issues.push({ facet: 'categories', row: index, field: 'path', message: 'Path elements must be names, {name, slug?} or {id}.' });
                    return null;
                }
                levels.push(level);
            }
            const last = levels[levels.length - 1];
            if (leafName) {
                if (last && last.kind === 'name' && slugify(last.name) === slugify(leafName)) {
                    levels[levels.length - 1] = { kind: 'name', name: last.name, slug: leafSlug ?? last.slug };
                } else {
                    levels.push({ kind: 'name', name: leafName, slug: leafSlug });
                }
            }
            if (levels.length === 0) {
                issues.push({ facet: 'categories', row: index, field: 'name', message: 'Category name is required.' });
                return null;
            }
            return levels;
        }

        if (!leafName) {
            issues.push({ facet: 'categories', row: index, field: 'name', message: 'Category name is required.' });
            return null;
        }
        const levels: CategoryLevel[] = [{ kind: 'name', name: leafName, slug: leafSlug }];
        let parent = row.parent;
        while (parent !== undefined && parent !== null) {
            const level = this.categoryLevel(parent);
            if (!level || levels.length >= MAX_CATEGORY_DEPTH) {
                issues.push({ facet: 'categories', row: index, field: 'parent', message: 'parent must be a name, {name, slug?, parent?} or {id}.' });
                return null;
            }
            levels.unshift(level);
            parent = isRecord(parent) ? parent.parent : undefined;
        }
        return levels;
    }

    private categoryLevel(value: unknown): CategoryLevel | null {
        const name = scalarText(value);
        if (name) return { kind: 'name', name };
        if (!isRecord(value)) return null;
        const id = scalarText(value.id);
        if (id) return { kind: 'id', id };
        const levelName = scalarText(value.name);
        if (!levelName) return null;
        const slug = scalarText(value.slug);
        return { kind: 'name', name: levelName, slug: slug ? slugify(slug) : undefined };
    }

    private parsePrice(value: unknown): number | null {
        const numeric = typeof value === 'string' ? parseNumeric(value.replace(',', '.')) : value;
        if (typeof numeric !== 'number' || !Number.isFinite(numeric) || numeric < 0) return null;
        return Math.round(numeric * 100) / 100;
    }

    private parseImages(value: unknown): string[] | null {
        if (!Array.isArray(value)) return null;
        const images: string[] = [];
        for (const item of value) {
            if (typeof item !== 'string') return null;
            if (item.trim()) images.push(item.trim());
        }
        return images;
    }

    private parseStringMap(value: JsonRecord): Record<string, string> | null {
        const map: Record<string, string> = {};
        for (const [key, raw] of Object.entries(value)) {
            const text = scalarText(raw);
            if (text === null) return null;
            if (text) map[key.trim()] = text;
        }
        return map;
    }
}
