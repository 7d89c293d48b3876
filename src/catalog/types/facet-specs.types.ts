import { AttributeScope } from '../entities/attribute.entity';

// Parsed, typed forms of the four JSON facets. `row` is the index in the incoming array.

export interface AttributeSpec {
    row: number;
    name: string;
    values: string[];
    scope: AttributeScope | null;
}

export interface VariantAttributeValue {
    key: string; // attribute name or slug exactly as the operator typed it
    value: string;
}

/**
 * Commercial fields left undefined were not sent: a matched variant keeps its value,
 * a new variant gets the default.
 */
export interface VariantSpec {
    row: number;
    name?: string;
    sku?: string;
    purchasePrice?: number | null;
    salePrice?: number;
    stockQty?: number;
    images?: string[];
    attributes: VariantAttributeValue[];
}

export type VariantKey =
    | { kind: 'sku'; sku: string }
    | { kind: 'selection'; values: Record<string, string> };

export interface MemberFilter {
    match: Record<string, string[]>;
    exclude: Record<string, string[]>;
}

export type GroupMembersSpec =
    | { kind: 'explicit'; keys: VariantKey[] }
    | { kind: 'filter'; filter: MemberFilter };

export interface GroupSpec {
    row: number;
    name: string;
    slug?: string;
    description?: string;
    images?: string[];
    members: GroupMembersSpec;
}

export type CategoryLevel =
    | { kind: 'name'; name: string; slug?: string }
    | { kind: 'id'; id: string };

export interface CategorySpec {
    row: number;
    levels: CategoryLevel[]; // root first, leaf last
}

export interface ParsedFacets {
    attributes?: AttributeSpec[];
    variants?: VariantSpec[];
    groups?: GroupSpec[];
    categories?: CategorySpec[];
}

// Raw facet payloads as they arrive; undefined = not sent, null = explicit clear.
export interface RawFacets {
    attributes_json?: unknown;
    variants_json?: unknown;
    groups_json?: unknown;
    categories_json?: unknown;
}
