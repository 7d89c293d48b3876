import { Injectable } from '@nestjs/common';
import { AttributeOption, AttributeType } from '../entities/attribute.entity';
import { Category, ProductCategory } from '../entities/category.entity';
import { Variant } from '../entities/variant.entity';
import { VariantGroup } from '../entities/variant-group.entity';

export interface SerializableState {
    readonly productId: string;
    readonly types: ReadonlyMap<string, AttributeType>;
    readonly options: ReadonlyMap<string, AttributeOption>;
    readonly memberships: ReadonlyMap<string, ProductCategory>;
    readonly categories: {
        get(id: string): Category | undefined;
        ancestors(id: string): Category[];
    };
    activeVariants(): Variant[];
    activeGroups(): VariantGroup[];
}

export interface AttributeFacetRow {
    attribute: string;
    values: string[];
    scope?: 'product';
}

export type VariantFacetRow = Record<string, string | number | string[] | null>;

export interface GroupFacetRow {
    name: string;
    slug: string;
    description: string;
    images: string[];
    members: Array<Record<string, string>> | { match: Record<string, string[]>; exclude: Record<string, string[]> };
}

export interface CategoryFacetRow {
    name: string;
    slug: string;
    path: Array<{ name: string; slug: string }>;
}

export interface SerializedFacets {
    attributes_json: AttributeFacetRow[];
    variants_json: VariantFacetRow[];
    groups_json: GroupFacetRow[];
    categories_json: CategoryFacetRow[];
}

const byOrder = <T extends { DisplayOrder: number; Id: string }>(a: T, b: T): number =>
    a.DisplayOrder - b.DisplayOrder || (a.Id < b.Id ? -1 : a.Id > b.Id ? 1 : 0);

/**
 * Writes the normalized rows back out as the four edit facets. Feeding the result to a
 * save reproduces the same rows.
 */
@Injectable()
export class FacetSerializer {
    serialize(state: SerializableState): SerializedFacets {
        return {
            attributes_json: this.attributes(state),
            variants_json: this.variants(state),
            groups_json: this.groups(state),
            categories_json: this.categories(state),
        };
    }

    attributes(state: SerializableState): AttributeFacetRow[] {
        const used = new Set(state.activeVariants().flatMap((variant) => Object.values(variant.Selection)));
        const byType = new Map<string, AttributeOption[]>();
        for (const option of state.options.values()) {
            if (option.ProductId !== state.productId && !used.has(option.Id)) continue;
            byType.set(option.AttributeTypeId, [...(byType.get(option.AttributeTypeId) ?? []), option]);
        }
        return [...byType.keys()]
            .flatMap((typeId) => {
                const type = state.types.get(typeId);
                return type ? [type] : [];
            })
            .sort(byOrder)
            .map((type) => {
                const row: AttributeFacetRow = {
                    attribute: type.Name,
                    values: (byType.get(type.Id) ?? []).sort(byOrder).map((option) => option.Value),
                };
                if (type.Scope === 'product') row.scope = 'product';
                return row;
            });
    }

    variants(state: SerializableState): VariantFacetRow[] {
        return state.activeVariants().map((variant) => {
            const row: VariantFacetRow = {
                name: variant.Name,
                sku: variant.Sku,
                purchase_price: variant.PurchasePrice,
                sale_price: variant.SalePrice,
                stock_qty: variant.StockQty,
                images: variant.Images,
            };
            Object.assign(row, this.selectionKey(state, variant));
            return row;
        });
    }

    groups(state: SerializableState): GroupFacetRow[] {
        const variants = new Map(state.activeVariants().map((variant) => [variant.Id, variant] as const));
        return state.activeGroups().map((group) => ({
            name: group.Name,
            slug: group.Slug,
            description: group.Description,
            images: group.Images,
            members: group.MemberFilter
                ? { match: group.MemberFilter.match, exclude: group.MemberFilter.exclude }
                : group.MemberVariantIds.flatMap((id) => {
                      const variant = variants.get(id);
                      return variant ? [this.selectionKey(state, variant)] : [];
                  }),
        }));
    }

    /** Explicit memberships only; implied ancestors come back on their own. */
    categories(state: Pick<SerializableState, 'memberships' | 'categories'>): CategoryFacetRow[] {
        const rows: Array<CategoryFacetRow & { sortKey: string }> = [];
        for (const membership of state.memberships.values()) {
            if (!membership.IsExplicit) continue;
            const leaf = state.categories.get(membership.CategoryId);
            if (!leaf) continue;
            const chain = [...state.categories.ancestors(leaf.Id), leaf];
            rows.push({
                name: leaf.Name,
                slug: leaf.Slug,
                path: chain.map((node) => ({ name: node.Name, slug: node.Slug })),
                sortKey: leaf.Path,
            });
        }
        return rows
            .sort((a, b) => a.sortKey.localeCompare(b.sortKey))
            .map(({ name, slug, path }) => ({ name, slug, path }));
    }

    private selectionKey(state: SerializableState, variant: Variant): Record<string, string> {
        const key: Record<string, string> = {};
        for (const [typeId, optionId] of Object.entries(variant.Selection)) {
            const type = state.types.get(typeId);
            const option = state.options.get(optionId);
            if (type && option) key[type.Slug] = option.Value;
        }
        return key;
    }
}
