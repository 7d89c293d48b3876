import { canonicalJson } from '../../common/utils/stable-hash';
import {
    CatalogEntityMap,
    CatalogEntityName,
    ChangeEntry,
    ChangeEntryOf,
    ChangeOperation,
} from '../entities/change-set.entity';

type Buckets = { [E in CatalogEntityName]: Map<string, ChangeEntryOf<E>> };

// Order in which entries are applied: parents before the rows that reference them.
const APPLY_ORDER: CatalogEntityName[] = [
    'Product',
    'AttributeType',
    'AttributeOption',
    'Category',
    'Variant',
    'VariantGroup',
    'ProductCategory',
];

/**
 * Collects the net effect of a reconciliation run. Repeated touches of the same row
 * collapse into one entry and updates that end where they started are dropped, so an
 * unchanged facet yields no entries at all.
 */
export class ChangeRecorder {
    private readonly buckets: Buckets = {
        Product: new Map(),
        AttributeType: new Map(),
        AttributeOption: new Map(),
        Variant: new Map(),
        VariantGroup: new Map(),
        Category: new Map(),
        ProductCategory: new Map(),
    };

    record<E extends CatalogEntityName>(
        entity: E,
        op: ChangeOperation,
        id: string,
        before: CatalogEntityMap[E] | null,
        after: CatalogEntityMap[E] | null,
    ): void {
        const bucket: Map<string, ChangeEntryOf<E>> = this.buckets[entity];
        const previous = bucket.get(id);

        if (!previous) {
            if (op === 'update' && canonicalJson(before) === canonicalJson(after)) return;
            bucket.set(id, { entity, op, id, before, after });
            return;
        }

        if (previous.op === 'create') {
            if (op === 'retire' || op === 'delete') bucket.delete(id);
            else bucket.set(id, { ...previous, after });
            return;
        }

        const merged: ChangeEntryOf<E> = { entity, op: op === 'create' ? 'update' : op, id, before: previous.before, after };
        if (merged.op === 'update' && canonicalJson(merged.before) === canonicalJson(merged.after)) {
            bucket.delete(id);
            return;
        }
        bucket.set(id, merged);
    }

    has(entity: CatalogEntityName, id: string): boolean {
        return this.buckets[entity].has(id);
    }

    count(exclude: CatalogEntityName[] = []): number {
        return APPLY_ORDER.filter((name) => !exclude.includes(name)).reduce((sum, name) => sum + this.buckets[name].size, 0);
    }

    countOf(entity: CatalogEntityName): number {
        return this.buckets[entity].size;
    }

    entries(): ChangeEntry[] {
        return [
            ...this.buckets.Product.values(),
            ...this.buckets.AttributeType.values(),
            ...this.buckets.AttributeOption.values(),
            ...this.buckets.Category.values(),
            ...this.buckets.Variant.values(),
            ...this.buckets.VariantGroup.values(),
            ...this.buckets.ProductCategory.values(),
        ];
    }
}
