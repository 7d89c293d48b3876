import { AttributeOption, AttributeType } from './attribute.entity';
import { Category, ProductCategory } from './category.entity';
import { Product } from './product.entity';
import { Variant } from './variant.entity';
import { VariantGroup } from './variant-group.entity';

export interface CatalogEntityMap {
    Product: Product;
    AttributeType: AttributeType;
    AttributeOption: AttributeOption;
    Variant: Variant;
    VariantGroup: VariantGroup;
    Category: Category;
    ProductCategory: ProductCategory;
}

export type CatalogEntityName = keyof CatalogEntityMap;

// retire = soft delete (row kept with IsActive = false), delete = row removed
export type ChangeOperation = 'create' | 'update' | 'retire' | 'delete';

export interface ChangeEntryOf<E extends CatalogEntityName> {
    entity: E;
    op: ChangeOperation;
    id: string;
    before: CatalogEntityMap[E] | null;
    after: CatalogEntityMap[E] | null;
}

export type ChangeEntry = { [E in CatalogEntityName]: ChangeEntryOf<E> }[CatalogEntityName];

export interface PriceTransition {
    variantId: string;
    sku: string;
    field: 'purchase' | 'sale';
    oldPrice: number | null;
    newPrice: number | null;
}

export interface CatalogChangeSet {
    Id: string; // uuid PRIMARY KEY, the transaction id
    ProductId: string | null; // uuid, NULL for tree-wide edits
    ExpectedVersion: number | null; // checked under lock before anything is applied
    ExpectedProductVersions: Record<string, number>; // jsonb NOT NULL DEFAULT '{}', productId -> Version for tree-wide rewrites
    Actor: string | null; // text
    Entries: ChangeEntry[]; // jsonb NOT NULL
    PriceTransitions: PriceTransition[]; // jsonb NOT NULL
    CreatedAt: string; // timestamptz NOT NULL DEFAULT now()
}
