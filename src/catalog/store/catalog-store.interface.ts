import { AttributeOption, AttributeType } from '../entities/attribute.entity';
import { Category, ProductCategory } from '../entities/category.entity';
import { CatalogChangeSet } from '../entities/change-set.entity';
import { Product } from '../entities/product.entity';
import { Variant } from '../entities/variant.entity';
import { VariantGroup } from '../entities/variant-group.entity';

export interface ProductGraph {
    variants: Variant[]; // active only
    groups: VariantGroup[]; // active only
    memberships: ProductCategory[];
}

export interface AttributeCatalogRows {
    types: AttributeType[]; // global types plus the product's own
    options: AttributeOption[]; // global options plus the product's own
}

/**
 * Persistence boundary of the catalog core. Reads return plain rows; every write goes
 * through commit(), which must apply the whole change set or nothing.
 */
export interface CatalogStore {
    getProduct(productId: string): Promise<Product | null>;
    loadProductGraph(productId: string): Promise<ProductGraph>;
    loadAttributeCatalog(productId: string | null): Promise<AttributeCatalogRows>;
    loadCategories(): Promise<Category[]>;
    loadMembershipsOfCategories(categoryIds: string[]): Promise<ProductCategory[]>;
    countCategoryMemberships(): Promise<Map<string, number>>;
    isProductSlugTaken(slug: string): Promise<boolean>;

    /**
     * Applies all entries atomically. When ExpectedVersion is set the product's stored
     * Version must still equal it, and so must every entry of ExpectedProductVersions;
     * otherwise ConcurrencyConflict is thrown and nothing is written.
     */
    commit(changeSet: CatalogChangeSet): Promise<void>;
}
