import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { ConcurrencyConflict, ReconciliationConflict, ReferentialIntegrityError } from '../../common/errors/catalog.errors';
import { SupabaseService } from '../../common/supabase.service';
import { AttributeOption, AttributeType } from '../entities/attribute.entity';
import { Category, ProductCategory } from '../entities/category.entity';
import { CatalogChangeSet, CatalogEntityName } from '../entities/change-set.entity';
import { Product } from '../entities/product.entity';
import { Variant } from '../entities/variant.entity';
import { VariantGroup } from '../entities/variant-group.entity';
import { AttributeCatalogRows, CatalogStore, ProductGraph } from './catalog-store.interface';

export const CATALOG_TABLES: Record<CatalogEntityName, string> = {
    Product: 'Products',
    AttributeType: 'AttributeTypes',
    AttributeOption: 'AttributeOptions',
    Variant: 'ProductVariants',
    VariantGroup: 'VariantGroups',
    Category: 'Categories',
    ProductCategory: 'ProductCategories',
};

// Raised by apply_catalog_changeset when the locked product row has moved on.
const STALE_VERSION_SQLSTATE = 'P0409';
const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

@Injectable()
export class SupabaseCatalogStore implements CatalogStore {
    private readonly logger = new Logger(SupabaseCatalogStore.name);

    constructor(private readonly supabaseService: SupabaseService) {}

    private getSupabaseClient(): SupabaseClient {
        return this.supabaseService.getServiceClient();
    }

    async getProduct(productId: string): Promise<Product | null> {
        const { data, error } = await this.getSupabaseClient()
            .from(CATALOG_TABLES.Product)
            .select('*')
            .eq('Id', productId)
            .maybeSingle<Product>();

        if (error) {
            this.logger.error(`Error fetching product ${productId}: ${error.message}`);
            throw new InternalServerErrorException('Failed to retrieve product');
        }
        return data;
    }

    async loadProductGraph(productId: string): Promise<ProductGraph> {
        const supabase = this.getSupabaseClient();
        const [variants, groups, memberships] = await Promise.all([
            supabase.from(CATALOG_TABLES.Variant).select('*').eq('ProductId', productId).eq('IsActive', true).returns<Variant[]>(),
            supabase.from(CATALOG_TABLES.VariantGroup).select('*').eq('ProductId', productId).eq('IsActive', true).returns<VariantGroup[]>(),
            supabase.from(CATALOG_TABLES.ProductCategory).select('*').eq('ProductId', productId).returns<ProductCategory[]>(),
        ]);

        const error = variants.error ?? groups.error ?? memberships.error;
        if (error) {
            this.logger.error(`Error loading graph of product ${productId}: ${error.message}`);
            throw new InternalServerErrorException('Failed to load product variants, groups and categories');
        }
        return {
            variants: variants.data ?? [],
            groups: groups.data ?? [],
            memberships: memberships.data ?? [],
        };
    }

    async loadAttributeCatalog(productId: string | null): Promise<AttributeCatalogRows> {
        const supabase = this.getSupabaseClient();
        const ownerFilter = productId ? `ProductId.is.null,ProductId.eq.${productId}` : 'ProductId.is.null';
        const [types, options] = await Promise.all([
            supabase.from(CATALOG_TABLES.AttributeType).select('*').or(ownerFilter).returns<AttributeType[]>(),
            supabase.from(CATALOG_TABLES.AttributeOption).select('*').or(ownerFilter).returns<AttributeOption[]>(),
        ]);

        const error = types.error ?? options.error;
        if (error) {
            this.logger.error(`Error loading attribute catalog: ${error.message}`);
            throw new InternalServerErrorException('Failed to load attribute catalog');
        }
        return { types: types.data ?? [], options: options.data ?? [] };
    }

    async loadCategories(): Promise<Category[]> {
        const { data, error } = await this.getSupabaseClient()
            .from(CATALOG_TABLES.Category)
            .select('*')
            .order('Path', { ascending: true })
            .returns<Category[]>();

        if (error) {
            this.logger.error(`Error loading categories: ${error.message}`);
            throw new InternalServerErrorException('Failed to load categories');
        }
        return data ?? [];
    }

    async loadMembershipsOfCategories(categoryIds: string[]): Promise<ProductCategory[]> {
        if (categoryIds.length === 0) return [];
        const { data, error } = await this.getSupabaseClient()
            .from(CATALOG_TABLES.ProductCategory)
            .select('*')
            .in('CategoryId', categoryIds)
            .returns<ProductCategory[]>();

        if (error) {
            this.logger.error(`Error loading memberships of ${categoryIds.length} categories: ${error.message}`);
            throw new InternalServerErrorException('Failed to load category memberships');
        }
        return data ?? [];
    }

    async countCategoryMemberships(): Promise<Map<string, number>> {
        const { data, error } = await this.getSupabaseClient()
            .from(CATALOG_TABLES.ProductCategory)
            .select('CategoryId')
            .returns<Array<Pick<ProductCategory, 'CategoryId'>>>();

        if (error) {
            this.logger.error(`Error counting category memberships: ${error.message}`);
            throw new InternalServerErrorException('Failed to count category memberships');
        }
        const counts = new Map<string, number>();
        for (const row of data ?? []) {
            counts.set(row.CategoryId, (counts.get(row.CategoryId) ?? 0) + 1);
        }
        return counts;
    }

    async isProductSlugTaken(slug: string): Promise<boolean> {
        const { count, error } = await this.getSupabaseClient()
            .from(CATALOG_TABLES.Product)
            .select('Id', { count: 'exact', head: true })
            .eq('Slug', slug);

        if (error) {
            this.logger.error(`Error checking product slug "${slug}": ${error.message}`);
            throw new InternalServerErrorException('Failed to check product slug');
        }
        return (count ?? 0) > 0;
    }

    /**
     * One round trip: apply_catalog_changeset locks the product row, compares versions,
     * applies every entry and records the change set inside a single transaction.
     */
    async commit(changeSet: CatalogChangeSet): Promise<void> {
        const { error } = await this.getSupabaseClient().rpc('apply_catalog_changeset', {
            p_change_set: { ...changeSet, Tables: CATALOG_TABLES },
        });

        if (error) {
            throw this.translateCommitError(changeSet, error);
        }
        this.logger.log(`Committed change set ${changeSet.Id} (${changeSet.Entries.length} entries, product ${changeSet.ProductId ?? '-'})`);
    }

    private translateCommitError(changeSet: CatalogChangeSet, error: PostgrestError): Error {
        if (error.code === STALE_VERSION_SQLSTATE) {
            const productId = error.hint || changeSet.ProductId;
            const expected =
                productId === null
                    ? null
                    : productId === changeSet.ProductId
                      ? changeSet.ExpectedVersion
                      : changeSet.ExpectedProductVersions[productId];
            if (productId !== null && typeof expected === 'number') {
                const actual = Number.parseInt(error.details ?? '', 10);
                return new ConcurrencyConflict(productId, expected, Number.isNaN(actual) ? null : actual);
            }
        }
        if (error.code === UNIQUE_VIOLATION) {
            return new ReconciliationConflict(`Change set ${changeSet.Id} violates a uniqueness rule: ${error.message}`);
        }
        if (error.code === FOREIGN_KEY_VIOLATION) {
            return new ReferentialIntegrityError(`Change set ${changeSet.Id} references a missing row: ${error.message}`);
        }
        this.logger.error(`Failed to commit change set ${changeSet.Id}: ${error.message}`, error.details);
        return new InternalServerErrorException(`Could not commit catalog changes: ${error.message}`);
    }
}
