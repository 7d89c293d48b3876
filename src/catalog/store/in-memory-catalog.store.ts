import { Injectable, Logger } from '@nestjs/common';
import { ConcurrencyConflict, ReconciliationConflict, ReferentialIntegrityError } from '../../common/errors/catalog.errors';
import { normalizeValue } from '../../common/utils/slugify';
import { AttributeOption, AttributeType } from '../entities/attribute.entity';
import { Category, ProductCategory } from '../entities/category.entity';
import { CatalogChangeSet, CatalogEntityMap, CatalogEntityName, ChangeEntryOf } from '../entities/change-set.entity';
import { Product } from '../entities/product.entity';
import { Variant } from '../entities/variant.entity';
import { VariantGroup } from '../entities/variant-group.entity';
import { AttributeCatalogRows, CatalogStore, ProductGraph } from './catalog-store.interface';

type Tables = { [E in CatalogEntityName]: Map<string, CatalogEntityMap[E]> };

function emptyTables(): Tables {
    return {
        Product: new Map(),
        AttributeType: new Map(),
        AttributeOption: new Map(),
        Variant: new Map(),
        VariantGroup: new Map(),
        Category: new Map(),
        ProductCategory: new Map(),
    };
}

/**
 * Process-local store with the same contract as the Supabase one: commit() applies a
 * change set to a copy of the tables, checks the unique constraints the database
 * enforces, and swaps the copy in only when everything passed.
 */
@Injectable()
export class InMemoryCatalogStore implements CatalogStore {
    private readonly logger = new Logger(InMemoryCatalogStore.name);
    private tables: Tables = emptyTables();
    private readonly committed: CatalogChangeSet[] = [];

    async getProduct(productId: string): Promise<Product | null> {
        const product = this.tables.Product.get(productId);
        return product ? structuredClone(product) : null;
    }

    async loadProductGraph(productId: string): Promise<ProductGraph> {
        return {
            variants: this.rows('Variant').filter((row) => row.ProductId === productId && row.IsActive),
            groups: this.rows('VariantGroup').filter((row) => row.ProductId === productId && row.IsActive),
            memberships: this.rows('ProductCategory').filter((row) => row.ProductId === productId),
        };
    }

    async loadAttributeCatalog(productId: string | null): Promise<AttributeCatalogRows> {
        const visible = (owner: string | null): boolean => owner === null || owner === productId;
        return {
            types: this.rows('AttributeType').filter((row) => visible(row.ProductId)),
            options: this.rows('AttributeOption').filter((row) => visible(row.ProductId)),
        };
    }

    async loadCategories(): Promise<Category[]> {
        return this.rows('Category');
    }

    async loadMembershipsOfCategories(categoryIds: string[]): Promise<ProductCategory[]> {
        const wanted = new Set(categoryIds);
        return this.rows('ProductCategory').filter((row) => wanted.has(row.CategoryId));
    }

    async countCategoryMemberships(): Promise<Map<string, number>> {
        const counts = new Map<string, number>();
        for (const membership of this.tables.ProductCategory.values()) {
            counts.set(membership.CategoryId, (counts.get(membership.CategoryId) ?? 0) + 1);
        }
        return counts;
    }

    async isProductSlugTaken(slug: string): Promise<boolean> {
        return [...this.tables.Product.values()].some((product) => product.Slug === slug);
    }

    async commit(changeSet: CatalogChangeSet): Promise<void> {
        const draft = this.copyTables();

        const expected = { ...changeSet.ExpectedProductVersions };
        if (changeSet.ProductId !== null && changeSet.ExpectedVersion !== null) {
            expected[changeSet.ProductId] = changeSet.ExpectedVersion;
        }
        for (const [productId, version] of Object.entries(expected)) {
            const stored = draft.Product.get(productId);
            if (!stored || stored.Version !== version) {
                throw new ConcurrencyConflict(productId, version, stored?.Version ?? null);
            }
        }

        for (const entry of changeSet.Entries) {
            switch (entry.entity) {
                case 'Product':
                    this.apply(draft.Product, entry);
                    break;
                case 'AttributeType':
                    this.apply(draft.AttributeType, entry);
                    break;
                case 'AttributeOption':
                    this.apply(draft.AttributeOption, entry);
                    break;
                case 'Variant':
                    this.apply(draft.Variant, entry);
                    break;
                case 'VariantGroup':
                    this.apply(draft.VariantGroup, entry);
                    break;
                case 'Category':
                    this.apply(draft.Category, entry);
                    break;
                case 'ProductCategory':
                    this.apply(draft.ProductCategory, entry);
                    break;
            }
        }

        this.checkConstraints(draft);
        this.tables = draft;
        this.committed.push(structuredClone(changeSet));
        this.logger.debug(`Committed change set ${changeSet.Id} with ${changeSet.Entries.length} entries`);
    }

    /** Committed change sets, oldest first. */
    changeSets(): CatalogChangeSet[] {
        return structuredClone(this.committed);
    }

    /** Every row of an entity, retired ones included. */
    rows<E extends CatalogEntityName>(entity: E): CatalogEntityMap[E][] {
        const table: Map<string, CatalogEntityMap[E]> = this.tables[entity];
        return [...table.values()].map((row) => structuredClone(row));
    }

    private apply<E extends CatalogEntityName>(table: Map<string, CatalogEntityMap[E]>, entry: ChangeEntryOf<E>): void {
        if (entry.op === 'delete') {
            if (!table.delete(entry.id)) {
                throw new ReferentialIntegrityError(`${entry.entity} ${entry.id} cannot be deleted: it does not exist.`);
            }
            return;
        }
        if (!entry.after) {
            throw new ReferentialIntegrityError(`${entry.entity} ${entry.id}: ${entry.op} entry carries no row.`);
        }
        if (entry.op === 'create' && table.has(entry.id)) {
            throw new ReconciliationConflict(`${entry.entity} ${entry.id} already exists.`);
        }
        if (entry.op !== 'create' && !table.has(entry.id)) {
            throw new ReferentialIntegrityError(`${entry.entity} ${entry.id} does not exist.`);
        }
        table.set(entry.id, structuredClone(entry.after));
    }

    private checkConstraints(tables: Tables): void {
        this.unique(tables.Product.values(), (row: Product) => row.Slug, 'product slug');
        this.unique(tables.AttributeType.values(), (row: AttributeType) => `${row.Slug}|${row.Scope}|${row.ProductId ?? ''}`, 'attribute type');
        this.unique(
            tables.AttributeOption.values(),
            (row: AttributeOption) => `${row.AttributeTypeId}|${row.ProductId ?? ''}|${normalizeValue(row.Value)}`,
            'attribute option',
        );
        this.unique(
            [...tables.Variant.values()].filter((row) => row.IsActive),
            (row: Variant) => `${row.ProductId}|${row.Sku}`,
            'variant SKU',
        );
        this.unique(
            [...tables.VariantGroup.values()].filter((row) => row.IsActive),
            (row: VariantGroup) => `${row.ProductId}|${row.Slug}`,
            'group slug',
        );
        this.unique(tables.Category.values(), (row: Category) => `${row.ParentId ?? ''}|${row.Slug}`, 'category slug');

        for (const membership of tables.ProductCategory.values()) {
            this.requireRow(tables.Product, membership.ProductId, membership);
            this.requireRow(tables.Category, membership.CategoryId, membership);
        }
        for (const variant of tables.Variant.values()) this.requireRow(tables.Product, variant.ProductId, variant);
        for (const group of tables.VariantGroup.values()) this.requireRow(tables.Product, group.ProductId, group);
    }

    private unique<T>(rows: Iterable<T>, key: (row: T) => string, label: string): void {
        const seen = new Set<string>();
        for (const row of rows) {
            const value = key(row);
            if (seen.has(value)) {
                throw new ReconciliationConflict(`Duplicate ${label}: ${value}.`);
            }
            seen.add(value);
        }
    }

    private requireRow(table: Map<string, unknown>, id: string, referrer: Product | Variant | VariantGroup | ProductCategory): void {
        if (!table.has(id)) {
            throw new ReferentialIntegrityError(`Row ${referrer.Id} references missing row ${id}.`);
        }
    }

    private copyTables(): Tables {
        return {
            Product: new Map(this.tables.Product),
            AttributeType: new Map(this.tables.AttributeType),
            AttributeOption: new Map(this.tables.AttributeOption),
            Variant: new Map(this.tables.Variant),
            VariantGroup: new Map(this.tables.VariantGroup),
            Category: new Map(this.tables.Category),
            ProductCategory: new Map(this.tables.ProductCategory),
        };
    }
}
