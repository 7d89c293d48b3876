import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import { CatalogModule } from '../catalog/catalog.module';
import { CATALOG_STORE, CLOCK, Clock, ID_GENERATOR, IdGenerator } from '../catalog/catalog.constants';
import { CatalogSyncService } from '../catalog/catalog-sync.service';
import { CategoryMembershipService } from '../catalog/category-membership.service';
import { CategoryTreeService } from '../catalog/category-tree.service';
import { PriceHistoryService } from '../catalog/collaborators/price-history.service';
import { Product } from '../catalog/entities/product.entity';
import { ProductReadModelService } from '../catalog/product-read-model.service';
import { InMemoryCatalogStore } from '../catalog/store/in-memory-catalog.store';
import { ProductWorkspace } from '../catalog/workspace/product-workspace';
import { AttributeCatalogRows, ProductGraph } from '../catalog/store/catalog-store.interface';
import { Category } from '../catalog/entities/category.entity';

export const FIXED_NOW = '2026-01-15T10:00:00.000Z';

/** id-0001, id-0002, ... so creation order is also sort order. */
export function sequentialIds(prefix = 'id'): IdGenerator {
    let counter = 0;
    return () => `${prefix}-${String(++counter).padStart(4, '0')}`;
}

export function fixedClock(iso = FIXED_NOW): Clock {
    return () => new Date(iso);
}

export function productFixture(overrides: Partial<Product> = {}): Product {
    return {
        Id: 'product-1',
        Name: 'Linha de Pesca',
        Slug: 'linha-de-pesca',
        Description: '',
        IsActive: true,
        PurchasePrice: null,
        SalePrice: null,
        StockQty: 0,
        Images: [],
        AttributesJson: null,
        VariantsJson: null,
        GroupsJson: null,
        CategoriesJson: null,
        AttributesHash: null,
        VariantsHash: null,
        GroupsHash: null,
        CategoriesHash: null,
        CompatibilityJson: [],
        Stats: null,
        Version: 1,
        CreatedAt: FIXED_NOW,
        UpdatedAt: FIXED_NOW,
        ...overrides,
    };
}

export interface WorkspaceFixture {
    product?: Partial<Product>;
    isNew?: boolean;
    graph?: Partial<ProductGraph>;
    catalog?: Partial<AttributeCatalogRows>;
    categories?: Category[];
    ids?: IdGenerator;
}

/** A workspace over hand-made rows, for reconciler tests that need no store. */
export function workspaceFixture(fixture: WorkspaceFixture = {}): ProductWorkspace {
    return new ProductWorkspace(
        {
            product: productFixture(fixture.product),
            isNew: fixture.isNew ?? false,
            graph: { variants: [], groups: [], memberships: [], ...fixture.graph },
            catalog: { types: [], options: [], ...fixture.catalog },
            categories: fixture.categories ?? [],
        },
        fixture.ids ?? sequentialIds(),
        FIXED_NOW,
    );
}

export interface CatalogTestContext {
    moduleRef: TestingModule;
    store: InMemoryCatalogStore;
    sync: CatalogSyncService;
    readModel: ProductReadModelService;
    memberships: CategoryMembershipService;
    categoryTree: CategoryTreeService;
    priceHistory: PriceHistoryService;
    close(): Promise<void>;
}

/**
 * The whole catalog module over an in-memory store, with sequential ids and a frozen
 * clock. Event listeners are live, so committed change sets reach price history.
 */
export async function createCatalogTestingModule(): Promise<CatalogTestContext> {
    const store = new InMemoryCatalogStore();
    const moduleRef = await Test.createTestingModule({
        imports: [
            ConfigModule.forRoot({
                isGlobal: true,
                ignoreEnvFile: true,
                load: [() => ({ CATALOG_STORE: 'memory', CATALOG_MAX_BULK_ROWS: '10' })],
            }),
            EventEmitterModule.forRoot(),
            CatalogModule,
        ],
    })
        .overrideProvider(CATALOG_STORE)
        .useValue(store)
        .overrideProvider(ID_GENERATOR)
        .useValue(sequentialIds())
        .overrideProvider(CLOCK)
        .useValue(fixedClock())
        .compile();
    await moduleRef.init();

    return {
        moduleRef,
        store,
        sync: moduleRef.get(CatalogSyncService),
        readModel: moduleRef.get(ProductReadModelService),
        memberships: moduleRef.get(CategoryMembershipService),
        categoryTree: moduleRef.get(CategoryTreeService),
        priceHistory: moduleRef.get(PriceHistoryService),
        close: () => moduleRef.close(),
    };
}
