import { ConcurrencyConflict, ReconciliationConflict, ReferentialIntegrityError } from '../../common/errors/catalog.errors';
import { CatalogChangeSet, ChangeEntry } from '../entities/change-set.entity';
import { Variant } from '../entities/variant.entity';
import { FIXED_NOW, productFixture } from '../../testing/catalog-testing';
import { InMemoryCatalogStore } from './in-memory-catalog.store';

const changeSet = (id: string, entries: ChangeEntry[], expectedVersion: number | null = null): CatalogChangeSet => ({
    Id: id,
    ProductId: 'product-1',
    ExpectedVersion: expectedVersion,
    ExpectedProductVersions: {},
    Actor: null,
    Entries: entries,
    PriceTransitions: [],
    CreatedAt: FIXED_NOW,
});

const variant = (id: string, sku: string): Variant => ({
    Id: id,
    ProductId: 'product-1',
    Sku: sku,
    Name: sku,
    PurchasePrice: null,
    SalePrice: 0,
    StockQty: 0,
    Images: [],
    Selection: {},
    IsActive: true,
    RetiredAt: null,
    CreatedAt: FIXED_NOW,
    UpdatedAt: FIXED_NOW,
});

describe('InMemoryCatalogStore', () => {
    let store: InMemoryCatalogStore;
    const product = productFixture();

    beforeEach(async () => {
        store = new InMemoryCatalogStore();
        await store.commit(changeSet('cs-1', [{ entity: 'Product', op: 'create', id: product.Id, before: null, after: product }]));
    });

    it('applies a change set and returns copies of the rows', async () => {
        const stored = await store.getProduct('product-1');
        expect(stored).toEqual(product);
        expect(stored).not.toBe(product);
        expect(await store.isProductSlugTaken('linha-de-pesca')).toBe(true);
        expect(store.changeSets().map((set) => set.Id)).toEqual(['cs-1']);
    });

    it('rejects a change set whose expected version is stale', async () => {
        const renamed = { ...product, Name: 'Outra', Version: 2 };

        await expect(
            store.commit(changeSet('cs-2', [{ entity: 'Product', op: 'update', id: product.Id, before: product, after: renamed }], 7)),
        ).rejects.toBeInstanceOf(ConcurrencyConflict);
        expect((await store.getProduct('product-1'))?.Name).toBe('Linha de Pesca');
    });

    it('checks the versions of products a tree-wide change set rewrites', async () => {
        const renamed = { ...product, Name: 'Outra', Version: 2 };
        const treeWide = (id: string, version: number): CatalogChangeSet => ({
            ...changeSet(id, [{ entity: 'Product', op: 'update', id: product.Id, before: product, after: renamed }]),
            ProductId: null,
            ExpectedProductVersions: { 'product-1': version },
        });

        await expect(store.commit(treeWide('cs-2', 3))).rejects.toMatchObject({ productId: 'product-1', expectedVersion: 3, actualVersion: 1 });
        expect((await store.getProduct('product-1'))?.Name).toBe('Linha de Pesca');

        await store.commit(treeWide('cs-3', 1));
        expect((await store.getProduct('product-1'))?.Name).toBe('Outra');
    });

    it('writes nothing when a unique constraint fails', async () => {
        const renamed = { ...product, Name: 'Outra', Version: 2 };

        await expect(
            store.commit(
                changeSet(
                    'cs-2',
                    [
                        { entity: 'Product', op: 'update', id: product.Id, before: product, after: renamed },
                        { entity: 'Variant', op: 'create', id: 'v-1', before: null, after: variant('v-1', 'DUP') },
                        { entity: 'Variant', op: 'create', id: 'v-2', before: null, after: variant('v-2', 'DUP') },
                    ],
                    1,
                ),
            ),
        ).rejects.toBeInstanceOf(ReconciliationConflict);
        expect(store.rows('Variant')).toEqual([]);
        expect((await store.getProduct('product-1'))?.Version).toBe(1);
    });

    it('allows a retired variant to keep a SKU that an active one reuses', async () => {
        await store.commit(changeSet('cs-2', [{ entity: 'Variant', op: 'create', id: 'v-1', before: null, after: variant('v-1', 'A') }]));
        const retired = { ...variant('v-1', 'A'), IsActive: false, RetiredAt: FIXED_NOW };

        await store.commit(
            changeSet('cs-3', [
                { entity: 'Variant', op: 'retire', id: 'v-1', before: variant('v-1', 'A'), after: retired },
                { entity: 'Variant', op: 'create', id: 'v-2', before: null, after: variant('v-2', 'A') },
            ]),
        );

        expect((await store.loadProductGraph('product-1')).variants.map((row) => row.Id)).toEqual(['v-2']);
    });

    it('rejects memberships that point at a missing category', async () => {
        await expect(
            store.commit(
                changeSet('cs-2', [
                    {
                        entity: 'ProductCategory',
                        op: 'create',
                        id: 'product-1:cat-x',
                        before: null,
                        after: { Id: 'product-1:cat-x', ProductId: 'product-1', CategoryId: 'cat-x', IsExplicit: true },
                    },
                ]),
            ),
        ).rejects.toBeInstanceOf(ReferentialIntegrityError);
    });
});
