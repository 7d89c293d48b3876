import { CategoryCycleError, ConcurrencyConflict, ValidationError } from '../common/errors/catalog.errors';
import { CatalogTestContext, createCatalogTestingModule } from '../testing/catalog-testing';

// Pesca (id-0012) > Linhas (id-0013) > Multifilamento (id-0014) holds product id-0001;
// Náutica (id-0017) holds product id-0016.
async function seed(ctx: CatalogTestContext): Promise<void> {
    await ctx.sync.createProduct(
        {
            name: 'Linha Multifilamento',
            attributes_json: [
                { attribute: 'Número', values: ['5', '8'] },
                { attribute: 'Comprimento', values: ['230m', '350m'] },
            ],
            variants_json: [
                { Número: '5', Comprimento: '230m' },
                { Número: '8', Comprimento: '350m' },
                { Número: '8', Comprimento: '230m' },
            ],
            groups_json: [{ name: 'Número 8', members: { Número: '8' } }],
            categories_json: [{ path: ['Pesca', 'Linhas'], name: 'Multifilamento' }],
        },
        null,
    );
    await ctx.sync.createProduct({ name: 'Boia', categories_json: [{ name: 'Náutica' }] }, null);
}

describe('CategoryTreeService', () => {
    let ctx: CatalogTestContext;

    beforeEach(async () => {
        ctx = await createCatalogTestingModule();
        await seed(ctx);
    });

    afterEach(async () => {
        await ctx.close();
    });

    it('lists the tree depth first with product counts', async () => {
        const nodes = await ctx.categoryTree.listTree();

        expect(nodes.map((node) => [node.name, node.level, node.productCount, node.hasChildren])).toEqual([
            ['Náutica', 0, 1, false],
            ['Pesca', 0, 1, true],
            ['Linhas', 1, 1, true],
            ['Multifilamento', 2, 1, false],
        ]);
    });

    it('keeps the ancestors of search matches', async () => {
        const nodes = await ctx.categoryTree.listTree('multi');

        expect(nodes.map((node) => node.path)).toEqual(['Pesca', 'Pesca > Linhas', 'Pesca > Linhas > Multifilamento']);
    });

    it('moves a subtree and re-derives the implied memberships', async () => {
        const moved = await ctx.categoryTree.updateCategory('id-0013', { parentId: 'id-0017' }, 'user-1');

        expect(moved).toMatchObject({ ParentId: 'id-0017', Path: 'Náutica > Linhas', PathIds: ['id-0017', 'id-0013'] });
        const product = await ctx.readModel.getProduct('id-0001');
        expect(product.version).toBe(2);
        expect(product.categories.map((category) => [category.path, category.isExplicit])).toEqual([
            ['Náutica', false],
            ['Náutica > Linhas', false],
            ['Náutica > Linhas > Multifilamento', true],
        ]);

        const nodes = await ctx.categoryTree.listTree();
        expect(nodes.map((node) => [node.name, node.level, node.productCount])).toEqual([
            ['Náutica', 0, 2],
            ['Linhas', 1, 1],
            ['Multifilamento', 2, 1],
            ['Pesca', 0, 0],
        ]);
    });

    it('renames a node and rewrites the categories facet of its products', async () => {
        await ctx.categoryTree.updateCategory('id-0013', { name: 'Linhas de Pesca' }, null);

        const facets = await ctx.readModel.getFacets('id-0001');
        expect(facets.categories_json[0].path.map((level) => level.name)).toEqual(['Pesca', 'Linhas de Pesca', 'Multifilamento']);
        expect((await ctx.store.getProduct('id-0001'))?.Version).toBe(2);
    });

    it('fails instead of overwriting a product saved while the tree edit was in flight', async () => {
        const loadProductGraph = ctx.store.loadProductGraph.bind(ctx.store);
        jest.spyOn(ctx.store, 'loadProductGraph').mockImplementationOnce(async (productId) => {
            await ctx.sync.updateProduct({ id: 'id-0001', version: 1, name: 'Linha Trançada' }, null);
            return loadProductGraph(productId);
        });

        await expect(ctx.categoryTree.updateCategory('id-0013', { name: 'Linhas de Pesca' }, null)).rejects.toBeInstanceOf(
            ConcurrencyConflict,
        );

        expect(await ctx.store.getProduct('id-0001')).toMatchObject({ Name: 'Linha Trançada', Version: 2 });
        expect(ctx.store.rows('Category').find((category) => category.Id === 'id-0013')?.Name).toBe('Linhas');
    });

    it('refuses to move a node under its own descendant', async () => {
        await expect(ctx.categoryTree.updateCategory('id-0012', { parentId: 'id-0014' }, null)).rejects.toBeInstanceOf(CategoryCycleError);
    });

    it('refuses an empty update', async () => {
        await expect(ctx.categoryTree.updateCategory('id-0012', {}, null)).rejects.toBeInstanceOf(ValidationError);
    });

    it('prunes categories left without products', async () => {
        expect(await ctx.categoryTree.pruneOrphans()).toBe(0);

        await ctx.categoryTree.updateCategory('id-0013', { parentId: 'id-0017' }, null);

        expect(await ctx.categoryTree.pruneOrphans()).toBe(1);
        expect(ctx.store.rows('Category').map((category) => category.Name)).toEqual(['Linhas', 'Multifilamento', 'Náutica']);
    });
});
