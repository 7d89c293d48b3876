import { ValidationError } from '../../common/errors/catalog.errors';
import { AttributeOption, AttributeType } from '../entities/attribute.entity';
import { Variant } from '../entities/variant.entity';
import { FIXED_NOW, workspaceFixture } from '../../testing/catalog-testing';
import { AttributeCatalogService } from './attribute-catalog.service';

const globalCor: AttributeType = { Id: 'type-cor', Name: 'Cor', Slug: 'cor', Scope: 'global', ProductId: null, DisplayOrder: 0 };

const option = (id: string, value: string, productId: string | null, order = 0): AttributeOption => ({
    Id: id,
    AttributeTypeId: 'type-cor',
    ProductId: productId,
    Value: value,
    DisplayName: value,
    FilterGroup: value.toLowerCase(),
    DisplayOrder: order,
});

describe('AttributeCatalogService', () => {
    const service = new AttributeCatalogService();

    it('creates missing types and product options', () => {
        const ws = workspaceFixture();

        const mapping = service.reconcile(ws, [{ row: 0, name: 'Cor', values: ['Azul', 'Verde'], scope: null }]);

        expect(ws.types.get('id-0001')).toEqual({ Id: 'id-0001', Name: 'Cor', Slug: 'cor', Scope: 'global', ProductId: null, DisplayOrder: 0 });
        expect(ws.options.get('id-0003')).toEqual({
            Id: 'id-0003',
            AttributeTypeId: 'id-0001',
            ProductId: 'product-1',
            Value: 'Verde',
            DisplayName: 'Verde',
            FilterGroup: 'verde',
            DisplayOrder: 1,
        });
        expect([...(mapping.get('Cor')?.keys() ?? [])]).toEqual(['azul', 'verde']);
        expect(ws.recorder.countOf('AttributeType')).toBe(1);
        expect(ws.recorder.countOf('AttributeOption')).toBe(2);
    });

    it('reuses a global option whose filter group matches', () => {
        const ws = workspaceFixture({ catalog: { types: [globalCor], options: [option('opt-azul', 'Azul', null)] } });

        const mapping = service.reconcile(ws, [{ row: 0, name: 'cor', values: ['AZUL'], scope: null }]);

        expect(mapping.get('cor')?.get('azul')?.Id).toBe('opt-azul');
        expect(ws.recorder.count()).toBe(0);
    });

    it('matches a global option by its value as well as its filter group', () => {
        const ferrari: AttributeOption = { ...option('opt-ferrari', 'Vermelho Ferrari', null), FilterGroup: 'vermelho' };
        const ws = workspaceFixture({ catalog: { types: [globalCor], options: [ferrari] } });

        const mapping = service.reconcile(ws, [{ row: 0, name: 'Cor', values: ['Vermelho', 'vermelho  ferrari'], scope: null }]);

        expect(mapping.get('Cor')?.get('vermelho')?.Id).toBe('opt-ferrari');
        expect(mapping.get('Cor')?.get('vermelho ferrari')?.Id).toBe('opt-ferrari');
        expect(ws.recorder.count()).toBe(0);
    });

    it('creates a product-scoped type even when a global one shares its name', () => {
        const ws = workspaceFixture({ catalog: { types: [globalCor], options: [option('opt-azul', 'Azul', null)] } });

        const mapping = service.reconcile(ws, [{ row: 0, name: 'Cor', values: ['Azul'], scope: 'product' }]);

        expect(ws.types.get('id-0001')).toEqual({ Id: 'id-0001', Name: 'Cor', Slug: 'cor', Scope: 'product', ProductId: 'product-1', DisplayOrder: 1 });
        expect(mapping.get('Cor')?.get('azul')).toEqual({
            Id: 'id-0002',
            AttributeTypeId: 'id-0001',
            ProductId: 'product-1',
            Value: 'Azul',
            DisplayName: 'Azul',
            FilterGroup: 'azul',
            DisplayOrder: 0,
        });
        expect(service.findType(ws, 'Cor')?.Id).toBe('id-0001');
    });

    it('scopes a product attribute to the product', () => {
        const ws = workspaceFixture();
        service.reconcile(ws, [{ row: 0, name: 'Acabamento', values: ['Fosco'], scope: 'product' }]);
        expect(service.findType(ws, 'acabamento')).toMatchObject({ Scope: 'product', ProductId: 'product-1' });
    });

    it('prunes unlisted product options unless a variant still uses them', () => {
        const used: Variant = {
            Id: 'v-1',
            ProductId: 'product-1',
            Sku: 'LN-VERMELHO',
            Name: 'Vermelho',
            PurchasePrice: null,
            SalePrice: 0,
            StockQty: 0,
            Images: [],
            Selection: { 'type-cor': 'opt-vermelho' },
            IsActive: true,
            RetiredAt: null,
            CreatedAt: FIXED_NOW,
            UpdatedAt: FIXED_NOW,
        };
        const ws = workspaceFixture({
            graph: { variants: [used] },
            catalog: {
                types: [globalCor],
                options: [option('opt-roxo', 'Roxo', 'product-1', 0), option('opt-vermelho', 'Vermelho', 'product-1', 1), option('opt-azul', 'Azul', null)],
            },
        });

        const removed = service.pruneUnlisted(ws, new Map());

        expect(removed).toBe(1);
        expect(ws.options.has('opt-roxo')).toBe(false);
        expect(ws.options.has('opt-azul')).toBe(true);
        expect(ws.warnings).toEqual(['Option "Cor: Vermelho" was kept because variants still use it: LN-VERMELHO.']);
    });

    it('rejects attribute names without usable characters', () => {
        expect(() => service.reconcile(workspaceFixture(), [{ row: 2, name: '!!!', values: ['x'], scope: null }])).toThrow(ValidationError);
    });
});
