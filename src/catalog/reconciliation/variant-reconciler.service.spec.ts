import { ReconciliationConflict } from '../../common/errors/catalog.errors';
import { AttributeOption, AttributeType } from '../entities/attribute.entity';
import { Variant } from '../entities/variant.entity';
import { FIXED_NOW, workspaceFixture } from '../../testing/catalog-testing';
import { AttributeCatalogService } from './attribute-catalog.service';
import { VariantReconcilerService, identityKey } from './variant-reconciler.service';

const numero: AttributeType = { Id: 'type-n', Name: 'Número', Slug: 'numero', Scope: 'global', ProductId: null, DisplayOrder: 0 };
const option = (id: string, value: string, order: number): AttributeOption => ({
    Id: id,
    AttributeTypeId: 'type-n',
    ProductId: 'product-1',
    Value: value,
    DisplayName: value,
    FilterGroup: value,
    DisplayOrder: order,
});
const existing = (id: string, sku: string, optionId: string, salePrice = 10): Variant => ({
    Id: id,
    ProductId: 'product-1',
    Sku: sku,
    Name: sku,
    PurchasePrice: null,
    SalePrice: salePrice,
    StockQty: 2,
    Images: [],
    Selection: { 'type-n': optionId },
    IsActive: true,
    RetiredAt: null,
    CreatedAt: '2025-12-01T00:00:00.000Z',
    UpdatedAt: '2025-12-01T00:00:00.000Z',
});
const catalog = { types: [numero], options: [option('opt-5', '5', 0), option('opt-8', '8', 1)] };

describe('identityKey', () => {
    it('ignores attribute order', () => {
        expect(identityKey({ b: 'opt-2', a: 'opt-1' })).toBe('opt-1,opt-2');
    });
});

describe('VariantReconcilerService', () => {
    const reconciler = new VariantReconcilerService(new AttributeCatalogService());

    it('creates variants with generated SKUs and names', () => {
        const ws = workspaceFixture({ isNew: true });

        const result = reconciler.reconcile(ws, [
            { row: 0, salePrice: 10, attributes: [{ key: 'Número', value: '5' }, { key: 'Comprimento', value: '230m' }] },
            { row: 1, sku: 'CUSTOM', attributes: [{ key: 'Número', value: '8' }, { key: 'Comprimento', value: '350m' }] },
        ]);

        expect(result).toEqual({ created: 2, updated: 0, retired: 0 });
        expect(ws.activeVariants().map((variant) => [variant.Id, variant.Sku, variant.Name, variant.SalePrice])).toEqual([
            ['id-0007', 'LINHA-DE-PESCA-5-230M', '5 / 230m', 10],
            ['id-0008', 'CUSTOM', '8 / 350m', 0],
        ]);
        expect(ws.variants.get('id-0007')?.Selection).toEqual({ 'id-0001': 'id-0002', 'id-0003': 'id-0004' });
    });

    it('suffixes a generated SKU that another row already claims', () => {
        const ws = workspaceFixture({ catalog });

        reconciler.reconcile(ws, [
            { row: 0, sku: 'LINHA-DE-PESCA-8', attributes: [{ key: 'numero', value: '5' }] },
            { row: 1, attributes: [{ key: 'numero', value: '8' }] },
        ]);

        expect(ws.activeVariants().map((variant) => variant.Sku)).toEqual(['LINHA-DE-PESCA-8', 'LINHA-DE-PESCA-8-1']);
    });

    it('matches by attribute values and records price transitions', () => {
        const ws = workspaceFixture({ catalog, graph: { variants: [existing('v-1', 'OLD', 'opt-5')] } });

        const result = reconciler.reconcile(ws, [{ row: 0, salePrice: 12, attributes: [{ key: 'numero', value: '5' }] }]);

        expect(result).toEqual({ created: 0, updated: 1, retired: 0 });
        expect(ws.variants.get('v-1')).toMatchObject({ Sku: 'OLD', SalePrice: 12, StockQty: 2, UpdatedAt: FIXED_NOW });
        expect(ws.priceTransitions).toEqual([{ variantId: 'v-1', sku: 'OLD', field: 'sale', oldPrice: 10, newPrice: 12 }]);
    });

    it('writes nothing when a row matches its variant exactly', () => {
        const ws = workspaceFixture({ catalog, graph: { variants: [existing('v-1', 'OLD', 'opt-5')] } });

        const result = reconciler.reconcile(ws, [{ row: 0, salePrice: 10, attributes: [{ key: 'numero', value: '5' }] }]);

        expect(result).toEqual({ created: 0, updated: 0, retired: 0 });
        expect(ws.recorder.count()).toBe(0);
    });

    it('retires variants missing from the facet', () => {
        const ws = workspaceFixture({ catalog, graph: { variants: [existing('v-1', 'A', 'opt-5'), existing('v-2', 'B', 'opt-8')] } });

        const result = reconciler.reconcile(ws, [{ row: 0, attributes: [{ key: 'numero', value: '5' }] }]);

        expect(result.retired).toBe(1);
        expect(ws.variants.has('v-2')).toBe(false);
        const [entry] = ws.recorder.entries();
        expect(entry).toMatchObject({ entity: 'Variant', op: 'retire', id: 'v-2', after: { IsActive: false, RetiredAt: FIXED_NOW } });
    });

    it('rejects two rows with the same attribute values', () => {
        const ws = workspaceFixture({ catalog });
        let caught: unknown;
        try {
            reconciler.reconcile(ws, [
                { row: 0, attributes: [{ key: 'numero', value: '5' }] },
                { row: 1, sku: 'OTHER', attributes: [{ key: 'Número', value: '5' }] },
            ]);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(ReconciliationConflict);
        expect(caught instanceof ReconciliationConflict && caught.issues).toEqual([
            { facet: 'variants', row: 1, message: 'Same attribute values as row 0.' },
        ]);
    });

    it('rejects a row whose SKU is kept by another matched variant', () => {
        const ws = workspaceFixture({ catalog, graph: { variants: [existing('v-1', 'A', 'opt-5')] } });
        expect(() =>
            reconciler.reconcile(ws, [
                { row: 0, attributes: [{ key: 'numero', value: '5' }] },
                { row: 1, sku: 'A', attributes: [{ key: 'numero', value: '8' }] },
            ]),
        ).toThrow(ReconciliationConflict);
    });
});
