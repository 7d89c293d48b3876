import { Variant } from '../entities/variant.entity';
import { CompatibilityRelation, DependencyInferenceService } from './dependency-inference.service';

const variant = (id: string, selection: Record<string, string>, isActive = true): Variant => ({
    Id: id,
    ProductId: 'product-1',
    Sku: id.toUpperCase(),
    Name: id,
    PurchasePrice: null,
    SalePrice: 0,
    StockQty: 0,
    Images: [],
    Selection: selection,
    IsActive: isActive,
    RetiredAt: null,
    CreatedAt: '2026-01-01T00:00:00.000Z',
    UpdatedAt: '2026-01-01T00:00:00.000Z',
});

describe('DependencyInferenceService', () => {
    const service = new DependencyInferenceService();

    it('records exactly the option pairs that co-occur', () => {
        const pairs = service.infer([
            variant('v-1', { 'type-numero': 'opt-5', 'type-comp': 'opt-230' }),
            variant('v-2', { 'type-numero': 'opt-8', 'type-comp': 'opt-350' }),
            variant('v-3', { 'type-comp': 'opt-350', 'type-numero': 'opt-8' }),
            variant('v-4', { 'type-numero': 'opt-5', 'type-comp': 'opt-350' }, false),
        ]);
        expect(pairs).toEqual([
            { typeA: 'type-comp', optionA: 'opt-230', typeB: 'type-numero', optionB: 'opt-5' },
            { typeA: 'type-comp', optionA: 'opt-350', typeB: 'type-numero', optionB: 'opt-8' },
        ]);
    });

    it('builds all pairs of a three-attribute variant', () => {
        expect(service.infer([variant('v-1', { a: 'a1', b: 'b1', c: 'c1' })])).toHaveLength(3);
    });
});

describe('CompatibilityRelation', () => {
    const relation = new CompatibilityRelation([
        { typeA: 'type-comp', optionA: 'opt-230', typeB: 'type-numero', optionB: 'opt-5' },
        { typeA: 'type-comp', optionA: 'opt-350', typeB: 'type-numero', optionB: 'opt-8' },
    ]);

    it('answers from the stored pairs in either direction', () => {
        expect(relation.size).toBe(2);
        expect(relation.compatible('type-numero', 'opt-5', 'type-comp', 'opt-230')).toBe(true);
        expect(relation.compatible('type-comp', 'opt-230', 'type-numero', 'opt-5')).toBe(true);
        expect(relation.compatible('type-numero', 'opt-5', 'type-comp', 'opt-350')).toBe(false);
    });

    it('treats options of one type as mutually exclusive', () => {
        expect(relation.compatible('type-numero', 'opt-5', 'type-numero', 'opt-5')).toBe(true);
        expect(relation.compatible('type-numero', 'opt-5', 'type-numero', 'opt-8')).toBe(false);
    });

    it('leaves types that never meet unconstrained', () => {
        expect(relation.compatible('type-cor', 'opt-azul', 'type-numero', 'opt-5')).toBe(true);
    });
});
