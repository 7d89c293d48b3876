import { Category } from '../entities/category.entity';
import { Product } from '../entities/product.entity';
import { productFixture } from '../../testing/catalog-testing';
import { ChangeRecorder } from './change-recorder';

const category = (overrides: Partial<Category> = {}): Category => ({
    Id: 'cat-1',
    Name: 'Pesca',
    Slug: 'pesca',
    ParentId: null,
    Path: 'Pesca',
    PathIds: ['cat-1'],
    IsActive: true,
    CreatedAt: '2026-01-01T00:00:00.000Z',
    UpdatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
});

describe('ChangeRecorder', () => {
    let recorder: ChangeRecorder;

    beforeEach(() => {
        recorder = new ChangeRecorder();
    });

    it('drops an update that changes nothing', () => {
        recorder.record('Category', 'update', 'cat-1', category(), category());
        expect(recorder.count()).toBe(0);
    });

    it('folds later touches of a created row into the create', () => {
        recorder.record('Category', 'create', 'cat-1', null, category());
        recorder.record('Category', 'update', 'cat-1', category(), category({ Name: 'Pesca Esportiva' }));

        expect(recorder.entries()).toEqual([
            { entity: 'Category', op: 'create', id: 'cat-1', before: null, after: category({ Name: 'Pesca Esportiva' }) },
        ]);
    });

    it('cancels a create followed by a delete', () => {
        recorder.record('Category', 'create', 'cat-1', null, category());
        recorder.record('Category', 'delete', 'cat-1', category(), null);
        expect(recorder.count()).toBe(0);
    });

    it('drops an update that ends where it started', () => {
        recorder.record('Category', 'update', 'cat-1', category(), category({ Name: 'Outra' }));
        recorder.record('Category', 'update', 'cat-1', category({ Name: 'Outra' }), category());
        expect(recorder.has('Category', 'cat-1')).toBe(false);
    });

    it('keeps the original before image when an update turns into a retire', () => {
        recorder.record('Category', 'update', 'cat-1', category(), category({ Name: 'Outra' }));
        recorder.record('Category', 'retire', 'cat-1', category({ Name: 'Outra' }), category({ Name: 'Outra', IsActive: false }));

        const [entry] = recorder.entries();
        expect(entry.op).toBe('retire');
        expect(entry.before).toEqual(category());
    });

    it('lists entries parents first', () => {
        const product: Product = productFixture();
        recorder.record('Category', 'create', 'cat-1', null, category());
        recorder.record('Product', 'update', product.Id, product, { ...product, Name: 'Linha Nova' });

        expect(recorder.entries().map((entry) => entry.entity)).toEqual(['Product', 'Category']);
        expect(recorder.countOf('Category')).toBe(1);
        expect(recorder.count(['Product'])).toBe(1);
    });
});
