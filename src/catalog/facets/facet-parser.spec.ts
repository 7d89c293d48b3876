import { ValidationError } from '../../common/errors/catalog.errors';
import { FacetParser } from './facet-parser';

describe('FacetParser', () => {
    const parser = new FacetParser();

    it('returns nothing for omitted facets and empty lists for null', () => {
        expect(parser.parse({})).toEqual({});
        expect(parser.parse({ variants_json: null })).toEqual({ variants: [] });
    });

    it('parses attribute rows, dropping blank values', () => {
        const parsed = parser.parse({ attributes_json: [{ attribute: 'Cor', values: ['Azul', ' Verde ', '', 5], scope: 'product' }] });
        expect(parsed.attributes).toEqual([{ row: 0, name: 'Cor', values: ['Azul', 'Verde', '5'], scope: 'product' }]);
    });

    it('splits variant rows into commercial fields and attribute values', () => {
        const parsed = parser.parse({
            variants_json: [{ sku: 'LN-5', sale_price: '10,5', stock_qty: '3', purchase_price: null, Cor: 'Azul', Número: 5 }],
        });
        expect(parsed.variants).toEqual([
            {
                row: 0,
                sku: 'LN-5',
                salePrice: 10.5,
                stockQty: 3,
                purchasePrice: null,
                attributes: [
                    { key: 'Cor', value: 'Azul' },
                    { key: 'Número', value: '5' },
                ],
            },
        ]);
    });

    it('reads group members as keys, shorthand filters or match/exclude filters', () => {
        const parsed = parser.parse({
            groups_json: [
                { name: 'Kit', members: ['LN-5', { Cor: 'Azul', Comprimento: '230m' }] },
                { name: 'Azuis', members: { Cor: 'Azul' } },
                { name: 'Coloridas', slug: 'Coloridas 230', members: { match: { Comprimento: '230m' }, exclude: { Cor: ['Branco'] } } },
            ],
        });
        expect(parsed.groups).toEqual([
            {
                row: 0,
                name: 'Kit',
                members: {
                    kind: 'explicit',
                    keys: [
                        { kind: 'sku', sku: 'LN-5' },
                        { kind: 'selection', values: { Cor: 'Azul', Comprimento: '230m' } },
                    ],
                },
            },
            { row: 1, name: 'Azuis', members: { kind: 'filter', filter: { match: { Cor: ['Azul'] }, exclude: {} } } },
            {
                row: 2,
                name: 'Coloridas',
                slug: 'coloridas-230',
                members: { kind: 'filter', filter: { match: { Comprimento: ['230m'] }, exclude: { Cor: ['Branco'] } } },
            },
        ]);
    });

    it('builds category levels from a path or a parent chain', () => {
        const parsed = parser.parse({
            categories_json: [
                { path: ['Pintura', 'Tinta'], name: 'Tinta para Tecido' },
                { name: 'Tinta', parent: { name: 'Construção' } },
                { path: [{ id: 'cat-1' }], name: 'Linhas', slug: 'Linhas de Pesca' },
            ],
        });
        expect(parsed.categories).toEqual([
            {
                row: 0,
                levels: [
                    { kind: 'name', name: 'Pintura' },
                    { kind: 'name', name: 'Tinta' },
                    { kind: 'name', name: 'Tinta para Tecido' },
                ],
            },
            {
                row: 1,
                levels: [
                    { kind: 'name', name: 'Construção' },
                    { kind: 'name', name: 'Tinta' },
                ],
            },
            {
                row: 2,
                levels: [
                    { kind: 'id', id: 'cat-1' },
                    { kind: 'name', name: 'Linhas', slug: 'linhas-de-pesca' },
                ],
            },
        ]);
    });

    it('collects every structural issue before failing', () => {
        let caught: unknown;
        try {
            parser.parse({ attributes_json: [{ values: [] }], variants_json: 'oops', groups_json: [{ name: 'Kit', members: [] }] });
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(ValidationError);
        expect(caught instanceof ValidationError && caught.issues).toEqual([
            { facet: 'attributes', row: 0, field: 'attribute', message: 'Attribute name is required.' },
            { facet: 'variants', message: 'variants_json must be an array or null.' },
            { facet: 'groups', row: 0, field: 'members', message: 'A group needs at least one member.' },
        ]);
    });

    it('rejects blank stock and price strings', () => {
        let caught: unknown;
        try {
            parser.parse({ variants_json: [{ stock_qty: '', Cor: 'Azul' }, { sale_price: '  ', Cor: 'Verde' }] });
        } catch (error) {
            caught = error;
        }
        expect(caught instanceof ValidationError && caught.issues).toEqual([
            { facet: 'variants', row: 0, field: 'stock_qty', message: 'stock_qty must be an integer.' },
            { facet: 'variants', row: 1, field: 'sale_price', message: 'sale_price must be a non-negative number.' },
        ]);
    });

    it('rejects negative prices', () => {
        expect(() => parser.parse({ variants_json: [{ sale_price: -1, Cor: 'Azul' }] })).toThrow(ValidationError);
    });
});
