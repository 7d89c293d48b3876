import { CategoryCycleError, ReconciliationConflict, ReferentialIntegrityError } from '../../common/errors/catalog.errors';
import { FIXED_NOW, sequentialIds } from '../../testing/catalog-testing';
import { ChangeRecorder } from './change-recorder';
import { CategoryTree } from './category-tree';

describe('CategoryTree', () => {
    let recorder: ChangeRecorder;
    let tree: CategoryTree;

    beforeEach(() => {
        recorder = new ChangeRecorder();
        tree = new CategoryTree([], recorder, sequentialIds('cat'), FIXED_NOW);
    });

    const buildPintura = () => {
        const pintura = tree.create('Pintura', 'pintura', null);
        const tinta = tree.create('Tinta', 'tinta', pintura.Id);
        const tecido = tree.create('Tinta para Tecido', 'tinta-para-tecido', tinta.Id);
        return { pintura, tinta, tecido };
    };

    it('materializes path and path ids on create', () => {
        const { tecido } = buildPintura();
        expect(tecido.Path).toBe('Pintura > Tinta > Tinta para Tecido');
        expect(tecido.PathIds).toEqual(['cat-0001', 'cat-0002', 'cat-0003']);
        expect(tree.ancestors(tecido.Id).map((node) => node.Name)).toEqual(['Pintura', 'Tinta']);
    });

    it('finds children by slug, then by name ignoring case', () => {
        const { pintura, tinta } = buildPintura();
        expect(tree.findChild(pintura.Id, 'Tinta')?.Id).toBe(tinta.Id);
        expect(tree.findChild(pintura.Id, 'TINTA', 'other-slug')?.Id).toBe(tinta.Id);
        expect(tree.findChild(null, 'Tinta')).toBeUndefined();
    });

    it('refreshes the subtree paths on rename', () => {
        const { tinta, tecido } = buildPintura();
        tree.rename(tinta.Id, 'Tintas');
        expect(tree.get(tecido.Id)?.Path).toBe('Pintura > Tintas > Tinta para Tecido');
    });

    it('moves a node and its subtree', () => {
        const { tinta, tecido } = buildPintura();
        const construcao = tree.create('Construção', 'construcao', null);

        tree.move(tinta.Id, construcao.Id);

        expect(tree.get(tecido.Id)?.PathIds).toEqual([construcao.Id, tinta.Id, tecido.Id]);
        expect(tree.get(tecido.Id)?.Path).toBe('Construção > Tinta > Tinta para Tecido');
        expect(tree.children(construcao.Id).map((node) => node.Id)).toEqual([tinta.Id]);
    });

    it('refuses to move a node under its own descendant', () => {
        const { pintura, tecido } = buildPintura();
        expect(() => tree.move(pintura.Id, tecido.Id)).toThrow(CategoryCycleError);
        expect(() => tree.move(pintura.Id, pintura.Id)).toThrow(CategoryCycleError);
    });

    it('refuses a move that clashes with a sibling slug', () => {
        const { tinta } = buildPintura();
        tree.create('Tinta', 'tinta', null);
        expect(() => tree.move(tinta.Id, null)).toThrow(ReconciliationConflict);
    });

    it('removes leaves only', () => {
        const { tinta, tecido } = buildPintura();
        expect(() => tree.remove(tinta.Id)).toThrow(ReferentialIntegrityError);

        tree.remove(tecido.Id);
        expect(tree.get(tecido.Id)).toBeUndefined();
        // created and deleted in the same run: nothing left to write
        expect(recorder.has('Category', tecido.Id)).toBe(false);
    });
});
