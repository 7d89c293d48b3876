import { normalizeValue, slugify, uniqueSlug } from './slugify';

describe('slugify', () => {
    it('strips accents and joins words with dashes', () => {
        expect(slugify('Tinta para Tecido')).toBe('tinta-para-tecido');
        expect(slugify('Número')).toBe('numero');
        expect(slugify('Construção')).toBe('construcao');
    });

    it('collapses punctuation runs and trims dashes', () => {
        expect(slugify('  Cor / Tamanho ')).toBe('cor-tamanho');
        expect(slugify('!!!')).toBe('');
    });
});

describe('normalizeValue', () => {
    it('lowercases and collapses whitespace', () => {
        expect(normalizeValue('  Azul   Claro ')).toBe('azul claro');
    });
});

describe('uniqueSlug', () => {
    it('keeps a free slug and suffixes taken ones in order', () => {
        expect(uniqueSlug('kit', new Set())).toBe('kit');
        expect(uniqueSlug('kit', new Set(['kit']))).toBe('kit-1');
        expect(uniqueSlug('kit', new Set(['kit', 'kit-1']))).toBe('kit-2');
    });
});
