import { canonicalJson, stableHash } from './stable-hash';

describe('canonicalJson', () => {
    it('sorts keys at every depth and keeps array order', () => {
        expect(canonicalJson({ b: 1, a: { d: 2, c: [{ z: 1, y: 2 }] } })).toBe('{"a":{"c":[{"y":2,"z":1}],"d":2},"b":1}');
    });

    it('drops undefined members', () => {
        expect(canonicalJson({ a: undefined, b: 1 })).toBe('{"b":1}');
    });
});

describe('stableHash', () => {
    it('ignores key order', () => {
        expect(stableHash({ a: 1, b: [1, 2] })).toBe(stableHash({ b: [1, 2], a: 1 }));
    });

    it('is sensitive to array order', () => {
        expect(stableHash([1, 2])).not.toBe(stableHash([2, 1]));
    });
});
