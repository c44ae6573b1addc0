import { describe, it, expect } from 'vitest';
import { WorkbookCache } from '../src/cache.js';
import { ParseError } from '../src/errors.js';
import { writeBook, sampleSheets, contractGrid, CONTRACT_SHEET } from './fixtures.js';

describe('WorkbookCache', () => {
    const first = writeBook(sampleSheets());
    const second = writeBook([
        [CONTRACT_SHEET, contractGrid(['Contract Number'], [['K1']])],
        ['8a', [['Contract #'], ['K1']]],
    ]);

    it('returns the cached result for identical bytes', () => {
        const cache = new WorkbookCache();

        const a = cache.load(first);
        const b = cache.load(first.slice(0));

        expect(a.cached).toBe(false);
        expect(b.cached).toBe(true);
        expect(b.result).toBe(a.result);
        expect(cache.size).toBe(1);
    });

    it('recomputes when the bytes change', () => {
        const cache = new WorkbookCache();

        const a = cache.load(first);
        const b = cache.load(second);

        expect(b.cached).toBe(false);
        expect(b.result.hash).not.toBe(a.result.hash);
        expect(cache.size).toBe(2);
    });

    it('evicts the least recently used entry', () => {
        const cache = new WorkbookCache(1);

        const a = cache.load(first);
        cache.load(second);

        expect(cache.has(a.result.hash)).toBe(false);
        expect(cache.size).toBe(1);
    });

    it('invalidates and clears entries', () => {
        const cache = new WorkbookCache();
        const a = cache.load(first);
        cache.load(second);

        expect(cache.invalidate(a.result.hash)).toBe(true);
        expect(cache.invalidate(a.result.hash)).toBe(false);
        expect(cache.load(first).cached).toBe(false);

        cache.clear();
        expect(cache.size).toBe(0);
    });

    it('does not cache failures', () => {
        const cache = new WorkbookCache();

        expect(() => cache.load(new ArrayBuffer(0))).toThrow(ParseError);
        expect(cache.size).toBe(0);
    });

    it('rejects a non-positive size', () => {
        expect(() => new WorkbookCache(0)).toThrow(RangeError);
    });
});
