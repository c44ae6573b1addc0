import { describe, it, expect } from 'vitest';
import { normalizeKey, normalizeHeader, isBlank } from '../../src/utils/normalize.js';

describe('normalizeKey', () => {
    it('strips a trailing .0 and surrounding whitespace', () => {
        expect(normalizeKey('47QRCA25D0001.0 ')).toBe('47QRCA25D0001');
    });

    it('is a no-op on an already-normalized key', () => {
        expect(normalizeKey('47QRCA25D0001')).toBe('47QRCA25D0001');
        expect(normalizeKey(normalizeKey('47QRCA25D0001.0 '))).toBe('47QRCA25D0001');
    });

    it('strips numeric float artifacts from codes', () => {
        expect(normalizeKey('541511.0')).toBe('541511');
        expect(normalizeKey(' 12.0 ')).toBe('12');
    });

    it('keeps .0 that is not a suffix', () => {
        expect(normalizeKey('47.0QRCA')).toBe('47.0QRCA');
        expect(normalizeKey('1.00')).toBe('1.00');
    });

    it('strips repeated trailing .0 suffixes', () => {
        expect(normalizeKey('1.0.0')).toBe('1');
        expect(normalizeKey('47QRCA25D0001.0.0')).toBe('47QRCA25D0001');
        expect(normalizeKey('47QRCA25D0001 .0 ')).toBe('47QRCA25D0001');
    });

    it('gives the same result when applied twice', () => {
        const inputs = ['47QRCA25D0001.0.0', ' 541511.0 ', '1.00', '47.0QRCA', 'K9 .0.0', '  '];
        for (const input of inputs) {
            expect(normalizeKey(normalizeKey(input))).toBe(normalizeKey(input));
        }
    });

    it('maps missing and blank values to null', () => {
        expect(normalizeKey(null)).toBeNull();
        expect(normalizeKey(undefined)).toBeNull();
        expect(normalizeKey('   ')).toBeNull();
        expect(normalizeKey('.0')).toBeNull();
    });
});

describe('normalizeHeader', () => {
    it('trims leading and trailing whitespace', () => {
        expect(normalizeHeader(' Vendor Name  ')).toBe('Vendor Name');
    });

    it('keeps inner whitespace', () => {
        expect(normalizeHeader('ZIP  Code')).toBe('ZIP  Code');
    });
});

describe('isBlank', () => {
    it('treats null, undefined and whitespace as blank', () => {
        expect(isBlank(null)).toBe(true);
        expect(isBlank(undefined)).toBe(true);
        expect(isBlank(' \t')).toBe(true);
    });

    it('treats text as present', () => {
        expect(isBlank('0')).toBe(false);
    });
});
