import { describe, it, expect } from 'vitest';
import { cellToField, formatIsoDate } from '../../src/utils/cells.js';

describe('cellToField', () => {
    it('keeps strings, including empty ones', () => {
        expect(cellToField('Acme')).toBe('Acme');
        expect(cellToField('')).toBe('');
    });

    it('writes numbers without a float artifact', () => {
        expect(cellToField(541511)).toBe('541511');
        expect(cellToField(1.5)).toBe('1.5');
    });

    it('maps blanks and non-finite numbers to null', () => {
        expect(cellToField(null)).toBeNull();
        expect(cellToField(undefined)).toBeNull();
        expect(cellToField(Number.NaN)).toBeNull();
    });

    it('writes booleans in spreadsheet form', () => {
        expect(cellToField(true)).toBe('TRUE');
        expect(cellToField(false)).toBe('FALSE');
    });

    it('writes dates as YYYY-MM-DD', () => {
        expect(cellToField(new Date(Date.UTC(2025, 0, 15)))).toBe('2025-01-15');
    });
});

describe('formatIsoDate', () => {
    it('pads month and day', () => {
        expect(formatIsoDate(new Date(Date.UTC(2026, 2, 5)))).toBe('2026-03-05');
    });
});
