import { describe, it, expect } from 'vitest';
import { normalizeWorkbook, loadContractTable, loadPoolTable } from '../../src/workbook/normalize.js';
import { SchemaError } from '../../src/errors.js';
import { buildBook, contractGrid, sampleSheets, CONTRACT_SHEET } from '../fixtures.js';

describe('loadContractTable', () => {
    it('reads the header from the second row and normalizes contract numbers', () => {
        const { table, warnings } = loadContractTable(buildBook(sampleSheets()));

        expect(table.columns).toEqual(['Contract Number', 'Vendor Name', 'UEI', 'Domain', 'Vendor City', 'ZIP Code']);
        expect(table.rows.map((r) => r['Contract Number'])).toEqual([
            '47QRCA25D0001',
            '47QRCA25D0002',
            '47QRCA25D0002',
        ]);
        expect(table.rows[0]['Vendor Name']).toBe('Acme Corp');
        expect(warnings).toEqual([]);
    });

    it('drops rows with no contract number and warns', () => {
        const book = buildBook([
            [CONTRACT_SHEET, contractGrid(['Contract Number', 'Vendor Name'], [
                ['K1', 'Acme Corp'],
                [null, 'No Number LLC'],
            ])],
        ]);

        const { table, warnings } = loadContractTable(book);

        expect(table.rows).toHaveLength(1);
        expect(warnings).toEqual(['Skipped 1 contract rows with no "Contract Number"']);
    });

    it('throws SchemaError when the contract sheet is missing', () => {
        const book = buildBook([['8a', [['Contract #'], ['K1']]]]);

        expect(() => loadContractTable(book)).toThrow(SchemaError);
        expect(() => loadContractTable(book)).toThrow(
            'Sheet "OASIS+Contract Information" not found in workbook. Sheets: 8a'
        );
    });

    it('lists the columns found when Contract Number is missing', () => {
        const book = buildBook([
            [CONTRACT_SHEET, contractGrid(['Contract No', ' Vendor Name'], [['K1', 'Acme Corp']])],
        ]);

        try {
            loadContractTable(book);
            expect.fail('expected SchemaError');
        } catch (err) {
            expect(err).toBeInstanceOf(SchemaError);
            if (err instanceof SchemaError) {
                expect(err.foundColumns).toEqual(['Contract No', 'Vendor Name']);
                expect(err.message).toBe(
                    '"Contract Number" not found in contract sheet. Columns: Contract No, Vendor Name'
                );
            }
        }
    });
});

describe('loadPoolTable', () => {
    it('unions pool sheets and tags each row with its pool', () => {
        const { table, sheets, warnings } = loadPoolTable(buildBook(sampleSheets()));

        expect(sheets).toEqual(['8a', 'HUBZone']);
        expect(table.columns).toEqual(['Contract #', 'Vendor', 'NAICS', 'SIN', 'Pool']);
        expect(table.rows).toEqual([
            { 'Contract #': '47QRCA25D0001', Vendor: 'Acme', NAICS: '541511', SIN: '54151S', Pool: '8a' },
            { 'Contract #': '47QRCA25D0002', Vendor: null, NAICS: '541512', SIN: '54151HACS', Pool: '8a' },
            { 'Contract #': '47QRCA25D0009', Vendor: 'Orphan Works', NAICS: null, SIN: null, Pool: 'HUBZone' },
        ]);
        expect(warnings).toEqual(['Ignored sheet "Notes" (not a recognized pool)']);
    });

    it('treats a trailing space in the sheet name as the same pool', () => {
        const plain = loadPoolTable(buildBook(sampleSheets('Service Disabled Veteran Owned')));
        const spaced = loadPoolTable(buildBook(sampleSheets('Service Disabled Veteran Owned ')));

        expect(plain.sheets[0]).toBe('Service Disabled Veteran Owned');
        expect(spaced.sheets[0]).toBe('Service Disabled Veteran Owned');
        expect(spaced.table.rows.map((r) => r.Pool)).toEqual(plain.table.rows.map((r) => r.Pool));
        expect(spaced.table.rows[0].Pool).toBe('Service Disabled Veteran Owned');
    });

    it('overwrites a Pool column carried by the sheet', () => {
        const book = buildBook([['Small Business', [['Contract #', 'Pool'], ['K1', 'stale']]]]);

        const { table } = loadPoolTable(book);

        expect(table.columns).toEqual(['Contract #', 'Pool']);
        expect(table.rows[0].Pool).toBe('Small Business');
    });

    it('throws SchemaError when no pool sheet is present', () => {
        const book = buildBook([
            [CONTRACT_SHEET, contractGrid(['Contract Number'], [['K1']])],
            ['Notes', [['x']]],
        ]);

        expect(() => loadPoolTable(book)).toThrow(SchemaError);
        expect(() => loadPoolTable(book)).toThrow(/^No pool sheets found in workbook\./);
    });

    it('throws SchemaError when Contract # is missing from every pool sheet', () => {
        const book = buildBook([['8a', [['Contract', 'Vendor'], ['K1', 'Acme']]]]);

        try {
            loadPoolTable(book);
            expect.fail('expected SchemaError');
        } catch (err) {
            expect(err).toBeInstanceOf(SchemaError);
            if (err instanceof SchemaError) {
                expect(err.foundColumns).toEqual(['Contract', 'Vendor', 'Pool']);
            }
        }
    });
});

describe('normalizeWorkbook', () => {
    it('returns both tables and all warnings', () => {
        const result = normalizeWorkbook(buildBook(sampleSheets()));

        expect(result.contracts.rows).toHaveLength(3);
        expect(result.pools.rows).toHaveLength(3);
        expect(result.poolSheets).toEqual(['8a', 'HUBZone']);
        expect(result.warnings).toEqual(['Ignored sheet "Notes" (not a recognized pool)']);
    });
});
