import * as XLSX from 'xlsx';
import type { FieldValue, MergedRecord, MergedTable } from '../src/types/index.js';

export type Grid = unknown[][];

export const CONTRACT_SHEET = 'OASIS+Contract Information';

/**
 * Contract sheet grid: decorative title row, then the header row.
 */
export function contractGrid(header: unknown[], rows: Grid): Grid {
    return [['OASIS+ Contractor List'], header, ...rows];
}

/**
 * In-memory workbook with sheets in the given order.
 */
export function buildBook(sheets: [string, Grid][]): XLSX.WorkBook {
    const wb = XLSX.utils.book_new();
    for (const [name, grid] of sheets) {
        XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(grid), name);
    }
    return wb;
}

/**
 * Serialized .xlsx bytes, as an upload would deliver them.
 */
export function writeBook(sheets: [string, Grid][]): ArrayBuffer {
    return XLSX.write(buildBook(sheets), { type: 'array', bookType: 'xlsx' });
}

/**
 * A small but complete workbook:
 * - K1 matches one contract row
 * - K2 matches two contract rows (fan-out)
 * - K9 matches nothing
 */
export function sampleSheets(poolSheetName = '8a'): [string, Grid][] {
    return [
        [
            CONTRACT_SHEET,
            contractGrid(
                ['Contract Number', 'Vendor Name ', 'UEI', 'Domain', 'Vendor City', 'ZIP Code'],
                [
                    ['47QRCA25D0001.0', 'Acme Corp', 'UEIACME0001', 'Technical', 'Austin', '73301'],
                    ['47QRCA25D0002', 'Beta One', 'UEIBETA0001', 'Management', 'Reston', '20190'],
                    ['47QRCA25D0002 ', 'Beta Two', 'UEIBETA0002', 'Logistics', 'Tampa', '33601'],
                ]
            ),
        ],
        [
            poolSheetName,
            [
                ['Contract # ', 'Vendor', 'NAICS', 'SIN'],
                ['47QRCA25D0001', 'Acme', 541511, '54151S'],
                ['47QRCA25D0002.0', null, '541512.0', '54151HACS'],
            ],
        ],
        [
            'HUBZone',
            [
                ['Contract #', 'Vendor'],
                ['47QRCA25D0009', 'Orphan Works'],
            ],
        ],
        ['Notes', [['Prepared by'], ['Contracts office']]],
    ];
}

const MERGED_COLUMNS = [
    'Contract #', 'Vendor', 'Pool', 'Contract Number', 'UEI', 'Domain',
    'NAICS', 'SIN', 'Vendor City', 'ZIP Code', 'Vendor Display',
];

type MergedOverrides = Partial<Record<string, string | null>> & { 'Vendor Display'?: string };

function mergedRow(overrides: MergedOverrides): MergedRecord {
    const row: Record<string, FieldValue> = {};
    for (const column of MERGED_COLUMNS) {
        row[column] = overrides[column] ?? null;
    }
    return { ...row, 'Vendor Display': overrides['Vendor Display'] ?? '' };
}

/**
 * Five merged rows spanning three pools; row 5 has no vendor.
 */
export function sampleMergedTable(): MergedTable {
    return {
        columns: MERGED_COLUMNS,
        rows: [
            mergedRow({
                'Contract #': '47QRCA25D0001', 'Contract Number': '47QRCA25D0001', Pool: '8a',
                NAICS: '541511', Domain: 'Technical', SIN: '54151S',
                'Vendor Display': 'AEVEX Corp', UEI: 'AEV123',
            }),
            mergedRow({
                'Contract #': '47QRCA25D0002', 'Contract Number': '47QRCA25D0002', Pool: '8a',
                NAICS: '541512', Domain: 'Management', SIN: '54151HACS',
                'Vendor Display': 'Beta LLC', UEI: 'BET456',
            }),
            mergedRow({
                'Contract #': '47QRCA25D0003', Pool: 'HUBZone',
                NAICS: '541511', Domain: 'Technical', SIN: '54151S',
                'Vendor Display': 'Gamma Inc',
            }),
            mergedRow({
                'Contract #': '47QRCA25D0004', 'Contract Number': '47QRCA25D0004', Pool: 'Unrestricted',
                'Vendor Display': 'AEVEX Corp', UEI: 'AEV123',
            }),
            mergedRow({
                'Contract #': '47QRCA25D0005', Pool: '8a',
                NAICS: '541511', Domain: 'Technical', SIN: '54151S',
            }),
        ],
    };
}
