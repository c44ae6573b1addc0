import * as XLSX from 'xlsx';

type Grid = unknown[][];

/**
 * Two matched contracts in "8a", one orphan award in "HUBZone".
 */
export const SAMPLE_SHEETS: [string, Grid][] = [
    [
        'OASIS+Contract Information',
        [
            ['OASIS+ Contractor List'],
            ['Contract Number', 'Vendor Name', 'UEI', 'Domain'],
            ['47QRCA25D0001', 'Acme Corp', 'UEIACME0001', 'Technical'],
            ['47QRCA25D0002', 'Beta LLC', 'UEIBETA0001', 'Management'],
        ],
    ],
    [
        '8a',
        [
            ['Contract #', 'NAICS', 'SIN'],
            ['47QRCA25D0001', '541511', '54151S'],
            ['47QRCA25D0002', '541512', '54151HACS'],
        ],
    ],
    [
        'HUBZone',
        [
            ['Contract #', 'NAICS'],
            ['47QRCA25D0009', '541511'],
        ],
    ],
];

export function workbookBytes(sheets: [string, Grid][] = SAMPLE_SHEETS): Buffer<ArrayBuffer> {
    const wb = XLSX.utils.book_new();
    for (const [name, grid] of sheets) {
        XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(grid), name);
    }
    const bytes: ArrayBuffer = XLSX.write(wb, { type: 'array', bookType: 'xlsx' });
    return Buffer.from(bytes);
}
