/**
 * Workbook decoding and sheet extraction.
 *
 * ARCHITECTURAL NOTE: Receives an ArrayBuffer, never a path.
 * The core has no file-system access.
 */

import * as XLSX from 'xlsx';
import type { FieldValue } from '../types/index.js';
import { ParseError, describeError } from '../errors.js';
import { cellToField } from '../utils/cells.js';
import { isBlank, normalizeHeader } from '../utils/normalize.js';
import { uniqueName } from '../utils/columns.js';

/**
 * One sheet after header trimming. Transient: discarded after normalization.
 */
export interface RawSheet {
    name: string;
    columns: string[];
    rows: Record<string, FieldValue>[];
}

const EMPTY_HEADER = '__EMPTY';

/**
 * Leading bytes of the spreadsheet containers accepted: ZIP (.xlsx) and
 * Compound File Binary (.xls). SheetJS reads any other bytes as plain text.
 */
const CONTAINER_SIGNATURES: readonly (readonly number[])[] = [
    [0x50, 0x4b, 0x03, 0x04],
    [0xd0, 0xcf, 0x11, 0xe0],
];

/**
 * Decode a workbook blob.
 *
 * @throws ParseError when the blob is empty, is not a spreadsheet
 * container, or cannot be decoded
 */
export function readWorkbook(data: ArrayBuffer): XLSX.WorkBook {
    if (data.byteLength === 0) {
        throw new ParseError('Workbook is empty (0 bytes).');
    }
    if (!hasContainerSignature(new Uint8Array(data, 0, Math.min(data.byteLength, 4)))) {
        throw new ParseError('Not a spreadsheet: expected an .xlsx or .xls workbook.');
    }
    try {
        return XLSX.read(data, { type: 'array', cellDates: true });
    } catch (err) {
        throw new ParseError(`Could not decode workbook: ${describeError(err)}`, { cause: err });
    }
}

/**
 * Extract one sheet as named rows.
 *
 * @param sheet - Decoded worksheet
 * @param name - Sheet name, kept for diagnostics
 * @param headerRow - Zero-based row holding the column names; rows above are ignored
 */
export function readSheet(sheet: XLSX.WorkSheet, name: string, headerRow: number): RawSheet {
    const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        range: headerRow,
        defval: null,
        blankrows: false,
        raw: true,
    });

    if (grid.length === 0) {
        return { name, columns: [], rows: [] };
    }

    const [headerCells, ...body] = grid;
    const columns = buildColumnNames(headerCells);
    const rows: Record<string, FieldValue>[] = [];

    for (const cells of body) {
        const row: Record<string, FieldValue> = {};
        let blank = true;
        for (let i = 0; i < columns.length; i++) {
            const value = cellToField(cells[i]);
            if (!isBlank(value)) blank = false;
            row[columns[i]] = value;
        }
        if (!blank) {
            rows.push(row);
        }
    }

    return { name, columns, rows };
}

/**
 * Trimmed, unique column names for a header row.
 * Blank headers become __EMPTY, __EMPTY_1, ...; repeated names get _1, _2, ...
 */
export function buildColumnNames(headerCells: readonly unknown[]): string[] {
    const taken = new Set<string>();
    const columns: string[] = [];
    for (const cell of headerCells) {
        const text = normalizeHeader(cellToField(cell) ?? '');
        const name = uniqueName(text === '' ? EMPTY_HEADER : text, taken);
        taken.add(name);
        columns.push(name);
    }
    return columns;
}

function hasContainerSignature(head: Uint8Array): boolean {
    return CONTAINER_SIGNATURES.some(
        (signature) => head.length >= signature.length && signature.every((byte, i) => head[i] === byte)
    );
}
