/**
 * Delimited-text export and re-import.
 * Quoting follows the usual CSV rules (RFC 4180) via SheetJS.
 */

import * as XLSX from 'xlsx';
import type { DataRecord, DataTable, FieldValue } from '../types/index.js';
import { ParseError, describeError } from '../errors.js';
import { readSheet } from '../workbook/read.js';

/**
 * Keep only the listed columns that exist on the table, in the given order.
 */
export function selectColumns(table: DataTable, columns: readonly string[]): DataTable {
    const kept = columns.filter((column) => table.columns.includes(column));
    const rows = table.rows.map((row) => {
        const projected: Record<string, FieldValue> = {};
        for (const column of kept) {
            projected[column] = row[column] ?? null;
        }
        return projected;
    });
    return { columns: kept, rows };
}

const FIELD_SEPARATOR = ',';

/**
 * Header line plus one line per row, comma-delimited.
 * Every present value is quoted, so a stray carriage return inside a value
 * cannot end the record. Missing values are written as empty fields.
 */
export function toDelimitedText(table: DataTable): string {
    const sheet = XLSX.utils.aoa_to_sheet(toGrid(table));
    return XLSX.utils.sheet_to_csv(sheet, {
        FS: FIELD_SEPARATOR,
        RS: '\n',
        blankrows: true,
        forceQuotes: true,
    });
}

/**
 * Read delimited text back into a table. Values stay strings;
 * empty fields become the missing marker.
 *
 * The separator is always a comma, never guessed from the content. A
 * `sep=,` line is prepended when the text has none, so SheetJS reads it as
 * delimited values whatever its first characters are.
 *
 * @throws ParseError when the text cannot be decoded
 */
export function parseDelimitedText(text: string): DataTable {
    let workbook: XLSX.WorkBook;
    try {
        workbook = XLSX.read(withSeparatorLine(stripBom(text)), {
            type: 'string',
            raw: true,
            FS: FIELD_SEPARATOR,
        });
    } catch (err) {
        throw new ParseError(`Could not decode delimited text: ${describeError(err)}`, { cause: err });
    }

    const [name] = workbook.SheetNames;
    if (name === undefined) {
        return { columns: [], rows: [] };
    }
    const { columns, rows } = readSheet(workbook.Sheets[name], name, 0);
    return { columns, rows };
}

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

function withSeparatorLine(text: string): string {
    return text.startsWith('sep=') ? text : `sep=${FIELD_SEPARATOR}\n${text}`;
}

function toGrid(table: DataTable): (string | null)[][] {
    return [
        [...table.columns],
        ...table.rows.map((row: DataRecord) => table.columns.map((column) => row[column] ?? null)),
    ];
}
