import exceljs from 'exceljs';
import type { Worksheet, Workbook, Fill, Font } from 'exceljs';
import type { FieldValue } from '@award-explorer/shared';

export const HEADER_FONT: Partial<Font> = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };

export const HEADER_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF4472C4' } };

export const COUNT_FORMAT = '#,##0';

const MIN_WIDTH = 10;
const MAX_WIDTH = 60;

/**
 * Column of an exported sheet. `count` columns hold integers and are
 * right-aligned with a thousands separator; `text` columns are left as written.
 */
export interface SheetColumn {
    header: string;
    key: string;
    kind: 'text' | 'count';
}

export type SheetRow = Readonly<Record<string, FieldValue | number>>;

export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Award Explorer';
    workbook.created = new Date();
    return workbook;
}

/**
 * Adds a styled sheet: header row in the shared style and frozen, count
 * columns formatted, widths fitted to content. With `filter`, the header
 * row also gets an auto-filter spanning every column.
 */
export function addTableSheet(
    workbook: Workbook,
    name: string,
    columns: readonly SheetColumn[],
    rows: Iterable<SheetRow>,
    options: { filter?: boolean } = {}
): Worksheet {
    const sheet = workbook.addWorksheet(name);
    sheet.columns = columns.map(({ header, key }) => ({ header, key }));

    for (const row of rows) {
        sheet.addRow(columns.map(({ key }) => row[key] ?? null));
    }

    formatHeaderRow(sheet);
    columns.forEach((column, i) => {
        if (column.kind === 'count') formatCountColumn(sheet, i + 1);
    });
    if (options.filter && columns.length > 0) {
        sheet.autoFilter = { from: { row: 1, column: 1 }, to: { row: 1, column: columns.length } };
    }
    autoFitColumns(sheet);
    return sheet;
}

export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);
    headerRow.font = { ...HEADER_FONT };
    headerRow.fill = { ...HEADER_FILL };
    headerRow.alignment = { vertical: 'middle', horizontal: 'center' };

    worksheet.views = [{ state: 'frozen', xSplit: 0, ySplit: 1 }];
}

/**
 * Integer format, right-aligned, for the body of one column.
 * The header keeps its centred alignment.
 */
export function formatCountColumn(worksheet: Worksheet, col: number): void {
    worksheet.getColumn(col).eachCell({ includeEmpty: false }, (cell, rowNumber) => {
        if (rowNumber === 1) return;
        cell.numFmt = COUNT_FORMAT;
        cell.alignment = { horizontal: 'right' };
    });
}

/**
 * Widen columns to their longest rendered value, clamped.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach((column) => {
        let maxLen = MIN_WIDTH;
        column.eachCell?.({ includeEmpty: false }, (cell) => {
            maxLen = Math.max(maxLen, cell.text.length);
        });
        column.width = Math.min(maxLen + 2, MAX_WIDTH);
    });
}
