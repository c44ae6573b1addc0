import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, extname, join } from 'node:path';
import { toDelimitedText, type AggregateViews } from '@award-explorer/core';
import type { DataTable, TableSummary } from '@award-explorer/shared';
import { generateExportExcel } from '../excel/export.js';

/**
 * A target without an extension is a directory: the export is written
 * inside it as `<basename><ext>`.
 */
export function resolveExportPath(target: string, basename: string, ext: '.csv' | '.xlsx'): string {
    return extname(target) === '' ? join(target, `${basename}${ext}`) : target;
}

/**
 * Writes the table as CSV and returns the path written.
 */
export async function writeCsvExport(table: DataTable, target: string, basename: string): Promise<string> {
    const path = resolveExportPath(target, basename, '.csv');
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, toDelimitedText(table), 'utf-8');
    return path;
}

/**
 * Writes the table and its aggregate views as .xlsx and returns the path written.
 */
export async function writeExcelExport(
    table: DataTable,
    views: AggregateViews,
    summary: TableSummary,
    target: string,
    basename: string
): Promise<string> {
    const path = resolveExportPath(target, basename, '.xlsx');
    await mkdir(dirname(path), { recursive: true });
    const workbook = generateExportExcel(table, views, summary);
    const buffer = await workbook.xlsx.writeBuffer();
    await writeFile(path, new Uint8Array(buffer));
    return path;
}
