import type { Workbook } from 'exceljs';
import type { DataTable, GroupCount, TableSummary } from '@award-explorer/shared';
import type { AggregateViews } from '@award-explorer/core';
import { createWorkbook, addTableSheet } from './utils.js';
import type { SheetColumn } from './utils.js';

export const SHEET_NAMES = {
    DATA: 'Filtered Data',
    BY_POOL: 'Vendors per Pool',
    TOP_NAICS: 'Top NAICS',
    BY_DOMAIN: 'Domains',
    SUMMARY: 'Summary',
} as const;

/**
 * Filtered table plus the aggregate views and headline metrics.
 * Missing values are left as empty cells.
 */
export function generateExportExcel(
    table: DataTable,
    views: AggregateViews,
    summary: TableSummary
): Workbook {
    const workbook = createWorkbook();

    addDataSheet(workbook, table);
    addCountSheet(workbook, SHEET_NAMES.BY_POOL, 'Pool', views.byPool);
    addCountSheet(workbook, SHEET_NAMES.TOP_NAICS, 'NAICS', views.topNaics);
    addCountSheet(workbook, SHEET_NAMES.BY_DOMAIN, 'Domain', views.byDomain);
    addSummarySheet(workbook, summary);

    return workbook;
}

function addDataSheet(workbook: Workbook, table: DataTable): void {
    const columns: SheetColumn[] = table.columns.map((column) => ({ header: column, key: column, kind: 'text' }));
    addTableSheet(workbook, SHEET_NAMES.DATA, columns, table.rows, { filter: true });
}

/**
 * Sheet: one grouped-count view.
 * Columns: <group label>, Unique Vendors
 */
function addCountSheet(workbook: Workbook, name: string, label: string, counts: GroupCount[]): void {
    addTableSheet(
        workbook,
        name,
        [
            { header: label, key: 'group', kind: 'text' },
            { header: 'Unique Vendors', key: 'count', kind: 'count' },
        ],
        counts.map(({ group, count }) => ({ group, count }))
    );
}

function addSummarySheet(workbook: Workbook, summary: TableSummary): void {
    addTableSheet(
        workbook,
        SHEET_NAMES.SUMMARY,
        [
            { header: 'Metric', key: 'metric', kind: 'text' },
            { header: 'Value', key: 'value', kind: 'count' },
        ],
        [
            { metric: 'Rows', value: summary.rows },
            { metric: 'Unique Vendors', value: summary.unique_vendors },
            { metric: 'Unique NAICS Codes', value: summary.unique_naics },
            { metric: 'Pools', value: summary.pools },
        ]
    );
}
