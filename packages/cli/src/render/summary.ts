import type { ReconcileStats, TableSummary } from '@award-explorer/shared';

const number = new Intl.NumberFormat('en-US');

/**
 * The four metric tiles as text lines.
 */
export function renderSummary(summary: TableSummary): string[] {
    return [
        `Rows:               ${number.format(summary.rows)}`,
        `Unique Vendors:     ${number.format(summary.unique_vendors)}`,
        `Unique NAICS Codes: ${number.format(summary.unique_naics)}`,
        `Pools:              ${number.format(summary.pools)}`,
    ];
}

/**
 * Reconciliation counts for the loaded workbook.
 */
export function renderStats(stats: ReconcileStats): string[] {
    return [
        `Pool sheets:    ${stats.pool_sheets.join(', ')}`,
        `Pool rows:      ${number.format(stats.pool_rows)}`,
        `Contract rows:  ${number.format(stats.contract_rows)}`,
        `Merged rows:    ${number.format(stats.merged_rows)}`,
        `Unmatched:      ${number.format(stats.unmatched_rows)}`,
        `Fan-out:        ${number.format(stats.fan_out_rows)}`,
    ];
}
