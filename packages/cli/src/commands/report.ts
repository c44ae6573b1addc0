import { buildAggregateViews, selectColumns, summarizeTable, type AggregateViews } from '@award-explorer/core';
import type { ExplorerConfig, GroupCount, MergedTable } from '@award-explorer/shared';
import { renderBarChart, renderSummary, renderTable } from '../render/index.js';
import { log, lines, section } from '../utils/console.js';

/**
 * Prints the metric tiles and a preview of the configured display columns.
 */
export function printTableView(table: MergedTable, config: ExplorerConfig, rows: number): void {
    section('Summary');
    lines(renderSummary(summarizeTable(table)));

    section(`Rows (first ${Math.min(rows, table.rows.length)} of ${table.rows.length})`);
    lines(renderTable(selectColumns(table, config.displayColumns), rows));
}

/**
 * Prints the three aggregate bar charts.
 */
export function printCharts(views: AggregateViews, config: ExplorerConfig): void {
    const charts: [string, GroupCount[]][] = [
        ['Unique Vendors per Pool', views.byPool],
        [`Top ${config.topNaics} NAICS by Unique Vendors`, views.topNaics],
        ['Unique Vendors per Domain', views.byDomain],
    ];
    for (const [title, counts] of charts) {
        log('');
        lines(renderBarChart(title, counts));
    }
}

/**
 * Aggregates the table, then prints its charts.
 */
export function printChartsFor(table: MergedTable, config: ExplorerConfig): void {
    printCharts(buildAggregateViews(table, config.topNaics), config);
}
