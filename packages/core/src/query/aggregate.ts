/**
 * Option lists, grouped counts and headline metrics.
 */

import type { DataTable, GroupCount, TableSummary } from '../types/index.js';
import { COLUMNS, EXPLORER_DEFAULTS } from '../types/index.js';

/**
 * Distinct non-missing values of a column, in ascending code-unit order.
 */
export function distinctValues(table: DataTable, field: string): string[] {
    const values = new Set<string>();
    for (const row of table.rows) {
        const value = row[field];
        if (value !== undefined && value !== null) {
            values.add(value);
        }
    }
    return [...values].sort();
}

/**
 * Number of distinct `countField` values per `groupField` value.
 *
 * Only a missing value goes uncounted: `""` is a value of its own, so rows
 * with an empty Vendor Display count as one vendor per group.
 * Rows whose group is missing are left out. Sorted by count descending,
 * ties broken by group ascending; truncated to `topN` when given.
 */
export function groupedUniqueCount(
    table: DataTable,
    groupField: string,
    countField: string,
    topN?: number
): GroupCount[] {
    const groups = new Map<string, Set<string>>();

    for (const row of table.rows) {
        const group = row[groupField];
        if (group === undefined || group === null) continue;

        let members = groups.get(group);
        if (!members) {
            members = new Set<string>();
            groups.set(group, members);
        }

        const value = row[countField];
        if (value !== undefined && value !== null) {
            members.add(value);
        }
    }

    const counts = [...groups].map(([group, members]) => ({ group, count: members.size }));
    counts.sort((a, b) => b.count - a.count || compareStrings(a.group, b.group));

    return topN === undefined ? counts : counts.slice(0, topN);
}

/**
 * Unique vendors per pool.
 */
export function vendorsByPool(table: DataTable): GroupCount[] {
    return groupedUniqueCount(table, COLUMNS.POOL, COLUMNS.VENDOR_DISPLAY);
}

/**
 * Unique vendors per NAICS code, busiest codes only.
 */
export function topNaics(table: DataTable, topN: number = EXPLORER_DEFAULTS.TOP_NAICS): GroupCount[] {
    return groupedUniqueCount(table, COLUMNS.NAICS, COLUMNS.VENDOR_DISPLAY, topN);
}

/**
 * Unique vendors per domain.
 */
export function vendorsByDomain(table: DataTable): GroupCount[] {
    return groupedUniqueCount(table, COLUMNS.DOMAIN, COLUMNS.VENDOR_DISPLAY);
}

/**
 * The three aggregate views shown alongside a table.
 */
export interface AggregateViews {
    byPool: GroupCount[];
    topNaics: GroupCount[];
    byDomain: GroupCount[];
}

export function buildAggregateViews(
    table: DataTable,
    naicsLimit: number = EXPLORER_DEFAULTS.TOP_NAICS
): AggregateViews {
    return {
        byPool: vendorsByPool(table),
        topNaics: topNaics(table, naicsLimit),
        byDomain: vendorsByDomain(table),
    };
}

/**
 * Row count plus distinct vendors, NAICS codes and pools.
 * Counts follow {@link distinctValues}, so `""` counts once.
 */
export function summarizeTable(table: DataTable): TableSummary {
    return {
        rows: table.rows.length,
        unique_vendors: distinctValues(table, COLUMNS.VENDOR_DISPLAY).length,
        unique_naics: distinctValues(table, COLUMNS.NAICS).length,
        pools: distinctValues(table, COLUMNS.POOL).length,
    };
}

function compareStrings(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
