/**
 * Search and facet filtering over a merged table.
 * Filtering is non-destructive: a new table is returned, rows are shared.
 */

import type { DataRecord, FilterCriteriaInput, MergedTable } from '../types/index.js';
import { COLUMNS, FilterCriteriaSchema, SEARCH_COLUMNS } from '../types/index.js';

/**
 * Apply search text and facet selections, composed by AND.
 * Empty search or an empty selection leaves rows untouched.
 */
export function filterTable(table: MergedTable, criteria: FilterCriteriaInput = {}): MergedTable {
    const { search, pools, domains, naics, sins } = FilterCriteriaSchema.parse(criteria);
    const needle = search.toLowerCase();

    const facets: [string, ReadonlySet<string>][] = [
        [COLUMNS.POOL, new Set(pools)],
        [COLUMNS.DOMAIN, new Set(domains)],
        [COLUMNS.NAICS, new Set(naics)],
        [COLUMNS.SIN, new Set(sins)],
    ];
    const active = facets.filter(([, values]) => values.size > 0);

    const rows = table.rows.filter(
        (row) =>
            (needle === '' || matchesSearch(row, needle)) &&
            active.every(([column, values]) => matchesFacet(row, column, values))
    );

    return { columns: table.columns, rows };
}

/**
 * Case-insensitive substring match against Vendor Display, UEI and both
 * spellings of the contract identifier. A missing field is a non-match.
 */
export function matchesSearch(row: DataRecord, search: string): boolean {
    const needle = search.toLowerCase();
    return SEARCH_COLUMNS.some((column) => {
        const value = row[column];
        return value !== undefined && value !== null && value.toLowerCase().includes(needle);
    });
}

/**
 * Exact membership; the missing marker is never a member.
 */
export function matchesFacet(row: DataRecord, column: string, values: ReadonlySet<string>): boolean {
    const value = row[column];
    return value !== undefined && value !== null && values.has(value);
}
