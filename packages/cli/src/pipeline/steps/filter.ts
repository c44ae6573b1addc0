import { distinctValues, filterTable } from '@award-explorer/core';
import { COLUMNS } from '@award-explorer/shared';
import type { PipelineStep } from '../types.js';

/**
 * Step 3: Filter
 * Applies search and facet selections. A selected value that never occurs
 * in the workbook is reported, not rejected.
 */
export const applyFilters: PipelineStep = async (state) => {
    if (!state.load) {
        return state;
    }

    const { table } = state.load;
    const { criteria } = state.options;

    const facets: [string, string, string[]][] = [
        ['Pool', COLUMNS.POOL, criteria.pools],
        ['Domain', COLUMNS.DOMAIN, criteria.domains],
        ['NAICS', COLUMNS.NAICS, criteria.naics],
        ['SIN', COLUMNS.SIN, criteria.sins],
    ];

    for (const [label, column, selected] of facets) {
        if (selected.length === 0) continue;
        const known = new Set(distinctValues(table, column));
        for (const value of selected) {
            if (!known.has(value)) {
                state.warnings.push(`${label} "${value}" does not occur in the workbook`);
            }
        }
    }

    state.filtered = filterTable(table, criteria);
    return state;
};
