/**
 * End-to-end workbook loading: decode, normalize, reconcile.
 *
 * Either a complete LoadResult is returned or an error is thrown;
 * no partial table ever escapes.
 */

import type { LoadResult } from './types/index.js';
import { readWorkbook } from './workbook/read.js';
import { normalizeWorkbook } from './workbook/normalize.js';
import { reconcile } from './reconciler/merge.js';
import { hashWorkbook } from './utils/hash.js';

/**
 * Load a workbook blob into the merged table.
 *
 * @param data - File contents as ArrayBuffer
 * @throws ParseError if the blob is not a spreadsheet
 * @throws SchemaError if a required sheet or column is missing
 */
export function loadWorkbook(data: ArrayBuffer): LoadResult {
    const workbook = readWorkbook(data);
    const { contracts, pools, poolSheets, warnings } = normalizeWorkbook(workbook);
    const { table, unmatchedRows, fanOutRows } = reconcile(contracts, pools);

    if (unmatchedRows > 0) {
        warnings.push(`${unmatchedRows} pool rows have no matching contract record`);
    }
    if (fanOutRows > 0) {
        warnings.push(`${fanOutRows} pool rows matched more than one contract record`);
    }

    return {
        hash: hashWorkbook(data),
        table,
        warnings,
        stats: {
            pool_sheets: poolSheets,
            pool_rows: pools.rows.length,
            contract_rows: contracts.rows.length,
            merged_rows: table.rows.length,
            unmatched_rows: unmatchedRows,
            fan_out_rows: fanOutRows,
        },
    };
}
