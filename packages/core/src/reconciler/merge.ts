/**
 * Reconciler: left join of pool awards against contract records.
 *
 * Join semantics:
 * - Every pool row survives. No match -> contract columns are null.
 * - k matching contract rows -> k output rows (fan-out, not deduplicated).
 * - A null key never matches.
 *
 * Name collisions keep the pool column as-is and rename the contract
 * column with CONTRACT_SUFFIX, so no value is dropped.
 */

import type {
    ContractTable,
    DataRecord,
    FieldValue,
    MergedRecord,
    MergedTable,
    PoolTable,
} from '../types/index.js';
import { COLUMNS, CONTRACT_SUFFIX, GUARANTEED_COLUMNS, VENDOR_NAME_COLUMNS } from '../types/index.js';
import { firstPresent } from '../utils/fallback.js';
import { uniqueName } from '../utils/columns.js';

export interface ReconcileResult {
    table: MergedTable;
    /** Pool rows with no contract match. */
    unmatchedRows: number;
    /** Pool rows that matched more than one contract row. */
    fanOutRows: number;
}

/**
 * Left-join pools to contracts on Contract # = Contract Number.
 * Pure: neither input is modified.
 */
export function reconcile(contracts: ContractTable, pools: PoolTable): ReconcileResult {
    const contractColumns = renameContractColumns(pools.columns, contracts.columns);
    const columns = buildMergedColumns(pools.columns, [...contractColumns.values()]);
    const index = indexContracts(contracts.rows);

    const rows: MergedRecord[] = [];
    let unmatchedRows = 0;
    let fanOutRows = 0;

    for (const award of pools.rows) {
        const key = award[COLUMNS.CONTRACT_REF] ?? null;
        const matches = key === null ? [] : index.get(key) ?? [];

        if (matches.length === 0) {
            unmatchedRows++;
            rows.push(mergeRow(award, null, contractColumns, columns));
            continue;
        }
        if (matches.length > 1) {
            fanOutRows++;
        }
        for (const contract of matches) {
            rows.push(mergeRow(award, contract, contractColumns, columns));
        }
    }

    return { table: { columns, rows }, unmatchedRows, fanOutRows };
}

/**
 * Group contract rows by normalized contract number, keeping sheet order.
 */
export function indexContracts(rows: readonly DataRecord[]): Map<string, DataRecord[]> {
    const index = new Map<string, DataRecord[]>();
    for (const row of rows) {
        const key = row[COLUMNS.CONTRACT_NUMBER];
        if (key === undefined || key === null) continue;
        const bucket = index.get(key);
        if (bucket) {
            bucket.push(row);
        } else {
            index.set(key, [row]);
        }
    }
    return index;
}

/**
 * Output name for each contract column; colliding names get the suffix.
 */
export function renameContractColumns(
    poolColumns: readonly string[],
    contractColumns: readonly string[]
): Map<string, string> {
    const taken = new Set(poolColumns);
    const renamed = new Map<string, string>();
    for (const column of contractColumns) {
        const name = taken.has(column) ? uniqueName(`${column}${CONTRACT_SUFFIX}`, taken) : column;
        taken.add(name);
        renamed.set(column, name);
    }
    return renamed;
}

/**
 * Pool columns, then contract columns, then Vendor Display, then any
 * guaranteed column neither side produced.
 */
function buildMergedColumns(poolColumns: readonly string[], contractColumns: readonly string[]): string[] {
    const columns = [...poolColumns, ...contractColumns];
    for (const column of [COLUMNS.VENDOR_DISPLAY, ...GUARANTEED_COLUMNS]) {
        if (!columns.includes(column)) {
            columns.push(column);
        }
    }
    return columns;
}

function mergeRow(
    award: DataRecord,
    contract: DataRecord | null,
    contractColumns: ReadonlyMap<string, string>,
    columns: readonly string[]
): MergedRecord {
    const joined: Record<string, FieldValue> = { ...award };
    for (const [source, target] of contractColumns) {
        joined[target] = contract ? contract[source] ?? null : null;
    }

    const row: Record<string, FieldValue> = {};
    for (const column of columns) {
        row[column] = joined[column] ?? null;
    }

    return { ...row, [COLUMNS.VENDOR_DISPLAY]: firstPresent(joined, VENDOR_NAME_COLUMNS) ?? '' };
}
