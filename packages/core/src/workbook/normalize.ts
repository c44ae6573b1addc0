/**
 * Workbook normalizer.
 *
 * Turns the contract-information sheet and every recognized pool sheet into
 * two tables with trimmed column names and normalized join keys.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned as data.
 */

import type * as XLSX from 'xlsx';
import type { ContractTable, FieldValue, PoolTable } from '../types/index.js';
import {
    CODE_COLUMNS,
    COLUMNS,
    CONTRACT_HEADER_ROW,
    CONTRACT_SHEET_NAME,
    POOL_HEADER_ROW,
    POOL_NAMES,
} from '../types/index.js';
import { SchemaError } from '../errors.js';
import { normalizeKey } from '../utils/normalize.js';
import { unionColumns } from '../utils/columns.js';
import { readSheet, type RawSheet } from './read.js';

const POOL_NAME_SET: ReadonlySet<string> = new Set(POOL_NAMES);

export interface ContractLoadResult {
    table: ContractTable;
    warnings: string[];
}

export interface PoolLoadResult {
    table: PoolTable;
    /** Trimmed names of the loaded pool sheets, in workbook order. */
    sheets: string[];
    warnings: string[];
}

export interface NormalizedWorkbook {
    contracts: ContractTable;
    pools: PoolTable;
    poolSheets: string[];
    warnings: string[];
}

/**
 * Normalize both sides of the join.
 *
 * @throws SchemaError on the first missing sheet or column
 */
export function normalizeWorkbook(workbook: XLSX.WorkBook): NormalizedWorkbook {
    const contracts = loadContractTable(workbook);
    const pools = loadPoolTable(workbook);

    return {
        contracts: contracts.table,
        pools: pools.table,
        poolSheets: pools.sheets,
        warnings: [...contracts.warnings, ...pools.warnings],
    };
}

/**
 * Load the contract-information sheet. Header is on the second row.
 */
export function loadContractTable(workbook: XLSX.WorkBook): ContractLoadResult {
    const sheet = workbook.SheetNames.includes(CONTRACT_SHEET_NAME)
        ? workbook.Sheets[CONTRACT_SHEET_NAME]
        : undefined;

    if (!sheet) {
        throw new SchemaError(
            `Sheet "${CONTRACT_SHEET_NAME}" not found in workbook. ` +
            `Sheets: ${workbook.SheetNames.join(', ')}`
        );
    }

    const raw = readSheet(sheet, CONTRACT_SHEET_NAME, CONTRACT_HEADER_ROW);
    requireColumn(raw.columns, COLUMNS.CONTRACT_NUMBER, 'contract sheet');

    const warnings: string[] = [];
    const rows: Record<string, FieldValue>[] = [];
    let skippedRows = 0;

    for (const row of raw.rows) {
        const key = normalizeKey(row[COLUMNS.CONTRACT_NUMBER]);
        if (key === null) {
            skippedRows++;
            continue;
        }
        rows.push({ ...row, [COLUMNS.CONTRACT_NUMBER]: key });
    }

    if (skippedRows > 0) {
        warnings.push(`Skipped ${skippedRows} contract rows with no "${COLUMNS.CONTRACT_NUMBER}"`);
    }

    return { table: { columns: raw.columns, rows }, warnings };
}

/**
 * Load and union every recognized pool sheet, tagging rows with their pool.
 */
export function loadPoolTable(workbook: XLSX.WorkBook): PoolLoadResult {
    const warnings: string[] = [];
    const loaded: { pool: string; sheet: RawSheet }[] = [];

    for (const sheetName of workbook.SheetNames) {
        if (sheetName === CONTRACT_SHEET_NAME) continue;

        const pool = sheetName.trim();
        if (!POOL_NAME_SET.has(pool)) {
            warnings.push(`Ignored sheet "${sheetName}" (not a recognized pool)`);
            continue;
        }

        loaded.push({ pool, sheet: readSheet(workbook.Sheets[sheetName], sheetName, POOL_HEADER_ROW) });
    }

    if (loaded.length === 0) {
        throw new SchemaError(
            `No pool sheets found in workbook. Expected one of: ${POOL_NAMES.join(', ')}. ` +
            `Sheets: ${workbook.SheetNames.join(', ')}`
        );
    }

    const columns = unionColumns([...loaded.map(({ sheet }) => sheet.columns), [COLUMNS.POOL]]);
    requireColumn(columns, COLUMNS.CONTRACT_REF, 'pool sheets');

    const codeColumns = CODE_COLUMNS.filter((col) => columns.includes(col));
    const rows: Record<string, FieldValue>[] = [];

    for (const { pool, sheet } of loaded) {
        for (const source of sheet.rows) {
            const row: Record<string, FieldValue> = {};
            for (const column of columns) {
                row[column] = source[column] ?? null;
            }
            row[COLUMNS.POOL] = pool;
            row[COLUMNS.CONTRACT_REF] = normalizeKey(row[COLUMNS.CONTRACT_REF]);
            for (const column of codeColumns) {
                row[column] = normalizeKey(row[column]);
            }
            rows.push(row);
        }
    }

    return {
        table: { columns, rows },
        sheets: loaded.map(({ pool }) => pool),
        warnings,
    };
}

function requireColumn(columns: readonly string[], column: string, where: string): void {
    if (!columns.includes(column)) {
        throw new SchemaError(
            `"${column}" not found in ${where}. Columns: ${columns.join(', ')}`,
            columns
        );
    }
}
