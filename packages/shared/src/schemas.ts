/**
 * Zod schemas for Award Explorer data structures.
 *
 * IMPORTANT: `null` is the missing marker for every cell.
 * A present-but-empty cell is the empty string, never `null`.
 */

import { z } from 'zod';
import { DISPLAY_COLUMNS, EXPLORER_DEFAULTS } from './constants.js';

// ============================================================================
// Table Schemas
// ============================================================================

/**
 * Cell value after normalization: a string or the missing marker.
 */
export const FieldValueSchema = z.string().nullable();

export type FieldValue = z.infer<typeof FieldValueSchema>;

/**
 * One row, keyed by column name.
 */
export const DataRecordSchema = z.record(z.string(), FieldValueSchema);

export type DataRecord = Readonly<z.infer<typeof DataRecordSchema>>;

/**
 * Ordered schema plus rows. Every row carries every column.
 */
export const DataTableSchema = z.object({
    columns: z.array(z.string()),
    rows: z.array(DataRecordSchema),
});

export interface DataTable<R extends DataRecord = DataRecord> {
    readonly columns: readonly string[];
    readonly rows: readonly R[];
}

/**
 * Merged row: always carries a string `Vendor Display`.
 */
export type MergedRecord = DataRecord & { readonly 'Vendor Display': string };

export type ContractTable = DataTable;
export type PoolTable = DataTable;
export type MergedTable = DataTable<MergedRecord>;

// ============================================================================
// Reconciliation Schemas
// ============================================================================

/**
 * Counts gathered while normalizing and joining a workbook.
 */
export const ReconcileStatsSchema = z.object({
    pool_sheets: z.array(z.string()),
    pool_rows: z.number().int().min(0),
    contract_rows: z.number().int().min(0),
    merged_rows: z.number().int().min(0),
    unmatched_rows: z.number().int().min(0),
    fan_out_rows: z.number().int().min(0),
});

export type ReconcileStats = z.infer<typeof ReconcileStatsSchema>;

/**
 * Result of loading a workbook end to end.
 * Warnings are returned as data; the core never logs.
 */
export interface LoadResult {
    readonly hash: string;
    readonly table: MergedTable;
    readonly warnings: readonly string[];
    readonly stats: ReconcileStats;
}

// ============================================================================
// Query Schemas
// ============================================================================

/**
 * Search text plus facet selections. Empty selections match everything.
 */
export const FilterCriteriaSchema = z.object({
    search: z.string().default(''),
    pools: z.array(z.string()).default([]),
    domains: z.array(z.string()).default([]),
    naics: z.array(z.string()).default([]),
    sins: z.array(z.string()).default([]),
});

export type FilterCriteria = z.infer<typeof FilterCriteriaSchema>;
export type FilterCriteriaInput = z.input<typeof FilterCriteriaSchema>;

/**
 * One bar of an aggregate view.
 */
export const GroupCountSchema = z.object({
    group: z.string(),
    count: z.number().int().min(0),
});

export type GroupCount = z.infer<typeof GroupCountSchema>;

/**
 * Headline metrics of a (filtered) table.
 */
export const TableSummarySchema = z.object({
    rows: z.number().int().min(0),
    unique_vendors: z.number().int().min(0),
    unique_naics: z.number().int().min(0),
    pools: z.number().int().min(0),
});

export type TableSummary = z.infer<typeof TableSummarySchema>;

// ============================================================================
// Configuration Schema
// ============================================================================

/**
 * Explorer configuration, read from YAML.
 */
export const ExplorerConfigSchema = z.object({
    previewRows: z.number().int().min(0).default(EXPLORER_DEFAULTS.PREVIEW_ROWS),
    topNaics: z.number().int().min(1).default(EXPLORER_DEFAULTS.TOP_NAICS),
    cacheSize: z.number().int().min(1).default(EXPLORER_DEFAULTS.CACHE_SIZE),
    exportBasename: z.string().min(1).default(EXPLORER_DEFAULTS.EXPORT_BASENAME),
    displayColumns: z.array(z.string().min(1)).min(1).default([...DISPLAY_COLUMNS]),
});

export type ExplorerConfig = z.infer<typeof ExplorerConfigSchema>;
