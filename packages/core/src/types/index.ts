/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    FieldValue,
    DataRecord,
    DataTable,
    MergedRecord,
    ContractTable,
    PoolTable,
    MergedTable,
    ReconcileStats,
    LoadResult,
    FilterCriteria,
    FilterCriteriaInput,
    GroupCount,
    TableSummary,
} from '@award-explorer/shared';

export {
    FilterCriteriaSchema,
    CONTRACT_SHEET_NAME,
    CONTRACT_HEADER_ROW,
    POOL_HEADER_ROW,
    POOL_NAMES,
    COLUMNS,
    CONTRACT_SUFFIX,
    VENDOR_NAME_COLUMNS,
    CODE_COLUMNS,
    GUARANTEED_COLUMNS,
    SEARCH_COLUMNS,
    EXPLORER_DEFAULTS,
} from '@award-explorer/shared';
