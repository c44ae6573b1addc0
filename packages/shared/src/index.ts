// Schemas
export {
    FieldValueSchema,
    DataRecordSchema,
    DataTableSchema,
    ReconcileStatsSchema,
    FilterCriteriaSchema,
    GroupCountSchema,
    TableSummarySchema,
    ExplorerConfigSchema,
} from './schemas.js';

// Types
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
    ExplorerConfig,
} from './schemas.js';

// Constants
export {
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
    DISPLAY_COLUMNS,
    EXPLORER_DEFAULTS,
} from './constants.js';
export type { PoolName } from './constants.js';
