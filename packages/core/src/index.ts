// Types (re-exported from shared)
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
} from './types/index.js';

// Errors
export { SchemaError, ParseError, describeError } from './errors.js';

// Utils
export { normalizeKey, normalizeHeader, isBlank } from './utils/normalize.js';
export { firstPresent } from './utils/fallback.js';
export { cellToField } from './utils/cells.js';
export { hashWorkbook } from './utils/hash.js';

// Workbook
export { readWorkbook, readSheet, normalizeWorkbook, loadContractTable, loadPoolTable } from './workbook/index.js';
export type { RawSheet, NormalizedWorkbook } from './workbook/index.js';

// Reconciler
export { reconcile } from './reconciler/index.js';
export type { ReconcileResult } from './reconciler/index.js';

// Loading
export { loadWorkbook } from './load.js';
export { WorkbookCache } from './cache.js';
export type { CachedLoad } from './cache.js';

// Query
export {
    filterTable,
    matchesSearch,
    distinctValues,
    groupedUniqueCount,
    vendorsByPool,
    topNaics,
    vendorsByDomain,
    summarizeTable,
    buildAggregateViews,
    selectColumns,
    toDelimitedText,
    parseDelimitedText,
} from './query/index.js';
export type { AggregateViews } from './query/index.js';
