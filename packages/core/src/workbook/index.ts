export { readWorkbook, readSheet, buildColumnNames } from './read.js';
export type { RawSheet } from './read.js';
export { normalizeWorkbook, loadContractTable, loadPoolTable } from './normalize.js';
export type { NormalizedWorkbook, ContractLoadResult, PoolLoadResult } from './normalize.js';
