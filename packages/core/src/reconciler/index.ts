export { reconcile, indexContracts, renameContractColumns } from './merge.js';
export type { ReconcileResult } from './merge.js';
