import { describeError } from '@award-explorer/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 2: Load & Reconcile
 * Normalizes the workbook and joins pools to contracts through the cache.
 * SchemaError and ParseError are fatal: no data view may follow them.
 */
export const loadInput: PipelineStep = async (state) => {
    if (!state.data) {
        state.errors.push({ step: 'load', message: 'No workbook data to load.', fatal: true });
        return state;
    }

    try {
        const { result, cached } = state.cache.load(state.data);
        state.load = result;
        state.cached = cached;

        for (const warning of result.warnings) {
            state.warnings.push(`[workbook] ${warning}`);
        }
    } catch (err) {
        const kind = err instanceof Error ? err.name : 'Error';
        state.errors.push({
            step: 'load',
            message: `${kind}: ${describeError(err)}`,
            fatal: true,
            error: err,
        });
    }
    return state;
};
