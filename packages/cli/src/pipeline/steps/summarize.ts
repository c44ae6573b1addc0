import { buildAggregateViews, summarizeTable } from '@award-explorer/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Summarize
 */
export const summarizeResults: PipelineStep = async (state) => {
    if (!state.filtered) {
        return state;
    }

    state.summary = summarizeTable(state.filtered);
    state.views = buildAggregateViews(state.filtered, state.config.topNaics);

    if (state.filtered.rows.length === 0) {
        state.warnings.push('No rows match the current filters');
    }
    return state;
};
