import { describeError } from '@award-explorer/core';
import type { PipelineStep } from '../types.js';
import { writeCsvExport, writeExcelExport } from '../../export/write.js';

/**
 * Step 5: Export
 * Writes the filtered table as CSV and/or .xlsx when requested.
 */
export const exportResults: PipelineStep = async (state) => {
    const { csv, xlsx } = state.options;
    if (!state.filtered || (!csv && !xlsx)) {
        return state;
    }

    const basename = state.config.exportBasename;

    try {
        if (csv) {
            state.outputs.push(await writeCsvExport(state.filtered, csv, basename));
        }
        if (xlsx && state.summary && state.views) {
            state.outputs.push(
                await writeExcelExport(state.filtered, state.views, state.summary, xlsx, basename)
            );
        }
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results: ${describeError(err)}`,
            fatal: true,
            error: err,
        });
    }
    return state;
};
