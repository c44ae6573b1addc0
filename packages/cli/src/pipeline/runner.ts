import type { WorkbookCache } from '@award-explorer/core';
import type { ExplorerConfig } from '@award-explorer/shared';
import type { PipelineState, PipelineStep } from './types.js';
import { readInput } from './steps/read.js';
import { loadInput } from './steps/load.js';
import { applyFilters } from './steps/filter.js';
import { summarizeResults } from './steps/summarize.js';
import { exportResults } from './steps/export.js';
import type { ExploreOptions } from '../types.js';
import { arrow, error } from '../utils/console.js';

/**
 * Orchestrates the execution of the explore pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    workbookPath: string,
    options: ExploreOptions,
    config: ExplorerConfig,
    cache: WorkbookCache
): Promise<PipelineState> {
    let state: PipelineState = {
        workbookPath,
        options,
        config,
        cache,
        outputs: [],
        warnings: [],
        errors: [],
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Read Workbook', fn: readInput },
        { name: 'Load & Reconcile', fn: loadInput },
        { name: 'Filter', fn: applyFilters },
        { name: 'Summarize', fn: summarizeResults },
        { name: 'Export', fn: exportResults },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
