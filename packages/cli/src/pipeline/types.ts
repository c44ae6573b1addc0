import type { WorkbookCache, AggregateViews } from '@award-explorer/core';
import type { ExplorerConfig, LoadResult, MergedTable, TableSummary } from '@award-explorer/shared';
import type { ExploreOptions } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the explore pipeline.
 */
export interface PipelineState {
    workbookPath: string;
    options: ExploreOptions;
    config: ExplorerConfig;
    cache: WorkbookCache;

    // Accumulated during pipeline execution
    data?: ArrayBuffer;
    load?: LoadResult;
    cached?: boolean;
    filtered?: MergedTable;
    summary?: TableSummary;
    views?: AggregateViews;
    outputs: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
