import { WorkbookCache, describeError } from '@award-explorer/core';
import type { ExplorerConfig } from '@award-explorer/shared';
import { loadConfig } from '../config/load.js';
import { runPipeline } from '../pipeline/runner.js';
import type { PipelineState } from '../pipeline/types.js';
import { renderStats } from '../render/index.js';
import { log, lines, section, success, warn, arrow, error } from '../utils/console.js';
import type { ExploreOptions } from '../types.js';
import { printCharts, printTableView } from './report.js';
import { runInteractive } from './interactive.js';

/**
 * Loads a workbook, applies the requested filters and prints the views.
 * Exits with code 1 when a fatal error leaves no data to show.
 */
export async function exploreWorkbook(workbookPath: string, options: ExploreOptions): Promise<void> {
    log(`\nAward Explorer - ${workbookPath}`);

    let config: ExplorerConfig;
    try {
        config = loadConfig(options.config);
    } catch (err) {
        error(`Error: Failed to load configuration. ${describeError(err)}`);
        process.exit(1);
    }

    const cache = new WorkbookCache(config.cacheSize);
    const state = await runPipeline(workbookPath, options, config, cache);

    if (!reportState(state)) {
        process.exit(1);
    }

    if (options.interactive && state.load) {
        await runInteractive({
            workbookPath,
            config,
            cache,
            table: state.load.table,
            criteria: options.criteria,
            rows: options.rows ?? config.previewRows,
        });
    }
}

/**
 * Prints warnings, errors and, when the pipeline succeeded, the data views.
 * Returns false when a fatal error occurred.
 */
export function reportState(state: PipelineState): boolean {
    if (state.warnings.length > 0) {
        log('');
        for (const w of state.warnings) {
            warn(w);
        }
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            error(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Exploration failed with fatal errors.');
            return false;
        }
    }

    const { load, filtered, views } = state;
    if (!load || !filtered || !views) {
        return false;
    }

    success(`Loaded ${load.stats.merged_rows} merged rows${state.cached ? ' (cached)' : ''}.`);
    section('Reconciliation');
    lines(renderStats(load.stats));

    if (state.options.columns) {
        section('Columns');
        lines(load.table.columns);
    }

    printTableView(filtered, state.config, state.options.rows ?? state.config.previewRows);
    printCharts(views, state.config);

    for (const output of state.outputs) {
        arrow(`Export saved to: ${output}`);
    }
    return true;
}
