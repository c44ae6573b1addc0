import { parseArgs } from 'node:util';
import { FilterCriteriaSchema } from '@award-explorer/shared';
import type { ExploreOptions } from './types.js';

export interface ParsedCommandLine {
    workbookPath?: string;
    help: boolean;
    options: ExploreOptions;
}

/**
 * Parses `award-explorer <workbook.xlsx> [options]`.
 *
 * @throws Error on unknown options or an invalid --rows value
 */
export function parseCommandLine(argv: string[]): ParsedCommandLine {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            search: { type: 'string' },
            pool: { type: 'string', multiple: true },
            domain: { type: 'string', multiple: true },
            naics: { type: 'string', multiple: true },
            sin: { type: 'string', multiple: true },
            csv: { type: 'string' },
            xlsx: { type: 'string' },
            rows: { type: 'string' },
            config: { type: 'string' },
            interactive: { type: 'boolean', short: 'i', default: false },
            columns: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    if (positionals.length > 1) {
        throw new Error(`Expected one workbook path, got ${positionals.length}: ${positionals.join(', ')}`);
    }

    let rows: number | undefined;
    if (values.rows !== undefined) {
        rows = Number(values.rows);
        if (!Number.isInteger(rows) || rows < 0) {
            throw new Error(`--rows must be a non-negative integer, got "${values.rows}"`);
        }
    }

    const criteria = FilterCriteriaSchema.parse({
        search: values.search,
        pools: values.pool,
        domains: values.domain,
        naics: values.naics,
        sins: values.sin,
    });

    return {
        workbookPath: positionals[0],
        help: values.help ?? false,
        options: {
            criteria,
            csv: values.csv,
            xlsx: values.xlsx,
            rows,
            config: values.config,
            interactive: values.interactive ?? false,
            columns: values.columns ?? false,
        },
    };
}
