#!/usr/bin/env node
/**
 * Award Explorer CLI
 *
 * The CLI owns all file I/O and console output. The core receives the
 * workbook as an ArrayBuffer and returns tables and warnings as data.
 */

import { describeError } from '@award-explorer/core';
import { parseCommandLine, type ParsedCommandLine } from './args.js';
import { exploreWorkbook } from './commands/explore.js';
import { error } from './utils/console.js';

const USAGE = [
    'Award Explorer',
    '',
    'Usage: award-explorer <workbook.xlsx> [options]',
    '',
    'Options:',
    '  --search <text>     free-text search over vendor, UEI and contract numbers',
    '  --pool <v>          select a pool (repeatable)',
    '  --domain <v>        select a domain (repeatable)',
    '  --naics <v>         select a NAICS code (repeatable)',
    '  --sin <v>           select a SIN (repeatable)',
    '  --csv <path>        write the filtered table as CSV',
    '  --xlsx <path>       write the filtered table and charts as .xlsx',
    '  --rows <n>          rows to preview',
    '  --config <path>     YAML config file (default: ./award-explorer.yaml)',
    '  -i, --interactive   start a query session',
    '  --columns           list the merged columns',
    '  -h, --help          show this help',
    '',
    'Example:',
    '  award-explorer OASIS_awards.xlsx --pool 8a --naics 541511 --csv out/',
];

async function main() {
    let parsed: ParsedCommandLine;
    try {
        parsed = parseCommandLine(process.argv.slice(2));
    } catch (err) {
        error(`Error: ${describeError(err)}`);
        console.log(USAGE.join('\n'));
        process.exit(1);
    }

    if (parsed.help || !parsed.workbookPath) {
        console.log(USAGE.join('\n'));
        process.exit(parsed.help ? 0 : 1);
    }

    await exploreWorkbook(parsed.workbookPath, parsed.options);
}

main().catch((err: unknown) => {
    error(`Unexpected error: ${describeError(err)}`);
    process.exit(1);
});
