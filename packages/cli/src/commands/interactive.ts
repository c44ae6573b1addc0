import { createInterface } from 'node:readline';
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import {
    WorkbookCache,
    buildAggregateViews,
    describeError,
    distinctValues,
    filterTable,
    summarizeTable,
} from '@award-explorer/core';
import type { ExplorerConfig, FilterCriteria, MergedTable } from '@award-explorer/shared';
import { writeCsvExport, writeExcelExport } from '../export/write.js';
import { HELP_LINES, applyCommand, describeCriteria, parseCommand, type SessionCommand } from '../session/commands.js';
import { toArrayBuffer } from '../utils/buffer.js';
import { log, lines, success, warn, info, arrow, error } from '../utils/console.js';
import { printChartsFor, printTableView } from './report.js';

export interface Session {
    workbookPath: string;
    config: ExplorerConfig;
    cache: WorkbookCache;
    table: MergedTable;
    criteria: FilterCriteria;
    rows: number;
}

/**
 * Query session over stdin. Ends on `quit` or end of input.
 */
export async function runInteractive(session: Session): Promise<Session> {
    const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY });
    info('Interactive session. Type "help" for commands.');
    try {
        return await runSession(session, rl);
    } finally {
        rl.close();
    }
}

/**
 * Processes commands line by line. Errors in one command are printed and
 * the session continues with its previous state.
 */
export async function runSession(session: Session, lines: AsyncIterable<string>): Promise<Session> {
    let current = session;
    for await (const line of lines) {
        const command = parseCommand(line);
        if (!command) continue;
        if (command.kind === 'quit') break;

        try {
            current = await executeCommand(current, command);
        } catch (err) {
            error(describeError(err));
        }
    }
    return current;
}

export async function executeCommand(session: Session, command: SessionCommand): Promise<Session> {
    switch (command.kind) {
        case 'search':
        case 'facet':
        case 'clear': {
            const criteria = applyCommand(session.criteria, command);
            const count = filterTable(session.table, criteria).rows.length;
            arrow(`${describeCriteria(criteria)} (${count} rows)`);
            return { ...session, criteria };
        }
        case 'show':
            printTableView(filterTable(session.table, session.criteria), session.config, session.rows);
            return session;
        case 'charts':
            printChartsFor(filterTable(session.table, session.criteria), session.config);
            return session;
        case 'options': {
            if (!session.table.columns.includes(command.column)) {
                warn(`Column "${command.column}" not in workbook`);
                return session;
            }
            const values = distinctValues(session.table, command.column);
            log(`${command.column} (${values.length} values)`);
            lines(values.map((value) => `  ${value}`));
            return session;
        }
        case 'export': {
            const filtered = filterTable(session.table, session.criteria);
            const basename = session.config.exportBasename;
            const path = extname(command.path).toLowerCase() === '.xlsx'
                ? await writeExcelExport(
                    filtered,
                    buildAggregateViews(filtered, session.config.topNaics),
                    summarizeTable(filtered),
                    command.path,
                    basename
                )
                : await writeCsvExport(filtered, command.path, basename);
            success(`Exported ${filtered.rows.length} rows to ${path}`);
            return session;
        }
        case 'reload': {
            const data = toArrayBuffer(await readFile(session.workbookPath));
            const { result, cached } = session.cache.load(data);
            for (const w of result.warnings) warn(`[workbook] ${w}`);
            success(cached
                ? `Workbook unchanged; reused cached table (${result.table.rows.length} rows).`
                : `Reloaded workbook (${result.table.rows.length} rows).`);
            return { ...session, table: result.table };
        }
        case 'help':
            lines(HELP_LINES.map((line) => `  ${line}`));
            return session;
        case 'unknown':
            warn(`${command.reason}. Type "help" for commands.`);
            return session;
        case 'quit':
            return session;
    }
}
