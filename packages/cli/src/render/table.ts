import type { DataTable, FieldValue } from '@award-explorer/shared';

const MAX_CELL_WIDTH = 28;
const MISSING_TEXT = '—';

/**
 * Fixed-width text rendering of the first `limit` rows.
 * Cells longer than MAX_CELL_WIDTH are cut with an ellipsis.
 */
export function renderTable(table: DataTable, limit: number): string[] {
    if (table.columns.length === 0) {
        return [];
    }

    const rows = table.rows.slice(0, limit);
    const cells = rows.map((row) => table.columns.map((column) => formatCell(row[column])));
    const widths = table.columns.map((column, i) =>
        Math.max(clip(column).length, ...cells.map((line) => line[i].length))
    );

    const lines = [
        table.columns.map((column, i) => clip(column).padEnd(widths[i])).join(' | ').trimEnd(),
        widths.map((w) => '-'.repeat(w)).join('-+-'),
        ...cells.map((line) => line.map((cell, i) => cell.padEnd(widths[i])).join(' | ').trimEnd()),
    ];

    if (table.rows.length > rows.length) {
        lines.push(`… ${table.rows.length - rows.length} more rows`);
    }
    return lines;
}

function formatCell(value: FieldValue | undefined): string {
    return value === null || value === undefined ? MISSING_TEXT : clip(value);
}

function clip(text: string): string {
    return text.length > MAX_CELL_WIDTH ? `${text.slice(0, MAX_CELL_WIDTH - 1)}…` : text;
}
