import type { GroupCount } from '@award-explorer/shared';

const BAR_WIDTH = 30;
const LABEL_WIDTH = 32;

/**
 * Horizontal text bar chart, bars scaled to the largest count.
 */
export function renderBarChart(title: string, counts: readonly GroupCount[]): string[] {
    if (counts.length === 0) {
        return [title, '  No data for current filters.'];
    }

    const max = Math.max(...counts.map(({ count }) => count));
    const labelWidth = Math.min(LABEL_WIDTH, Math.max(...counts.map(({ group }) => group.length)));

    return [
        title,
        ...counts.map(({ group, count }) => {
            const label = group.length > labelWidth ? `${group.slice(0, labelWidth - 1)}…` : group.padEnd(labelWidth);
            const bar = max === 0 ? '' : '█'.repeat(Math.round((count / max) * BAR_WIDTH));
            return `  ${label} ${bar} ${count}`;
        }),
    ];
}
