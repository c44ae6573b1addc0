/**
 * Column naming helpers.
 */

/**
 * Returns `base` if free, else the first free `base_N` (N from 1).
 * Does not reserve the name; callers add it to `taken`.
 */
export function uniqueName(base: string, taken: ReadonlySet<string>): string {
    if (!taken.has(base)) {
        return base;
    }
    let n = 1;
    while (taken.has(`${base}_${n}`)) {
        n++;
    }
    return `${base}_${n}`;
}

/**
 * Merge column lists, keeping first-seen order.
 */
export function unionColumns(lists: readonly (readonly string[])[]): string[] {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const list of lists) {
        for (const column of list) {
            if (!seen.has(column)) {
                seen.add(column);
                result.push(column);
            }
        }
    }
    return result;
}
