/**
 * Console output for the CLI; the core never logs.
 * Progress and data go to stdout, warnings and errors to stderr.
 */

export function log(message: string): void {
    console.log(message);
}

/**
 * Prints pre-rendered lines (tables, charts, metric tiles) one per call.
 */
export function lines(rendered: Iterable<string>): void {
    for (const line of rendered) console.log(line);
}

/**
 * Blank line, then a `--- Title ---` banner.
 */
export function section(title: string): void {
    console.log(`\n--- ${title} ---`);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}
