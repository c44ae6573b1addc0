/**
 * Error taxonomy for workbook loading.
 * Both kinds are fatal: callers must not render any data view after one.
 */

/**
 * A required sheet or column is missing, or no pool sheet matched.
 */
export class SchemaError extends Error {
    /** Columns actually present, when the failure is about a column. */
    readonly foundColumns: readonly string[];

    constructor(message: string, foundColumns: readonly string[] = [], options?: ErrorOptions) {
        super(message, options);
        this.name = 'SchemaError';
        this.foundColumns = foundColumns;
    }
}

/**
 * The blob could not be decoded as a spreadsheet.
 */
export class ParseError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ParseError';
    }
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
