import type { DataRecord } from '../types/index.js';
import { isBlank } from './normalize.js';

/**
 * Ordered-fallback lookup: the first non-blank value among `fields`,
 * returned as stored, or null when every candidate is missing or blank.
 */
export function firstPresent(record: DataRecord, fields: readonly string[]): string | null {
    for (const field of fields) {
        const value = record[field];
        if (value !== undefined && value !== null && !isBlank(value)) {
            return value;
        }
    }
    return null;
}
