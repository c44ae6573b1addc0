/**
 * Conversion of decoded spreadsheet cells to field values.
 */

import type { FieldValue } from '../types/index.js';

/**
 * Convert a raw cell (as returned by sheet_to_json with raw: true) to a
 * string or the missing marker.
 *
 * - null/undefined -> null
 * - numbers -> shortest decimal form (541511, not 541511.0)
 * - booleans -> TRUE / FALSE
 * - dates -> YYYY-MM-DD (UTC)
 */
export function cellToField(value: unknown): FieldValue {
    if (value === null || value === undefined) {
        return null;
    }
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value) ? String(value) : null;
    }
    if (typeof value === 'boolean') {
        return value ? 'TRUE' : 'FALSE';
    }
    if (value instanceof Date) {
        return isNaN(value.getTime()) ? null : formatIsoDate(value);
    }
    return String(value);
}

/**
 * Format date as ISO YYYY-MM-DD string using UTC components.
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}
