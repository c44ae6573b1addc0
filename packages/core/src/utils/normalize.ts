/**
 * Key normalization for the contract join.
 *
 * NOTE: Both sides of the join go through normalizeKey. Any divergence
 * between the pool-side and contract-side rule drops matches silently.
 */

import type { FieldValue } from '../types/index.js';

/**
 * Trailing float artifacts left by numeric-typed spreadsheet cells,
 * repeated suffixes included. Anchored: a ".0" in the middle of a value is kept.
 */
const FLOAT_ARTIFACT = /(\s*\.0)+$/;

/**
 * Normalize a contract number or code cell.
 *
 * Transformations:
 * - Trim surrounding whitespace
 * - Strip every trailing ".0"
 * - Trim again
 *
 * Idempotent: normalizeKey(normalizeKey(x)) === normalizeKey(x).
 *
 * Blank values become the missing marker, so they never join.
 *
 * @example normalizeKey('47QRCA25D0001.0 ') // '47QRCA25D0001'
 */
export function normalizeKey(value: FieldValue | undefined): FieldValue {
    if (value === null || value === undefined) {
        return null;
    }
    const normalized = value.trim().replace(FLOAT_ARTIFACT, '').trim();
    return normalized === '' ? null : normalized;
}

/**
 * Header cells are trimmed; workbook authors leave stray spaces.
 */
export function normalizeHeader(value: string): string {
    return value.trim();
}

/**
 * True for the missing marker and for whitespace-only strings.
 */
export function isBlank(value: FieldValue | undefined): boolean {
    return value === null || value === undefined || value.trim() === '';
}
