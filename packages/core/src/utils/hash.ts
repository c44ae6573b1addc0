/**
 * Content hashing for workbook identity.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 so the core stays free of node:crypto.
 */

import { sha256 } from 'js-sha256';

/**
 * SHA-256 of the workbook bytes, prefixed with 'sha256:'.
 * Two uploads with identical bytes share a hash.
 */
export function hashWorkbook(data: ArrayBuffer): string {
    return `sha256:${sha256(data)}`;
}
