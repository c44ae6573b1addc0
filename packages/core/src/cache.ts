/**
 * Content-addressed cache of loaded workbooks.
 *
 * The key is the SHA-256 of the bytes, so a changed upload is a cache miss.
 * Entries are never updated in place; the least recently used entry is
 * evicted once `maxEntries` is reached. Failed loads are not cached.
 */

import type { LoadResult } from './types/index.js';
import { EXPLORER_DEFAULTS } from './types/index.js';
import { hashWorkbook } from './utils/hash.js';
import { loadWorkbook } from './load.js';

export interface CachedLoad {
    result: LoadResult;
    /** True when the result came from the cache. */
    cached: boolean;
}

export class WorkbookCache {
    private readonly entries = new Map<string, LoadResult>();

    constructor(private readonly maxEntries: number = EXPLORER_DEFAULTS.CACHE_SIZE) {
        if (!Number.isInteger(maxEntries) || maxEntries < 1) {
            throw new RangeError(`Cache size must be a positive integer, got ${maxEntries}`);
        }
    }

    /**
     * Load through the cache. Errors from loadWorkbook propagate unchanged.
     */
    load(data: ArrayBuffer): CachedLoad {
        const hash = hashWorkbook(data);
        const hit = this.entries.get(hash);
        if (hit) {
            // Re-insert to mark as most recently used
            this.entries.delete(hash);
            this.entries.set(hash, hit);
            return { result: hit, cached: true };
        }

        const result = loadWorkbook(data);
        this.entries.set(hash, result);
        while (this.entries.size > this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
        }
        return { result, cached: false };
    }

    has(hash: string): boolean {
        return this.entries.has(hash);
    }

    invalidate(hash: string): boolean {
        return this.entries.delete(hash);
    }

    clear(): void {
        this.entries.clear();
    }

    get size(): number {
        return this.entries.size;
    }
}
