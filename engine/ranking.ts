/**
 * Breezeway Engine — Ranking
 */

import type { CompositeRecord } from './types';

export const DEFAULT_TOP_LIMIT = 10;

/**
 * Coolest first, then cleanest. Returns 0 for equal keys so that the stable
 * sort keeps input order as the final tie-break.
 */
export function compareRecords(a: CompositeRecord, b: CompositeRecord): number {
    if (a.avgTempCelsius !== b.avgTempCelsius) {
        return a.avgTempCelsius - b.avgTempCelsius;
    }
    return a.avgPm25 - b.avgPm25;
}

/**
 * Sort, truncate to `limit` and stamp 1-based ranks.
 * Returns new records; the input array and its elements are left untouched.
 * Fewer than `limit` inputs yields all of them, never padded.
 */
export function rankRecords(
    records: readonly CompositeRecord[],
    limit: number = DEFAULT_TOP_LIMIT
): CompositeRecord[] {
    return [...records]
        .sort(compareRecords)
        .slice(0, Math.max(0, limit))
        .map((record, index) => ({ ...record, rank: index + 1 }));
}
