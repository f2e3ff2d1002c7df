/**
 * Breezeway Engine — Core Type Definitions
 *
 * Shapes shared by the provider client, the aggregation pipeline, the ranked
 * cache and the travel advisory.
 */

// =============================================================================
// Points
// =============================================================================

/**
 * A tracked geographic point.
 * Immutable after load; names are unique within a PointStore.
 */
export interface Point {
    id: string;
    name: string;
    lat: number;
    long: number;
}

// =============================================================================
// Provider Readings
// =============================================================================

export type ProviderId = 'temperature' | 'airQuality';

/**
 * A same-hour pair of scalars reduced from two hourly series.
 * Both values are rounded to 2 decimals at the point of reduction.
 */
export interface DailyReading {
    temperatureCelsius: number;
    pm25: number;
}

/**
 * Hourly payload as returned by both Open-Meteo endpoints.
 * `time` entries are local timestamps without offset ("2026-10-19T14:00"),
 * positionally aligned with the field array.
 */
export interface HourlySeries {
    time: string[];
    values: Array<number | null>;
}

// =============================================================================
// Ranked Records
// =============================================================================

export interface CompositeRecord {
    pointId: string;
    pointName: string;
    avgTempCelsius: number;
    avgPm25: number;
    /** 1-based position in the ranked subset; 0 until ranked. */
    rank: number;
}

export type CacheState = 'empty' | 'fresh' | 'stale' | 'refreshing';

/**
 * One generation of the ranked cache, as handed to a reader.
 * `records` is always a copy owned by the caller.
 */
export interface CacheSnapshot {
    records: CompositeRecord[];
    computedAt: Date;
    /** BLAKE3 hex digest of the canonical encoding of `records`. */
    snapshotId: string;
    /** True when served past its TTL (refresh in flight or failed). */
    stale: boolean;
}

// =============================================================================
// Travel Advisory
// =============================================================================

export type Verdict = 'Recommended' | 'Not Recommended';

export interface LocationReading {
    name: string;
    tempCelsius: number;
    pm25: number;
}

export interface CurrentLocation {
    lat: number;
    long: number;
    name?: string;
}

export interface AdvisoryRequest {
    current: CurrentLocation;
    destinationName: string;
    /** Calendar date, YYYY-MM-DD. */
    travelDate: string;
}

export interface AdvisoryResult {
    verdict: Verdict;
    reason: string;
    travelDate: string;
    current: LocationReading;
    destination: LocationReading;
    /** current − destination; positive means the destination is cooler. */
    tempDiff: number;
    /** current − destination; positive means the destination is cleaner. */
    pm25Diff: number;
}
