/**
 * Breezeway Engine — Aggregation Pipeline
 *
 * Per-point aggregation (temperature + PM2.5 merged into one record) and the
 * fleet-wide fan-out that ranks every tracked point.
 */
/* eslint-disable no-console */

import { describeError, errorFromAbort, TransportError } from '../errors';
import { AdmissionGate } from '../gate';
import { DEFAULT_TOP_LIMIT, rankRecords } from '../ranking';
import type { CompositeRecord, Point } from '../types';
import { fetchDailyReading, type ProviderClient } from './fetcher';

export const DEFAULT_FLEET_CONCURRENCY = 5;

// =============================================================================
// Point Aggregation
// =============================================================================

/**
 * Fetch both providers for one point and merge them into an unranked record.
 * Any provider failure fails the point; no partial record is produced.
 */
export async function aggregatePoint(
    client: ProviderClient,
    point: Point,
    signal?: AbortSignal
): Promise<CompositeRecord> {
    const reading = await fetchDailyReading(client, {
        latitude: point.lat,
        longitude: point.long,
        signal
    });

    return {
        pointId: point.id,
        pointName: point.name,
        avgTempCelsius: reading.temperatureCelsius,
        avgPm25: reading.pm25,
        rank: 0
    };
}

// =============================================================================
// Fleet Aggregation
// =============================================================================

export type PointOutcome =
    | { ok: true; record: CompositeRecord }
    | { ok: false; pointId: string; pointName: string; error: unknown };

export interface FleetOptions {
    client: ProviderClient;
    /** Maximum point aggregations in flight (default 5). */
    concurrency?: number;
    /** Number of ranked records to keep (default 10). */
    limit?: number;
    signal?: AbortSignal;
}

export interface FleetResult {
    records: CompositeRecord[];
    attempted: number;
    failed: number;
}

/**
 * Aggregate every point behind the admission gate and collect all outcomes.
 * Never rejects: failed points are reported as `{ ok: false }` outcomes.
 * Outcomes are returned in input order regardless of completion order.
 */
export async function collectOutcomes(
    points: readonly Point[],
    client: ProviderClient,
    gate: AdmissionGate,
    signal?: AbortSignal
): Promise<PointOutcome[]> {
    return Promise.all(
        points.map((point) =>
            gate.run(() => aggregatePoint(client, point, signal)).then(
                (record): PointOutcome => ({ ok: true, record }),
                (error: unknown): PointOutcome => ({ ok: false, pointId: point.id, pointName: point.name, error })
            )
        )
    );
}

/**
 * Rank the coolest and cleanest points.
 * Best-effort: points whose aggregation fails are logged and dropped, so
 * the result may hold fewer than `limit` records (or none).
 */
export async function aggregateFleet(
    points: readonly Point[],
    options: FleetOptions
): Promise<FleetResult> {
    const { client, concurrency = DEFAULT_FLEET_CONCURRENCY, limit = DEFAULT_TOP_LIMIT, signal } = options;
    const gate = new AdmissionGate(concurrency);

    const outcomes = await collectOutcomes(points, client, gate, signal);

    const succeeded: CompositeRecord[] = [];
    let failed = 0;
    for (const outcome of outcomes) {
        if (outcome.ok) {
            succeeded.push(outcome.record);
            continue;
        }
        failed++;
        console.warn('[fleet] point aggregation failed', {
            pointId: outcome.pointId,
            pointName: outcome.pointName,
            error: describeError(outcome.error)
        });
    }

    console.log(`[fleet] Aggregated ${succeeded.length}/${points.length} points`);

    return {
        records: rankRecords(succeeded, limit),
        attempted: points.length,
        failed
    };
}

/**
 * Loader for the refreshing cache. Rejects when the refresh deadline expired
 * or every point failed; the cache then keeps its previous generation.
 */
export function createFleetLoader(
    points: readonly Point[],
    options: Omit<FleetOptions, 'signal'>
): (signal: AbortSignal) => Promise<CompositeRecord[]> {
    return async (signal) => {
        const result = await aggregateFleet(points, { ...options, signal });
        if (signal.aborted) {
            throw errorFromAbort(signal.reason);
        }
        if (result.attempted > 0 && result.failed === result.attempted) {
            throw new TransportError(`all ${result.attempted} point aggregations failed`);
        }
        return result.records;
    };
}
