/**
 * Breezeway Engine — Refreshing Cache
 *
 * Holds the single ranked generation behind a TTL. At most one refresh runs
 * at a time; readers arriving while it runs get the previous generation when
 * there is one and join the refresh when there is not.
 *
 * States: empty → refreshing → fresh → (ttl elapses) → stale → refreshing → …
 *
 * All transitions happen synchronously between awaits on the event loop, so
 * the post-miss re-check cannot race another reader.
 */
/* eslint-disable no-console */

import { describeError, errorFromAbort } from './errors';
import { contentId } from './hash';
import { raceSignal } from './time';
import type { CacheSnapshot, CacheState, CompositeRecord } from './types';

export const DEFAULT_CACHE_TTL_MS = 5 * 60_000;
export const DEFAULT_REFRESH_TIMEOUT_MS = 30_000;
export const DEFAULT_WARM_TIMEOUT_MS = 60_000;

export type RecordLoader = (signal: AbortSignal) => Promise<CompositeRecord[]>;

export interface RefreshingCacheOptions {
    load: RecordLoader;
    ttlMs?: number;
    /** Deadline for one refresh, independent of any reader's deadline. */
    refreshTimeoutMs?: number;
    warmTimeoutMs?: number;
    /** Clock override for tests. */
    now?: () => number;
}

export interface GetTopOptions {
    /** Reader deadline. Expiry rejects with TimeoutError unless a previous generation exists. */
    signal?: AbortSignal;
    /** Treat entries at least this old as needing a refresh (default: the TTL). */
    maxAgeMs?: number;
    /** Deadline for a refresh this call starts (default: refreshTimeoutMs). */
    refreshTimeoutMs?: number;
}

export interface CacheStats {
    state: CacheState;
    computedAt: Date | null;
    refreshes: number;
    failures: number;
}

interface CacheEntry {
    records: readonly CompositeRecord[];
    computedAt: number;
    snapshotId: string;
}

type RefreshOutcome = { ok: true; entry: CacheEntry } | { ok: false; error: unknown };

export class RefreshingCache {
    readonly ttlMs: number;
    private readonly load: RecordLoader;
    private readonly refreshTimeoutMs: number;
    private readonly warmTimeoutMs: number;
    private readonly now: () => number;

    private entry: CacheEntry | null = null;
    private inflight: Promise<RefreshOutcome> | null = null;
    private refreshes = 0;
    private failures = 0;

    constructor(options: RefreshingCacheOptions) {
        this.load = options.load;
        this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
        this.refreshTimeoutMs = options.refreshTimeoutMs ?? DEFAULT_REFRESH_TIMEOUT_MS;
        this.warmTimeoutMs = options.warmTimeoutMs ?? DEFAULT_WARM_TIMEOUT_MS;
        this.now = options.now ?? Date.now;

        if (!(this.ttlMs > 0)) {
            throw new Error(`RefreshingCache ttlMs must be positive (got ${this.ttlMs})`);
        }
    }

    state(): CacheState {
        if (this.inflight) return 'refreshing';
        if (!this.entry) return 'empty';
        return this.isStale(this.entry) ? 'stale' : 'fresh';
    }

    stats(): CacheStats {
        return {
            state: this.state(),
            computedAt: this.entry ? new Date(this.entry.computedAt) : null,
            refreshes: this.refreshes,
            failures: this.failures
        };
    }

    /** Ranked records; always a copy the caller may mutate. */
    async getTop(options: GetTopOptions = {}): Promise<CompositeRecord[]> {
        const snapshot = await this.getTopSnapshot(options);
        return snapshot.records;
    }

    async getTopSnapshot(options: GetTopOptions = {}): Promise<CacheSnapshot> {
        const maxAgeMs = options.maxAgeMs ?? this.ttlMs;
        const current = this.entry;

        if (current && this.ageOf(current) < maxAgeMs) {
            return this.snapshot(current);
        }

        if (this.inflight) {
            if (current) return this.snapshot(current);
            return this.awaitRefresh(this.inflight, options.signal);
        }

        const refresh = this.startRefresh(options.refreshTimeoutMs ?? this.refreshTimeoutMs);
        return this.awaitRefresh(refresh, options.signal);
    }

    /**
     * Populate the cache before serving traffic.
     */
    async warm(): Promise<void> {
        await this.getTop({
            signal: AbortSignal.timeout(this.warmTimeoutMs),
            refreshTimeoutMs: this.warmTimeoutMs
        });
    }

    /**
     * Refresh every `ttl / 2` so readers rarely see a stale generation.
     * Errors are logged, never thrown. Stops when `signal` aborts or the
     * returned function is called.
     */
    startBackgroundRefresh(signal?: AbortSignal): () => void {
        const intervalMs = Math.max(1, Math.floor(this.ttlMs / 2));
        let running = false;

        const timer = setInterval(() => {
            if (running) return;
            running = true;
            this.getTopSnapshot({
                signal: AbortSignal.timeout(this.refreshTimeoutMs),
                maxAgeMs: intervalMs
            })
                .catch((error: unknown) => {
                    console.error('[cache] background refresh failed', { error: describeError(error) });
                })
                .finally(() => {
                    running = false;
                });
        }, intervalMs);
        timer.unref();

        const stop = () => {
            clearInterval(timer);
            signal?.removeEventListener('abort', stop);
        };
        if (signal?.aborted) {
            stop();
        } else {
            signal?.addEventListener('abort', stop, { once: true });
        }
        return stop;
    }

    private startRefresh(timeoutMs: number): Promise<RefreshOutcome> {
        const startedAt = this.now();
        const signal = AbortSignal.timeout(timeoutMs);
        const refresh = new Promise<CompositeRecord[]>((resolve) => resolve(this.load(signal)))
            .then((records): RefreshOutcome => {
                const entry: CacheEntry = {
                    records: records.map((record) => ({ ...record })),
                    computedAt: this.now(),
                    snapshotId: contentId(records)
                };
                this.entry = entry;
                this.refreshes++;
                console.log('[cache] refreshed', {
                    records: entry.records.length,
                    snapshotId: entry.snapshotId.slice(0, 12),
                    tookMs: entry.computedAt - startedAt
                });
                return { ok: true, entry };
            }, (error: unknown): RefreshOutcome => {
                this.failures++;
                console.error('[cache] refresh failed', {
                    error: describeError(error),
                    hasPrevious: this.entry !== null
                });
                return { ok: false, error };
            })
            .finally(() => {
                this.inflight = null;
            });

        this.inflight = refresh;
        return refresh;
    }

    private async awaitRefresh(refresh: Promise<RefreshOutcome>, signal?: AbortSignal): Promise<CacheSnapshot> {
        let outcome: RefreshOutcome;
        try {
            outcome = await raceSignal(refresh, signal, errorFromAbort);
        } catch (error) {
            outcome = { ok: false, error };
        }

        if (outcome.ok) return this.snapshot(outcome.entry);

        // Prefer the previous generation over failing the reader.
        const previous = this.entry;
        if (previous) return this.snapshot(previous);
        throw outcome.error;
    }

    private ageOf(entry: CacheEntry): number {
        return this.now() - entry.computedAt;
    }

    private isStale(entry: CacheEntry): boolean {
        return this.ageOf(entry) >= this.ttlMs;
    }

    private snapshot(entry: CacheEntry): CacheSnapshot {
        return {
            records: entry.records.map((record) => ({ ...record })),
            computedAt: new Date(entry.computedAt),
            snapshotId: entry.snapshotId,
            stale: this.isStale(entry)
        };
    }
}
