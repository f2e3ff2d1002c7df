/**
 * Breezeway HTTP surface.
 *
 * Routes:
 *   GET  /health                          → liveness + cache state
 *   GET  /api/v1/destinations/top         → ranked cache snapshot (ETag / 304)
 *   POST /api/v1/travel/recommendation    → travel advisory
 */
/* eslint-disable no-console */

import express, { type NextFunction, type Request, type Response } from 'express';
import {
    DataFormatError,
    OutlookError,
    TimeoutError,
    TransportError,
    UnknownDestinationError,
    ValidationError,
    describeError,
    type AdvisoryComparator,
    type AdvisoryRequest,
    type PointStore,
    type RefreshingCache
} from '@engine/index';
import { parseCoord } from '@engine/location';
import { DEFAULT_TOP_REQUEST_TIMEOUT_MS } from './config';

export interface AppDependencies {
    cache: RefreshingCache;
    advisory: AdvisoryComparator;
    points: PointStore;
    topRequestTimeoutMs?: number;
    topLimit?: number;
}

const CORS_HEADERS: Record<string, string> = {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, If-None-Match',
    'Access-Control-Max-Age': '86400'
};

const SECURITY_HEADERS: Record<string, string> = {
    'X-Content-Type-Options': 'nosniff'
};

const CACHE_TOP = 'public, max-age=60';
const CACHE_ERROR = 'no-store';

// =============================================================================
// Responses
// =============================================================================

export function statusForError(error: unknown): number {
    if (error instanceof UnknownDestinationError) return 404;
    if (error instanceof ValidationError) return 400;
    if (error instanceof TimeoutError) return 504;
    if (error instanceof TransportError || error instanceof DataFormatError) return 502;
    return 500;
}

function sendError(res: Response, error: unknown): void {
    const status = statusForError(error);
    const body = error instanceof OutlookError
        ? { error: error.code, message: error.message }
        : { error: 'INTERNAL', message: 'internal error' };

    if (status >= 500) {
        console.error('[http] request failed', { status, error: describeError(error) });
    }
    res.status(status).set('Cache-Control', CACHE_ERROR).json(body);
}

/**
 * Whether an `If-None-Match` header covers `etag`. Handles comma-separated
 * lists, weak validators and `*`; comparison is weak, as for GET.
 */
export function etagMatches(header: string | undefined, etag: string): boolean {
    if (!header) return false;
    const opaque = etag.replace(/^W\//, '');
    return header.split(',').some((candidate) => {
        const tag = candidate.trim();
        return tag === '*' || tag.replace(/^W\//, '') === opaque;
    });
}

function elapsed(startedAt: number): string {
    return `${Date.now() - startedAt}ms`;
}

// =============================================================================
// Request Parsing
// =============================================================================

/**
 * Shape-check a recommendation body. Semantic checks (date window,
 * coordinate ranges, destination lookup) belong to the comparator.
 */
export function parseAdvisoryBody(body: unknown): AdvisoryRequest {
    if (!body || typeof body !== 'object') {
        throw new ValidationError('request body must be a JSON object');
    }
    const b = body as Record<string, unknown>;

    const current = b.currentLocation;
    if (!current || typeof current !== 'object') {
        throw new ValidationError('currentLocation lat and long are required');
    }
    const c = current as Record<string, unknown>;
    const lat = parseCoord(c.lat);
    const long = parseCoord(c.long);
    if (lat === null || long === null) {
        throw new ValidationError('currentLocation lat and long are required');
    }

    if (typeof b.destinationName !== 'string' || !b.destinationName.trim()) {
        throw new ValidationError('destinationName is required');
    }
    if (typeof b.travelDate !== 'string' || !b.travelDate.trim()) {
        throw new ValidationError('travelDate is required (format: YYYY-MM-DD)');
    }

    return {
        current: {
            lat,
            long,
            name: typeof c.name === 'string' ? c.name : undefined
        },
        destinationName: b.destinationName.trim(),
        travelDate: b.travelDate.trim()
    };
}

// =============================================================================
// App
// =============================================================================

export function createApp(deps: AppDependencies): express.Express {
    const { cache, advisory, points } = deps;
    const topRequestTimeoutMs = deps.topRequestTimeoutMs ?? DEFAULT_TOP_REQUEST_TIMEOUT_MS;
    const topLimit = deps.topLimit ?? 10;

    const app = express();
    app.disable('x-powered-by');

    app.use((req, res, next) => {
        const startedAt = Date.now();
        res.set({ ...CORS_HEADERS, ...SECURITY_HEADERS });
        res.on('finish', () => {
            console.log(`[http] ${req.method} ${req.originalUrl} ${res.statusCode} ${elapsed(startedAt)}`);
        });
        if (req.method === 'OPTIONS') {
            res.status(204).end();
            return;
        }
        next();
    });

    app.use(express.json({ limit: '16kb' }));

    app.get('/health', (_req, res) => {
        const stats = cache.stats();
        res.json({
            status: 'healthy',
            points: points.size,
            cache: {
                state: stats.state,
                computedAt: stats.computedAt?.toISOString() ?? null,
                refreshes: stats.refreshes,
                failures: stats.failures
            }
        });
    });

    app.get('/api/v1/destinations/top', async (req, res) => {
        const startedAt = Date.now();
        try {
            const snapshot = await cache.getTopSnapshot({
                signal: AbortSignal.timeout(topRequestTimeoutMs)
            });
            const etag = `"${snapshot.snapshotId}"`;
            res.set({
                'ETag': etag,
                'Cache-Control': CACHE_TOP,
                'X-Response-Time': elapsed(startedAt)
            });

            if (etagMatches(req.get('If-None-Match'), etag)) {
                res.status(304).end();
                return;
            }

            res.json({
                generatedAt: snapshot.computedAt.toISOString(),
                description: `Top ${topLimit} coolest and cleanest destinations based on the 7-day forecast (2PM temperature and PM2.5 levels)`,
                stale: snapshot.stale,
                destinations: snapshot.records
            });
        } catch (error) {
            sendError(res, error);
        }
    });

    app.post('/api/v1/travel/recommendation', async (req, res) => {
        const startedAt = Date.now();
        // Provider calls stop once the client goes away.
        const disconnect = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) disconnect.abort();
        });
        try {
            const request = parseAdvisoryBody(req.body);
            const result = await advisory.compare(request, disconnect.signal);
            res.set('X-Response-Time', elapsed(startedAt)).json(result);
        } catch (error) {
            if (disconnect.signal.aborted) {
                console.log('[http] client disconnected', { url: req.originalUrl, elapsed: elapsed(startedAt) });
                return;
            }
            sendError(res, error);
        }
    });

    app.use((_req, res) => {
        res.status(404).set('Cache-Control', CACHE_ERROR).json({ error: 'NOT_FOUND', message: 'route not found' });
    });

    // Body parser failures (malformed JSON, oversized payloads) land here.
    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const status = typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
            ? error.status
            : 500;
        if (status >= 400 && status < 500) {
            res.status(status).set('Cache-Control', CACHE_ERROR).json({ error: 'INVALID_REQUEST', message: 'invalid request body' });
            return;
        }
        sendError(res, error);
    });

    return app;
}
