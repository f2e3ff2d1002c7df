import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { createServer, type Server } from 'http';
import {
    AdvisoryComparator,
    InvalidDateError,
    NoDataError,
    PointStore,
    RefreshingCache,
    TimeoutError,
    TransportError,
    UnknownDestinationError,
    ValidationError,
    errorFromAbort,
    type CompositeRecord,
    type ProviderClient,
    type RecordLoader
} from '@engine/index';
import { FakeProviderClient, clientByLatitude, deferred } from '../../engine/test/helpers';
import { createApp, etagMatches, parseAdvisoryBody, statusForError } from '../app';

const NOW = new Date('2026-10-19T10:00:00Z');

const RECORDS: CompositeRecord[] = [
    { pointId: '23', pointName: 'Victoria', avgTempCelsius: 11.5, avgPm25: 4.25, rank: 1 },
    { pointId: '9', pointName: 'Kingston', avgTempCelsius: 12, avgPm25: 6, rank: 2 }
];

const points = new PointStore([
    { id: '23', name: 'Victoria', lat: 48.43, long: -123.37 },
    { id: '9', name: 'Kingston', lat: 44.23, long: -76.49 }
]);

interface Harness {
    server: Server;
    baseUrl: string;
    load: Mock<RecordLoader>;
    cache: RefreshingCache;
}

interface StartOptions {
    topRequestTimeoutMs?: number;
    client?: ProviderClient;
}

async function start(options: StartOptions = {}): Promise<Harness> {
    const load = vi.fn<RecordLoader>();
    const cache = new RefreshingCache({ load, ttlMs: 60_000, now: () => NOW.getTime() });
    const advisory = new AdvisoryComparator({
        points,
        client: options.client ?? clientByLatitude({
            43.65: { temperature: 35.5, airQuality: 75 },
            48.43: { temperature: 28, airQuality: 25 },
            44.23: { temperature: 30, airQuality: new NoDataError('no 2PM PM2.5 data found') }
        }),
        now: () => NOW
    });

    const server = createServer(createApp({
        cache,
        advisory,
        points,
        topRequestTimeoutMs: options.topRequestTimeoutMs
    }));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
        throw new Error('server did not bind a port');
    }
    return { server, baseUrl: `http://127.0.0.1:${address.port}`, load, cache };
}

function postJson(url: string, body: unknown, signal?: AbortSignal): Promise<Response> {
    return fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: typeof body === 'string' ? body : JSON.stringify(body),
        signal
    });
}

async function stop(harness: Harness): Promise<void> {
    harness.server.closeAllConnections();
    await new Promise<void>((resolve) => harness.server.close(() => resolve()));
}

describe('HTTP app', () => {
    let harness: Harness;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        harness = await start();
    });

    afterEach(async () => {
        await stop(harness);
        vi.restoreAllMocks();
    });

    describe('GET /health', () => {
        it('reports the point count and cache state', async () => {
            const res = await fetch(`${harness.baseUrl}/health`);

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({
                status: 'healthy',
                points: 2,
                cache: { state: 'empty', computedAt: null, refreshes: 0, failures: 0 }
            });
        });
    });

    describe('GET /api/v1/destinations/top', () => {
        it('returns the ranked snapshot with caching headers', async () => {
            harness.load.mockResolvedValue(RECORDS);

            const res = await fetch(`${harness.baseUrl}/api/v1/destinations/top`);
            const snapshot = await harness.cache.getTopSnapshot();

            expect(res.status).toBe(200);
            expect(res.headers.get('etag')).toBe(`"${snapshot.snapshotId}"`);
            expect(res.headers.get('cache-control')).toBe('public, max-age=60');
            expect(res.headers.get('access-control-allow-origin')).toBe('*');
            expect(res.headers.get('x-content-type-options')).toBe('nosniff');
            expect(await res.json()).toEqual({
                generatedAt: '2026-10-19T10:00:00.000Z',
                description: 'Top 10 coolest and cleanest destinations based on the 7-day forecast (2PM temperature and PM2.5 levels)',
                stale: false,
                destinations: RECORDS
            });
            expect(harness.load).toHaveBeenCalledTimes(1);
        });

        it('answers 304 when the ETag matches', async () => {
            harness.load.mockResolvedValue(RECORDS);
            const first = await fetch(`${harness.baseUrl}/api/v1/destinations/top`);
            const etag = first.headers.get('etag') ?? '';

            const second = await fetch(`${harness.baseUrl}/api/v1/destinations/top`, {
                headers: { 'If-None-Match': etag }
            });

            expect(second.status).toBe(304);
            expect(await second.text()).toBe('');
        });

        it('answers 304 for a weak tag inside a list', async () => {
            harness.load.mockResolvedValue(RECORDS);
            const first = await fetch(`${harness.baseUrl}/api/v1/destinations/top`);
            const etag = first.headers.get('etag') ?? '';

            const second = await fetch(`${harness.baseUrl}/api/v1/destinations/top`, {
                headers: { 'If-None-Match': `"older", W/${etag}` }
            });

            expect(second.status).toBe(304);
        });

        it('answers 200 when no listed tag matches', async () => {
            harness.load.mockResolvedValue(RECORDS);

            const res = await fetch(`${harness.baseUrl}/api/v1/destinations/top`, {
                headers: { 'If-None-Match': '"older", W/"oldest"' }
            });

            expect(res.status).toBe(200);
        });

        it('maps an upstream failure to 502', async () => {
            harness.load.mockRejectedValue(new TransportError('all 2 point aggregations failed'));

            const res = await fetch(`${harness.baseUrl}/api/v1/destinations/top`);

            expect(res.status).toBe(502);
            expect(res.headers.get('cache-control')).toBe('no-store');
            expect(await res.json()).toEqual({ error: 'UPSTREAM_HTTP', message: 'all 2 point aggregations failed' });
        });
    });

    describe('POST /api/v1/travel/recommendation', () => {
        const url = () => `${harness.baseUrl}/api/v1/travel/recommendation`;

        it('returns the advisory', async () => {
            const res = await postJson(url(), {
                currentLocation: { lat: '43.65', long: -79.38, name: 'Toronto' },
                destinationName: 'Victoria',
                travelDate: '2026-10-21'
            });

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({
                verdict: 'Recommended',
                reason: 'Victoria is significantly cooler (7.5°C less) and has significantly better air quality (PM2.5 50 lower). Enjoy your trip!',
                travelDate: '2026-10-21',
                current: { name: 'Toronto', tempCelsius: 35.5, pm25: 75 },
                destination: { name: 'Victoria', tempCelsius: 28, pm25: 25 },
                tempDiff: 7.5,
                pm25Diff: 50
            });
        });

        it('rejects a missing destination with 400', async () => {
            const res = await postJson(url(), {
                currentLocation: { lat: 43.65, long: -79.38 },
                travelDate: '2026-10-21'
            });

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({ error: 'INVALID_REQUEST', message: 'destinationName is required' });
        });

        it('rejects a malformed date with 400', async () => {
            const res = await postJson(url(), {
                currentLocation: { lat: 43.65, long: -79.38 },
                destinationName: 'Victoria',
                travelDate: '21/10/2026'
            });

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({
                error: 'INVALID_DATE',
                message: 'invalid travel date format, use YYYY-MM-DD'
            });
        });

        it('rejects an unknown destination with 404', async () => {
            const res = await postJson(url(), {
                currentLocation: { lat: 43.65, long: -79.38 },
                destinationName: 'Atlantis',
                travelDate: '2026-10-21'
            });

            expect(res.status).toBe(404);
            expect(await res.json()).toEqual({ error: 'DESTINATION_NOT_FOUND', message: 'destination not found: Atlantis' });
        });

        it('maps missing provider data to 502', async () => {
            const res = await postJson(url(), {
                currentLocation: { lat: 43.65, long: -79.38 },
                destinationName: 'Kingston',
                travelDate: '2026-10-21'
            });

            expect(res.status).toBe(502);
            expect(await res.json()).toEqual({ error: 'UPSTREAM_NO_DATA', message: 'no 2PM PM2.5 data found' });
        });

        it('rejects malformed JSON with 400', async () => {
            const res = await postJson(url(), '{"currentLocation":');

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({ error: 'INVALID_REQUEST', message: 'invalid request body' });
        });
    });

    it('answers preflight requests', async () => {
        const res = await fetch(`${harness.baseUrl}/api/v1/travel/recommendation`, { method: 'OPTIONS' });

        expect(res.status).toBe(204);
        expect(res.headers.get('access-control-allow-methods')).toBe('GET, POST, OPTIONS');
    });

    it('returns 404 for unknown routes', async () => {
        const res = await fetch(`${harness.baseUrl}/api/v1/nowhere`);

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: 'NOT_FOUND', message: 'route not found' });
    });
});

describe('top request deadline', () => {
    it('answers 504 when the first load outlives the request budget', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        const harness = await start({ topRequestTimeoutMs: 20 });
        harness.load.mockReturnValue(new Promise<CompositeRecord[]>(() => {}));

        try {
            const res = await fetch(`${harness.baseUrl}/api/v1/destinations/top`);

            expect(res.status).toBe(504);
            expect(await res.json()).toEqual({ error: 'TIMEOUT', message: 'deadline exceeded' });
        } finally {
            await stop(harness);
            vi.restoreAllMocks();
        }
    });
});

describe('recommendation disconnect', () => {
    it('aborts provider calls when the client goes away', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        const started = deferred<void>();
        const aborted = deferred<void>();
        const client = new FakeProviderClient((_provider, query) => new Promise<number>((_resolve, reject) => {
            started.resolve();
            const signal = query.signal;
            if (!signal) return;
            signal.addEventListener('abort', () => {
                aborted.resolve();
                reject(errorFromAbort(signal.reason));
            }, { once: true });
        }));
        const harness = await start({ client });
        const controller = new AbortController();

        try {
            const pending = postJson(`${harness.baseUrl}/api/v1/travel/recommendation`, {
                currentLocation: { lat: 43.65, long: -79.38 },
                destinationName: 'Victoria',
                travelDate: '2026-10-21'
            }, controller.signal).catch((e: unknown) => e);
            await started.promise;

            controller.abort();

            expect(await pending).toMatchObject({ name: 'AbortError' });
            await aborted.promise;
            expect(client.calls).toHaveLength(4);
            expect(client.calls.every((c) => c.query.signal?.aborted)).toBe(true);
            await vi.waitFor(() => {
                expect(console.log).toHaveBeenCalledWith('[http] client disconnected', expect.objectContaining({
                    url: '/api/v1/travel/recommendation'
                }));
            });
            expect(console.error).not.toHaveBeenCalled();
        } finally {
            await stop(harness);
            vi.restoreAllMocks();
        }
    });
});

describe('etagMatches', () => {
    const etag = '"abc123"';

    it('matches the exact tag', () => {
        expect(etagMatches('"abc123"', etag)).toBe(true);
    });

    it('matches a weak form of the tag', () => {
        expect(etagMatches('W/"abc123"', etag)).toBe(true);
    });

    it('matches any entry of a list', () => {
        expect(etagMatches('"zzz", "abc123"', etag)).toBe(true);
        expect(etagMatches('"zzz",W/"abc123"', etag)).toBe(true);
    });

    it('matches the wildcard', () => {
        expect(etagMatches('*', etag)).toBe(true);
    });

    it('rejects other tags and an absent header', () => {
        expect(etagMatches('"abc1234"', etag)).toBe(false);
        expect(etagMatches('abc123', etag)).toBe(false);
        expect(etagMatches('', etag)).toBe(false);
        expect(etagMatches(undefined, etag)).toBe(false);
    });
});

describe('statusForError', () => {
    it('maps the error taxonomy to statuses', () => {
        expect(statusForError(new UnknownDestinationError('Atlantis'))).toBe(404);
        expect(statusForError(new InvalidDateError())).toBe(400);
        expect(statusForError(new ValidationError('bad'))).toBe(400);
        expect(statusForError(new TimeoutError())).toBe(504);
        expect(statusForError(new TransportError('down', { status: 503 }))).toBe(502);
        expect(statusForError(new NoDataError('none'))).toBe(502);
        expect(statusForError(new Error('surprise'))).toBe(500);
    });
});

describe('parseAdvisoryBody', () => {
    it('normalizes coordinates and trims strings', () => {
        expect(parseAdvisoryBody({
            currentLocation: { lat: '43.65', long: '-79.38' },
            destinationName: ' Victoria ',
            travelDate: ' 2026-10-21 '
        })).toEqual({
            current: { lat: 43.65, long: -79.38, name: undefined },
            destinationName: 'Victoria',
            travelDate: '2026-10-21'
        });
    });

    it('requires both coordinates', () => {
        expect(() => parseAdvisoryBody({ currentLocation: { lat: 43.65 }, destinationName: 'Victoria', travelDate: '2026-10-21' }))
            .toThrow('currentLocation lat and long are required');
        expect(() => parseAdvisoryBody({ destinationName: 'Victoria', travelDate: '2026-10-21' }))
            .toThrow('currentLocation lat and long are required');
    });

    it('requires a travel date', () => {
        expect(() => parseAdvisoryBody({ currentLocation: { lat: 1, long: 1 }, destinationName: 'Victoria' }))
            .toThrow('travelDate is required (format: YYYY-MM-DD)');
    });

    it('requires an object body', () => {
        expect(() => parseAdvisoryBody(null)).toThrow('request body must be a JSON object');
    });
});
