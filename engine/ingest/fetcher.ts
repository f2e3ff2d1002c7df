/**
 * Breezeway Engine — Provider Fetcher
 *
 * Fetches hourly temperature and PM2.5 series from Open-Meteo and reduces
 * each to one daily value sampled at 14:00 local time.
 */

import { DataFormatError, NoDataError, TimeoutError, TransportError, errorFromAbort, describeError } from '../errors';
import { formatCoord, round2 } from '../location';
import { hourOfTimestamp, raceSignal } from '../time';
import type { DailyReading, HourlySeries, ProviderId } from '../types';

// =============================================================================
// Configuration
// =============================================================================

export const PROVIDERS = {
    temperature: {
        endpoint: 'https://api.open-meteo.com/v1/forecast',
        field: 'temperature_2m',
        label: 'weather'
    },
    airQuality: {
        endpoint: 'https://air-quality-api.open-meteo.com/v1/air-quality',
        field: 'pm2_5',
        label: 'air quality'
    }
} as const satisfies Record<ProviderId, { endpoint: string; field: string; label: string }>;

/** Local hour standing in for daytime peak conditions. */
export const SAMPLE_HOUR = 14;

export const DEFAULT_PROVIDER_TIMEOUT_MS = 10_000;

// =============================================================================
// Client
// =============================================================================

export interface ProviderQuery {
    latitude: number;
    longitude: number;
    /** Single-day window (YYYY-MM-DD). Omit for the provider's default 7-day series. */
    date?: string;
    /** Caller deadline; aborting it aborts the outbound request. */
    signal?: AbortSignal;
}

/**
 * One outbound call to one provider for one point, reduced to a daily scalar.
 */
export interface ProviderClient {
    fetchDailyValue(provider: ProviderId, query: ProviderQuery): Promise<number>;
}

export interface OpenMeteoClientOptions {
    /** Hard per-call timeout (default 10s). */
    timeoutMs?: number;
    /** Transport override; defaults to the global fetch. */
    fetch?: typeof fetch;
}

export class OpenMeteoClient implements ProviderClient {
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch | undefined;

    constructor(options: OpenMeteoClientOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
        this.fetchImpl = options.fetch;
    }

    async fetchDailyValue(provider: ProviderId, query: ProviderQuery): Promise<number> {
        const { field, label } = PROVIDERS[provider];
        const url = buildProviderUrl(provider, query);

        const body = await fetchJsonWithTimeout(url, label, this.timeoutMs, query.signal, this.fetchImpl);

        const series = parseHourlySeries(body, field);
        return reduceAtHour(series, SAMPLE_HOUR, `no 2PM ${provider === 'temperature' ? 'temperature' : 'PM2.5'} data found`);
    }
}

/**
 * Fetch temperature and PM2.5 for one location concurrently.
 * Both calls always settle before this returns; if both fail, the
 * temperature error is the one surfaced.
 */
export async function fetchDailyReading(
    client: ProviderClient,
    query: ProviderQuery
): Promise<DailyReading> {
    const [temperature, pm25] = await Promise.allSettled([
        client.fetchDailyValue('temperature', query),
        client.fetchDailyValue('airQuality', query)
    ]);

    if (temperature.status === 'rejected') throw temperature.reason;
    if (pm25.status === 'rejected') throw pm25.reason;

    return { temperatureCelsius: temperature.value, pm25: pm25.value };
}

// =============================================================================
// Utilities
// =============================================================================

export function buildProviderUrl(provider: ProviderId, query: ProviderQuery): string {
    const { endpoint, field } = PROVIDERS[provider];
    const params = new URLSearchParams({
        latitude: formatCoord(query.latitude),
        longitude: formatCoord(query.longitude),
        hourly: field
    });
    if (query.date) {
        params.set('start_date', query.date);
        params.set('end_date', query.date);
    }
    params.set('timezone', 'auto');
    return `${endpoint}?${params}`;
}

/**
 * Validate an Open-Meteo body: `{ hourly: { time: string[], <field>: (number|null)[] } }`.
 */
export function parseHourlySeries(body: unknown, field: string): HourlySeries {
    if (!body || typeof body !== 'object' || !('hourly' in body)) {
        throw new DataFormatError('response is missing "hourly"');
    }
    const hourly = body.hourly;
    if (!hourly || typeof hourly !== 'object') {
        throw new DataFormatError('response "hourly" is not an object');
    }

    const record = hourly as Record<string, unknown>;
    const time = record.time;
    const values = record[field];

    if (!Array.isArray(time) || !time.every((t): t is string => typeof t === 'string')) {
        throw new DataFormatError('response "hourly.time" must be an array of strings');
    }
    if (!Array.isArray(values) || !values.every((v): v is number | null => v === null || typeof v === 'number')) {
        throw new DataFormatError(`response "hourly.${field}" must be an array of numbers`);
    }

    return { time, values };
}

/**
 * Average every finite sample whose timestamp hour equals `hour`,
 * rounded to 2 decimals. Throws NoDataError when nothing matches.
 */
export function reduceAtHour(series: HourlySeries, hour: number, emptyMessage = 'no samples at sampling hour'): number {
    let sum = 0;
    let count = 0;

    series.time.forEach((timestamp, i) => {
        if (hourOfTimestamp(timestamp) !== hour) return;
        const value = series.values[i];
        if (typeof value === 'number' && Number.isFinite(value)) {
            sum += value;
            count++;
        }
    });

    if (count === 0) {
        throw new NoDataError(emptyMessage);
    }
    return round2(sum / count);
}

/**
 * fetch() plus body read, both bounded by a hard timeout and, when given,
 * the caller's signal. Aborts surface as TimeoutError; network failures and
 * non-2xx statuses as TransportError; unreadable bodies as DataFormatError.
 */
async function fetchJsonWithTimeout(
    url: string,
    label: string,
    timeoutMs: number,
    signal: AbortSignal | undefined,
    fetchImpl: typeof fetch | undefined
): Promise<unknown> {
    if (signal?.aborted) throw errorFromAbort(signal.reason);

    const controller = new AbortController();
    const timeoutId = setTimeout(
        () => controller.abort(new TimeoutError(`provider call timed out after ${timeoutMs}ms`)),
        timeoutMs
    );
    const onAbort = () => controller.abort(errorFromAbort(signal?.reason));
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
        let response: Response;
        try {
            response = await (fetchImpl ?? fetch)(url, { signal: controller.signal });
        } catch (error) {
            if (controller.signal.aborted) {
                throw errorFromAbort(controller.signal.reason);
            }
            throw new TransportError(`request failed: ${describeError(error)}`, { cause: error });
        }

        if (!response.ok) {
            throw new TransportError(`${label} API returned status ${response.status}`, {
                status: response.status
            });
        }

        // The deadline still applies while the body streams in.
        try {
            return await raceSignal(response.json(), controller.signal, errorFromAbort);
        } catch (error) {
            if (controller.signal.aborted) {
                throw errorFromAbort(controller.signal.reason);
            }
            throw new DataFormatError(`${label} API returned an unreadable body: ${describeError(error)}`, {
                cause: error
            });
        }
    } finally {
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', onAbort);
    }
}
