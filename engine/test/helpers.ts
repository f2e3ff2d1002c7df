import type { ProviderClient, ProviderQuery } from '../ingest/fetcher';
import type { CompositeRecord, Point, ProviderId } from '../types';

export type ProviderHandler = (provider: ProviderId, query: ProviderQuery) => number | Promise<number>;

/**
 * In-process provider client. Records every call and answers through `handler`.
 */
export class FakeProviderClient implements ProviderClient {
    readonly calls: Array<{ provider: ProviderId; query: ProviderQuery }> = [];

    constructor(private readonly handler: ProviderHandler) {}

    async fetchDailyValue(provider: ProviderId, query: ProviderQuery): Promise<number> {
        this.calls.push({ provider, query });
        return this.handler(provider, query);
    }
}

export type FakeReading = { temperature: number | Error; airQuality: number | Error };

/**
 * Client answering by latitude. Unknown latitudes reject.
 */
export function clientByLatitude(readings: Record<number, FakeReading>): FakeProviderClient {
    return new FakeProviderClient((provider, query) => {
        const reading = readings[query.latitude];
        if (!reading) throw new Error(`no fake reading for latitude ${query.latitude}`);
        const value = reading[provider];
        if (value instanceof Error) throw value;
        return value;
    });
}

export function makePoint(i: number, overrides: Partial<Point> = {}): Point {
    return {
        id: String(i),
        name: `Point ${i}`,
        lat: i,
        long: i * 2,
        ...overrides
    };
}

export function makeRecord(i: number, avgTempCelsius: number, avgPm25: number): CompositeRecord {
    return {
        pointId: String(i),
        pointName: `Point ${i}`,
        avgTempCelsius,
        avgPm25,
        rank: 0
    };
}

export interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => {};
    let reject: (error: unknown) => void = () => {};
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

/** Let pending promise callbacks run. */
export async function flushMicrotasks(rounds = 10): Promise<void> {
    for (let i = 0; i < rounds; i++) {
        await Promise.resolve();
    }
}

/** 200 response whose body starts streaming and never completes. */
export function stalledResponse(): Response {
    const body = new ReadableStream<Uint8Array>({
        start(controller) {
            controller.enqueue(new TextEncoder().encode('{"hourly":'));
        }
    });
    return new Response(body, { status: 200, headers: { 'Content-Type': 'application/json' } });
}
