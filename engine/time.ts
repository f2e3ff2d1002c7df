/**
 * Breezeway Engine — Time Utilities
 */

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a strict YYYY-MM-DD calendar date as UTC midnight.
 * Returns null for malformed strings and impossible dates ("2026-02-30").
 */
export function parseUtcDate(date: string): Date | null {
    if (!DATE_PATTERN.test(date)) return null;
    const parsed = new Date(`${date}T00:00:00.000Z`);
    if (!Number.isFinite(parsed.getTime())) return null;
    if (parsed.toISOString().slice(0, 10) !== date) return null;
    return parsed;
}

/** UTC calendar date of `now`, YYYY-MM-DD. */
export function utcDateString(now: Date): string {
    return now.toISOString().slice(0, 10);
}

/**
 * Hour-of-day embedded in an Open-Meteo local timestamp ("2026-10-19T14:00").
 * Returns null when the string is too short to carry one.
 */
export function hourOfTimestamp(timestamp: string): number | null {
    if (timestamp.length < 13) return null;
    const hour = Number(timestamp.slice(11, 13));
    return Number.isInteger(hour) ? hour : null;
}

/**
 * Resolve when `promise` settles, or reject as soon as `signal` aborts.
 * The underlying work is not cancelled; callers that own it must abort it separately.
 */
export function raceSignal<T>(
    promise: Promise<T>,
    signal: AbortSignal | undefined,
    onAbort: (reason: unknown) => Error
): Promise<T> {
    if (!signal) return promise;
    if (signal.aborted) return Promise.reject(onAbort(signal.reason));

    return new Promise<T>((resolve, reject) => {
        const abort = () => reject(onAbort(signal.reason));
        signal.addEventListener('abort', abort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', abort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', abort);
                reject(error);
            }
        );
    });
}
