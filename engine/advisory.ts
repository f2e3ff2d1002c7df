/**
 * Breezeway Engine — Travel Advisory
 *
 * Compares the caller's location with one tracked point on a given day and
 * recommends the trip only when the destination is both cooler and cleaner.
 */

import { InvalidDateError, OutOfRangeError, UnknownDestinationError, ValidationError } from './errors';
import { fetchDailyReading, type ProviderClient } from './ingest/fetcher';
import { isValidLatitude, isValidLongitude, round2 } from './location';
import type { PointStore } from './points';
import { parseUtcDate, utcDateString } from './time';
import type { AdvisoryRequest, AdvisoryResult, LocationReading, Verdict } from './types';

/** Days ahead of today (UTC) a travel date may fall, inclusive. */
export const DEFAULT_ADVISORY_HORIZON_DAYS = 7;

export const DEFAULT_CURRENT_LOCATION_NAME = 'Current Location';

const DAY_MS = 86_400_000;

// =============================================================================
// Reason Text
// =============================================================================

function formatAmount(value: number): string {
    return String(round2(Math.abs(value)));
}

/**
 * Temperature clause for `tempDiff = current − destination`.
 * |d| < 1 same; 1 ≤ |d| ≤ 3 slightly; |d| > 3 significantly.
 */
export function describeTemperature(tempDiff: number): string {
    const magnitude = Math.abs(tempDiff);
    if (magnitude < 1) return 'about the same temperature';

    const direction = tempDiff > 0 ? 'cooler' : 'hotter';
    const qualifier = magnitude <= 3 ? 'slightly' : 'significantly';
    return `${qualifier} ${direction} (${formatAmount(tempDiff)}°C ${tempDiff > 0 ? 'less' : 'more'})`;
}

/**
 * Air quality clause for `pm25Diff = current − destination`.
 * |d| < 5 similar; 5 ≤ |d| ≤ 15 better/worse; |d| > 15 significantly.
 */
export function describeAirQuality(pm25Diff: number): string {
    const magnitude = Math.abs(pm25Diff);
    if (magnitude < 5) return 'similar air quality';

    const direction = pm25Diff > 0 ? 'better' : 'worse';
    const band = magnitude <= 15 ? `${direction} air quality` : `significantly ${direction} air quality`;
    return `${band} (PM2.5 ${formatAmount(pm25Diff)} ${pm25Diff > 0 ? 'lower' : 'higher'})`;
}

export function decideVerdict(tempDiff: number, pm25Diff: number): Verdict {
    return tempDiff > 0 && pm25Diff > 0 ? 'Recommended' : 'Not Recommended';
}

export function buildReason(destinationName: string, tempDiff: number, pm25Diff: number): string {
    const closing = decideVerdict(tempDiff, pm25Diff) === 'Recommended'
        ? 'Enjoy your trip!'
        : 'You may want to stay where you are.';
    return `${destinationName} is ${describeTemperature(tempDiff)} and has ${describeAirQuality(pm25Diff)}. ${closing}`;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Throws InvalidDateError for anything but a real YYYY-MM-DD date, and
 * OutOfRangeError outside [today, today + horizonDays] (UTC).
 */
export function validateTravelDate(travelDate: unknown, now: Date, horizonDays: number): string {
    if (typeof travelDate !== 'string') {
        throw new InvalidDateError();
    }
    const parsed = parseUtcDate(travelDate);
    if (!parsed) {
        throw new InvalidDateError();
    }

    const startOfToday = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
    const lastDay = startOfToday + horizonDays * DAY_MS;
    const travel = parsed.getTime();

    if (travel < startOfToday || travel > lastDay) {
        throw new OutOfRangeError(
            `travel date must be within the next ${horizonDays} days (${utcDateString(now)} to ${utcDateString(new Date(lastDay))})`
        );
    }
    return travelDate;
}

// =============================================================================
// Comparator
// =============================================================================

export interface AdvisoryComparatorOptions {
    points: PointStore;
    client: ProviderClient;
    horizonDays?: number;
    /** Clock override for tests. */
    now?: () => Date;
}

export class AdvisoryComparator {
    readonly horizonDays: number;
    private readonly points: PointStore;
    private readonly client: ProviderClient;
    private readonly now: () => Date;

    constructor(options: AdvisoryComparatorOptions) {
        this.points = options.points;
        this.client = options.client;
        this.horizonDays = options.horizonDays ?? DEFAULT_ADVISORY_HORIZON_DAYS;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Validate, then fetch both locations for the travel date concurrently
     * (four provider calls). The first failure, in the order current
     * temperature, current PM2.5, destination temperature, destination PM2.5,
     * fails the comparison.
     */
    async compare(request: AdvisoryRequest, signal?: AbortSignal): Promise<AdvisoryResult> {
        const travelDate = validateTravelDate(request.travelDate, this.now(), this.horizonDays);

        const { lat, long } = request.current;
        if (!isValidLatitude(lat) || !isValidLongitude(long)) {
            throw new ValidationError(
                'current location latitude must be -90..90 and longitude -180..180',
                'INVALID_LOCATION'
            );
        }

        const destination = this.points.findByName(request.destinationName);
        if (!destination) {
            throw new UnknownDestinationError(request.destinationName);
        }

        const [currentReading, destinationReading] = await Promise.allSettled([
            fetchDailyReading(this.client, { latitude: lat, longitude: long, date: travelDate, signal }),
            fetchDailyReading(this.client, {
                latitude: destination.lat,
                longitude: destination.long,
                date: travelDate,
                signal
            })
        ]);
        if (currentReading.status === 'rejected') throw currentReading.reason;
        if (destinationReading.status === 'rejected') throw destinationReading.reason;

        const current: LocationReading = {
            name: request.current.name?.trim() || DEFAULT_CURRENT_LOCATION_NAME,
            tempCelsius: currentReading.value.temperatureCelsius,
            pm25: currentReading.value.pm25
        };
        const target: LocationReading = {
            name: destination.name,
            tempCelsius: destinationReading.value.temperatureCelsius,
            pm25: destinationReading.value.pm25
        };

        const tempDiff = round2(current.tempCelsius - target.tempCelsius);
        const pm25Diff = round2(current.pm25 - target.pm25);

        return {
            verdict: decideVerdict(tempDiff, pm25Diff),
            reason: buildReason(target.name, tempDiff, pm25Diff),
            travelDate,
            current,
            destination: target,
            tempDiff,
            pm25Diff
        };
    }
}
