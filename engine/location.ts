/**
 * Breezeway Engine — Coordinates
 *
 * Query formatting and range checks for latitude/longitude pairs.
 */

export const COORD_DECIMALS = 4;

/**
 * Format a coordinate for provider queries: exactly 4 decimals,
 * "-0.0000" normalized to "0.0000".
 */
export function formatCoord(value: number): string {
    const formatted = value.toFixed(COORD_DECIMALS);
    return formatted === '-0.0000' ? '0.0000' : formatted;
}

export function isValidLatitude(value: number): boolean {
    return Number.isFinite(value) && value >= -90 && value <= 90;
}

export function isValidLongitude(value: number): boolean {
    return Number.isFinite(value) && value >= -180 && value <= 180;
}

/**
 * Parse a coordinate given as a number or numeric string.
 */
export function parseCoord(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value !== 'string' || value.trim() === '') return null;
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
}

/** Round to 2 decimals, normalizing -0 to 0. */
export function round2(value: number): number {
    const rounded = Math.round(value * 100) / 100;
    return Object.is(rounded, -0) ? 0 : rounded;
}
