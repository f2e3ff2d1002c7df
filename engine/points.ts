/**
 * Breezeway Engine — Point Store
 *
 * The static set of tracked points, loaded once at startup and read-only
 * afterwards. Names double as the advisory lookup key and must be unique.
 */
/* eslint-disable no-console */

import { readFile } from 'node:fs/promises';
import { describeError, ValidationError } from './errors';
import { isValidLatitude, isValidLongitude, parseCoord } from './location';
import type { Point } from './types';

export class PointStore {
    private readonly points: readonly Point[];
    private readonly byName = new Map<string, Point>();
    private readonly byId = new Map<string, Point>();

    constructor(points: Point[]) {
        for (const point of points) {
            if (this.byName.has(point.name)) {
                throw new ValidationError(`duplicate point name: ${point.name}`, 'DUPLICATE_POINT');
            }
            if (this.byId.has(point.id)) {
                throw new ValidationError(`duplicate point id: ${point.id}`, 'DUPLICATE_POINT');
            }
            const frozen = Object.freeze({ ...point });
            this.byName.set(frozen.name, frozen);
            this.byId.set(frozen.id, frozen);
        }
        this.points = Object.freeze(Array.from(this.byId.values()));
    }

    get size(): number {
        return this.points.length;
    }

    all(): readonly Point[] {
        return this.points;
    }

    /** Exact, case-sensitive name match. */
    findByName(name: string): Point | undefined {
        return this.byName.get(name);
    }

    findById(id: string): Point | undefined {
        return this.byId.get(id);
    }
}

/**
 * Parse a points document: `{ "points": [...] }` or a bare array.
 *
 * Coordinates may be numbers or numeric strings. Entries whose id/name are
 * missing or whose coordinates do not parse into range are skipped.
 */
export function parsePoints(raw: unknown): Point[] {
    const entries = Array.isArray(raw)
        ? raw
        : raw && typeof raw === 'object' && 'points' in raw && Array.isArray(raw.points)
            ? raw.points
            : null;
    if (!entries) {
        throw new ValidationError('points document must be an array or { "points": [...] }');
    }

    const out: Point[] = [];
    for (const [index, entry] of entries.entries()) {
        if (!entry || typeof entry !== 'object') continue;
        const e = entry as Record<string, unknown>;
        const id = typeof e.id === 'string' || typeof e.id === 'number' ? String(e.id).trim() : '';
        const name = typeof e.name === 'string' ? e.name.trim() : '';
        const lat = parseCoord(e.lat);
        const long = parseCoord(e.long);

        if (!id || !name) {
            console.warn('[points] skipping entry without id/name', { index });
            continue;
        }
        if (lat === null || long === null || !isValidLatitude(lat) || !isValidLongitude(long)) {
            console.warn('[points] skipping entry with invalid coordinates', { index, id, name });
            continue;
        }
        out.push({ id, name, lat, long });
    }
    return out;
}

export async function loadPointStore(filePath: string): Promise<PointStore> {
    const text = await readFile(filePath, 'utf8');
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ValidationError(`points file is not valid JSON: ${filePath} (${describeError(error)})`);
    }
    return new PointStore(parsePoints(raw));
}
