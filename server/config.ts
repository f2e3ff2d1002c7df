/**
 * Centralized configuration for the Breezeway server.
 *
 * All environment-dependent values are read here, once, at startup.
 */

import path from 'path';
import { fileURLToPath } from 'url';
import {
    DEFAULT_ADVISORY_HORIZON_DAYS,
    DEFAULT_CACHE_TTL_MS,
    DEFAULT_FLEET_CONCURRENCY,
    DEFAULT_PROVIDER_TIMEOUT_MS,
    DEFAULT_REFRESH_TIMEOUT_MS,
    DEFAULT_TOP_LIMIT,
    DEFAULT_WARM_TIMEOUT_MS
} from '@engine/index';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export interface ServerConfig {
    port: number;
    pointsFile: string;
    cacheTtlMs: number;
    topRequestTimeoutMs: number;
    warmTimeoutMs: number;
    refreshTimeoutMs: number;
    providerTimeoutMs: number;
    fleetConcurrency: number;
    topLimit: number;
    advisoryHorizonDays: number;
    shutdownTimeoutMs: number;
}

export const DEFAULT_TOP_REQUEST_TIMEOUT_MS = 500;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 30_000;

type Env = Record<string, string | undefined>;

/**
 * Read an integer of at least `min` from the environment.
 * Unset or blank values take the default; anything else must parse.
 */
function readInteger(env: Env, key: string, fallback: number, min = 1): number {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < min) {
        throw new Error(`Invalid ${key}: expected an integer >= ${min}, got "${raw}"`);
    }
    return n;
}

export function loadConfig(env: Env = process.env): ServerConfig {
    const pointsFile = env.POINTS_FILE?.trim() || path.resolve(__dirname, '..', 'data', 'points.json');

    return {
        port: readInteger(env, 'PORT', 3000, 0),
        pointsFile: path.resolve(pointsFile),
        cacheTtlMs: readInteger(env, 'CACHE_TTL_MS', DEFAULT_CACHE_TTL_MS),
        topRequestTimeoutMs: readInteger(env, 'TOP_REQUEST_TIMEOUT_MS', DEFAULT_TOP_REQUEST_TIMEOUT_MS),
        warmTimeoutMs: readInteger(env, 'WARM_TIMEOUT_MS', DEFAULT_WARM_TIMEOUT_MS),
        refreshTimeoutMs: readInteger(env, 'REFRESH_TIMEOUT_MS', DEFAULT_REFRESH_TIMEOUT_MS),
        providerTimeoutMs: readInteger(env, 'PROVIDER_TIMEOUT_MS', DEFAULT_PROVIDER_TIMEOUT_MS),
        fleetConcurrency: readInteger(env, 'FLEET_CONCURRENCY', DEFAULT_FLEET_CONCURRENCY),
        topLimit: readInteger(env, 'TOP_LIMIT', DEFAULT_TOP_LIMIT),
        advisoryHorizonDays: readInteger(env, 'ADVISORY_HORIZON_DAYS', DEFAULT_ADVISORY_HORIZON_DAYS, 0),
        shutdownTimeoutMs: readInteger(env, 'SHUTDOWN_TIMEOUT_MS', DEFAULT_SHUTDOWN_TIMEOUT_MS)
    };
}
