/**
 * Breezeway Engine — Canonical Serialization
 *
 * Snapshot ids must not depend on key insertion order, so values are
 * key-sorted before encoding. Same logical data → identical bytes.
 */

import { encode as msgpackEncode } from '@msgpack/msgpack';

/**
 * Recursively sort object keys alphabetically.
 * Arrays keep their order.
 *
 * Throws on undefined, functions, symbols, bigints and non-finite numbers;
 * none of them have a stable encoding.
 */
export function sortKeys(value: unknown): unknown {
    if (value === null) return null;
    if (value === undefined) throw new Error('Value contains undefined (forbidden)');
    if (typeof value === 'function') throw new Error('Value contains function (forbidden)');
    if (typeof value === 'symbol') throw new Error('Value contains symbol (forbidden)');
    if (typeof value === 'bigint') throw new Error('Value contains bigint (forbidden - use string)');

    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new Error(`Value contains non-finite number ${value} (forbidden)`);
        }
        return Object.is(value, -0) ? 0 : value;
    }

    if (typeof value !== 'object') return value;

    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }

    if (value instanceof Date) {
        return value.toISOString();
    }

    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        if (entry === undefined) {
            throw new Error(`Key '${key}' is undefined (forbidden)`);
        }
        sorted[key] = sortKeys(entry);
    }
    return sorted;
}

/**
 * Encode a value to MsgPack with sorted keys.
 */
export function canonicalMsgPack(value: unknown): Uint8Array {
    return new Uint8Array(msgpackEncode(sortKeys(value)));
}
