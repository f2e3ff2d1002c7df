/**
 * Breezeway Engine — BLAKE3 Hashing
 */

import { blake3 } from '@noble/hashes/blake3';
import { canonicalMsgPack } from './canonical';

/**
 * Convert Uint8Array to lowercase hex string.
 */
export function toHex(bytes: Uint8Array): string {
    return Array.from(bytes)
        .map((b) => b.toString(16).padStart(2, '0'))
        .join('');
}

/**
 * Compute BLAKE3 hash and return as lowercase hex string.
 */
export function hashHex(data: Uint8Array): string {
    return toHex(blake3(data));
}

/**
 * Content id of any canonically encodable value (64 hex chars).
 */
export function contentId(value: unknown): string {
    return hashHex(canonicalMsgPack(value));
}
