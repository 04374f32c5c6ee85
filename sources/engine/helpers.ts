/**
 * Helper functions for the overlay engine
 */

import { createId } from '@paralleldrive/cuid2';
import type { FieldValue } from './types';

// ============================================================================
// Assertions
// ============================================================================

/**
 * Fail on a broken internal contract
 * Not meant to be caught: callers have a programming error
 */
export function fail(message: string): never {
    throw new Error(`INTERNAL ASSERTION FAILED: ${message}`);
}

/**
 * Fail with the given message unless the condition holds
 */
export function hardAssert(condition: boolean, message: string): asserts condition {
    if (!condition) {
        fail(message);
    }
}

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Create a new random document ID
 */
export function createDocumentId(): string {
    return createId();
}

// ============================================================================
// Hashing
// ============================================================================

/**
 * 32-bit string hash (s[0]*31^(n-1) + ... + s[n-1])
 */
export function hashString(value: string): number {
    let hash = 0;
    for (let i = 0; i < value.length; i++) {
        hash = (Math.imul(hash, 31) + value.charCodeAt(i)) | 0;
    }
    return hash;
}

/**
 * Fold several hashes into one, order-sensitive
 */
export function combineHashes(...hashes: number[]): number {
    let result = 17;
    for (const hash of hashes) {
        result = (Math.imul(result, 31) + hash) | 0;
    }
    return result;
}

// ============================================================================
// Field Values
// ============================================================================

/**
 * Render a value as JSON with object keys sorted
 * Equal values always render the same way
 */
export function canonicalJson(value: FieldValue): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value);
    }
    if (Array.isArray(value)) {
        return `[${value.map(canonicalJson).join(',')}]`;
    }
    const entries = Object.keys(value)
        .sort()
        .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
}

/**
 * Deep equality check for field values
 */
export function valueEquals(a: FieldValue, b: FieldValue): boolean {
    if (a === b) return true;
    if (a === null || b === null) return false;
    if (typeof a !== 'object' || typeof b !== 'object') return false;

    if (Array.isArray(a) || Array.isArray(b)) {
        if (!Array.isArray(a) || !Array.isArray(b)) return false;
        if (a.length !== b.length) return false;
        return a.every((item, i) => valueEquals(item, b[i]));
    }

    const keysA = Object.keys(a);
    const keysB = Object.keys(b);

    if (keysA.length !== keysB.length) return false;

    for (const key of keysA) {
        if (!Object.hasOwn(b, key)) return false;
        if (!valueEquals(a[key], b[key])) {
            return false;
        }
    }

    return true;
}
