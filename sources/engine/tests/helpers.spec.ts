/**
 * Level 1: Basic Helper Functions
 * Tests for ID generation, assertions, hashing and value utilities
 */

import { describe, it, expect } from 'vitest';
import { createDocumentId, fail, hardAssert } from '../index';
import { canonicalJson, combineHashes, hashString, valueEquals } from '../helpers';

describe('Helper Functions', () => {
    describe('ID Generation', () => {
        it('should create unique document IDs', () => {
            const id1 = createDocumentId();
            const id2 = createDocumentId();

            expect(id1).not.toBe(id2);
            expect(typeof id1).toBe('string');
            expect(id1.length).toBeGreaterThan(0);
            expect(id1).not.toContain('/');
        });
    });

    describe('Assertions', () => {
        it('should throw with an assertion prefix', () => {
            expect(() => fail('broken')).toThrow('INTERNAL ASSERTION FAILED: broken');
        });

        it('should only throw when the condition is false', () => {
            expect(() => hardAssert(true, 'fine')).not.toThrow();
            expect(() => hardAssert(false, 'not fine')).toThrow('INTERNAL ASSERTION FAILED: not fine');
        });
    });

    describe('Hashing', () => {
        it('should hash strings like s[0]*31^(n-1) + ... + s[n-1]', () => {
            expect(hashString('')).toBe(0);
            expect(hashString('a')).toBe(97);
            expect(hashString('ab')).toBe(97 * 31 + 98);
        });

        it('should combine hashes in order', () => {
            expect(combineHashes()).toBe(17);
            expect(combineHashes(1)).toBe(17 * 31 + 1);
            expect(combineHashes(1, 2)).toBe((17 * 31 + 1) * 31 + 2);
            expect(combineHashes(1, 2)).not.toBe(combineHashes(2, 1));
        });

        it('should stay within 32-bit integers', () => {
            const hash = hashString('a fairly long string that overflows 32 bits many times');

            expect(Number.isInteger(hash)).toBe(true);
            expect(hash | 0).toBe(hash);
        });
    });

    describe('Field Values', () => {
        it('should render JSON with sorted keys', () => {
            expect(canonicalJson({ b: [1, { d: null, c: 'x' }], a: true })).toBe(
                '{"a":true,"b":[1,{"c":"x","d":null}]}'
            );
        });

        it('should compare values structurally', () => {
            expect(valueEquals({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true);
            expect(valueEquals({ a: 1 }, { a: 1, b: 2 })).toBe(false);
            expect(valueEquals([1, 2], { 0: 1, 1: 2 })).toBe(false);
            expect(valueEquals(null, {})).toBe(false);
            expect(valueEquals('1', 1)).toBe(false);
        });
    });
});
