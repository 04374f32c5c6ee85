/**
 * Tests for the persisted overlay format
 */

import { describe, it, expect } from 'vitest';
import {
    Mutation,
    NO_PRECONDITION,
    Overlay,
    OverlayDecodeError,
    decodeOverlay,
    encodeOverlay,
    existsPrecondition,
} from '../index';
import { key, patchMutation, setMutation } from './test-helpers';

describe('Overlay Codec', () => {
    describe('encodeOverlay()', () => {
        it('should encode an overlay without a mutation', () => {
            expect(encodeOverlay(new Overlay())).toEqual({ largestBatchId: -1, mutation: null });
            expect(encodeOverlay(new Overlay(4, Mutation.invalid()))).toEqual({ largestBatchId: 4, mutation: null });
        });

        it('should encode a patch', () => {
            const overlay = new Overlay(7, patchMutation('rooms/a', { a: 1 }));

            expect(encodeOverlay(overlay)).toEqual({
                largestBatchId: 7,
                mutation: {
                    type: 'patch',
                    path: 'rooms/a',
                    precondition: { type: 'exists', exists: true },
                    value: { a: 1 },
                    fieldMask: ['a'],
                },
            });
        });

        it('should encode a delete without a value', () => {
            const overlay = new Overlay(2, Mutation.delete(key('rooms/a')));

            expect(encodeOverlay(overlay)).toEqual({
                largestBatchId: 2,
                mutation: { type: 'delete', path: 'rooms/a', precondition: { type: 'none' } },
            });
        });
    });

    describe('decodeOverlay()', () => {
        it('should restore equal overlays through JSON', () => {
            const overlays = [
                new Overlay(),
                new Overlay(3, Mutation.invalid()),
                new Overlay(5, setMutation('rooms/a', { title: 'A', tags: ['x', 'y'], meta: { n: null } })),
                new Overlay(6, Mutation.patch(key('rooms/a'), { a: { b: 1 } }, ['a.b', 'c'], NO_PRECONDITION)),
                new Overlay(7, Mutation.delete(key('rooms/a/messages/m'), existsPrecondition(true))),
                new Overlay(8, Mutation.verify(key('rooms/b'))),
            ];

            for (const overlay of overlays) {
                const stored = JSON.parse(JSON.stringify(encodeOverlay(overlay)));

                expect(decodeOverlay(stored).equals(overlay)).toBe(true);
            }
        });

        it('should reject malformed input', () => {
            expect(() => decodeOverlay(null)).toThrow(OverlayDecodeError);
            expect(() => decodeOverlay({ largestBatchId: 1.5, mutation: null })).toThrow(OverlayDecodeError);
            expect(() =>
                decodeOverlay({ largestBatchId: 1, mutation: { type: 'rename', path: 'rooms/a' } })
            ).toThrow(OverlayDecodeError);
        });

        it('should report the validation issues', () => {
            try {
                decodeOverlay({ largestBatchId: 'one', mutation: null });
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(OverlayDecodeError);
                if (error instanceof OverlayDecodeError) {
                    expect(error.issues.map((issue) => issue.path)).toEqual([['largestBatchId']]);
                }
            }
        });

        it('should reject field masks that reach the object prototype', () => {
            const input = {
                largestBatchId: 1,
                mutation: {
                    type: 'patch',
                    path: 'rooms/a',
                    precondition: { type: 'none' },
                    value: {},
                    fieldMask: ['__proto__.toString'],
                },
            };

            expect(() => decodeOverlay(input)).toThrow(OverlayDecodeError);
            expect(() => decodeOverlay(input)).toThrow('Invalid field path in mask: "__proto__.toString"');
        });

        it('should reject a mutation without a batch id', () => {
            const mutation = { type: 'delete', path: 'rooms/a', precondition: { type: 'none' } };

            expect(() => decodeOverlay({ largestBatchId: -1, mutation })).toThrow(OverlayDecodeError);
            expect(() => decodeOverlay({ largestBatchId: -1, mutation })).toThrow(
                'An overlay with a mutation needs a batch id of at least 0, got -1'
            );
            expect(decodeOverlay({ largestBatchId: -1, mutation: null }).equals(new Overlay())).toBe(true);
        });

        it('should reject batch ids below -1', () => {
            expect(() => decodeOverlay({ largestBatchId: -2, mutation: null })).toThrow(OverlayDecodeError);
        });

        it('should reject numbers that are not finite', () => {
            const input = {
                largestBatchId: 1,
                mutation: { type: 'set', path: 'rooms/a', precondition: { type: 'none' }, value: { n: Infinity } },
            };

            expect(() => decodeOverlay(input)).toThrow(OverlayDecodeError);
        });

        it('should reject paths that do not name a document', () => {
            const input = {
                largestBatchId: 1,
                mutation: { type: 'delete', path: 'rooms', precondition: { type: 'none' } },
            };

            expect(() => decodeOverlay(input)).toThrow(OverlayDecodeError);
            expect(() => decodeOverlay(input)).toThrow('Invalid document path: "rooms"');
        });
    });
});
