/**
 * Overlay - the net pending local change to one document
 *
 * Instead of replaying every queued write batch to rebuild the local
 * view of a document, the engine keeps a single mutation per document
 * that has the same effect as all of them, together with the id of the
 * most recent batch that contributed to it.
 */

import { inspect } from 'node:util';
import type { DocumentKey } from './document-key';
import { combineHashes, hardAssert } from './helpers';
import { Mutation } from './mutation';
import { BATCH_ID_UNKNOWN, type BatchId } from './types';

/**
 * Pair of (largest contributing batch id, mutation)
 *
 * States:
 * - `new Overlay()`: no batch has contributed, batch id -1, invalid mutation
 * - batch id >= 0 with an invalid mutation: batches were seen but their
 *   writes cancel out
 * - batch id >= 0 with a valid mutation: the usual case
 *
 * Overlays are values. `clone()`/`copyFrom()` copy, `take()`/`moveFrom()`
 * move: the source of a move is reset to `new Overlay()`.
 */
export class Overlay {
    private batchId: BatchId;
    private currentMutation: Mutation;

    constructor(largestBatchId: BatchId = BATCH_ID_UNKNOWN, mutation: Mutation = Mutation.invalid()) {
        this.batchId = largestBatchId;
        this.currentMutation = mutation;
    }

    get largestBatchId(): BatchId {
        return this.batchId;
    }

    get mutation(): Mutation {
        return this.currentMutation;
    }

    /**
     * Key of the document this overlay belongs to
     * Only defined when the mutation is valid
     */
    get key(): DocumentKey {
        hardAssert(this.currentMutation.isValid, 'Overlay.key read from an overlay without a valid mutation');
        return this.currentMutation.key;
    }

    /**
     * Independent copy of this overlay
     */
    clone(): Overlay {
        return new Overlay(this.batchId, this.currentMutation);
    }

    /**
     * Move this overlay's contents into a new instance and reset this one
     */
    take(): Overlay {
        const moved = this.clone();
        this.reset();
        return moved;
    }

    /**
     * Replace this overlay's contents with a copy of `source`
     */
    copyFrom(source: Overlay): this {
        this.batchId = source.batchId;
        this.currentMutation = source.currentMutation;
        return this;
    }

    /**
     * Replace this overlay's contents with those of `source` and reset `source`
     */
    moveFrom(source: Overlay): this {
        if (source !== this) {
            this.copyFrom(source);
            source.reset();
        }
        return this;
    }

    equals(other: Overlay): boolean {
        return this.batchId === other.batchId && this.currentMutation.equals(other.currentMutation);
    }

    hash(): number {
        return combineHashes(this.batchId | 0, this.currentMutation.hash());
    }

    toString(): string {
        const mutation = this.currentMutation.isValid ? `, mutation=${this.currentMutation.toString()}` : '';
        return `Overlay(largest_batch_id=${this.batchId}${mutation})`;
    }

    [inspect.custom](): string {
        return this.toString();
    }

    private reset(): void {
        this.batchId = BATCH_ID_UNKNOWN;
        this.currentMutation = Mutation.invalid();
    }
}

/**
 * Hasher for containers keyed by overlays, same result as `overlay.hash()`
 */
export function overlayHash(overlay: Overlay): number {
    return overlay.hash();
}

/**
 * Equality counterpart of `overlayHash`
 */
export function overlayEquals(left: Overlay, right: Overlay): boolean {
    return left.equals(right);
}
