/**
 * Overlay index - document key to overlay
 *
 * The local view of a document is its stored version with the document's
 * overlay applied. Looking the overlay up here replaces replaying every
 * pending write batch.
 */

import { DocumentKey } from './document-key';
import { hardAssert } from './helpers';
import type { Mutation } from './mutation';
import { Overlay } from './overlay';
import type { BatchId, Logger } from './types';

/**
 * Storage of overlays keyed by document
 *
 * Overlays go in and come out as independent copies: changing an overlay
 * obtained from the index, or one handed to it, never changes the entry.
 * Every list returned is sorted by document key.
 */
export interface OverlayIndex {
    /**
     * Overlay of the document, or null if it has no pending change
     */
    getOverlay(key: DocumentKey): Overlay | null;

    /**
     * Overlays of the given documents that have one
     */
    getOverlays(keys: Iterable<DocumentKey>): Overlay[];

    /**
     * Store an overlay under its key, replacing the previous one
     * The overlay's mutation must be valid and its batch id at least 0
     */
    putOverlay(overlay: Overlay): void;

    /**
     * Store one overlay per mutation, all attributed to `largestBatchId`
     * Invalid mutations carry no change and are skipped
     */
    saveOverlays(largestBatchId: BatchId, mutations: Iterable<Mutation>): void;

    /**
     * Remove the overlay of a document
     * @returns whether there was one
     */
    removeOverlay(key: DocumentKey): boolean;

    /**
     * Remove every overlay whose largest batch id is `batchId`
     * Called once the batch is acknowledged or rejected
     */
    removeOverlaysForBatchId(batchId: BatchId): void;

    /**
     * Overlays of documents directly inside `collectionPath`
     * that changed after `sinceBatchId`
     */
    getOverlaysForCollection(collectionPath: string, sinceBatchId: BatchId): Overlay[];

    /**
     * Overlays of documents in any collection with id `collectionGroup`
     * that changed after `sinceBatchId`
     *
     * Batches are taken whole, oldest first, until at least `count`
     * overlays are collected, so the result may hold more than `count`.
     */
    getOverlaysForCollectionGroup(collectionGroup: string, sinceBatchId: BatchId, count: number): Overlay[];
}

/**
 * Configuration for MemoryOverlayIndex
 */
export type MemoryOverlayIndexConfig = {
    /**
     * Destination of debug logging
     * Default: console
     */
    logger?: Logger;
};

/**
 * Overlay index held in memory
 */
export class MemoryOverlayIndex implements OverlayIndex {
    private overlays: Map<string, Overlay>;
    private overlayPathsByBatchId: Map<BatchId, Set<string>>;
    private config: Required<MemoryOverlayIndexConfig>;

    constructor(config: MemoryOverlayIndexConfig = {}) {
        this.overlays = new Map();
        this.overlayPathsByBatchId = new Map();
        this.config = {
            logger: config.logger ?? console,
        };
    }

    /**
     * Number of documents with an overlay
     */
    get size(): number {
        return this.overlays.size;
    }

    getOverlay(key: DocumentKey): Overlay | null {
        return this.overlays.get(key.path)?.clone() ?? null;
    }

    getOverlays(keys: Iterable<DocumentKey>): Overlay[] {
        const found = new Map<string, Overlay>();
        for (const key of keys) {
            const overlay = this.overlays.get(key.path);
            if (overlay) {
                found.set(key.path, overlay);
            }
        }
        return sortedCopies(found.values());
    }

    putOverlay(overlay: Overlay): void {
        const path = overlay.key.path;
        hardAssert(
            overlay.largestBatchId >= 0,
            `Overlay for ${path} stored with batch id ${overlay.largestBatchId}`
        );
        const existing = this.overlays.get(path);
        if (existing) {
            this.forgetBatchEntry(existing.largestBatchId, path);
        }

        this.overlays.set(path, overlay.clone());

        let paths = this.overlayPathsByBatchId.get(overlay.largestBatchId);
        if (!paths) {
            paths = new Set();
            this.overlayPathsByBatchId.set(overlay.largestBatchId, paths);
        }
        paths.add(path);
    }

    saveOverlays(largestBatchId: BatchId, mutations: Iterable<Mutation>): void {
        let saved = 0;
        for (const mutation of mutations) {
            if (!mutation.isValid) {
                continue;
            }
            hardAssert(
                largestBatchId >= 0,
                `Overlay for ${mutation.key.path} saved with batch id ${largestBatchId}`
            );
            this.putOverlay(new Overlay(largestBatchId, mutation));
            saved++;
        }
        this.config.logger.debug(`Saved ${saved} overlays for batch ${largestBatchId}`);
    }

    removeOverlay(key: DocumentKey): boolean {
        const existing = this.overlays.get(key.path);
        if (!existing) {
            return false;
        }
        this.overlays.delete(key.path);
        this.forgetBatchEntry(existing.largestBatchId, key.path);
        return true;
    }

    removeOverlaysForBatchId(batchId: BatchId): void {
        const paths = this.overlayPathsByBatchId.get(batchId);
        if (!paths) {
            return;
        }
        for (const path of paths) {
            this.overlays.delete(path);
        }
        this.overlayPathsByBatchId.delete(batchId);
        this.config.logger.debug(`Removed ${paths.size} overlays of batch ${batchId}`);
    }

    getOverlaysForCollection(collectionPath: string, sinceBatchId: BatchId): Overlay[] {
        const matching: Overlay[] = [];
        for (const overlay of this.overlays.values()) {
            if (overlay.key.collectionPath === collectionPath && overlay.largestBatchId > sinceBatchId) {
                matching.push(overlay);
            }
        }
        return sortedCopies(matching);
    }

    getOverlaysForCollectionGroup(collectionGroup: string, sinceBatchId: BatchId, count: number): Overlay[] {
        const byBatchId = new Map<BatchId, Overlay[]>();
        for (const overlay of this.overlays.values()) {
            if (overlay.key.collectionGroup !== collectionGroup || overlay.largestBatchId <= sinceBatchId) {
                continue;
            }
            const batch = byBatchId.get(overlay.largestBatchId);
            if (batch) {
                batch.push(overlay);
            } else {
                byBatchId.set(overlay.largestBatchId, [overlay]);
            }
        }

        const result: Overlay[] = [];
        const batchIds = Array.from(byBatchId.keys()).sort((a, b) => a - b);
        for (const batchId of batchIds) {
            if (result.length >= count) {
                break;
            }
            result.push(...(byBatchId.get(batchId) ?? []));
        }
        return sortedCopies(result);
    }

    private forgetBatchEntry(batchId: BatchId, path: string): void {
        const paths = this.overlayPathsByBatchId.get(batchId);
        if (!paths) {
            return;
        }
        paths.delete(path);
        if (paths.size === 0) {
            this.overlayPathsByBatchId.delete(batchId);
        }
    }
}

function sortedCopies(overlays: Iterable<Overlay>): Overlay[] {
    return Array.from(overlays, (overlay) => overlay.clone()).sort((a, b) => DocumentKey.comparator(a.key, b.key));
}
