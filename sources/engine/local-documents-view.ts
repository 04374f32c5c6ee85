/**
 * Local documents view
 *
 * Materializes what the user sees locally: the stored version of a
 * document with its overlay, if any, applied on top.
 */

import { DocumentKey } from './document-key';
import type { LocalDocument } from './document';
import type { Overlay } from './overlay';
import type { OverlayIndex } from './overlay-index';
import type { RemoteDocumentReader } from './remote-document-cache';
import { BATCH_ID_UNKNOWN, type Logger } from './types';

/**
 * Configuration for LocalDocumentsView
 */
export type LocalDocumentsViewConfig = {
    /**
     * Destination of debug logging
     * Default: console
     */
    logger?: Logger;
};

/**
 * Apply an overlay to the base version of its document
 */
export function applyOverlay(document: LocalDocument, overlay: Overlay | null): LocalDocument {
    if (overlay === null) {
        return document;
    }
    return overlay.mutation.applyToLocalView(document);
}

export class LocalDocumentsView {
    private remoteDocuments: RemoteDocumentReader;
    private overlays: OverlayIndex;
    private config: Required<LocalDocumentsViewConfig>;

    constructor(
        remoteDocuments: RemoteDocumentReader,
        overlays: OverlayIndex,
        config: LocalDocumentsViewConfig = {}
    ) {
        this.remoteDocuments = remoteDocuments;
        this.overlays = overlays;
        this.config = {
            logger: config.logger ?? console,
        };
    }

    /**
     * Local view of one document, missing if it does not exist locally
     */
    getDocument(key: DocumentKey): LocalDocument {
        return applyOverlay(this.remoteDocuments.getEntry(key), this.overlays.getOverlay(key));
    }

    /**
     * Local views of several documents in one pass, sorted by key
     * Missing documents are included
     */
    getDocuments(keys: Iterable<DocumentKey>): LocalDocument[] {
        const keyList = Array.from(keys);
        const documents = this.remoteDocuments.getEntries(keyList);
        const overlays = this.overlays.getOverlays(keyList);
        return this.merge(documents, overlays);
    }

    /**
     * Local views of the documents directly inside a collection, sorted by key
     *
     * Includes documents that only exist through a pending write and
     * leaves out documents a pending write deletes.
     */
    getDocumentsInCollection(collectionPath: string): LocalDocument[] {
        const documents = this.remoteDocuments.getDocumentsInCollection(collectionPath);
        const overlays = this.overlays.getOverlaysForCollection(collectionPath, BATCH_ID_UNKNOWN);

        // Overlaid documents not in the cache start out missing
        const known = new Set(documents.map((document) => document.key.path));
        const unknownKeys = overlays.map((overlay) => overlay.key).filter((key) => !known.has(key.path));
        const bases = documents.concat(this.remoteDocuments.getEntries(unknownKeys));

        return this.merge(bases, overlays).filter((document) => document.data !== null);
    }

    private merge(documents: LocalDocument[], overlays: Overlay[]): LocalDocument[] {
        const overlaysByPath = new Map(overlays.map((overlay) => [overlay.key.path, overlay] as const));
        const merged = documents
            .map((document) => applyOverlay(document, overlaysByPath.get(document.key.path) ?? null))
            .sort((a, b) => DocumentKey.comparator(a.key, b.key));

        this.config.logger.debug(
            `Materialized ${merged.length} documents with ${overlaysByPath.size} overlays`
        );
        return merged;
    }
}
