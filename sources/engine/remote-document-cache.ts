/**
 * Remote document cache - the last known server version of each document
 */

import { DocumentKey } from './document-key';
import { foundDocument, missingDocument, type LocalDocument } from './document';
import type { DocumentData } from './types';

/**
 * Read access to stored (server) documents
 * Documents that are not stored come back as missing documents
 */
export interface RemoteDocumentReader {
    getEntry(key: DocumentKey): LocalDocument;

    /**
     * One entry per distinct key, sorted by key
     */
    getEntries(keys: Iterable<DocumentKey>): LocalDocument[];

    /**
     * Stored documents directly inside `collectionPath`, sorted by key
     */
    getDocumentsInCollection(collectionPath: string): LocalDocument[];
}

/**
 * Remote document cache held in memory
 */
export class MemoryRemoteDocumentCache implements RemoteDocumentReader {
    private documents: Map<string, LocalDocument>;

    constructor() {
        this.documents = new Map();
    }

    /**
     * Store a document, replacing any previous version
     */
    add(key: DocumentKey, data: DocumentData): void {
        this.documents.set(key.path, foundDocument(key, data));
    }

    remove(key: DocumentKey): boolean {
        return this.documents.delete(key.path);
    }

    getEntry(key: DocumentKey): LocalDocument {
        return this.documents.get(key.path) ?? missingDocument(key);
    }

    getEntries(keys: Iterable<DocumentKey>): LocalDocument[] {
        const entries = new Map<string, LocalDocument>();
        for (const key of keys) {
            entries.set(key.path, this.getEntry(key));
        }
        return sortByKey(entries.values());
    }

    getDocumentsInCollection(collectionPath: string): LocalDocument[] {
        const matching: LocalDocument[] = [];
        for (const document of this.documents.values()) {
            if (document.key.collectionPath === collectionPath) {
                matching.push(document);
            }
        }
        return sortByKey(matching);
    }
}

function sortByKey(documents: Iterable<LocalDocument>): LocalDocument[] {
    return Array.from(documents).sort((a, b) => DocumentKey.comparator(a.key, b.key));
}
