/**
 * Document identity
 */

import { createDocumentId, hashString } from './helpers';

/**
 * Path of a single document: alternating collection and document IDs,
 * e.g. `rooms/abc/messages/xyz`
 *
 * Keys are compared segment by segment, so every document of a
 * collection sorts together, and a key sorts before any key it prefixes.
 * Segments are ordered by Unicode code point.
 */
export class DocumentKey {
    readonly segments: readonly string[];
    readonly path: string;

    private constructor(segments: readonly string[]) {
        this.segments = Object.freeze([...segments]);
        this.path = segments.join('/');
    }

    /**
     * Parse a slash-separated document path
     */
    static fromPath(path: string): DocumentKey {
        return DocumentKey.fromSegments(path.split('/'));
    }

    static fromSegments(segments: readonly string[]): DocumentKey {
        if (
            segments.length === 0 ||
            segments.length % 2 !== 0 ||
            segments.some((segment) => segment.length === 0)
        ) {
            throw new Error(
                `Invalid document path: "${segments.join('/')}". ` +
                `Document paths need an even number of non-empty segments.`
            );
        }
        return new DocumentKey(segments);
    }

    /**
     * Create a key for a new document with a generated ID
     */
    static autoId(collectionPath: string): DocumentKey {
        return DocumentKey.fromPath(`${collectionPath}/${createDocumentId()}`);
    }

    static comparator(left: DocumentKey, right: DocumentKey): number {
        const length = Math.min(left.segments.length, right.segments.length);
        for (let i = 0; i < length; i++) {
            const order = compareByCodePoint(left.segments[i], right.segments[i]);
            if (order !== 0) return order;
        }
        return left.segments.length - right.segments.length;
    }

    /**
     * Last segment: the document ID within its collection
     */
    get documentId(): string {
        return this.segments[this.segments.length - 1];
    }

    /**
     * Path of the collection that directly contains the document
     */
    get collectionPath(): string {
        return this.segments.slice(0, -1).join('/');
    }

    /**
     * ID of the containing collection, shared by every collection
     * with the same name at any depth
     */
    get collectionGroup(): string {
        return this.segments[this.segments.length - 2];
    }

    equals(other: DocumentKey): boolean {
        return DocumentKey.comparator(this, other) === 0;
    }

    hash(): number {
        return hashString(this.path);
    }

    toString(): string {
        return this.path;
    }
}

function compareByCodePoint(left: string, right: string): number {
    const a = Array.from(left);
    const b = Array.from(right);
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
        const diff = (a[i].codePointAt(0) ?? 0) - (b[i].codePointAt(0) ?? 0);
        if (diff !== 0) return diff < 0 ? -1 : 1;
    }
    return a.length - b.length;
}
