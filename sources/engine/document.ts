import { freeze } from 'immer';
import type { DocumentKey } from './document-key';
import type { DocumentData } from './types';

/**
 * A document as seen locally
 *
 * `data` is null when the document does not exist (never stored, or
 * deleted). `hasLocalMutations` is set once a pending local change has
 * been applied on top of the stored version.
 */
export interface LocalDocument {
    readonly key: DocumentKey;
    readonly data: DocumentData | null;
    readonly hasLocalMutations: boolean;
}

export function missingDocument(key: DocumentKey): LocalDocument {
    return { key, data: null, hasLocalMutations: false };
}

/**
 * Document with a copy of the given data, frozen
 */
export function foundDocument(key: DocumentKey, data: DocumentData): LocalDocument {
    return { key, data: freeze(structuredClone(data), true), hasLocalMutations: false };
}
