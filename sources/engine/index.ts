/**
 * Overlay Engine - Export all public APIs
 */

// Types
export { BATCH_ID_UNKNOWN } from './types';
export type {
    BatchId,
    FieldValue,
    DocumentData,
    Logger,
} from './types';

// Helpers
export { createDocumentId, hardAssert, fail } from './helpers';

// Documents
export { DocumentKey } from './document-key';
export { missingDocument, foundDocument } from './document';
export type { LocalDocument } from './document';

// Mutations
export { Mutation, NO_PRECONDITION, existsPrecondition } from './mutation';
export type { MutationType, Precondition } from './mutation';

// Overlays
export { Overlay, overlayHash, overlayEquals } from './overlay';
export { ObjectMap } from './object-map';
export { MemoryOverlayIndex } from './overlay-index';
export type { OverlayIndex, MemoryOverlayIndexConfig } from './overlay-index';

// Local view
export { MemoryRemoteDocumentCache } from './remote-document-cache';
export type { RemoteDocumentReader } from './remote-document-cache';
export { LocalDocumentsView, applyOverlay } from './local-documents-view';
export type { LocalDocumentsViewConfig } from './local-documents-view';

// Persistence
export { encodeOverlay, decodeOverlay, OverlayDecodeError } from './overlay-codec';
export type { PersistedOverlay, PersistedMutation } from './overlay-codec';
