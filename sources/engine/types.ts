/**
 * Core types for the overlay engine
 */

// ============================================================================
// Batches
// ============================================================================

/**
 * Identifier of a pending write batch
 * Allocated by the mutation queue, higher values are more recent
 */
export type BatchId = number;

/**
 * Batch id of an overlay no batch has contributed to
 */
export const BATCH_ID_UNKNOWN: BatchId = -1;

// ============================================================================
// Document Values
// ============================================================================

/**
 * A value stored in a document field
 */
export type FieldValue =
    | null
    | boolean
    | number
    | string
    | FieldValue[]
    | DocumentData;

/**
 * Contents of a document: field names mapped to values
 */
export interface DocumentData {
    [field: string]: FieldValue;
}

// ============================================================================
// Logging
// ============================================================================

/**
 * The part of `console` the engine logs through
 */
export type Logger = Pick<Console, 'debug'>;
