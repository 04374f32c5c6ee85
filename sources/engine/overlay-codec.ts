/**
 * Persisted form of overlays
 *
 * Storage layers keep overlays as plain JSON. Decoding validates the
 * input, so a corrupted entry fails with the list of problems instead of
 * producing an overlay that breaks later.
 */

import { z } from 'zod';
import { DocumentKey } from './document-key';
import { Mutation, isValidFieldPath, type Precondition } from './mutation';
import { Overlay } from './overlay';
import type { DocumentData, FieldValue } from './types';

// ============================================================================
// Schemas
// ============================================================================

const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
    z.union([
        z.null(),
        z.boolean(),
        z.number().finite(),
        z.string(),
        z.array(fieldValueSchema),
        z.record(fieldValueSchema),
    ])
);

const documentDataSchema: z.ZodType<DocumentData> = z.record(fieldValueSchema);

const preconditionSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('none') }),
    z.object({ type: z.literal('exists'), exists: z.boolean() }),
]);

const pathSchema = z.string().min(1);

const fieldPathSchema = z.string().refine(isValidFieldPath, (path) => ({
    message: `Invalid field path in mask: "${path}"`,
}));

const persistedMutationSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('set'),
        path: pathSchema,
        precondition: preconditionSchema,
        value: documentDataSchema,
    }),
    z.object({
        type: z.literal('patch'),
        path: pathSchema,
        precondition: preconditionSchema,
        value: documentDataSchema,
        fieldMask: z.array(fieldPathSchema),
    }),
    z.object({
        type: z.literal('delete'),
        path: pathSchema,
        precondition: preconditionSchema,
    }),
    z.object({
        type: z.literal('verify'),
        path: pathSchema,
        precondition: preconditionSchema,
    }),
]);

const persistedOverlaySchema = z
    .object({
        largestBatchId: z.number().int().min(-1),
        mutation: persistedMutationSchema.nullable(),
    })
    .superRefine((overlay, context) => {
        if (overlay.mutation !== null && overlay.largestBatchId < 0) {
            context.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['largestBatchId'],
                message: `An overlay with a mutation needs a batch id of at least 0, got ${overlay.largestBatchId}`,
            });
        }
    });

export type PersistedMutation = z.infer<typeof persistedMutationSchema>;
export type PersistedOverlay = z.infer<typeof persistedOverlaySchema>;

// ============================================================================
// Errors
// ============================================================================

/**
 * Persisted data that does not describe an overlay
 */
export class OverlayDecodeError extends Error {
    readonly issues: z.ZodIssue[];

    constructor(message: string, issues: z.ZodIssue[] = []) {
        super(message);
        this.name = 'OverlayDecodeError';
        this.issues = issues;
    }
}

// ============================================================================
// Encoding
// ============================================================================

export function encodeOverlay(overlay: Overlay): PersistedOverlay {
    return {
        largestBatchId: overlay.largestBatchId,
        mutation: encodeMutation(overlay.mutation),
    };
}

function encodeMutation(mutation: Mutation): PersistedMutation | null {
    const type = mutation.type;
    if (type === null) {
        return null;
    }
    const path = mutation.key.path;
    const precondition = mutation.precondition;
    switch (type) {
        case 'set':
            return { type, path, precondition, value: mutation.value ?? {} };
        case 'patch':
            return {
                type,
                path,
                precondition,
                value: mutation.value ?? {},
                fieldMask: [...(mutation.fieldMask ?? [])],
            };
        case 'delete':
        case 'verify':
            return { type, path, precondition };
    }
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Rebuild an overlay from its persisted form
 * @throws OverlayDecodeError when the input is malformed
 */
export function decodeOverlay(input: unknown): Overlay {
    const parsed = persistedOverlaySchema.safeParse(input);
    if (!parsed.success) {
        throw new OverlayDecodeError(
            `Malformed persisted overlay: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
            parsed.error.issues
        );
    }
    const { largestBatchId, mutation } = parsed.data;
    return new Overlay(largestBatchId, mutation === null ? Mutation.invalid() : decodeMutation(mutation));
}

function decodeMutation(persisted: PersistedMutation): Mutation {
    const key = decodeKey(persisted.path);
    const precondition: Precondition = persisted.precondition;
    switch (persisted.type) {
        case 'set':
            return Mutation.set(key, persisted.value, precondition);
        case 'patch':
            return Mutation.patch(key, persisted.value, persisted.fieldMask, precondition);
        case 'delete':
            return Mutation.delete(key, precondition);
        case 'verify':
            return Mutation.verify(key, precondition);
    }
}

function decodeKey(path: string): DocumentKey {
    try {
        return DocumentKey.fromPath(path);
    } catch (error) {
        throw new OverlayDecodeError(
            `Malformed persisted overlay: ${error instanceof Error ? error.message : String(error)}`
        );
    }
}
