/**
 * Mutations - the unit of local document change
 *
 * A mutation describes one write to one document:
 * - set: replace the document's contents
 * - patch: write or delete the fields named by a field mask
 * - delete: remove the document
 * - verify: assert a precondition without changing anything
 *
 * Besides these, there is a single invalid mutation. It stands for
 * "no change at all" and has no document key.
 */

import { freeze, produce } from 'immer';
import type { DocumentKey } from './document-key';
import type { LocalDocument } from './document';
import type { DocumentData, FieldValue } from './types';
import { canonicalJson, combineHashes, fail, hardAssert, hashString, valueEquals } from './helpers';

export type MutationType = 'set' | 'patch' | 'delete' | 'verify';

/**
 * Condition on the base document that must hold for a mutation to apply
 */
export type Precondition =
    | { readonly type: 'none' }
    | { readonly type: 'exists'; readonly exists: boolean };

export const NO_PRECONDITION: Precondition = { type: 'none' };

export function existsPrecondition(exists: boolean): Precondition {
    return { type: 'exists', exists };
}

interface MutationFields {
    readonly type: MutationType;
    readonly key: DocumentKey;
    readonly precondition: Precondition;
    /** Contents for set, field values for patch */
    readonly value: DocumentData | null;
    /** Sorted, de-duplicated dotted field paths of a patch */
    readonly fieldMask: readonly string[] | null;
}

const KIND_NAMES: Record<MutationType, string> = {
    set: 'SetMutation',
    patch: 'PatchMutation',
    delete: 'DeleteMutation',
    verify: 'VerifyMutation',
};

/**
 * Immutable description of a write to a single document
 */
export class Mutation {
    private static readonly INVALID = new Mutation(null);

    private readonly fields: MutationFields | null;

    private constructor(fields: MutationFields | null) {
        this.fields = fields;
    }

    /**
     * The mutation that changes nothing and belongs to no document
     */
    static invalid(): Mutation {
        return Mutation.INVALID;
    }

    static set(key: DocumentKey, value: DocumentData, precondition: Precondition = NO_PRECONDITION): Mutation {
        return new Mutation({
            type: 'set',
            key,
            precondition,
            value: freezeCopy(value),
            fieldMask: null,
        });
    }

    /**
     * Patch the fields named in `fieldMask`
     * Masked fields present in `value` are written, masked fields missing
     * from it are deleted. Only applies to existing documents unless a
     * different precondition is given.
     */
    static patch(
        key: DocumentKey,
        value: DocumentData,
        fieldMask: readonly string[],
        precondition: Precondition = existsPrecondition(true)
    ): Mutation {
        for (const path of fieldMask) {
            if (!isValidFieldPath(path)) {
                throw new Error(`Invalid field path in mask: "${path}"`);
            }
        }
        return new Mutation({
            type: 'patch',
            key,
            precondition,
            value: freezeCopy(value),
            fieldMask: Object.freeze(Array.from(new Set(fieldMask)).sort()),
        });
    }

    static delete(key: DocumentKey, precondition: Precondition = NO_PRECONDITION): Mutation {
        return new Mutation({ type: 'delete', key, precondition, value: null, fieldMask: null });
    }

    static verify(key: DocumentKey, precondition: Precondition = existsPrecondition(true)): Mutation {
        return new Mutation({ type: 'verify', key, precondition, value: null, fieldMask: null });
    }

    get isValid(): boolean {
        return this.fields !== null;
    }

    /**
     * Kind of write, null for the invalid mutation
     */
    get type(): MutationType | null {
        return this.fields?.type ?? null;
    }

    /**
     * Key of the mutated document
     * Must only be read from a valid mutation
     */
    get key(): DocumentKey {
        return this.valid().key;
    }

    get precondition(): Precondition {
        return this.fields?.precondition ?? NO_PRECONDITION;
    }

    get value(): DocumentData | null {
        return this.fields?.value ?? null;
    }

    get fieldMask(): readonly string[] | null {
        return this.fields?.fieldMask ?? null;
    }

    /**
     * Apply this mutation to the local view of its document
     * Returns the document unchanged when the precondition does not hold
     */
    applyToLocalView(document: LocalDocument): LocalDocument {
        const fields = this.fields;
        if (fields === null) {
            return document;
        }
        hardAssert(
            fields.key.equals(document.key),
            `Mutation for ${fields.key.path} applied to document ${document.key.path}`
        );
        if (!preconditionHolds(fields.precondition, document)) {
            return document;
        }

        switch (fields.type) {
            case 'set':
                return { key: document.key, data: fields.value, hasLocalMutations: true };

            case 'patch': {
                const value = fields.value ?? {};
                const mask = fields.fieldMask ?? [];
                const base: DocumentData = document.data ?? {};
                const data = produce(base, (draft: DocumentData) => {
                    for (const path of mask) {
                        const segments = path.split('.');
                        const newValue = getField(value, segments);
                        if (newValue === undefined) {
                            deleteField(draft, segments);
                        } else {
                            setField(draft, segments, newValue);
                        }
                    }
                });
                return { key: document.key, data, hasLocalMutations: true };
            }

            case 'delete':
                return { key: document.key, data: null, hasLocalMutations: true };

            case 'verify':
                return document;
        }
    }

    equals(other: Mutation): boolean {
        const a = this.fields;
        const b = other.fields;
        if (a === null || b === null) {
            return a === b;
        }
        return (
            a.type === b.type &&
            a.key.equals(b.key) &&
            describePrecondition(a.precondition) === describePrecondition(b.precondition) &&
            nullableEquals(a.value, b.value, valueEquals) &&
            nullableEquals(a.fieldMask, b.fieldMask, maskEquals)
        );
    }

    hash(): number {
        const fields = this.fields;
        if (fields === null) {
            return 0;
        }
        return combineHashes(
            hashString(fields.type),
            fields.key.hash(),
            hashString(describePrecondition(fields.precondition)),
            fields.value === null ? 0 : hashString(canonicalJson(fields.value)),
            fields.fieldMask === null ? 0 : hashString(fields.fieldMask.join(','))
        );
    }

    toString(): string {
        const fields = this.fields;
        if (fields === null) {
            return 'Mutation(invalid)';
        }
        const parts = [
            `key=${fields.key.path}`,
            `precondition=${describePrecondition(fields.precondition)}`,
        ];
        if (fields.fieldMask !== null) {
            parts.push(`mask=[${fields.fieldMask.join(', ')}]`);
        }
        if (fields.value !== null) {
            parts.push(`value=${canonicalJson(fields.value)}`);
        }
        return `${KIND_NAMES[fields.type]}(${parts.join(', ')})`;
    }

    private valid(): MutationFields {
        return this.fields ?? fail('Accessed the document key of an invalid mutation');
    }
}

function freezeCopy(value: DocumentData): DocumentData {
    assertFiniteNumbers(value);
    return freeze(structuredClone(value), true);
}

function assertFiniteNumbers(value: FieldValue): void {
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new Error(`Invalid field value: ${value}. Numbers must be finite.`);
        }
    } else if (Array.isArray(value)) {
        value.forEach(assertFiniteNumbers);
    } else if (isMap(value)) {
        Object.values(value).forEach(assertFiniteNumbers);
    }
}

function preconditionHolds(precondition: Precondition, document: LocalDocument): boolean {
    return precondition.type === 'none' || precondition.exists === (document.data !== null);
}

function describePrecondition(precondition: Precondition): string {
    return precondition.type === 'none' ? 'none' : `exists=${precondition.exists}`;
}

function nullableEquals<T>(a: T | null, b: T | null, equals: (x: T, y: T) => boolean): boolean {
    if (a === null || b === null) {
        return a === b;
    }
    return equals(a, b);
}

function maskEquals(a: readonly string[], b: readonly string[]): boolean {
    return a.length === b.length && a.every((path, i) => path === b[i]);
}

// ============================================================================
// Field Paths
// ============================================================================

// Segments that would reach Object.prototype instead of a field
const RESERVED_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Dotted path of non-empty segments, none of them reserved
 */
export function isValidFieldPath(path: string): boolean {
    return path
        .split('.')
        .every((segment) => segment.length > 0 && !RESERVED_SEGMENTS.has(segment));
}

function isMap(value: FieldValue | undefined): value is DocumentData {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getField(data: DocumentData, segments: readonly string[]): FieldValue | undefined {
    let current: FieldValue = data;
    for (const segment of segments) {
        if (!isMap(current) || !Object.hasOwn(current, segment)) {
            return undefined;
        }
        current = current[segment];
    }
    return current;
}

function setField(target: DocumentData, segments: readonly string[], value: FieldValue): void {
    let current = target;
    for (const segment of segments.slice(0, -1)) {
        const next = Object.hasOwn(current, segment) ? current[segment] : undefined;
        if (isMap(next)) {
            current = next;
        } else {
            const created: DocumentData = {};
            current[segment] = created;
            current = created;
        }
    }
    current[segments[segments.length - 1]] = value;
}

function deleteField(target: DocumentData, segments: readonly string[]): void {
    let current = target;
    for (const segment of segments.slice(0, -1)) {
        if (!Object.hasOwn(current, segment)) {
            return;
        }
        const next = current[segment];
        if (!isMap(next)) {
            return;
        }
        current = next;
    }
    const last = segments[segments.length - 1];
    if (Object.hasOwn(current, last)) {
        delete current[last];
    }
}
