/**
 * Tests for ObjectMap
 */

import { describe, it, expect } from 'vitest';
import { DocumentKey, ObjectMap } from '../index';

function keyMap<V>(): ObjectMap<DocumentKey, V> {
    return new ObjectMap<DocumentKey, V>(
        (key) => key.hash(),
        (left, right) => left.equals(right)
    );
}

describe('ObjectMap', () => {
    it('should start empty', () => {
        const map = keyMap<number>();

        expect(map.size).toBe(0);
        expect(map.isEmpty()).toBe(true);
        expect(map.get(DocumentKey.fromPath('rooms/a'))).toBeUndefined();
    });

    it('should find entries by an equal key', () => {
        const map = keyMap<number>();

        map.set(DocumentKey.fromPath('rooms/a'), 1);

        expect(map.get(DocumentKey.fromPath('rooms/a'))).toBe(1);
        expect(map.has(DocumentKey.fromPath('rooms/a'))).toBe(true);
        expect(map.has(DocumentKey.fromPath('rooms/b'))).toBe(false);
    });

    it('should replace the value of an existing key', () => {
        const map = keyMap<number>();

        map.set(DocumentKey.fromPath('rooms/a'), 1).set(DocumentKey.fromPath('rooms/a'), 2);

        expect(map.size).toBe(1);
        expect(map.get(DocumentKey.fromPath('rooms/a'))).toBe(2);
    });

    it('should keep colliding keys apart', () => {
        const map = new ObjectMap<string, number>(() => 42, (a, b) => a === b);

        map.set('x', 1);
        map.set('y', 2);

        expect(map.size).toBe(2);
        expect(map.get('x')).toBe(1);
        expect(map.get('y')).toBe(2);

        expect(map.delete('x')).toBe(true);
        expect(map.get('x')).toBeUndefined();
        expect(map.get('y')).toBe(2);
        expect(map.size).toBe(1);
    });

    it('should delete entries', () => {
        const map = keyMap<number>();
        map.set(DocumentKey.fromPath('rooms/a'), 1);

        expect(map.delete(DocumentKey.fromPath('rooms/b'))).toBe(false);
        expect(map.delete(DocumentKey.fromPath('rooms/a'))).toBe(true);
        expect(map.delete(DocumentKey.fromPath('rooms/a'))).toBe(false);
        expect(map.isEmpty()).toBe(true);
    });

    it('should iterate every entry', () => {
        const map = keyMap<number>();
        map.set(DocumentKey.fromPath('rooms/a'), 1);
        map.set(DocumentKey.fromPath('rooms/b'), 2);

        const seen: string[] = [];
        map.forEach((value, key) => seen.push(`${key.path}=${value}`));

        expect(seen.sort()).toEqual(['rooms/a=1', 'rooms/b=2']);
        expect(Array.from(map, ([key]) => key.path).sort()).toEqual(['rooms/a', 'rooms/b']);
    });
});
