/**
 * Map keyed by value rather than by reference
 *
 * Keys are bucketed by `hasher` and compared with `equals` within a
 * bucket. Entries iterate in insertion order of their buckets.
 */
export class ObjectMap<K, V> implements Iterable<[K, V]> {
    private readonly hasher: (key: K) => number;
    private readonly equals: (left: K, right: K) => boolean;
    private readonly buckets = new Map<number, Array<[K, V]>>();
    private entryCount = 0;

    constructor(hasher: (key: K) => number, equals: (left: K, right: K) => boolean) {
        this.hasher = hasher;
        this.equals = equals;
    }

    get size(): number {
        return this.entryCount;
    }

    isEmpty(): boolean {
        return this.entryCount === 0;
    }

    get(key: K): V | undefined {
        const entry = this.find(key);
        return entry?.[1];
    }

    has(key: K): boolean {
        return this.find(key) !== undefined;
    }

    set(key: K, value: V): this {
        const hash = this.hasher(key);
        const bucket = this.buckets.get(hash);
        if (bucket === undefined) {
            this.buckets.set(hash, [[key, value]]);
            this.entryCount++;
            return this;
        }
        const entry = bucket.find(([existing]) => this.equals(existing, key));
        if (entry) {
            entry[1] = value;
        } else {
            bucket.push([key, value]);
            this.entryCount++;
        }
        return this;
    }

    delete(key: K): boolean {
        const hash = this.hasher(key);
        const bucket = this.buckets.get(hash);
        if (bucket === undefined) {
            return false;
        }
        const index = bucket.findIndex(([existing]) => this.equals(existing, key));
        if (index === -1) {
            return false;
        }
        bucket.splice(index, 1);
        if (bucket.length === 0) {
            this.buckets.delete(hash);
        }
        this.entryCount--;
        return true;
    }

    forEach(callback: (value: V, key: K) => void): void {
        for (const [key, value] of this) {
            callback(value, key);
        }
    }

    *[Symbol.iterator](): Iterator<[K, V]> {
        for (const bucket of this.buckets.values()) {
            for (const [key, value] of bucket) {
                yield [key, value];
            }
        }
    }

    private find(key: K): [K, V] | undefined {
        return this.buckets.get(this.hasher(key))?.find(([existing]) => this.equals(existing, key));
    }
}
