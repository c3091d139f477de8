/**
 * BoundedCache - Size-capped key/value cache
 *
 * 'fifo' evicts the oldest inserted entry; 'lru' evicts the least recently
 * read or written one. Both rely on Map preserving insertion order.
 */

export type EvictionPolicy = 'fifo' | 'lru';

export interface BoundedCacheOptions {
    capacity?: number;
    policy?: EvictionPolicy;
}

export const DEFAULT_CACHE_CAPACITY = 50;

export class BoundedCache<K, V> {
    private _entries: Map<K, V>;
    private _capacity: number;
    private _policy: EvictionPolicy;

    constructor({capacity = DEFAULT_CACHE_CAPACITY, policy = 'fifo'}: BoundedCacheOptions = {}) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error(`Cache capacity must be a positive integer, got ${capacity}`);
        }
        this._entries = new Map();
        this._capacity = capacity;
        this._policy = policy;
    }

    get(key: K): V | undefined {
        if (!this._entries.has(key)) {
            return undefined;
        }
        const value = this._entries.get(key);
        if (this._policy === 'lru' && value !== undefined) {
            // Move to the back of the eviction order
            this._entries.delete(key);
            this._entries.set(key, value);
        }
        return value;
    }

    has(key: K): boolean {
        return this._entries.has(key);
    }

    set(key: K, value: V): void {
        if (this._entries.has(key)) {
            if (this._policy === 'lru') {
                this._entries.delete(key);
            }
        } else if (this._entries.size >= this._capacity) {
            const oldest = this._entries.keys().next();
            if (!oldest.done) {
                this._entries.delete(oldest.value);
            }
        }
        this._entries.set(key, value);
    }

    clear(): void {
        this._entries.clear();
    }

    get size(): number {
        return this._entries.size;
    }

    get capacity(): number {
        return this._capacity;
    }
}
