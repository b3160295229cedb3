import type { UnitOfWork } from '../pool/UnitOfWork.js';

/**
 * Key-indexed state owned by exactly one registry.
 */
export interface KeyValueStore<V> {
    get(key: string): V | undefined;
    has(key: string): boolean;
    set(key: string, value: V): void;
    delete(key: string): boolean;
    entries(): IterableIterator<[string, V]>;
    clear(): void;
    readonly size: number;
}

export class MemoryStore<V> implements KeyValueStore<V> {
    private data: Map<string, V> = new Map();

    get(key: string): V | undefined {
        return this.data.get(key);
    }

    has(key: string): boolean {
        return this.data.has(key);
    }

    set(key: string, value: V): void {
        this.data.set(key, value);
    }

    delete(key: string): boolean {
        return this.data.delete(key);
    }

    entries(): IterableIterator<[string, V]> {
        return this.data.entries();
    }

    clear(): void {
        this.data.clear();
    }

    get size(): number {
        return this.data.size;
    }
}

/**
 * Write `value` under `key`, registering the restore of the previous entry.
 */
export function journaledSet<V>(store: KeyValueStore<V>, key: string, value: V, uow: UnitOfWork): void {
    const existed = store.has(key);
    const previous = store.get(key);

    uow.onRollback(() => {
        if (existed && previous !== undefined) {
            store.set(key, previous);
        } else {
            store.delete(key);
        }
    });

    store.set(key, value);
}
