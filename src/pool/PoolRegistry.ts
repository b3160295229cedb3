/**
 * Pool Registry
 *
 * Pools are keyed by the ORDERED asset pair. (X, Y) and (Y, X) are two
 * independent pools with their own reserves and prices.
 */

import { MemoryStore, journaledSet, type KeyValueStore } from '../storage/KeyValueStore.js';
import type { UnitOfWork } from './UnitOfWork.js';
import { AmmError, AmmErrorCode } from './errors.js';

export interface Pool {
    reserveA: bigint;
    reserveB: bigint;
    totalShares: bigint;
}

export interface PoolEntry extends Pool {
    assetA: string;
    assetB: string;
}

export function poolKey(assetA: string, assetB: string): string {
    return JSON.stringify([assetA, assetB]);
}

function parsePoolKey(key: string): [string, string] {
    const parsed: unknown = JSON.parse(key);
    if (!Array.isArray(parsed) || parsed.length !== 2 || typeof parsed[0] !== 'string' || typeof parsed[1] !== 'string') {
        throw new Error(`Malformed pool key: ${key}`);
    }
    return [parsed[0], parsed[1]];
}

export class PoolRegistry {
    constructor(private readonly store: KeyValueStore<Pool> = new MemoryStore<Pool>()) {}

    lookup(assetA: string, assetB: string): Pool | undefined {
        const pool = this.store.get(poolKey(assetA, assetB));
        return pool ? { ...pool } : undefined;
    }

    create(assetA: string, assetB: string, reserveA: bigint, reserveB: bigint, totalShares: bigint, uow: UnitOfWork): Pool {
        const key = poolKey(assetA, assetB);
        if (this.store.has(key)) {
            throw new AmmError(AmmErrorCode.PoolExists, `Pool ${assetA}/${assetB} already exists`);
        }

        const pool: Pool = { reserveA, reserveB, totalShares };
        journaledSet(this.store, key, pool, uow);
        return { ...pool };
    }

    update(assetA: string, assetB: string, pool: Pool, uow: UnitOfWork): void {
        const key = poolKey(assetA, assetB);
        if (!this.store.has(key)) {
            throw new AmmError(AmmErrorCode.PoolNotFound, `Pool ${assetA}/${assetB} not found`);
        }
        journaledSet(this.store, key, { ...pool }, uow);
    }

    list(): PoolEntry[] {
        return Array.from(this.store.entries()).map(([key, pool]) => {
            const [assetA, assetB] = parsePoolKey(key);
            return { assetA, assetB, ...pool };
        });
    }

    /** Replace all pools; used when loading a snapshot */
    load(entries: PoolEntry[]): void {
        this.store.clear();
        for (const { assetA, assetB, reserveA, reserveB, totalShares } of entries) {
            this.store.set(poolKey(assetA, assetB), { reserveA, reserveB, totalShares });
        }
    }

    get size(): number {
        return this.store.size;
    }
}
