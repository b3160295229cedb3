import { describe, it, expect } from 'vitest';
import { UnitOfWork, runAtomically } from '../../src/pool/UnitOfWork.js';
import { MemoryStore, journaledSet } from '../../src/storage/KeyValueStore.js';
import { PoolRegistry } from '../../src/pool/PoolRegistry.js';
import { LPLedger } from '../../src/pool/LPLedger.js';
import { AmmErrorCode } from '../../src/pool/errors.js';

describe('UnitOfWork', () => {
    it('undoes actions in reverse order', () => {
        const order: number[] = [];
        const uow = new UnitOfWork();
        uow.onRollback(() => order.push(1));
        uow.onRollback(() => order.push(2));
        uow.onRollback(() => order.push(3));
        uow.rollback();
        expect(order).toEqual([3, 2, 1]);
    });

    it('drops undo actions on commit', () => {
        const uow = new UnitOfWork();
        uow.onRollback(() => {
            throw new Error('should not run');
        });
        uow.commit();
        expect(uow.pendingActions).toBe(0);
        expect(() => uow.onRollback(() => undefined)).toThrow('Unit of work already closed');
    });

    it('reports undo actions that fail', () => {
        const uow = new UnitOfWork();
        uow.onRollback(() => {
            throw new Error('stuck');
        });
        expect(() => uow.rollback()).toThrow('Rollback failed');
    });

    it('runAtomically rethrows after restoring the store', () => {
        const store = new MemoryStore<number>();
        store.set('kept', 1);

        expect(() => runAtomically(uow => {
            journaledSet(store, 'kept', 2, uow);
            journaledSet(store, 'added', 3, uow);
            throw new Error('boom');
        })).toThrow('boom');

        expect(store.get('kept')).toBe(1);
        expect(store.has('added')).toBe(false);
    });
});

describe('PoolRegistry', () => {
    it('creates once per ordered pair', () => {
        const registry = new PoolRegistry();
        runAtomically(uow => registry.create('x', 'y', 1n, 2n, 3n, uow));

        expect(() => runAtomically(uow => registry.create('x', 'y', 1n, 2n, 3n, uow)))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.PoolExists }));
        expect(registry.lookup('y', 'x')).toBeUndefined();
        expect(registry.list()).toEqual([{ assetA: 'x', assetB: 'y', reserveA: 1n, reserveB: 2n, totalShares: 3n }]);
    });

    it('updates only existing pools', () => {
        const registry = new PoolRegistry();
        expect(() => runAtomically(uow => registry.update('x', 'y', { reserveA: 1n, reserveB: 1n, totalShares: 1n }, uow)))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.PoolNotFound }));
    });

    it('hands out copies', () => {
        const registry = new PoolRegistry();
        runAtomically(uow => registry.create('x', 'y', 1n, 2n, 3n, uow));
        const pool = registry.lookup('x', 'y');
        if (pool) pool.reserveA = 100n;
        expect(registry.lookup('x', 'y')?.reserveA).toBe(1n);
    });

    it('keeps asset ids containing separators apart', () => {
        const registry = new PoolRegistry();
        runAtomically(uow => {
            registry.create('a|b', 'c', 1n, 1n, 1n, uow);
            registry.create('a', 'b|c', 2n, 2n, 2n, uow);
        });
        expect(registry.size).toBe(2);
        expect(registry.lookup('a|b', 'c')?.reserveA).toBe(1n);
    });
});

describe('LPLedger', () => {
    it('credits and debits a single balance per account', () => {
        const ledger = new LPLedger();
        runAtomically(uow => {
            ledger.credit('alice', 10n, uow);
            ledger.credit('alice', 5n, uow);
            ledger.debit('alice', 3n, uow);
        });
        expect(ledger.balanceOf('alice')).toBe(12n);
        expect(() => runAtomically(uow => ledger.debit('alice', 13n, uow)))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.InsufficientBalance }));
        expect(ledger.balanceOf('bob')).toBe(0n);
    });
});
