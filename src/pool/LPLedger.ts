/**
 * LP share balances.
 *
 * One balance per account across ALL pools. Shares minted in one pool can be
 * presented for withdrawal from another; the pool-level checks in
 * LiquidityEngine are the only guard.
 */

import { MemoryStore, journaledSet, type KeyValueStore } from '../storage/KeyValueStore.js';
import type { UnitOfWork } from './UnitOfWork.js';
import { AmmError, AmmErrorCode } from './errors.js';
import { SafeMath } from './math.js';

export class LPLedger {
    constructor(private readonly store: KeyValueStore<bigint> = new MemoryStore<bigint>()) {}

    balanceOf(account: string): bigint {
        return this.store.get(account) ?? 0n;
    }

    credit(account: string, shares: bigint, uow: UnitOfWork): bigint {
        const balance = SafeMath.add(this.balanceOf(account), shares);
        journaledSet(this.store, account, balance, uow);
        return balance;
    }

    debit(account: string, shares: bigint, uow: UnitOfWork): bigint {
        const current = this.balanceOf(account);
        if (current < shares) {
            throw new AmmError(AmmErrorCode.InsufficientBalance, `LP balance ${current} below ${shares}`);
        }
        const balance = current - shares;
        journaledSet(this.store, account, balance, uow);
        return balance;
    }

    entries(): [string, bigint][] {
        return Array.from(this.store.entries());
    }

    load(balances: [string, bigint][]): void {
        this.store.clear();
        for (const [account, shares] of balances) {
            this.store.set(account, shares);
        }
    }
}
