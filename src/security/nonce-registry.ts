/**
 * Nonce Registry
 * Replay protection for signed swap authorizations.
 *
 * Each account holds at most ONE nonce record, written on its first signed
 * swap and never cleared. A present record blocks every later signed swap
 * from that account, whatever nonce it carries.
 */

import { MemoryStore, journaledSet, type KeyValueStore } from '../storage/KeyValueStore.js';
import type { UnitOfWork } from '../pool/UnitOfWork.js';
import { AmmError, AmmErrorCode } from '../pool/errors.js';
import { logger } from '../utils/logger.js';

export class NonceRegistry {
    private log = logger.child('Nonces');

    constructor(private readonly store: KeyValueStore<bigint> = new MemoryStore<bigint>()) {}

    hasRecord(account: string): boolean {
        return this.store.has(account);
    }

    lastNonce(account: string): bigint | undefined {
        return this.store.get(account);
    }

    /**
     * True only when the stored nonce equals `nonce`
     */
    isUsed(account: string, nonce: bigint): boolean {
        return this.store.get(account) === nonce;
    }

    record(account: string, nonce: bigint, uow: UnitOfWork): void {
        const existing = this.store.get(account);
        if (existing !== undefined) {
            this.log.warn(`Nonce record already present for ${account} (last: ${existing})`);
            throw new AmmError(AmmErrorCode.InvalidNonce, `Account ${account} has already used its signed swap`);
        }
        journaledSet(this.store, account, nonce, uow);
    }

    entries(): [string, bigint][] {
        return Array.from(this.store.entries());
    }

    load(records: [string, bigint][]): void {
        this.store.clear();
        for (const [account, nonce] of records) {
            this.store.set(account, nonce);
        }
        this.log.info(`Loaded nonces for ${records.length} accounts`);
    }
}
