/**
 * In-memory fungible token.
 * Balances are plain bigints per account; no allowances.
 */

import { logger, type Logger } from '../utils/logger.js';
import type { TokenMetadata, TransferableAsset, TransferResult } from './Token.js';

export interface LedgerTokenState {
    id: string;
    metadata: TokenMetadata;
    totalSupply: string;
    balances: Record<string, string>;
}

export class LedgerToken implements TransferableAsset {
    readonly id: string;
    private readonly meta: TokenMetadata;
    private balances: Map<string, bigint> = new Map();
    private supply: bigint = 0n;
    private log: Logger;

    constructor(id: string, metadata: Partial<TokenMetadata> = {}) {
        this.id = id;
        this.meta = {
            name: metadata.name ?? id,
            symbol: metadata.symbol ?? id.toUpperCase(),
            decimals: metadata.decimals ?? 6,
        };
        this.log = logger.child(`Token:${this.meta.symbol}`);
    }

    metadata(): TokenMetadata {
        return { ...this.meta };
    }

    balanceOf(account: string): bigint {
        return this.balances.get(account) ?? 0n;
    }

    get totalSupply(): bigint {
        return this.supply;
    }

    mint(account: string, amount: bigint): void {
        if (amount <= 0n) {
            throw new Error('Mint amount must be positive');
        }
        this.balances.set(account, this.balanceOf(account) + amount);
        this.supply += amount;
        this.log.debug(`Minted ${amount} to ${account}`);
    }

    transfer(amount: bigint, from: string, to: string, memo?: string): TransferResult {
        if (amount <= 0n) {
            return { success: false, error: 'Amount must be positive' };
        }
        if (from === to) {
            return { success: false, error: 'Sender and recipient are the same' };
        }

        const balance = this.balanceOf(from);
        if (balance < amount) {
            return { success: false, error: `Insufficient ${this.meta.symbol} balance: ${balance} < ${amount}` };
        }

        this.balances.set(from, balance - amount);
        this.balances.set(to, this.balanceOf(to) + amount);
        this.log.debug(`Transfer ${amount} ${from} → ${to}${memo ? ` (${memo})` : ''}`);
        return { success: true };
    }

    // ========== SERIALIZATION ==========

    getState(): LedgerTokenState {
        return {
            id: this.id,
            metadata: this.metadata(),
            totalSupply: this.supply.toString(),
            balances: Object.fromEntries(
                Array.from(this.balances.entries()).map(([account, amount]) => [account, amount.toString()])
            ),
        };
    }

    static fromState(state: LedgerTokenState): LedgerToken {
        const token = new LedgerToken(state.id, state.metadata);
        token.supply = BigInt(state.totalSupply);
        token.balances = new Map(
            Object.entries(state.balances).map(([account, amount]) => [account, BigInt(amount)])
        );
        return token;
    }
}
