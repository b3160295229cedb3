/**
 * Exchange session for CLI commands: load state, run one command, save.
 */

import { Exchange } from '../pool/Exchange.js';
import { Storage } from '../storage/Storage.js';
import { LedgerToken } from '../token/LedgerToken.js';
import { config } from '../config.js';

export interface SessionOptions {
    dataDir?: string;
}

export class Session {
    readonly exchange: Exchange;
    readonly tokens: Map<string, LedgerToken> = new Map();
    private readonly storage: Storage;

    constructor(options: SessionOptions = {}) {
        this.storage = new Storage(options.dataDir ?? config.storage.dataDir);
        this.exchange = new Exchange();

        const persisted = this.storage.load();
        if (persisted) {
            this.exchange.loadState(persisted.exchange);
            for (const tokenState of persisted.tokens) {
                this.tokens.set(tokenState.id, LedgerToken.fromState(tokenState));
            }
        }
    }

    token(id: string): LedgerToken {
        const token = this.tokens.get(id);
        if (!token) {
            throw new Error(`Unknown token '${id}'. Create it with 'amm token create ${id}'.`);
        }
        return token;
    }

    addToken(token: LedgerToken): void {
        if (this.tokens.has(token.id)) {
            throw new Error(`Token '${token.id}' already exists`);
        }
        this.tokens.set(token.id, token);
    }

    save(): void {
        this.storage.save(
            this.exchange.getState(),
            Array.from(this.tokens.values()).map(token => token.getState())
        );
    }

    get location(): string {
        return this.storage.location;
    }
}
