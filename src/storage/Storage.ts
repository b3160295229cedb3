import fs from 'fs';
import path from 'path';
import { config } from '../config.js';
import type { ExchangeState } from '../pool/Exchange.js';
import type { LedgerTokenState } from '../token/LedgerToken.js';
import { logger } from '../utils/logger.js';

export interface PersistedState {
    version: string;
    savedAt: number;
    exchange: ExchangeState;
    tokens: LedgerTokenState[];
}

function isPersistedState(value: unknown): value is PersistedState {
    if (typeof value !== 'object' || value === null) return false;
    if (!('exchange' in value) || !('tokens' in value)) return false;
    const { exchange, tokens } = value;
    return typeof exchange === 'object' && exchange !== null && 'pools' in exchange && Array.isArray(tokens);
}

export class Storage {
    private dataDir: string;
    private statePath: string;

    constructor(dataDir: string = config.storage.dataDir, stateFile: string = config.storage.stateFile) {
        this.dataDir = dataDir;
        this.statePath = path.join(this.dataDir, stateFile);
    }

    private ensureDirectories(): void {
        if (!fs.existsSync(this.dataDir)) {
            fs.mkdirSync(this.dataDir, { recursive: true });
        }
    }

    get location(): string {
        return this.statePath;
    }

    save(exchange: ExchangeState, tokens: LedgerTokenState[]): void {
        this.ensureDirectories();
        const state: PersistedState = {
            version: config.version,
            savedAt: Date.now(),
            exchange,
            tokens,
        };
        const tmpPath = `${this.statePath}.tmp`;
        fs.writeFileSync(tmpPath, JSON.stringify(state, null, 2));
        fs.renameSync(tmpPath, this.statePath);
        logger.debug(`💾 Exchange state saved to ${this.statePath}`);
    }

    load(): PersistedState | null {
        if (!fs.existsSync(this.statePath)) {
            return null;
        }

        const content = fs.readFileSync(this.statePath, 'utf-8');
        const parsed: unknown = JSON.parse(content);
        if (!isPersistedState(parsed)) {
            throw new Error(`Unrecognized state file: ${this.statePath}`);
        }
        return parsed;
    }
}
