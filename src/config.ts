import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevelSetting[] = ['debug', 'info', 'warn', 'error'];

// Read version from package.json dynamically
function getPackageVersion(): string {
    try {
        const __filename = fileURLToPath(import.meta.url);
        const __dirname = dirname(__filename);
        // src/config.ts and dist/src/config.js both sit below the root
        for (const relative of ['../package.json', '../../package.json']) {
            try {
                const pkg: unknown = JSON.parse(readFileSync(join(__dirname, relative), 'utf-8'));
                if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
                    return pkg.version;
                }
            } catch {
                continue;
            }
        }
        return '0.0.0';
    } catch {
        return '0.0.0';
    }
}

function parseLogLevel(value: string | undefined): LogLevelSetting {
    const normalized = (value ?? 'info').toLowerCase();
    const match = LOG_LEVELS.find(level => level === normalized);
    return match ?? 'info';
}

const dataDir = process.env.AMM_DATA_DIR || './data';

export const config = {
    version: getPackageVersion(),
    log: {
        level: parseLogLevel(process.env.LOG_LEVEL),
    },
    exchange: {
        // Principal that holds every pool's reserves
        custodyAccount: process.env.AMM_CUSTODY_ACCOUNT || 'amm-custody',
        feeBps: 30n,
        bpsDenominator: 10_000n,
    },
    storage: {
        dataDir,
        stateFile: process.env.AMM_STATE_FILE || 'exchange.json',
    },
};

export type { LogLevelSetting };
