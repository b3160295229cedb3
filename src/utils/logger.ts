import { config, type LogLevelSetting } from '../config.js';

type LogLevel = LogLevelSetting;

const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
};

const levelColors: Record<LogLevel, string> = {
    debug: colors.dim,
    info: colors.green,
    warn: colors.yellow,
    error: colors.red,
};

const levelIcons: Record<LogLevel, string> = {
    debug: '🔍',
    info: '✅',
    warn: '⚠️',
    error: '❌',
};

const levelRank: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

class Logger {
    private context: string;
    private threshold: LogLevel;

    constructor(context: string = 'App', threshold: LogLevel = config.log.level) {
        this.context = context;
        this.threshold = threshold;
    }

    private log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (levelRank[level] < levelRank[this.threshold]) {
            return;
        }

        const timestamp = new Date().toISOString();
        const color = levelColors[level];
        const icon = levelIcons[level];
        const line = `${colors.dim}${timestamp}${colors.reset} ${icon} ${color}[${level.toUpperCase()}]${colors.reset} ${colors.cyan}[${this.context}]${colors.reset} ${message}`;

        if (level === 'error') {
            console.error(line, ...args);
        } else {
            console.log(line, ...args);
        }
    }

    debug(message: string, ...args: unknown[]): void {
        this.log('debug', message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        this.log('info', message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.log('warn', message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        this.log('error', message, ...args);
    }

    child(context: string): Logger {
        return new Logger(`${this.context}:${context}`, this.threshold);
    }
}

export const logger = new Logger('AMM');
export { Logger };
export type { LogLevel };
