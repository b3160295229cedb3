/**
 * CLI formatting helpers (chalk, boxen, figures, log-symbols).
 */

import chalk from 'chalk';
import boxen, { type Options as BoxenOptions } from 'boxen';
import figures from 'figures';
import logSymbols from 'log-symbols';

export const sym = {
    success: logSymbols.success,
    error: logSymbols.error,
    warning: logSymbols.warning,
    info: logSymbols.info,
    arrow: figures.arrowRight,
    pointer: figures.pointer,
    bullet: figures.bullet,
    pool: '💧',
    swap: '💱',
    key: '🔐',
};

export const c = {
    heading: chalk.bold.cyan,
    label: chalk.gray,
    value: chalk.white,
    highlight: chalk.bold.yellow,
    muted: chalk.dim,
    ok: chalk.green,
    err: chalk.red,
    warn: chalk.yellow,
};

const defaultBoxStyle: BoxenOptions = {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
};

/**
 * Render key/value rows with labels padded to the same width
 */
export function rows(entries: [string, string][]): string {
    const width = Math.max(0, ...entries.map(([key]) => key.length));
    return entries
        .map(([key, value]) => `${c.label((key + ':').padEnd(width + 1))} ${c.value(value)}`)
        .join('\n');
}

export function box(content: string, title?: string, options?: BoxenOptions): string {
    return boxen(content, {
        ...defaultBoxStyle,
        title,
        titleAlignment: 'center',
        ...options,
    });
}

export function successBox(content: string, title?: string): string {
    return box(content, title || `${sym.success} Success`, { borderColor: 'green' });
}

export function error(msg: string): void {
    console.error(`${sym.error} ${c.err(msg)}`);
}

export function info(msg: string): void {
    console.log(`${sym.info} ${msg}`);
}
