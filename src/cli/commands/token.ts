/**
 * Token CLI Command
 * Create in-memory tokens, mint balances and inspect them.
 */

import { Command, InvalidArgumentError } from 'commander';
import { LedgerToken } from '../../token/LedgerToken.js';
import { box, rows, successBox, sym } from '../../utils/cli.js';
import { parseAmount } from '../parse.js';
import { withSession } from './shared.js';

function parseDecimals(value: string): number {
    const decimals = Number(value);
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
        throw new InvalidArgumentError('Decimals must be an integer between 0 and 36.');
    }
    return decimals;
}

export const tokenCommand = new Command('token')
    .description('Token ledger operations');

tokenCommand
    .command('create')
    .description('Register a new token')
    .argument('<id>', 'Token identifier')
    .option('--name <name>', 'Display name')
    .option('--symbol <symbol>', 'Ticker symbol')
    .option('--decimals <number>', 'Decimal places', parseDecimals, 6)
    .action((id: string, _options: unknown, command: Command) => {
        const options = command.opts<{ name?: string; symbol?: string; decimals: number }>();
        withSession(command, session => {
            const token = new LedgerToken(id, options);
            session.addToken(token);
            const meta = token.metadata();
            console.log(successBox(rows([
                ['Id', token.id],
                ['Name', meta.name],
                ['Symbol', meta.symbol],
                ['Decimals', String(meta.decimals)],
            ]), `${sym.success} Token Created`));
        });
    });

tokenCommand
    .command('mint')
    .description('Mint tokens to an account')
    .argument('<id>', 'Token identifier')
    .argument('<account>', 'Receiving account')
    .argument('<amount>', 'Amount in base units', parseAmount)
    .action((id: string, account: string, amount: bigint, _options: unknown, command: Command) => {
        withSession(command, session => {
            const token = session.token(id);
            token.mint(account, amount);
            console.log(successBox(rows([
                ['Token', id],
                ['Account', account],
                ['Minted', amount.toString()],
                ['Balance', token.balanceOf(account).toString()],
            ]), `${sym.success} Minted`));
        });
    });

tokenCommand
    .command('balance')
    .description('Show balances of an account')
    .argument('<account>', 'Account to inspect')
    .action((account: string, _options: unknown, command: Command) => {
        withSession(command, session => {
            const entries: [string, string][] = Array.from(session.tokens.values())
                .map(token => [token.id, token.balanceOf(account).toString()]);
            entries.push(['LP shares', session.exchange.getLPBalance(account).toString()]);
            console.log(box(rows(entries), `${sym.bullet} ${account}`));
        }, false);
    });
