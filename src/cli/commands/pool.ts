/**
 * Pool CLI Command
 * Liquidity, swaps and quotes against the persisted exchange state
 */

import { Command } from 'commander';
import { box, c, info, rows, successBox, sym } from '../../utils/cli.js';
import { parseAmount } from '../parse.js';
import { withSession } from './shared.js';

export const poolCommand = new Command('pool')
    .description('Liquidity pool operations');

// ========== INFO ==========

poolCommand
    .command('info')
    .description('List pools and their reserves')
    .action((_options: unknown, command: Command) => {
        withSession(command, session => {
            const pools = session.exchange.listPools();
            if (pools.length === 0) {
                info(`No pools yet. Use ${c.highlight('amm pool add')} to create one.`);
                return;
            }
            for (const pool of pools) {
                console.log(box(rows([
                    [`Reserve ${pool.assetA}`, pool.reserveA.toString()],
                    [`Reserve ${pool.assetB}`, pool.reserveB.toString()],
                    ['Total shares', pool.totalShares.toString()],
                ]), `${sym.pool} ${pool.assetA} ${sym.arrow} ${pool.assetB}`));
            }
        }, false);
    });

// ========== QUOTE ==========

poolCommand
    .command('quote')
    .description('Get swap quote without executing')
    .argument('<assetIn>', 'Asset to sell')
    .argument('<assetOut>', 'Asset to buy')
    .argument('<amountIn>', 'Amount to sell', parseAmount)
    .action((assetIn: string, assetOut: string, amountIn: bigint, _options: unknown, command: Command) => {
        withSession(command, session => {
            const amountOut = session.exchange.getAmountOut(assetIn, assetOut, amountIn);
            console.log(box(rows([
                ['Input', `${amountIn} ${assetIn}`],
                ['Output', `${amountOut} ${assetOut}`],
                ['Fee', '0.30%'],
            ]), `${sym.swap} Swap Quote`));
        }, false);
    });

// ========== ADD LIQUIDITY ==========

poolCommand
    .command('add')
    .description('Add liquidity (creates the pool on first deposit)')
    .argument('<assetA>', 'First asset of the ordered pair')
    .argument('<assetB>', 'Second asset of the ordered pair')
    .requiredOption('--account <account>', 'Provider account')
    .requiredOption('--amount-a <amount>', 'Desired amount of assetA', parseAmount)
    .requiredOption('--amount-b <amount>', 'Desired amount of assetB', parseAmount)
    .option('--min-a <amount>', 'Minimum accepted amount of assetA', parseAmount, 0n)
    .option('--min-b <amount>', 'Minimum accepted amount of assetB', parseAmount, 0n)
    .action((assetA: string, assetB: string, _options: unknown, command: Command) => {
        const options = command.opts<{ account: string; amountA: bigint; amountB: bigint; minA: bigint; minB: bigint }>();
        withSession(command, session => {
            const event = session.exchange.addLiquidity(
                session.token(assetA),
                session.token(assetB),
                { desiredA: options.amountA, desiredB: options.amountB, minA: options.minA, minB: options.minB },
                options.account
            );
            console.log(successBox(rows([
                [`${assetA} added`, event.amountA.toString()],
                [`${assetB} added`, event.amountB.toString()],
                ['Shares minted', event.shares.toString()],
            ]), `${sym.success} Liquidity Added`));
        });
    });

// ========== REMOVE LIQUIDITY ==========

poolCommand
    .command('remove')
    .description('Burn LP shares for the underlying assets')
    .argument('<assetA>', 'First asset of the ordered pair')
    .argument('<assetB>', 'Second asset of the ordered pair')
    .requiredOption('--account <account>', 'Provider account')
    .requiredOption('--shares <amount>', 'LP shares to burn', parseAmount)
    .option('--min-a <amount>', 'Minimum accepted amount of assetA', parseAmount, 0n)
    .option('--min-b <amount>', 'Minimum accepted amount of assetB', parseAmount, 0n)
    .action((assetA: string, assetB: string, _options: unknown, command: Command) => {
        const options = command.opts<{ account: string; shares: bigint; minA: bigint; minB: bigint }>();
        withSession(command, session => {
            const event = session.exchange.removeLiquidity(
                session.token(assetA),
                session.token(assetB),
                { shares: options.shares, minA: options.minA, minB: options.minB },
                options.account
            );
            console.log(successBox(rows([
                ['Shares burned', event.shares.toString()],
                [`${assetA} received`, event.amountA.toString()],
                [`${assetB} received`, event.amountB.toString()],
            ]), `${sym.success} Liquidity Removed`));
        });
    });

// ========== SWAP ==========

poolCommand
    .command('swap')
    .description('Swap through the (assetIn, assetOut) pool')
    .argument('<assetIn>', 'Asset to sell')
    .argument('<assetOut>', 'Asset to buy')
    .argument('<amountIn>', 'Amount to sell', parseAmount)
    .requiredOption('--account <account>', 'Trading account')
    .option('--min-out <amount>', 'Minimum accepted output', parseAmount, 0n)
    .action((assetIn: string, assetOut: string, amountIn: bigint, _options: unknown, command: Command) => {
        const options = command.opts<{ account: string; minOut: bigint }>();
        withSession(command, session => {
            const event = session.exchange.swap(
                session.token(assetIn),
                session.token(assetOut),
                amountIn,
                options.minOut,
                options.account
            );
            console.log(successBox(rows([
                ['Sold', `${event.amountIn} ${assetIn}`],
                ['Bought', `${event.amountOut} ${assetOut}`],
            ]), `${sym.swap} Swap Executed`));
        });
    });
