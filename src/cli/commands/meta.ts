/**
 * Meta-transaction CLI Command
 * Key generation and signing happen offline; `relay` submits a signed swap.
 */

import { Command } from 'commander';
import { generateKeyPair, publicKeyFromPrivate, PUBLIC_KEY_BYTES, SIGNATURE_BYTES } from '../../security/ecdsa-utils.js';
import { signSwapAuthorization, swapAuthorizationDigest } from '../../security/meta-tx.js';
import { box, c, rows, successBox, sym } from '../../utils/cli.js';
import { parseAmount, parseHex } from '../parse.js';
import { withSession } from './shared.js';

export const metaCommand = new Command('meta')
    .description('Signed swap authorizations');

metaCommand
    .command('keygen')
    .description('Generate a secp256k1 key pair')
    .action(() => {
        const { privateKey, publicKey } = generateKeyPair();
        console.log(box(rows([
            ['Private key', privateKey],
            ['Public key', publicKey],
        ]), `${sym.key} Key Pair`));
        console.log(c.warn('Store the private key somewhere safe. It is not saved.'));
    });

metaCommand
    .command('sign')
    .description('Sign a swap authorization for a relayer to submit')
    .requiredOption('--private-key <hex>', 'Signer private key', parseHex(32))
    .requiredOption('--nonce <n>', 'Authorization nonce', parseAmount)
    .requiredOption('--amount-in <amount>', 'Amount to sell', parseAmount)
    .requiredOption('--min-out <amount>', 'Minimum accepted output', parseAmount)
    .action((_options: unknown, command: Command) => {
        const options = command.opts<{ privateKey: string; nonce: bigint; amountIn: bigint; minOut: bigint }>();
        const authorization = { nonce: options.nonce, amountIn: options.amountIn, minAmountOut: options.minOut };
        console.log(box(rows([
            ['Digest', swapAuthorizationDigest(authorization).toString('hex')],
            ['Signature', signSwapAuthorization(options.privateKey, authorization)],
            ['Public key', publicKeyFromPrivate(options.privateKey)],
        ]), `${sym.key} Swap Authorization`));
    });

metaCommand
    .command('relay')
    .description('Submit a signed swap on behalf of an account')
    .argument('<assetIn>', 'Asset to sell')
    .argument('<assetOut>', 'Asset to buy')
    .requiredOption('--account <account>', 'Account the swap acts for')
    .requiredOption('--relayer <account>', 'Submitting relayer')
    .requiredOption('--nonce <n>', 'Authorization nonce', parseAmount)
    .requiredOption('--amount-in <amount>', 'Amount to sell', parseAmount)
    .requiredOption('--min-out <amount>', 'Minimum accepted output', parseAmount)
    .requiredOption('--signature <hex>', 'Recoverable signature', parseHex(SIGNATURE_BYTES))
    .requiredOption('--public-key <hex>', 'Signer public key', parseHex(PUBLIC_KEY_BYTES))
    .action((assetIn: string, assetOut: string, _options: unknown, command: Command) => {
        const options = command.opts<{
            account: string;
            relayer: string;
            nonce: bigint;
            amountIn: bigint;
            minOut: bigint;
            signature: string;
            publicKey: string;
        }>();
        withSession(command, session => {
            const event = session.exchange.swapWithSignature(
                session.token(assetIn),
                session.token(assetOut),
                {
                    account: options.account,
                    nonce: options.nonce,
                    amountIn: options.amountIn,
                    minAmountOut: options.minOut,
                    signature: options.signature,
                    publicKey: options.publicKey,
                },
                options.relayer
            );
            console.log(successBox(rows([
                ['Account', event.account],
                ['Relayer', options.relayer],
                ['Sold', `${event.amountIn} ${assetIn}`],
                ['Bought', `${event.amountOut} ${assetOut}`],
            ]), `${sym.swap} Relayed Swap Executed`));
        });
    });
