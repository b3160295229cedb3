/**
 * Exchange
 *
 * Public surface of the engine. Owns the stores, wires the engines and runs
 * every state-changing call as one atomic unit:
 * - success: all writes and transfers stay, an event is emitted
 * - failure: every write is restored and every transfer reversed, the error is rethrown
 *
 * Operations are synchronous and must not interleave. A token whose transfer
 * re-enters the exchange is rejected.
 */

import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import type { TransferableAsset } from '../token/Token.js';
import { MetaTxAuthorizer, type SignedSwapRequest } from '../security/meta-tx.js';
import { NonceRegistry } from '../security/nonce-registry.js';
import { LPLedger } from './LPLedger.js';
import {
    LiquidityEngine,
    type AddLiquidityParams,
    type RemoveLiquidityParams,
} from './LiquidityEngine.js';
import { PoolRegistry, type Pool, type PoolEntry } from './PoolRegistry.js';
import { SwapEngine } from './SwapEngine.js';
import { runAtomically, type UnitOfWork } from './UnitOfWork.js';
import { AmmError, AmmErrorCode } from './errors.js';
import { assertUint } from './math.js';
import type { EventSink, LiquidityEvent, SwapEvent } from './events.js';

const log = logger.child('Exchange');

function parseStoredUint(value: string, label: string): bigint {
    if (!/^\d+$/.test(value)) {
        throw new Error(`Invalid ${label} in state: ${JSON.stringify(value)}`);
    }
    return assertUint(BigInt(value), label);
}

export interface ExchangeOptions {
    custodyAccount?: string;
    registry?: PoolRegistry;
    ledger?: LPLedger;
    nonces?: NonceRegistry;
    events?: EventSink;
}

export interface ExchangeState {
    custodyAccount: string;
    pools: {
        assetA: string;
        assetB: string;
        reserveA: string;
        reserveB: string;
        totalShares: string;
    }[];
    lpBalances: Record<string, string>;
    nonces: Record<string, string>;
}

export class Exchange {
    readonly custodyAccount: string;
    private readonly registry: PoolRegistry;
    private readonly ledger: LPLedger;
    private readonly nonces: NonceRegistry;
    private readonly liquidity: LiquidityEngine;
    private readonly swaps: SwapEngine;
    private readonly authorizer: MetaTxAuthorizer;
    private readonly events?: EventSink;
    private busy = false;

    constructor(options: ExchangeOptions = {}) {
        this.custodyAccount = options.custodyAccount ?? config.exchange.custodyAccount;
        this.registry = options.registry ?? new PoolRegistry();
        this.ledger = options.ledger ?? new LPLedger();
        this.nonces = options.nonces ?? new NonceRegistry();
        this.events = options.events;

        this.liquidity = new LiquidityEngine(this.registry, this.ledger, this.custodyAccount);
        this.swaps = new SwapEngine(this.registry, this.custodyAccount);
        this.authorizer = new MetaTxAuthorizer(this.nonces);
    }

    // ========== OPERATIONS ==========

    addLiquidity(
        assetA: TransferableAsset,
        assetB: TransferableAsset,
        params: AddLiquidityParams,
        caller: string
    ): LiquidityEvent {
        return this.execute<LiquidityEvent>('addLiquidity', caller, uow => {
            const result = this.liquidity.addLiquidity(assetA, assetB, params, caller, uow);
            return {
                type: 'add-liquidity',
                account: caller,
                assetA: assetA.id,
                assetB: assetB.id,
                amountA: result.amountA,
                amountB: result.amountB,
                shares: result.shares,
            };
        });
    }

    removeLiquidity(
        assetA: TransferableAsset,
        assetB: TransferableAsset,
        params: RemoveLiquidityParams,
        caller: string
    ): LiquidityEvent {
        return this.execute<LiquidityEvent>('removeLiquidity', caller, uow => {
            const result = this.liquidity.removeLiquidity(assetA, assetB, params, caller, uow);
            return {
                type: 'remove-liquidity',
                account: caller,
                assetA: assetA.id,
                assetB: assetB.id,
                amountA: result.amountA,
                amountB: result.amountB,
                shares: result.shares,
            };
        });
    }

    swap(
        assetIn: TransferableAsset,
        assetOut: TransferableAsset,
        amountIn: bigint,
        minAmountOut: bigint,
        caller: string
    ): SwapEvent {
        return this.execute<SwapEvent>('swap', caller, uow => {
            const result = this.swaps.executeSwap(assetIn, assetOut, { amountIn, minAmountOut }, caller, uow);
            return {
                type: 'swap',
                account: caller,
                assetIn: assetIn.id,
                assetOut: assetOut.id,
                amountIn: result.amountIn,
                amountOut: result.amountOut,
            };
        });
    }

    /**
     * Swap on behalf of `request.account`, authorized by its signature.
     * `relayer` only submits; it is recorded in the event and nothing else.
     */
    swapWithSignature(
        assetIn: TransferableAsset,
        assetOut: TransferableAsset,
        request: SignedSwapRequest,
        relayer: string
    ): SwapEvent {
        return this.execute<SwapEvent>('swapWithSignature', request.account, uow => {
            const account = this.authorizer.authorize(request, uow);
            const result = this.swaps.executeSwap(
                assetIn,
                assetOut,
                { amountIn: request.amountIn, minAmountOut: request.minAmountOut },
                account,
                uow
            );
            return {
                type: 'swap',
                account,
                assetIn: assetIn.id,
                assetOut: assetOut.id,
                amountIn: result.amountIn,
                amountOut: result.amountOut,
                relayer,
                nonce: request.nonce,
            };
        });
    }

    // ========== QUERIES ==========

    getReserves(assetA: string, assetB: string): Pool | undefined {
        return this.registry.lookup(assetA, assetB);
    }

    getLPBalance(account: string): bigint {
        return this.ledger.balanceOf(account);
    }

    getAmountOut(assetIn: string, assetOut: string, amountIn: bigint): bigint {
        const pool = this.registry.lookup(assetIn, assetOut);
        if (!pool) {
            throw new AmmError(AmmErrorCode.PoolNotFound, `Pool ${assetIn}/${assetOut} not found`);
        }
        return this.swaps.quote(pool.reserveA, pool.reserveB, amountIn);
    }

    isNonceUsed(account: string, nonce: bigint): boolean {
        return this.nonces.isUsed(account, nonce);
    }

    listPools(): PoolEntry[] {
        return this.registry.list();
    }

    // ========== SERIALIZATION ==========

    getState(): ExchangeState {
        return {
            custodyAccount: this.custodyAccount,
            pools: this.registry.list().map(pool => ({
                assetA: pool.assetA,
                assetB: pool.assetB,
                reserveA: pool.reserveA.toString(),
                reserveB: pool.reserveB.toString(),
                totalShares: pool.totalShares.toString(),
            })),
            lpBalances: Object.fromEntries(
                this.ledger.entries().map(([account, shares]) => [account, shares.toString()])
            ),
            nonces: Object.fromEntries(
                this.nonces.entries().map(([account, nonce]) => [account, nonce.toString()])
            ),
        };
    }

    loadState(state: ExchangeState): void {
        if (state.custodyAccount !== this.custodyAccount) {
            throw new Error(`State belongs to custody account ${state.custodyAccount}, not ${this.custodyAccount}`);
        }

        // Parse everything before replacing anything
        const pools = state.pools.map(pool => ({
            assetA: pool.assetA,
            assetB: pool.assetB,
            reserveA: parseStoredUint(pool.reserveA, `reserveA of ${pool.assetA}/${pool.assetB}`),
            reserveB: parseStoredUint(pool.reserveB, `reserveB of ${pool.assetA}/${pool.assetB}`),
            totalShares: parseStoredUint(pool.totalShares, `totalShares of ${pool.assetA}/${pool.assetB}`),
        }));
        const balances = Object.entries(state.lpBalances)
            .map(([account, shares]): [string, bigint] => [account, parseStoredUint(shares, `LP balance of ${account}`)]);
        const nonces = Object.entries(state.nonces)
            .map(([account, nonce]): [string, bigint] => [account, parseStoredUint(nonce, `nonce of ${account}`)]);

        this.registry.load(pools);
        this.ledger.load(balances);
        this.nonces.load(nonces);

        log.info(`📂 Exchange state loaded: ${state.pools.length} pools`);
    }

    // ========== EXECUTION ==========

    private execute<E extends SwapEvent | LiquidityEvent>(
        operation: string,
        account: string,
        body: (uow: UnitOfWork) => E
    ): E {
        if (this.busy) {
            throw new AmmError(AmmErrorCode.NotAuthorized, `Re-entrant ${operation} rejected`);
        }
        if (account.length === 0) {
            throw new AmmError(AmmErrorCode.NotAuthorized, 'Account is required');
        }
        if (account === this.custodyAccount) {
            throw new AmmError(AmmErrorCode.NotAuthorized, 'Custody account cannot trade');
        }

        this.busy = true;
        let event: E;
        try {
            event = runAtomically(body);
        } catch (error) {
            log.warn(`${operation} by ${account} failed: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        } finally {
            this.busy = false;
        }

        this.events?.emit(event);
        return event;
    }
}
