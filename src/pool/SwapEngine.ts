/**
 * Swap Engine
 *
 * Formula: x * y = k (constant product)
 * Fee: 0.3%, kept in the pool's reserves
 *
 * Direct and signature-authorized swaps both end up in executeSwap; they
 * differ only in how the authorized account was established.
 */

import { logger } from '../utils/logger.js';
import type { TransferableAsset } from '../token/Token.js';
import type { PoolRegistry } from './PoolRegistry.js';
import type { UnitOfWork } from './UnitOfWork.js';
import { AmmError, AmmErrorCode } from './errors.js';
import { SafeMath, assertUint, getAmountOut } from './math.js';
import { transferWithinUnit } from './transfers.js';

const log = logger.child('Swap');

export interface SwapParams {
    amountIn: bigint;
    minAmountOut: bigint;
}

export interface SwapResult {
    amountIn: bigint;
    amountOut: bigint;
}

export class SwapEngine {
    constructor(
        private readonly registry: PoolRegistry,
        private readonly custodyAccount: string
    ) {}

    quote(reserveIn: bigint, reserveOut: bigint, amountIn: bigint): bigint {
        return getAmountOut(
            assertUint(reserveIn, 'reserveIn'),
            assertUint(reserveOut, 'reserveOut'),
            assertUint(amountIn, 'amountIn')
        );
    }

    executeSwap(
        assetIn: TransferableAsset,
        assetOut: TransferableAsset,
        params: SwapParams,
        authorizedAccount: string,
        uow: UnitOfWork
    ): SwapResult {
        const amountIn = assertUint(params.amountIn, 'amountIn');
        const minAmountOut = assertUint(params.minAmountOut, 'minAmountOut');

        const pool = this.registry.lookup(assetIn.id, assetOut.id);
        if (!pool) {
            throw new AmmError(AmmErrorCode.PoolNotFound, `Pool ${assetIn.id}/${assetOut.id} not found`);
        }
        if (assetIn.id === assetOut.id) {
            throw new AmmError(AmmErrorCode.IdenticalAssets, `Cannot swap ${assetIn.id} for itself`);
        }
        if (amountIn === 0n) {
            throw new AmmError(AmmErrorCode.ZeroAmount, 'amountIn must be non-zero');
        }

        const reserveIn = pool.reserveA;
        const reserveOut = pool.reserveB;
        const amountOut = this.quote(reserveIn, reserveOut, amountIn);

        if (amountOut < minAmountOut) {
            throw new AmmError(AmmErrorCode.Slippage, `Slippage exceeded. Min: ${minAmountOut}, got: ${amountOut}`);
        }
        if (!(amountIn < reserveIn && amountOut < reserveOut)) {
            throw new AmmError(AmmErrorCode.InsufficientLiquidity, 'Insufficient liquidity for this swap');
        }

        const newReserveIn = SafeMath.add(reserveIn, amountIn);
        const newReserveOut = SafeMath.sub(reserveOut, amountOut);

        // k may only grow
        if (newReserveIn * newReserveOut < reserveIn * reserveOut) {
            throw new Error(`INVARIANT VIOLATION: ${newReserveIn * newReserveOut} < ${reserveIn * reserveOut}`);
        }

        transferWithinUnit(assetIn, amountIn, authorizedAccount, this.custodyAccount, 'swap', uow);
        this.registry.update(assetIn.id, assetOut.id, {
            reserveA: newReserveIn,
            reserveB: newReserveOut,
            totalShares: pool.totalShares,
        }, uow);
        transferWithinUnit(assetOut, amountOut, this.custodyAccount, authorizedAccount, 'swap', uow);

        log.info(`💱 ${authorizedAccount}: ${amountIn} ${assetIn.id} → ${amountOut} ${assetOut.id}`);
        return { amountIn, amountOut };
    }
}
