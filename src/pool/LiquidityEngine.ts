/**
 * Liquidity Engine
 *
 * First deposit into an ordered pair creates the pool and mints
 * isqrt(amountA * amountB) shares. Later deposits are matched to the
 * current reserve ratio on whichever side constrains them.
 *
 * Callers run each method inside a UnitOfWork; nothing here commits.
 */

import { logger } from '../utils/logger.js';
import type { TransferableAsset } from '../token/Token.js';
import type { LPLedger } from './LPLedger.js';
import type { Pool, PoolRegistry } from './PoolRegistry.js';
import type { UnitOfWork } from './UnitOfWork.js';
import { AmmError, AmmErrorCode } from './errors.js';
import { SafeMath, assertUint, isqrt, quoteProportional } from './math.js';
import { transferWithinUnit } from './transfers.js';

const log = logger.child('Liquidity');

export interface AddLiquidityParams {
    desiredA: bigint;
    desiredB: bigint;
    minA: bigint;
    minB: bigint;
}

export interface RemoveLiquidityParams {
    shares: bigint;
    minA: bigint;
    minB: bigint;
}

export interface LiquidityResult {
    amountA: bigint;
    amountB: bigint;
    shares: bigint;
}

export class LiquidityEngine {
    constructor(
        private readonly registry: PoolRegistry,
        private readonly ledger: LPLedger,
        private readonly custodyAccount: string
    ) {}

    addLiquidity(
        assetA: TransferableAsset,
        assetB: TransferableAsset,
        params: AddLiquidityParams,
        caller: string,
        uow: UnitOfWork
    ): LiquidityResult {
        const desiredA = assertUint(params.desiredA, 'desiredA');
        const desiredB = assertUint(params.desiredB, 'desiredB');
        const minA = assertUint(params.minA, 'minA');
        const minB = assertUint(params.minB, 'minB');

        if (assetA.id === assetB.id) {
            throw new AmmError(AmmErrorCode.IdenticalAssets, `Cannot pair ${assetA.id} with itself`);
        }
        if (desiredA === 0n || desiredB === 0n) {
            throw new AmmError(AmmErrorCode.ZeroAmount, 'Desired amounts must be non-zero');
        }

        const pool = this.registry.lookup(assetA.id, assetB.id);
        const result = pool
            ? this.topUp(assetA.id, assetB.id, pool, desiredA, desiredB, minA, minB, uow)
            : this.createPool(assetA.id, assetB.id, desiredA, desiredB, uow);

        this.ledger.credit(caller, result.shares, uow);
        this.collect(assetA, result.amountA, caller, 'add-liquidity', uow);
        this.collect(assetB, result.amountB, caller, 'add-liquidity', uow);

        log.info(`➕ ${caller}: ${result.amountA} ${assetA.id} + ${result.amountB} ${assetB.id} = ${result.shares} LP`);
        return result;
    }

    private createPool(
        assetA: string,
        assetB: string,
        desiredA: bigint,
        desiredB: bigint,
        uow: UnitOfWork
    ): LiquidityResult {
        const shares = isqrt(SafeMath.mul(desiredA, desiredB));
        if (shares === 0n) {
            throw new AmmError(AmmErrorCode.InsufficientLiquidity, 'Initial deposit mints no shares');
        }

        this.registry.create(assetA, assetB, desiredA, desiredB, shares, uow);
        log.info(`🏊 Pool ${assetA}/${assetB} created`);
        return { amountA: desiredA, amountB: desiredB, shares };
    }

    private topUp(
        assetA: string,
        assetB: string,
        pool: Pool,
        desiredA: bigint,
        desiredB: bigint,
        minA: bigint,
        minB: bigint,
        uow: UnitOfWork
    ): LiquidityResult {
        if (pool.reserveA === 0n || pool.reserveB === 0n) {
            throw new AmmError(AmmErrorCode.InsufficientLiquidity, `Pool ${assetA}/${assetB} has an empty reserve`);
        }

        let amountA: bigint;
        let amountB: bigint;
        let shares: bigint;

        const optimalB = quoteProportional(desiredA, pool.reserveA, pool.reserveB);
        if (optimalB <= desiredB) {
            amountA = desiredA;
            amountB = optimalB;
            shares = SafeMath.div(SafeMath.mul(amountA, pool.totalShares), pool.reserveA);
        } else {
            amountA = quoteProportional(desiredB, pool.reserveB, pool.reserveA);
            amountB = desiredB;
            shares = SafeMath.div(SafeMath.mul(amountB, pool.totalShares), pool.reserveB);
        }

        if (amountA < minA || amountB < minB) {
            throw new AmmError(
                AmmErrorCode.Slippage,
                `Deposit ${amountA}/${amountB} below minimum ${minA}/${minB}`
            );
        }

        this.registry.update(assetA, assetB, {
            reserveA: SafeMath.add(pool.reserveA, amountA),
            reserveB: SafeMath.add(pool.reserveB, amountB),
            totalShares: SafeMath.add(pool.totalShares, shares),
        }, uow);

        return { amountA, amountB, shares };
    }

    removeLiquidity(
        assetA: TransferableAsset,
        assetB: TransferableAsset,
        params: RemoveLiquidityParams,
        caller: string,
        uow: UnitOfWork
    ): LiquidityResult {
        const shares = assertUint(params.shares, 'shares');
        const minA = assertUint(params.minA, 'minA');
        const minB = assertUint(params.minB, 'minB');

        const pool = this.registry.lookup(assetA.id, assetB.id);
        if (!pool) {
            throw new AmmError(AmmErrorCode.PoolNotFound, `Pool ${assetA.id}/${assetB.id} not found`);
        }
        if (shares === 0n) {
            throw new AmmError(AmmErrorCode.ZeroAmount, 'Shares must be non-zero');
        }

        const balance = this.ledger.balanceOf(caller);
        if (balance < shares) {
            throw new AmmError(AmmErrorCode.InsufficientBalance, `LP balance ${balance} below ${shares}`);
        }
        if (pool.totalShares === 0n) {
            throw new AmmError(AmmErrorCode.InsufficientLiquidity, `Pool ${assetA.id}/${assetB.id} has no shares outstanding`);
        }

        const amountA = SafeMath.div(SafeMath.mul(shares, pool.reserveA), pool.totalShares);
        const amountB = SafeMath.div(SafeMath.mul(shares, pool.reserveB), pool.totalShares);

        if (amountA < minA || amountB < minB) {
            throw new AmmError(
                AmmErrorCode.Slippage,
                `Withdrawal ${amountA}/${amountB} below minimum ${minA}/${minB}`
            );
        }

        this.ledger.debit(caller, shares, uow);
        this.registry.update(assetA.id, assetB.id, {
            reserveA: SafeMath.sub(pool.reserveA, amountA),
            reserveB: SafeMath.sub(pool.reserveB, amountB),
            totalShares: SafeMath.sub(pool.totalShares, shares),
        }, uow);

        this.pay(assetA, amountA, caller, 'remove-liquidity', uow);
        this.pay(assetB, amountB, caller, 'remove-liquidity', uow);

        log.info(`➖ ${caller}: ${shares} LP → ${amountA} ${assetA.id} + ${amountB} ${assetB.id}`);
        return { amountA, amountB, shares };
    }

    private collect(asset: TransferableAsset, amount: bigint, from: string, memo: string, uow: UnitOfWork): void {
        transferWithinUnit(asset, amount, from, this.custodyAccount, memo, uow);
    }

    private pay(asset: TransferableAsset, amount: bigint, to: string, memo: string, uow: UnitOfWork): void {
        transferWithinUnit(asset, amount, this.custodyAccount, to, memo, uow);
    }
}
