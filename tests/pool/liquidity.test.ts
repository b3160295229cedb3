import { describe, it, expect, beforeEach } from 'vitest';
import { LiquidityEngine } from '../../src/pool/LiquidityEngine.js';
import { LPLedger } from '../../src/pool/LPLedger.js';
import { PoolRegistry } from '../../src/pool/PoolRegistry.js';
import { runAtomically } from '../../src/pool/UnitOfWork.js';
import { AmmErrorCode } from '../../src/pool/errors.js';
import { LedgerToken } from '../../src/token/LedgerToken.js';
import { CUSTODY, createMarket, createSeededMarket } from '../fixtures.js';

describe('First deposit', () => {
    it('creates the pool and mints the two-step square root', () => {
        const { exchange, events, x, y } = createMarket();
        const event = exchange.addLiquidity(x, y, { desiredA: 1000n, desiredB: 4000n, minA: 0n, minB: 0n }, 'alice');

        expect(event).toEqual({
            type: 'add-liquidity',
            account: 'alice',
            assetA: 'x',
            assetB: 'y',
            amountA: 1000n,
            amountB: 4000n,
            shares: 500_002n,
        });
        expect(exchange.getReserves('x', 'y')).toEqual({ reserveA: 1000n, reserveB: 4000n, totalShares: 500_002n });
        expect(exchange.getLPBalance('alice')).toBe(500_002n);
        expect(x.balanceOf('alice')).toBe(999_000n);
        expect(y.balanceOf('alice')).toBe(996_000n);
        expect(x.balanceOf(CUSTODY)).toBe(1000n);
        expect(y.balanceOf(CUSTODY)).toBe(4000n);
        expect(events.events).toEqual([event]);
    });

    it('rejects identical assets', () => {
        const { exchange, x } = createMarket();
        expect(() => exchange.addLiquidity(x, x, { desiredA: 10n, desiredB: 10n, minA: 0n, minB: 0n }, 'alice'))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.IdenticalAssets }));
    });

    it('rejects zero amounts', () => {
        const { exchange, x, y } = createMarket();
        expect(() => exchange.addLiquidity(x, y, { desiredA: 0n, desiredB: 10n, minA: 0n, minB: 0n }, 'alice'))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.ZeroAmount }));
        expect(exchange.getReserves('x', 'y')).toBeUndefined();
    });

    it('treats (y, x) as a different pool from (x, y)', () => {
        const { exchange, x, y } = createSeededMarket();
        const event = exchange.addLiquidity(y, x, { desiredA: 500n, desiredB: 500n, minA: 0n, minB: 0n }, 'alice');

        expect(event.shares).toBe(31_252n);
        expect(exchange.getReserves('y', 'x')).toEqual({ reserveA: 500n, reserveB: 500n, totalShares: 31_252n });
        expect(exchange.getReserves('x', 'y')).toEqual({ reserveA: 1000n, reserveB: 4000n, totalShares: 500_002n });
        // one balance across both pools
        expect(exchange.getLPBalance('alice')).toBe(531_254n);
    });
});

describe('Proportional top-up', () => {
    let registry: PoolRegistry;
    let ledger: LPLedger;
    let engine: LiquidityEngine;
    let x: LedgerToken;
    let y: LedgerToken;

    beforeEach(() => {
        registry = new PoolRegistry();
        ledger = new LPLedger();
        engine = new LiquidityEngine(registry, ledger, CUSTODY);
        x = new LedgerToken('x');
        y = new LedgerToken('y');
        x.mint('bob', 1000n);
        y.mint('bob', 1000n);
        runAtomically(uow => registry.create('x', 'y', 1000n, 4000n, 2000n, uow));
    });

    it('is A-constrained when the matched B fits', () => {
        const result = runAtomically(uow =>
            engine.addLiquidity(x, y, { desiredA: 100n, desiredB: 1000n, minA: 0n, minB: 0n }, 'bob', uow)
        );

        expect(result).toEqual({ amountA: 100n, amountB: 400n, shares: 200n });
        expect(registry.lookup('x', 'y')).toEqual({ reserveA: 1100n, reserveB: 4400n, totalShares: 2200n });
        expect(ledger.balanceOf('bob')).toBe(200n);
        expect(x.balanceOf('bob')).toBe(900n);
        expect(y.balanceOf('bob')).toBe(600n);
    });

    it('is B-constrained when the matched B exceeds the desired B', () => {
        const result = runAtomically(uow =>
            engine.addLiquidity(x, y, { desiredA: 100n, desiredB: 200n, minA: 0n, minB: 0n }, 'bob', uow)
        );

        expect(result).toEqual({ amountA: 50n, amountB: 200n, shares: 100n });
        expect(registry.lookup('x', 'y')).toEqual({ reserveA: 1050n, reserveB: 4200n, totalShares: 2100n });
    });

    it('fails on slippage without touching state', () => {
        expect(() => runAtomically(uow =>
            engine.addLiquidity(x, y, { desiredA: 100n, desiredB: 1000n, minA: 0n, minB: 401n }, 'bob', uow)
        )).toThrow(expect.objectContaining({ code: AmmErrorCode.Slippage }));

        expect(registry.lookup('x', 'y')).toEqual({ reserveA: 1000n, reserveB: 4000n, totalShares: 2000n });
        expect(ledger.balanceOf('bob')).toBe(0n);
        expect(x.balanceOf('bob')).toBe(1000n);
        expect(y.balanceOf('bob')).toBe(1000n);
    });
});

describe('Remove liquidity', () => {
    it('returns a top-up within one unit per asset', () => {
        const { exchange, x, y } = createSeededMarket();
        x.mint('bob', 1000n);
        y.mint('bob', 1000n);

        const added = exchange.addLiquidity(x, y, { desiredA: 100n, desiredB: 400n, minA: 0n, minB: 0n }, 'bob');
        expect(added.shares).toBe(50_000n);

        const removed = exchange.removeLiquidity(x, y, { shares: added.shares, minA: 0n, minB: 0n }, 'bob');
        expect(removed.amountA).toBe(99n);
        expect(removed.amountB).toBe(399n);
        expect(added.amountA - removed.amountA).toBeLessThanOrEqual(1n);
        expect(added.amountB - removed.amountB).toBeLessThanOrEqual(1n);
        expect(x.balanceOf('bob')).toBe(999n);
        expect(y.balanceOf('bob')).toBe(999n);
        expect(exchange.getLPBalance('bob')).toBe(0n);
    });

    it('keeps a fully drained pool addressable', () => {
        const { exchange, x, y } = createSeededMarket();
        const removed = exchange.removeLiquidity(x, y, { shares: 500_002n, minA: 0n, minB: 0n }, 'alice');

        expect(removed).toMatchObject({ amountA: 1000n, amountB: 4000n });
        expect(exchange.getReserves('x', 'y')).toEqual({ reserveA: 0n, reserveB: 0n, totalShares: 0n });
        expect(x.balanceOf('alice')).toBe(1_000_000n);

        expect(() => exchange.addLiquidity(x, y, { desiredA: 10n, desiredB: 10n, minA: 0n, minB: 0n }, 'alice'))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.InsufficientLiquidity }));
    });

    it('checks pool, amount and balance in that order', () => {
        const { exchange, x, y } = createSeededMarket();
        expect(() => exchange.removeLiquidity(y, x, { shares: 0n, minA: 0n, minB: 0n }, 'bob'))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.PoolNotFound }));
        expect(() => exchange.removeLiquidity(x, y, { shares: 0n, minA: 0n, minB: 0n }, 'bob'))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.ZeroAmount }));
        expect(() => exchange.removeLiquidity(x, y, { shares: 1n, minA: 0n, minB: 0n }, 'bob'))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.InsufficientBalance }));
    });

    it('enforces withdrawal minimums', () => {
        const { exchange, x, y } = createSeededMarket();
        // 1000 shares -> 1 x and 7 y
        expect(() => exchange.removeLiquidity(x, y, { shares: 1000n, minA: 2n, minB: 0n }, 'alice'))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.Slippage }));
        expect(exchange.removeLiquidity(x, y, { shares: 1000n, minA: 1n, minB: 7n }, 'alice'))
            .toMatchObject({ amountA: 1n, amountB: 7n });
    });

    it('refuses a withdrawal with a side that rounds down to zero', () => {
        const { exchange, x, y } = createSeededMarket();
        // 200 shares -> 0 x and 1 y

        expect(() => exchange.removeLiquidity(x, y, { shares: 200n, minA: 0n, minB: 0n }, 'alice'))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.TransferFailed }));

        expect(exchange.getLPBalance('alice')).toBe(500_002n);
        expect(exchange.getReserves('x', 'y')).toEqual({ reserveA: 1000n, reserveB: 4000n, totalShares: 500_002n });
        expect(x.balanceOf('alice')).toBe(999_000n);
        expect(y.balanceOf('alice')).toBe(996_000n);
    });

    it('rejects shares from another pool beyond this pool\'s reserves', () => {
        const { exchange, x, y } = createSeededMarket();
        exchange.addLiquidity(y, x, { desiredA: 500n, desiredB: 500n, minA: 0n, minB: 0n }, 'alice');

        expect(() => exchange.removeLiquidity(y, x, { shares: 531_254n, minA: 0n, minB: 0n }, 'alice'))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.ArithmeticOverflow }));
        expect(exchange.getLPBalance('alice')).toBe(531_254n);
        expect(exchange.getReserves('y', 'x')).toEqual({ reserveA: 500n, reserveB: 500n, totalShares: 31_252n });
    });
});

describe('Atomicity', () => {
    it('rejects a first deposit whose product overflows uint128', () => {
        const { exchange, events, x, y } = createMarket();
        const huge = 1n << 64n;
        x.mint('alice', huge);
        y.mint('alice', huge);

        expect(() => exchange.addLiquidity(x, y, { desiredA: huge, desiredB: huge, minA: 0n, minB: 0n }, 'alice'))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.ArithmeticOverflow }));

        expect(exchange.getReserves('x', 'y')).toBeUndefined();
        expect(exchange.getLPBalance('alice')).toBe(0n);
        expect(x.balanceOf('alice')).toBe(1_000_000n + huge);
        expect(y.balanceOf('alice')).toBe(1_000_000n + huge);
        expect(x.balanceOf(CUSTODY)).toBe(0n);
        expect(events.events).toEqual([]);
    });

    it('reverses the first deposit transfer when the second fails', () => {
        const { exchange, events, x, y } = createSeededMarket();
        x.mint('bob', 1000n);

        expect(() => exchange.addLiquidity(x, y, { desiredA: 100n, desiredB: 400n, minA: 0n, minB: 0n }, 'bob'))
            .toThrow(expect.objectContaining({ code: AmmErrorCode.TransferFailed }));

        expect(x.balanceOf('bob')).toBe(1000n);
        expect(x.balanceOf(CUSTODY)).toBe(1000n);
        expect(exchange.getLPBalance('bob')).toBe(0n);
        expect(exchange.getReserves('x', 'y')).toEqual({ reserveA: 1000n, reserveB: 4000n, totalShares: 500_002n });
        expect(events.events).toEqual([]);
    });
});
