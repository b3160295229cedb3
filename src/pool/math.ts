/**
 * Integer pool math.
 *
 * DETERMINISM:
 * - bigint only, no floating point
 * - every value is an unsigned 128-bit integer; anything outside rejects the operation
 * - division truncates
 */

import { config } from '../config.js';
import { AmmError, AmmErrorCode } from './errors.js';

export const UINT128_MAX = (1n << 128n) - 1n;

const FEE_BPS = config.exchange.feeBps;
const BPS_DENOMINATOR = config.exchange.bpsDenominator;

function overflow(message: string): AmmError {
    return new AmmError(AmmErrorCode.ArithmeticOverflow, message);
}

export function assertUint(value: bigint, label: string = 'value'): bigint {
    if (value < 0n || value > UINT128_MAX) {
        throw overflow(`${label} out of uint128 range: ${value}`);
    }
    return value;
}

export const SafeMath = {
    add(a: bigint, b: bigint): bigint {
        const result = a + b;
        if (result > UINT128_MAX) throw overflow('Overflow');
        return result;
    },
    sub(a: bigint, b: bigint): bigint {
        if (b > a) throw overflow('Underflow');
        return a - b;
    },
    mul(a: bigint, b: bigint): bigint {
        const result = a * b;
        if (result > UINT128_MAX) throw overflow('Overflow');
        return result;
    },
    div(a: bigint, b: bigint): bigint {
        if (b === 0n) throw overflow('Division by zero');
        return a / b;
    },
};

/**
 * Square root approximation used to mint the first deposit's shares.
 * Exactly two Newton steps from n/2; not iterated to convergence, so
 * isqrt(4_000_000) is 500_002 rather than 2_000.
 */
export function isqrt(n: bigint): bigint {
    assertUint(n, 'isqrt input');
    if (n < 2n) {
        return n;
    }

    const guess = n / 2n;
    const first = (guess + n / guess) / 2n;
    return (first + n / first) / 2n;
}

/**
 * Constant-product output for `amountIn` with the 0.3% fee kept in the pool.
 * Returns 0 when any input is 0.
 */
export function getAmountOut(reserveIn: bigint, reserveOut: bigint, amountIn: bigint): bigint {
    if (amountIn === 0n || reserveIn === 0n || reserveOut === 0n) {
        return 0n;
    }

    const amountInWithFee = SafeMath.mul(amountIn, BPS_DENOMINATOR - FEE_BPS);
    const numerator = SafeMath.mul(amountInWithFee, reserveOut);
    const denominator = SafeMath.add(SafeMath.mul(reserveIn, BPS_DENOMINATOR), amountInWithFee);
    return SafeMath.div(numerator, denominator);
}

/**
 * Amount of the other asset matching `amount` at the current reserve ratio.
 */
export function quoteProportional(amount: bigint, reserveFrom: bigint, reserveTo: bigint): bigint {
    return SafeMath.div(SafeMath.mul(amount, reserveTo), reserveFrom);
}
