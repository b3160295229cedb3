/**
 * Pool Module Exports
 */

export { Exchange } from './Exchange.js';
export type { ExchangeOptions, ExchangeState } from './Exchange.js';

export { PoolRegistry, poolKey } from './PoolRegistry.js';
export type { Pool, PoolEntry } from './PoolRegistry.js';
export { LPLedger } from './LPLedger.js';

export { LiquidityEngine } from './LiquidityEngine.js';
export type { AddLiquidityParams, RemoveLiquidityParams, LiquidityResult } from './LiquidityEngine.js';
export { SwapEngine } from './SwapEngine.js';
export type { SwapParams, SwapResult } from './SwapEngine.js';

export { UnitOfWork, runAtomically } from './UnitOfWork.js';
export { AmmError, AmmErrorCode, isAmmError } from './errors.js';
export { EventRecorder } from './events.js';
export type { EventSink, ExchangeEvent, LiquidityEvent, SwapEvent } from './events.js';
export { SafeMath, UINT128_MAX, getAmountOut, isqrt, quoteProportional } from './math.js';
