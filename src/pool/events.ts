export interface SwapEvent {
    type: 'swap';
    account: string;
    assetIn: string;
    assetOut: string;
    amountIn: bigint;
    amountOut: bigint;
    /** Set when the swap was submitted on the account's behalf */
    relayer?: string;
    nonce?: bigint;
}

export interface LiquidityEvent {
    type: 'add-liquidity' | 'remove-liquidity';
    account: string;
    assetA: string;
    assetB: string;
    amountA: bigint;
    amountB: bigint;
    shares: bigint;
}

export type ExchangeEvent = SwapEvent | LiquidityEvent;

/**
 * Observer for committed operations. Called after commit, never for a
 * failed operation.
 */
export interface EventSink {
    emit(event: ExchangeEvent): void;
}

export class EventRecorder implements EventSink {
    readonly events: ExchangeEvent[] = [];

    emit(event: ExchangeEvent): void {
        this.events.push(event);
    }
}
