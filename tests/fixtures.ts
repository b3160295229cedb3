import { Exchange } from '../src/pool/Exchange.js';
import { EventRecorder } from '../src/pool/events.js';
import { LedgerToken } from '../src/token/LedgerToken.js';
import type { TransferResult } from '../src/token/Token.js';

export const CUSTODY = 'custody';

export interface Market {
    exchange: Exchange;
    events: EventRecorder;
    x: LedgerToken;
    y: LedgerToken;
}

export function createMarket(): Market {
    const events = new EventRecorder();
    const exchange = new Exchange({ custodyAccount: CUSTODY, events });
    const x = new LedgerToken('x', { symbol: 'X', decimals: 6 });
    const y = new LedgerToken('y', { symbol: 'Y', decimals: 6 });
    x.mint('alice', 1_000_000n);
    y.mint('alice', 1_000_000n);
    return { exchange, events, x, y };
}

/**
 * Pool (x, y) seeded by alice with 1000 x and 4000 y (500_002 shares).
 */
export function createSeededMarket(): Market {
    const market = createMarket();
    market.exchange.addLiquidity(market.x, market.y, { desiredA: 1000n, desiredB: 4000n, minA: 0n, minB: 0n }, 'alice');
    market.events.events.length = 0;
    return market;
}

/**
 * Token whose payouts from `blockedSender` always fail.
 */
export class BlockingToken extends LedgerToken {
    constructor(id: string, private readonly blockedSender: string) {
        super(id);
    }

    override transfer(amount: bigint, from: string, to: string, memo?: string): TransferResult {
        if (from === this.blockedSender) {
            return { success: false, error: 'payouts frozen' };
        }
        return super.transfer(amount, from, to, memo);
    }
}
