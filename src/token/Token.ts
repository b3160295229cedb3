/**
 * Transfer capability every tradable asset exposes to the exchange.
 */

export interface TokenMetadata {
    name: string;
    symbol: string;
    decimals: number;
}

export interface TransferResult {
    success: boolean;
    error?: string;
}

export interface TransferableAsset {
    /** Identifier pools are keyed by */
    readonly id: string;
    metadata(): TokenMetadata;
    transfer(amount: bigint, from: string, to: string, memo?: string): TransferResult;
}
