/**
 * Exchange error taxonomy.
 * Codes 100-109 are stable identifiers shared with relayers and clients.
 */

export enum AmmErrorCode {
    NotAuthorized = 100,
    InvalidNonce = 101,
    Slippage = 102,
    InsufficientLiquidity = 103,
    IdenticalAssets = 104,
    ZeroAmount = 105,
    InsufficientBalance = 106,
    PoolExists = 107,
    PoolNotFound = 108,
    InvalidSignature = 109,
    ArithmeticOverflow = 110,
    TransferFailed = 111,
}

export class AmmError extends Error {
    readonly code: AmmErrorCode;

    constructor(code: AmmErrorCode, message?: string) {
        super(message ?? AmmErrorCode[code]);
        this.name = 'AmmError';
        this.code = code;
    }

    /** Taxonomy name, e.g. `Slippage` */
    get kind(): string {
        return AmmErrorCode[this.code];
    }
}

export function isAmmError(error: unknown, code?: AmmErrorCode): error is AmmError {
    return error instanceof AmmError && (code === undefined || error.code === code);
}
