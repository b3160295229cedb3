/**
 * Signed swap authorization (meta-transactions).
 *
 * A signer authorizes a swap offline; any relayer may submit it. The relayer
 * never becomes the authorized account.
 *
 * Digest: sha256(u128be(nonce) || u128be(amountIn) || u128be(minAmountOut))
 */

import { sha256, encodeUint128 } from '../utils/crypto.js';
import { logger } from '../utils/logger.js';
import type { UnitOfWork } from '../pool/UnitOfWork.js';
import { AmmError, AmmErrorCode } from '../pool/errors.js';
import { assertUint } from '../pool/math.js';
import { signDigest, verifyDigest } from './ecdsa-utils.js';
import type { NonceRegistry } from './nonce-registry.js';

const log = logger.child('MetaTx');

export interface SwapAuthorization {
    nonce: bigint;
    amountIn: bigint;
    minAmountOut: bigint;
}

export interface SignedSwapRequest extends SwapAuthorization {
    /** 65-byte recoverable signature, hex */
    signature: string;
    /** 33-byte compressed public key of the signer, hex */
    publicKey: string;
    /** Account the swap acts for */
    account: string;
}

export function swapAuthorizationDigest({ nonce, amountIn, minAmountOut }: SwapAuthorization): Buffer {
    return sha256(Buffer.concat([
        encodeUint128(assertUint(nonce, 'nonce')),
        encodeUint128(assertUint(amountIn, 'amountIn')),
        encodeUint128(assertUint(minAmountOut, 'minAmountOut')),
    ]));
}

/**
 * Client-side helper: produce the signature a relayer submits
 */
export function signSwapAuthorization(privateKey: string, authorization: SwapAuthorization): string {
    return signDigest(privateKey, swapAuthorizationDigest(authorization));
}

export class MetaTxAuthorizer {
    constructor(private readonly nonces: NonceRegistry) {}

    /**
     * Establish `request.account` as the authorized principal.
     * Asset and amount validity are left to the swap itself.
     */
    authorize(request: SignedSwapRequest, uow: UnitOfWork): string {
        const { account, nonce, signature, publicKey } = request;

        this.nonces.record(account, assertUint(nonce, 'nonce'), uow);

        const digest = swapAuthorizationDigest(request);
        if (!verifyDigest(publicKey, digest, signature)) {
            log.warn(`Signature rejected for ${account}`);
            throw new AmmError(AmmErrorCode.InvalidSignature, 'Signature does not match public key');
        }

        log.debug(`Authorized ${account} with nonce ${nonce}`);
        return account;
    }
}
