/**
 * ECDSA (secp256k1) utilities for signed swap authorizations.
 *
 * Signatures travel as 65 bytes of hex: r (32) || s (32) || recovery id (1).
 * Public keys are 33-byte compressed points.
 *
 * In ECDSA, both (r, s) and (r, n-s) are valid signatures for the same
 * message. Signing always produces the low-S form; recovery accepts either.
 */

import elliptic from 'elliptic';
import type { curve } from 'elliptic';
import BN from 'bn.js';
import { isHex } from '../utils/crypto.js';

const ec = new elliptic.ec('secp256k1');

// secp256k1 curve order
const CURVE_ORDER: BN = ec.curve.n;
const HALF_CURVE_ORDER: BN = CURVE_ORDER.shrn(1); // n/2

export const SIGNATURE_BYTES = 65;
export const PUBLIC_KEY_BYTES = 33;
export const DIGEST_BYTES = 32;

export interface KeyPairHex {
    privateKey: string;
    publicKey: string;
}

interface ParsedSignature {
    r: BN;
    s: BN;
    recovery: number;
}

/**
 * Check if s-value is in low-S form (s <= n/2)
 */
export function isLowS(s: BN): boolean {
    return s.cmp(HALF_CURVE_ORDER) <= 0;
}

export function generateKeyPair(): KeyPairHex {
    const keyPair = ec.genKeyPair();
    return {
        privateKey: keyPair.getPrivate('hex').padStart(64, '0'),
        publicKey: keyPair.getPublic(true, 'hex'),
    };
}

export function publicKeyFromPrivate(privateKey: string): string {
    return ec.keyFromPrivate(privateKey, 'hex').getPublic(true, 'hex');
}

/**
 * Sign a 32-byte digest, producing a 65-byte recoverable signature in hex.
 */
export function signDigest(privateKey: string, digest: Uint8Array): string {
    if (digest.length !== DIGEST_BYTES) {
        throw new Error(`Digest must be ${DIGEST_BYTES} bytes`);
    }

    const keyPair = ec.keyFromPrivate(privateKey, 'hex');
    // 'canonical' makes elliptic return the low-S form
    const signature = keyPair.sign(Buffer.from(digest), { canonical: true });
    if (signature.recoveryParam === null) {
        throw new Error('Signer did not produce a recovery id');
    }

    return Buffer.concat([
        signature.r.toArrayLike(Buffer, 'be', 32),
        signature.s.toArrayLike(Buffer, 'be', 32),
        Buffer.from([signature.recoveryParam]),
    ]).toString('hex');
}

function parseSignature(signature: string): ParsedSignature | null {
    if (!isHex(signature, SIGNATURE_BYTES)) {
        return null;
    }

    const bytes = Buffer.from(signature, 'hex');
    const r = new BN(bytes.subarray(0, 32));
    const s = new BN(bytes.subarray(32, 64));
    const recovery = bytes[64];

    if (recovery === undefined || recovery > 3) {
        return null;
    }
    if (r.isZero() || s.isZero() || r.cmp(CURVE_ORDER) >= 0 || s.cmp(CURVE_ORDER) >= 0) {
        return null;
    }
    return { r, s, recovery };
}

/**
 * Recover the compressed public key that produced `signature` over `digest`.
 * Returns null when the signature is malformed or recovery fails.
 */
export function recoverPublicKey(digest: Uint8Array, signature: string): string | null {
    if (digest.length !== DIGEST_BYTES) {
        return null;
    }

    const parsed = parseSignature(signature);
    if (!parsed) {
        return null;
    }

    try {
        const point: curve.base.BasePoint = ec.recoverPubKey(
            Buffer.from(digest),
            { r: parsed.r, s: parsed.s },
            parsed.recovery
        );
        return point.encode('hex', true);
    } catch {
        return null;
    }
}

/**
 * Verify signature against a known public key
 */
export function verifyDigest(publicKey: string, digest: Uint8Array, signature: string): boolean {
    const recovered = recoverPublicKey(digest, signature);
    return recovered !== null && recovered.toLowerCase() === publicKey.toLowerCase();
}
