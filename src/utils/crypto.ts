import crypto from 'crypto';

const UINT128_BYTES = 16;
const UINT128_LIMIT = 1n << 128n;

export function sha256(data: Uint8Array): Buffer {
    return crypto.createHash('sha256').update(data).digest();
}

/**
 * Fixed-width big-endian encoding of an unsigned 128-bit integer.
 */
export function encodeUint128(value: bigint): Buffer {
    if (value < 0n || value >= UINT128_LIMIT) {
        throw new RangeError(`Value out of uint128 range: ${value}`);
    }
    const buf = Buffer.alloc(UINT128_BYTES);
    buf.writeBigUInt64BE(value >> 64n, 0);
    buf.writeBigUInt64BE(value & 0xffff_ffff_ffff_ffffn, 8);
    return buf;
}

export function isHex(value: string, bytes?: number): boolean {
    if (!/^(?:[0-9a-fA-F]{2})*$/.test(value)) {
        return false;
    }
    return bytes === undefined || value.length === bytes * 2;
}
