import { InvalidArgumentError } from 'commander';
import { UINT128_MAX } from '../pool/math.js';

/**
 * Commander argument parser for unsigned integer amounts (base units).
 */
export function parseAmount(value: string): bigint {
    if (!/^\d+$/.test(value.replace(/_/g, ''))) {
        throw new InvalidArgumentError('Expected a non-negative integer amount.');
    }
    const amount = BigInt(value.replace(/_/g, ''));
    if (amount > UINT128_MAX) {
        throw new InvalidArgumentError('Amount exceeds the uint128 range.');
    }
    return amount;
}

export function parseHex(bytes: number) {
    return (value: string): string => {
        const hex = value.startsWith('0x') ? value.slice(2) : value;
        if (hex.length !== bytes * 2 || !/^[0-9a-fA-F]+$/.test(hex)) {
            throw new InvalidArgumentError(`Expected ${bytes} bytes of hex.`);
        }
        return hex.toLowerCase();
    };
}
