import type { Address, Duration } from './Ontology.js';

export const UINT256_MAX: bigint = (1n << 256n) - 1n;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

export const SECONDS_PER_DAY: Duration = 86_400n;
export const SECONDS_PER_YEAR: Duration = 365n * SECONDS_PER_DAY;
export const MAX_VESTING_DURATION: Duration = 10n * SECONDS_PER_YEAR;

/**
 * floor(a * b / denominator) with the full-width product kept before division.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
    if (denominator <= 0n) throw new RangeError('mulDiv: denominator must be positive');
    if (a < 0n || b < 0n) throw new RangeError('mulDiv: operands must be non-negative');
    return (a * b) / denominator;
}

export const minOf = (a: bigint, b: bigint): bigint => (a < b ? a : b);
export const maxOf = (a: bigint, b: bigint): bigint => (a > b ? a : b);
