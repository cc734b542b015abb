/**
 * @fileoverview CIDR Decomposer
 *
 * Turns an inclusive address interval into the fewest aligned CIDR blocks
 * that cover it exactly. Works for any family width.
 *
 * @module @rangefold/engine/decompose/CidrDecomposer
 */

import type { AddressFamily } from "../contracts/AddressFamily.js";
import { createPrefix, type Prefix } from "../contracts/Prefix.js";

/**
 * Number of trailing zero bits in `value`, capped at `width`.
 * Zero is aligned to every block size, so it reports the full width.
 */
export function trailingZeroBits(value: bigint, width: number): number {
    if (value === 0n) {
        return width;
    }

    let bits = 0;
    let rest = value;
    while ((rest & 1n) === 0n && bits < width) {
        rest >>= 1n;
        bits++;
    }
    return bits;
}

/**
 * floor(log2(value)) for a positive bigint.
 */
export function floorLog2(value: bigint): number {
    if (value <= 0n) {
        throw new RangeError(`floorLog2 requires a positive value, got ${value}`);
    }
    return value.toString(2).length - 1;
}

/**
 * Decompose [start, end] into the minimal ordered list of aligned blocks.
 *
 * At every step the emitted block is the largest one that both starts on
 * an aligned boundary at `cur` and does not run past `end`.
 *
 * @param family - Family whose width bounds the arithmetic
 * @param start - First address of the interval
 * @param end - Last address of the interval (inclusive)
 * @returns Blocks in ascending address order; empty when start > end
 *
 * @example
 * ```typescript
 * // 10.0.0.1 - 10.0.0.6
 * decomposeInterval(IPv4, 0x0a000001n, 0x0a000006n).map(formatPrefix);
 * // => ["10.0.0.1/32", "10.0.0.2/31", "10.0.0.4/31", "10.0.0.6/32"]
 * ```
 */
export function decomposeInterval(family: AddressFamily, start: bigint, end: bigint): Prefix[] {
    const blocks: Prefix[] = [];
    let cur = start;

    while (cur <= end) {
        const byAlignment = trailingZeroBits(cur, family.width);
        const byRemaining = floorLog2(end - cur + 1n);
        const sizeBits = Math.min(byAlignment, byRemaining);

        blocks.push(createPrefix(family, cur, family.width - sizeBits));
        cur += 1n << BigInt(sizeBits);
    }

    return blocks;
}
