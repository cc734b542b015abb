/**
 * @fileoverview Prefix
 *
 * A CIDR block held as a fixed-width unsigned integer plus a mask length.
 * Prefixes are always canonical: the host bits of `base` are zero.
 *
 * @module @rangefold/engine/contracts/Prefix
 */

import type { AddressFamily } from "./AddressFamily.js";

export interface Prefix {
    readonly family: AddressFamily;

    /** Network address, host bits cleared */
    readonly base: bigint;

    /** Mask length in [0, family.width] */
    readonly length: number;
}

/**
 * Inclusive address interval on one family's address line.
 */
export interface AddressInterval {
    readonly start: bigint;
    readonly end: bigint;
}

/**
 * Bitmask selecting the network bits of a prefix of the given length.
 */
export function networkMask(width: number, length: number): bigint {
    const all = (1n << BigInt(width)) - 1n;
    return (all >> BigInt(width - length)) << BigInt(width - length);
}

/**
 * Create a canonical prefix, clearing any host bits in `base`.
 *
 * @throws RangeError if `length` is outside [0, family.width] or `base` does not fit the width
 */
export function createPrefix(family: AddressFamily, base: bigint, length: number): Prefix {
    if (!Number.isInteger(length) || length < 0 || length > family.width) {
        throw new RangeError(`Mask length ${length} is out of range for ${family.name}`);
    }
    if (base < 0n || base >= 1n << BigInt(family.width)) {
        throw new RangeError(`Address ${base} does not fit in ${family.width} bits`);
    }

    return Object.freeze({
        family,
        base  : base & networkMask(family.width, length),
        length,
    });
}

/**
 * Number of addresses covered by a prefix.
 */
export function prefixSize(prefix: Prefix): bigint {
    return 1n << BigInt(prefix.family.width - prefix.length);
}
