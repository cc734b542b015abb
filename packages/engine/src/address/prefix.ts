/**
 * @fileoverview Address Model
 *
 * Parsing, formatting and interval conversion for IPv4 and IPv6 prefixes.
 * Address text is handled by the `ip-address` package; everything past
 * parsing is plain bigint arithmetic on the family width.
 *
 * @module @rangefold/engine/address/prefix
 */

import { Address4, Address6 } from "ip-address";
import type { AddressFamily } from "../contracts/AddressFamily.js";
import { ParseError } from "../contracts/ParseError.js";
import {
    createPrefix,
    prefixSize,
    type AddressInterval,
    type Prefix,
} from "../contracts/Prefix.js";
import { decomposeInterval } from "../decompose/CidrDecomposer.js";

const kMASK_PATTERN = /^\d{1,3}$/;

/**
 * Parse `address/length` text into a canonical prefix.
 *
 * Host bits set in the text are cleared rather than rejected, since published
 * lists occasionally carry them.
 *
 * @param text - CIDR text, e.g. "3.4.8.0/24" or "2600:1f14::/35"
 * @param family - Family the text must belong to
 * @throws ParseError if the text is not a valid prefix of that family
 *
 * @example
 * ```typescript
 * const prefix = parsePrefix("3.4.8.17/24", IPv4);
 * formatPrefix(prefix); // => "3.4.8.0/24"
 * ```
 */
export function parsePrefix(text: string, family: AddressFamily): Prefix {
    const input = text.trim();
    const slash = input.indexOf("/");

    if (slash === -1) {
        throw new ParseError({ input: text, family: family.name, reason: "missing mask length" });
    }

    const maskText = input.slice(slash + 1);
    if (!kMASK_PATTERN.test(maskText)) {
        throw new ParseError({
            input : text,
            family: family.name,
            reason: `mask length "${maskText}" is not a number`,
        });
    }

    const length = Number(maskText);
    if (length > family.width) {
        throw new ParseError({
            input : text,
            family: family.name,
            reason: `mask length ${length} is out of range 0-${family.width}`,
        });
    }

    const base = parseAddress(input.slice(0, slash), family, text);
    return createPrefix(family, base, length);
}

/**
 * Parse a bare address of the given family to its integer value.
 */
function parseAddress(address: string, family: AddressFamily, input: string): bigint {
    if (address.includes(":") !== (family.name === "IPv6")) {
        throw new ParseError({ input, family: family.name, reason: `not an ${family.name} address` });
    }

    try {
        return family.name === "IPv4"
            ? new Address4(address).bigInt()
            : new Address6(address).bigInt();
    }
    catch (error) {
        throw new ParseError({
            input,
            family: family.name,
            reason: error instanceof Error ? error.message : String(error),
        }, { cause: error });
    }
}

/**
 * Canonical text for a prefix: dotted quad for IPv4, compressed lowercase
 * for IPv6.
 */
export function formatPrefix(prefix: Prefix): string {
    const address = prefix.family.name === "IPv4"
        ? Address4.fromBigInt(prefix.base).correctForm()
        : Address6.fromBigInt(prefix.base).correctForm();

    return `${address}/${prefix.length}`;
}

/**
 * Inclusive address interval covered by a prefix.
 */
export function toInterval(prefix: Prefix): AddressInterval {
    return {
        start: prefix.base,
        end  : prefix.base + prefixSize(prefix) - 1n,
    };
}

/**
 * Canonical CIDR decomposition of an inclusive interval.
 *
 * @see decomposeInterval
 */
export function fromInterval(family: AddressFamily, start: bigint, end: bigint): Prefix[] {
    return decomposeInterval(family, start, end);
}
