/**
 * @fileoverview Address Family
 *
 * The two address families the engine understands. Every algorithm in the
 * engine is written once against {@link AddressFamily.width}; nothing branches
 * on the family name except parsing and formatting.
 *
 * @module @rangefold/engine/contracts/AddressFamily
 */

/**
 * Family identifier, as used on prefixes and in log output.
 */
export type AddressFamilyName = "IPv4" | "IPv6";

/**
 * Family descriptor - the family name plus its integer width in bits.
 */
export interface AddressFamily {
    readonly name: AddressFamilyName;
    readonly width: number;
}

export const IPv4: AddressFamily = Object.freeze({ name: "IPv4", width: 32 });

export const IPv6: AddressFamily = Object.freeze({ name: "IPv6", width: 128 });

/**
 * Families in canonical output order.
 */
export const ADDRESS_FAMILIES: readonly AddressFamily[] = Object.freeze([IPv4, IPv6]);

/**
 * Position of a family in canonical output order (IPv4 first).
 */
export function familyOrder(family: AddressFamily): number {
    return ADDRESS_FAMILIES.findIndex((candidate) => candidate.name === family.name);
}
