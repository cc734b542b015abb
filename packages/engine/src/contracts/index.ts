/**
 * @fileoverview Contract barrel exports
 *
 * Value types shared by every stage of the aggregation pipeline.
 *
 * @module @rangefold/engine/contracts
 */

// Address families
export type { AddressFamily, AddressFamilyName } from "./AddressFamily.js";
export {
    IPv4,
    IPv6,
    ADDRESS_FAMILIES,
    familyOrder,
} from "./AddressFamily.js";

// Prefixes
export type { Prefix, AddressInterval } from "./Prefix.js";
export {
    createPrefix,
    networkMask,
    prefixSize,
} from "./Prefix.js";

// Metadata
export type { MetadataField, MetadataRecord } from "./RangeMetadata.js";
export {
    METADATA_FIELDS,
    OTHER,
    OTHER_METADATA,
    createMetadata,
    metadataEquals,
    compareMetadata,
} from "./RangeMetadata.js";

// Entries and records
export type {
    InputEntry,
    OutputEntry,
    RangeRecord,
    Ipv4RangeRecord,
    Ipv6RangeRecord,
} from "./RangeEntry.js";
export { compareEntries } from "./RangeEntry.js";

// Errors
export type { ParseErrorDetails } from "./ParseError.js";
export { ParseError } from "./ParseError.js";
