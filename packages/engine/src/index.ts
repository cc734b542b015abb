/**
 * @fileoverview rangefold engine
 *
 * CIDR aggregation for published IP range lists.
 *
 * The engine provides:
 * - IPv4/IPv6 prefix parsing, formatting and interval conversion
 * - Merging of overlapping and adjacent prefixes into maximal intervals
 * - Minimal CIDR decomposition of each interval
 * - Metadata reconciliation under the "merged" and "compacted" policies
 * - A record codec for the published `ip_prefix` / `ipv6_prefix` shape
 *
 * @module @rangefold/engine
 * @example
 * ```typescript
 * import {
 *     RangeAggregator,
 *     parseRangeRecord,
 *     toRangeRecord,
 * } from "@rangefold/engine";
 *
 * const entries = records.map((record, index) => parseRangeRecord(record, index));
 * const { original, merged, compacted } = new RangeAggregator().aggregate(entries);
 * const output = merged.map(toRangeRecord);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    AddressFamily,
    AddressFamilyName,
    Prefix,
    AddressInterval,
    MetadataField,
    MetadataRecord,
    InputEntry,
    OutputEntry,
    RangeRecord,
    Ipv4RangeRecord,
    Ipv6RangeRecord,
    ParseErrorDetails,
} from "./contracts/index.js";
export {
    IPv4,
    IPv6,
    ADDRESS_FAMILIES,
    createPrefix,
    prefixSize,
    METADATA_FIELDS,
    OTHER,
    OTHER_METADATA,
    createMetadata,
    metadataEquals,
    compareEntries,
    ParseError,
} from "./contracts/index.js";

// ============================================================================
// Pipeline stages
// ============================================================================

export {
    parsePrefix,
    formatPrefix,
    toInterval,
    fromInterval,
} from "./address/index.js";
export { decomposeInterval } from "./decompose/index.js";
export { reconcileMetadata, type MetadataPolicy } from "./reconcile/index.js";
export { parseRangeRecord, toRangeRecord } from "./records/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    RangeAggregator,
    aggregate,
    summarizeAggregation,
    consoleLogger,
    silentLogger,
    type AggregationResult,
    type AggregationCollection,
    type AggregationSummary,
    type AggregatorConfig,
    type EngineLogger,
} from "./engine/index.js";
