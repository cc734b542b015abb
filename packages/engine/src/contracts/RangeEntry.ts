/**
 * @fileoverview Range Entries and Records
 *
 * Typed entries flow through the engine; records are the published JSON
 * shape at the engine's boundary.
 *
 * @module @rangefold/engine/contracts/RangeEntry
 */

import { familyOrder } from "./AddressFamily.js";
import type { Prefix } from "./Prefix.js";
import { compareMetadata, type MetadataRecord } from "./RangeMetadata.js";

/**
 * A published prefix with its metadata. The unit consumed by the engine.
 */
export interface InputEntry {
    readonly prefix: Prefix;
    readonly metadata: MetadataRecord;
}

/**
 * An emitted block. The prefix is a maximal aligned block (or, in the
 * original collection, the published prefix) and the metadata is
 * synthesised per policy.
 */
export interface OutputEntry {
    readonly prefix: Prefix;
    readonly metadata: MetadataRecord;
}

/**
 * Published IPv4 record.
 */
export interface Ipv4RangeRecord extends MetadataRecord {
    readonly ip_prefix: string;
}

/**
 * Published IPv6 record.
 */
export interface Ipv6RangeRecord extends MetadataRecord {
    readonly ipv6_prefix: string;
}

export type RangeRecord = Ipv4RangeRecord | Ipv6RangeRecord;

/**
 * Canonical entry order: family (IPv4 first), base, mask length, then metadata.
 */
export function compareEntries(a: InputEntry | OutputEntry, b: InputEntry | OutputEntry): number {
    const family = familyOrder(a.prefix.family) - familyOrder(b.prefix.family);
    if (family !== 0) {
        return family;
    }
    if (a.prefix.base !== b.prefix.base) {
        return a.prefix.base < b.prefix.base ? -1 : 1;
    }
    if (a.prefix.length !== b.prefix.length) {
        return a.prefix.length - b.prefix.length;
    }
    return compareMetadata(a.metadata, b.metadata);
}
