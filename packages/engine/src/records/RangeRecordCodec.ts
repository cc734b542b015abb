/**
 * @fileoverview Range Record Codec
 *
 * Converts between the published record shape and engine entries.
 *
 * A record carries exactly one of `ip_prefix` (IPv4) or `ipv6_prefix`
 * (IPv6); the family is taken from whichever is present. Parsing is
 * structural only: field presence, field types and prefix syntax.
 *
 * @module @rangefold/engine/records/RangeRecordCodec
 */

import { IPv4, IPv6 } from "../contracts/AddressFamily.js";
import { ParseError } from "../contracts/ParseError.js";
import {
    createMetadata,
    type MetadataField,
    type MetadataRecord,
} from "../contracts/RangeMetadata.js";
import type {
    InputEntry,
    OutputEntry,
    RangeRecord,
} from "../contracts/RangeEntry.js";
import { formatPrefix, parsePrefix } from "../address/prefix.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
    return JSON.stringify(value) ?? String(value);
}

/**
 * Parse one published record into an entry.
 *
 * @param raw - Record as decoded from JSON
 * @param recordIndex - Position in the upstream list, attached to any error
 * @throws ParseError if the record is malformed
 *
 * @example
 * ```typescript
 * const entry = parseRangeRecord({
 *     ip_prefix           : "3.4.8.0/24",
 *     region              : "us-east-1",
 *     service             : "AMAZON",
 *     network_border_group: "us-east-1",
 * });
 * entry.prefix.family.name; // => "IPv4"
 * ```
 */
export function parseRangeRecord(raw: unknown, recordIndex?: number): InputEntry {
    try {
        return parseRecord(raw);
    }
    catch (error) {
        if (error instanceof ParseError && recordIndex !== undefined) {
            throw error.atRecord(recordIndex);
        }
        throw error;
    }
}

function parseRecord(raw: unknown): InputEntry {
    if (!isPlainObject(raw)) {
        throw new ParseError({ input: describe(raw), reason: "record is not an object" });
    }

    const hasIpv4 = "ip_prefix" in raw;
    const hasIpv6 = "ipv6_prefix" in raw;

    if (hasIpv4 === hasIpv6) {
        throw new ParseError({
            input : describe(raw),
            reason: hasIpv4
                ? "record has both ip_prefix and ipv6_prefix"
                : "record has neither ip_prefix nor ipv6_prefix",
        });
    }

    const family = hasIpv4 ? IPv4 : IPv6;
    const prefixText = hasIpv4 ? raw.ip_prefix : raw.ipv6_prefix;

    if (typeof prefixText !== "string") {
        throw new ParseError({
            input : describe(prefixText),
            family: family.name,
            reason: `${hasIpv4 ? "ip_prefix" : "ipv6_prefix"} is not a string`,
        });
    }

    return Object.freeze({
        prefix  : parsePrefix(prefixText, family),
        metadata: parseMetadata(raw),
    });
}

function parseMetadata(raw: Record<string, unknown>): MetadataRecord {
    const field = (name: MetadataField): string => {
        const value = raw[name];
        if (typeof value !== "string") {
            throw new ParseError({ input: describe(raw), reason: `${name} is missing or not a string` });
        }
        return value;
    };

    return createMetadata({
        region              : field("region"),
        service             : field("service"),
        network_border_group: field("network_border_group"),
    });
}

/**
 * Serialise an output entry to the published record shape. The prefix key
 * of the other family is omitted.
 */
export function toRangeRecord(entry: OutputEntry): RangeRecord {
    const { region, service, network_border_group } = entry.metadata;
    const prefix = formatPrefix(entry.prefix);

    return entry.prefix.family.name === "IPv4"
        ? { ip_prefix: prefix, region, service, network_border_group }
        : { ipv6_prefix: prefix, region, service, network_border_group };
}
