/**
 * @fileoverview Range Documents
 *
 * Reads the upstream ip-ranges document and writes output documents in the
 * same shape:
 *
 * ```json
 * {
 *   "syncToken": "...",
 *   "createDate": "...",
 *   "prefixes": [{ "ip_prefix": "...", "region": "...", ... }],
 *   "ipv6_prefixes": [{ "ipv6_prefix": "...", "region": "...", ... }]
 * }
 * ```
 *
 * @module io/rangeDocument
 */

import { readFileSync, writeFileSync, existsSync } from "fs";
import type {
    Ipv4RangeRecord,
    Ipv6RangeRecord,
    RangeRecord,
} from "@rangefold/engine";

/**
 * Upstream document. Record lists are left undecoded; the engine's record
 * codec validates each record individually.
 */
export interface SourceDocument {
    readonly syncToken?: string;
    readonly createDate?: string;
    readonly prefixes: readonly unknown[];
    readonly ipv6_prefixes: readonly unknown[];
}

/**
 * Output document, one per collection.
 */
export interface RangeDocument {
    readonly syncToken?: string;
    readonly createDate?: string;
    readonly prefixes: readonly Ipv4RangeRecord[];
    readonly ipv6_prefixes: readonly Ipv6RangeRecord[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(raw: Record<string, unknown>, key: string, filePath: string): string | undefined {
    const value = raw[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== "string") {
        throw new Error(`Invalid range document ${filePath}: '${key}' is not a string`);
    }
    return value;
}

function optionalList(raw: Record<string, unknown>, key: string, filePath: string): readonly unknown[] {
    const value = raw[key];
    if (value === undefined) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new Error(`Invalid range document ${filePath}: '${key}' is not an array`);
    }
    return value;
}

/**
 * Read an upstream ip-ranges document.
 *
 * Missing `prefixes` or `ipv6_prefixes` lists are treated as empty.
 *
 * @param filePath - Path to the JSON document
 * @throws Error if the file doesn't exist, isn't JSON, or has the wrong shape
 */
export function readRangeDocument(filePath: string): SourceDocument {
    if (!existsSync(filePath)) {
        throw new Error(`Range document not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    }
    catch (error) {
        throw new Error(`Invalid range document ${filePath}: not valid JSON`, { cause: error });
    }

    if (!isPlainObject(parsed)) {
        throw new Error(`Invalid range document ${filePath}: expected a JSON object`);
    }

    return {
        syncToken    : optionalString(parsed, "syncToken", filePath),
        createDate   : optionalString(parsed, "createDate", filePath),
        prefixes     : optionalList(parsed, "prefixes", filePath),
        ipv6_prefixes: optionalList(parsed, "ipv6_prefixes", filePath),
    };
}

/**
 * Build an output document, carrying the source's sync token and creation
 * date and splitting records by family.
 */
export function buildRangeDocument(
    source: Pick<SourceDocument, "syncToken" | "createDate">,
    records: readonly RangeRecord[]
): RangeDocument {
    const prefixes: Ipv4RangeRecord[] = [];
    const ipv6Prefixes: Ipv6RangeRecord[] = [];

    for (const record of records) {
        if ("ip_prefix" in record) {
            prefixes.push(record);
        }
        else {
            ipv6Prefixes.push(record);
        }
    }

    return {
        syncToken    : source.syncToken,
        createDate   : source.createDate,
        prefixes,
        ipv6_prefixes: ipv6Prefixes,
    };
}

/**
 * Write a document as indented JSON with a trailing newline.
 */
export function writeRangeDocument(filePath: string, document: RangeDocument, indent: number): void {
    writeFileSync(filePath, `${JSON.stringify(document, null, indent)}\n`, "utf-8");
}
