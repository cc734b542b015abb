/**
 * @fileoverview RangeAggregator
 *
 * Wires the aggregation pipeline into a single call.
 *
 * Pipeline flow, once per address family present in the input:
 * 1. Interval Merger - maximal contiguous intervals
 * 2. CIDR Decomposer - minimal aligned blocks per interval
 * 3. Metadata Reconciler - metadata per block, per policy
 *
 * Design principles:
 * - Pure: no I/O, no clock, no shared state between runs
 * - Deterministic: identical input yields byte-identical output ordering
 * - Family-generic: IPv4 and IPv6 run the same code on different widths
 *
 * @module @rangefold/engine/engine/RangeAggregator
 */

import { ADDRESS_FAMILIES, type AddressFamilyName } from "../contracts/AddressFamily.js";
import {
    compareEntries,
    type InputEntry,
    type OutputEntry,
} from "../contracts/RangeEntry.js";
import { decomposeInterval } from "../decompose/CidrDecomposer.js";
import { mergeIntervals } from "../merge/IntervalMerger.js";
import { reconcileMetadata } from "../reconcile/MetadataReconciler.js";

/**
 * The three collections produced by one run.
 */
export interface AggregationResult {
    /** Input deduplicated and sorted, otherwise untouched */
    readonly original: readonly OutputEntry[];

    /** Aggregated blocks, metadata kept where contributors agree */
    readonly merged: readonly OutputEntry[];

    /** Aggregated blocks, every metadata field "other" */
    readonly compacted: readonly OutputEntry[];
}

export type AggregationCollection = keyof AggregationResult;

/**
 * Entry counts per family for each collection.
 */
export type AggregationSummary = Readonly<Record<AggregationCollection, Readonly<Record<AddressFamilyName, number>>>>;

/**
 * Aggregator configuration options.
 */
export interface AggregatorConfig {
    /** Logger for pipeline diagnostics */
    readonly logger?: EngineLogger;
}

/**
 * Logger interface for the engine.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const consoleLogger: EngineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Logger that discards everything. The default for library use.
 */
export const silentLogger: EngineLogger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};

/**
 * RangeAggregator - computes original, merged and compacted collections.
 *
 * @example
 * ```typescript
 * const aggregator = new RangeAggregator({ logger: consoleLogger });
 *
 * const result = aggregator.aggregate([
 *     { prefix: parsePrefix("3.4.8.0/24", IPv4), metadata: east },
 *     { prefix: parsePrefix("3.4.9.0/24", IPv4), metadata: west },
 * ]);
 *
 * result.merged.map((entry) => formatPrefix(entry.prefix));
 * // => ["3.4.8.0/23"]
 * ```
 */
export class RangeAggregator {
    private readonly config: Required<AggregatorConfig>;

    constructor(config: AggregatorConfig = {}) {
        this.config = {
            logger: config.logger ?? silentLogger,
        };
    }

    /**
     * Run the full pipeline over `entries`.
     *
     * @param entries - Parsed entries of any mix of families
     * @returns Frozen collections in canonical order
     */
    aggregate(entries: readonly InputEntry[]): AggregationResult {
        const original = this.deduplicate(entries);
        const merged: OutputEntry[] = [];
        const compacted: OutputEntry[] = [];

        for (const family of ADDRESS_FAMILIES) {
            const familyEntries = entries.filter((entry) => entry.prefix.family.name === family.name);
            if (familyEntries.length === 0) {
                continue;
            }

            const intervals = mergeIntervals(family, familyEntries);
            let blocks = 0;

            for (const interval of intervals) {
                const mergedMetadata = reconcileMetadata(interval.contributors, "merged");
                const compactedMetadata = reconcileMetadata(interval.contributors, "compacted");

                for (const prefix of decomposeInterval(family, interval.start, interval.end)) {
                    merged.push(Object.freeze({ prefix, metadata: mergedMetadata }));
                    compacted.push(Object.freeze({ prefix, metadata: compactedMetadata }));
                    blocks++;
                }
            }

            this.config.logger.debug("Family aggregated", {
                family   : family.name,
                entries  : familyEntries.length,
                intervals: intervals.length,
                blocks,
            });
        }

        merged.sort(compareEntries);
        compacted.sort(compareEntries);

        return Object.freeze({
            original : Object.freeze(original),
            merged   : Object.freeze(merged),
            compacted: Object.freeze(compacted),
        });
    }

    /**
     * Sort entries canonically and drop exact duplicates (same prefix and
     * same metadata). After sorting, duplicates are always neighbours.
     */
    private deduplicate(entries: readonly InputEntry[]): OutputEntry[] {
        const sorted = [...entries].sort(compareEntries);
        const unique: OutputEntry[] = [];

        for (const entry of sorted) {
            const previous = unique.at(-1);
            if (previous && compareEntries(previous, entry) === 0) {
                continue;
            }
            unique.push(Object.freeze({ prefix: entry.prefix, metadata: entry.metadata }));
        }

        if (unique.length < entries.length) {
            this.config.logger.debug("Duplicate entries dropped", {
                dropped: entries.length - unique.length,
            });
        }

        return unique;
    }
}

/**
 * Run the pipeline with a default, silent aggregator.
 */
export function aggregate(entries: readonly InputEntry[]): AggregationResult {
    return new RangeAggregator().aggregate(entries);
}

/**
 * Count entries per family in each collection.
 */
export function summarizeAggregation(result: AggregationResult): AggregationSummary {
    const count = (entries: readonly OutputEntry[]): Record<AddressFamilyName, number> => ({
        IPv4: entries.filter((entry) => entry.prefix.family.name === "IPv4").length,
        IPv6: entries.filter((entry) => entry.prefix.family.name === "IPv6").length,
    });

    return {
        original : count(result.original),
        merged   : count(result.merged),
        compacted: count(result.compacted),
    };
}
