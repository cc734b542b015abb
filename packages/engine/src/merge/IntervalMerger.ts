/**
 * @fileoverview Interval Merger
 *
 * Collapses the prefixes of one address family into maximal contiguous
 * intervals, ignoring the original prefix boundaries. Each interval keeps
 * every metadata record it absorbed, duplicates included, so the reconciler
 * can see whether contributors agreed.
 *
 * @module @rangefold/engine/merge/IntervalMerger
 */

import type { AddressFamily } from "../contracts/AddressFamily.js";
import type { MetadataRecord } from "../contracts/RangeMetadata.js";
import type { InputEntry } from "../contracts/RangeEntry.js";
import { toInterval } from "../address/prefix.js";

/**
 * A maximal run of covered addresses plus the records that covered it.
 */
export interface MergedInterval {
    readonly family: AddressFamily;
    readonly start: bigint;
    readonly end: bigint;
    readonly contributors: readonly MetadataRecord[];
}

interface PendingInterval {
    start: bigint;
    end: bigint;
    contributors: MetadataRecord[];
}

/**
 * Merge overlapping and adjacent prefixes of a single family.
 *
 * Intervals are sorted by start ascending and end descending, so a
 * containing interval is always seen before the intervals it contains.
 * Two intervals merge when the second starts no later than one past the
 * end of the first.
 *
 * @param family - Family of every entry in `entries`
 * @param entries - Entries to merge
 * @returns Disjoint, non-adjacent intervals in ascending order
 * @throws Error if an entry belongs to a different family
 */
export function mergeIntervals(family: AddressFamily, entries: readonly InputEntry[]): MergedInterval[] {
    const intervals = entries.map((entry) => {
        if (entry.prefix.family.name !== family.name) {
            throw new Error(`Cannot merge ${entry.prefix.family.name} prefix into ${family.name} intervals`);
        }
        return { ...toInterval(entry.prefix), metadata: entry.metadata };
    });

    intervals.sort((a, b) => {
        if (a.start !== b.start) {
            return a.start < b.start ? -1 : 1;
        }
        if (a.end !== b.end) {
            return a.end > b.end ? -1 : 1;
        }
        return 0;
    });

    const merged: MergedInterval[] = [];
    let current: PendingInterval | null = null;

    for (const next of intervals) {
        if (current && next.start <= current.end + 1n) {
            if (next.end > current.end) {
                current.end = next.end;
            }
            current.contributors.push(next.metadata);
            continue;
        }

        if (current) {
            merged.push(freeze(family, current));
        }
        current = { start: next.start, end: next.end, contributors: [next.metadata] };
    }

    if (current) {
        merged.push(freeze(family, current));
    }

    return merged;
}

function freeze(family: AddressFamily, pending: PendingInterval): MergedInterval {
    return Object.freeze({
        family,
        start       : pending.start,
        end         : pending.end,
        contributors: Object.freeze([...pending.contributors]),
    });
}
