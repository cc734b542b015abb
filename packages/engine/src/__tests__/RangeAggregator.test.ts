/**
 * @fileoverview Unit tests for RangeAggregator
 *
 * Tests cover:
 * - Worked merge scenarios (duplicates, adjacent blocks, gaps)
 * - The original collection (dedupe and canonical order)
 * - Mixed IPv4/IPv6 input
 * - Coverage, overlap, alignment and minimality over generated input
 * - Idempotence and determinism
 * - Metadata policy over generated input
 * - Logging and summaries
 *
 * @module @rangefold/engine/__tests__/RangeAggregator
 */

import { describe, it, expect, vi } from "vitest";
import {
    RangeAggregator,
    aggregate,
    summarizeAggregation,
    type EngineLogger,
} from "../engine/RangeAggregator.js";
import { formatPrefix, parsePrefix, toInterval } from "../address/prefix.js";
import { IPv4, IPv6, type AddressFamily } from "../contracts/AddressFamily.js";
import { createPrefix } from "../contracts/Prefix.js";
import {
    METADATA_FIELDS,
    OTHER,
    createMetadata,
    metadataEquals,
    type MetadataRecord,
} from "../contracts/RangeMetadata.js";
import type { InputEntry, OutputEntry } from "../contracts/RangeEntry.js";

function meta(region: string, service = "AMAZON", networkBorderGroup = region): MetadataRecord {
    return createMetadata({ region, service, network_border_group: networkBorderGroup });
}

function entry(text: string, metadata: MetadataRecord = meta("us-east-1")): InputEntry {
    const family = text.includes(":") ? IPv6 : IPv4;
    return { prefix: parsePrefix(text, family), metadata };
}

function texts(entries: readonly OutputEntry[]): string[] {
    return entries.map((output) => formatPrefix(output.prefix));
}

/**
 * Small deterministic generator (LCG) so generated cases are reproducible.
 */
function createRandom(seed: number): (limit: number) => number {
    let state = seed >>> 0;
    return (limit) => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state % limit;
    };
}

const kREGIONS = ["us-east-1", "us-west-2", "eu-west-1"];
const kSERVICES = ["AMAZON", "EC2", "S3"];

/**
 * Generate clustered prefixes inside `parent`, so that overlaps, adjacency
 * and gaps all occur.
 */
function generateEntries(
    seed: number,
    count: number,
    family: AddressFamily,
    parent: string,
    minLength: number,
    maxLength: number
): InputEntry[] {
    const random = createRandom(seed);
    const root = parsePrefix(parent, family);
    const hostBits = family.width - root.length;
    const entries: InputEntry[] = [];

    for (let i = 0; i < count; i++) {
        const length = minLength + random(maxLength - minLength + 1);
        const offset = BigInt(random(1 << 16)) << BigInt(hostBits - 16);
        const region = kREGIONS[random(kREGIONS.length)];
        entries.push({
            prefix  : createPrefix(family, root.base + offset, length),
            metadata: meta(region, kSERVICES[random(kSERVICES.length)], region),
        });
    }

    return entries;
}

interface CoveredRun {
    start: bigint;
    end: bigint;
    members: InputEntry[];
}

/**
 * Union of covered addresses for one family, computed independently of the
 * engine by repeated absorption.
 */
function coveredRuns(entries: readonly InputEntry[], family: AddressFamily): CoveredRun[] {
    const runs: CoveredRun[] = [];

    for (const input of entries.filter((candidate) => candidate.prefix.family === family)) {
        const { start, end } = toInterval(input.prefix);
        let run: CoveredRun = { start, end, members: [input] };

        for (let i = runs.length - 1; i >= 0; i--) {
            const other = runs[i];
            if (other.start <= run.end + 1n && run.start <= other.end + 1n) {
                run = {
                    start  : other.start < run.start ? other.start : run.start,
                    end    : other.end > run.end ? other.end : run.end,
                    members: [...other.members, ...run.members],
                };
                runs.splice(i, 1);
                i = runs.length;
            }
        }
        runs.push(run);
    }

    return runs.sort((a, b) => (a.start < b.start ? -1 : 1));
}

function runsOf(entries: readonly OutputEntry[], family: AddressFamily): Array<[bigint, bigint]> {
    return coveredRuns(entries, family).map((run): [bigint, bigint] => [run.start, run.end]);
}

const generated: InputEntry[] = [
    ...generateEntries(7, 400, IPv4, "10.0.0.0/8", 16, 30),
    ...generateEntries(11, 300, IPv6, "2600:1f00::/24", 32, 60),
];

describe("RangeAggregator", () => {
    describe("scenarios", () => {
        // Scenario: Duplicate prefix with identical metadata
        it("should collapse a duplicate with the same metadata", () => {
            const a = meta("us-east-1");
            const result = aggregate([entry("3.4.8.0/24", a), entry("3.4.8.0/24", a)]);

            expect(texts(result.merged)).toEqual(["3.4.8.0/24"]);
            expect(result.merged[0].metadata).toEqual(a);
            expect(texts(result.original)).toEqual(["3.4.8.0/24"]);
        });

        // Scenario: Adjacent /24s with disagreeing regions
        it("should merge adjacent siblings and mark disagreeing fields", () => {
            const result = aggregate([
                entry("3.4.8.0/24", meta("us-east-1", "AMAZON", "us-east-1")),
                entry("3.4.9.0/24", meta("us-west-1", "AMAZON", "us-west-1")),
            ]);

            expect(texts(result.merged)).toEqual(["3.4.8.0/23"]);
            expect(result.merged[0].metadata).toEqual({
                region              : "other",
                service             : "AMAZON",
                network_border_group: "other",
            });
            expect(texts(result.compacted)).toEqual(["3.4.8.0/23"]);
            expect(result.compacted[0].metadata).toEqual({
                region              : "other",
                service             : "other",
                network_border_group: "other",
            });
        });

        // Scenario: Three non-adjacent /24s
        it("should leave non-adjacent prefixes unmerged", () => {
            const result = aggregate([
                entry("3.4.12.0/24", meta("eu-west-1")),
                entry("3.4.8.0/24", meta("us-east-1")),
                entry("3.4.10.0/24", meta("us-west-2")),
            ]);

            expect(texts(result.merged)).toEqual(["3.4.8.0/24", "3.4.10.0/24", "3.4.12.0/24"]);
            expect(texts(result.compacted)).toEqual(["3.4.8.0/24", "3.4.10.0/24", "3.4.12.0/24"]);
            expect(result.merged.map((output) => output.metadata.region))
                .toEqual(["us-east-1", "us-west-2", "eu-west-1"]);
            expect(result.compacted.every((output) => output.metadata.region === OTHER)).toBe(true);
        });

        // Scenario: Adjacent but unaligned merge decomposes into several blocks
        it("should give every block of an interval the interval's metadata", () => {
            const result = aggregate([
                entry("3.4.9.0/24", meta("us-east-1")),
                entry("3.4.10.0/24", meta("us-east-1", "EC2")),
            ]);

            expect(texts(result.merged)).toEqual(["3.4.9.0/24", "3.4.10.0/24"]);
            expect(result.merged.map((output) => output.metadata.service)).toEqual(["other", "other"]);
            expect(result.merged.map((output) => output.metadata.region)).toEqual(["us-east-1", "us-east-1"]);
        });

        // Scenario: Contained prefix is absorbed
        it("should absorb contained prefixes", () => {
            const result = aggregate([
                entry("10.0.0.0/16", meta("us-east-1")),
                entry("10.0.4.0/22", meta("us-east-1")),
                entry("10.0.4.0/24", meta("us-east-1")),
            ]);

            expect(texts(result.merged)).toEqual(["10.0.0.0/16"]);
            expect(result.merged[0].metadata).toEqual(meta("us-east-1"));
            expect(texts(result.original)).toEqual(["10.0.0.0/16", "10.0.4.0/22", "10.0.4.0/24"]);
        });

        // Scenario: Empty input
        it("should return empty collections for no input", () => {
            expect(aggregate([])).toEqual({ original: [], merged: [], compacted: [] });
        });
    });

    describe("original collection", () => {
        // Scenario: Same prefix, different metadata
        it("should keep same-prefix entries whose metadata differs", () => {
            const result = aggregate([
                entry("3.4.8.0/24", meta("us-east-1", "EC2")),
                entry("3.4.8.0/24", meta("us-east-1", "AMAZON")),
                entry("3.4.8.0/24", meta("us-east-1", "EC2")),
            ]);

            expect(texts(result.original)).toEqual(["3.4.8.0/24", "3.4.8.0/24"]);
            expect(result.original.map((output) => output.metadata.service)).toEqual(["AMAZON", "EC2"]);
        });

        // Scenario: Canonical ordering
        it("should order by family, base, then mask length", () => {
            const result = aggregate([
                entry("2600:1f14::/35"),
                entry("10.0.0.0/16"),
                entry("3.4.8.0/24"),
                entry("10.0.0.0/8"),
            ]);

            expect(texts(result.original)).toEqual([
                "3.4.8.0/24",
                "10.0.0.0/8",
                "10.0.0.0/16",
                "2600:1f14::/35",
            ]);
        });

        // Scenario: Host bits are canonicalised in the original collection
        it("should hold canonical prefixes", () => {
            expect(texts(aggregate([entry("3.4.8.77/24")]).original)).toEqual(["3.4.8.0/24"]);
        });
    });

    describe("mixed families", () => {
        // Scenario: IPv4 and IPv6 aggregate independently
        it("should aggregate each family on its own and list IPv4 first", () => {
            const result = aggregate([
                entry("2600:1f14:1000::/36", meta("us-west-2")),
                entry("3.4.9.0/24", meta("us-east-1")),
                entry("2600:1f14::/36", meta("us-west-2")),
                entry("3.4.8.0/24", meta("us-east-1")),
            ]);

            expect(texts(result.merged)).toEqual(["3.4.8.0/23", "2600:1f14::/35"]);
            expect(result.merged.map((output) => output.metadata.region)).toEqual(["us-east-1", "us-west-2"]);
        });

        // Scenario: Same integer value in both families never merges
        it("should not merge across families", () => {
            const result = aggregate([entry("0.0.0.0/1"), entry("::/1")]);

            expect(texts(result.merged)).toEqual(["0.0.0.0/1", "::/1"]);
        });
    });

    describe("properties over generated input", () => {
        const result = aggregate(generated);

        for (const family of [IPv4, IPv6]) {
            describe(family.name, () => {
                const merged = result.merged.filter((output) => output.prefix.family === family);

                it("should cover exactly the input addresses", () => {
                    const expected = runsOf(generated, family);

                    expect(runsOf(result.merged, family)).toEqual(expected);
                    expect(runsOf(result.compacted, family)).toEqual(expected);
                    expect(runsOf(result.original, family)).toEqual(expected);
                });

                it("should emit blocks that neither overlap nor go out of order", () => {
                    for (let i = 1; i < merged.length; i++) {
                        expect(toInterval(merged[i].prefix).start).toBeGreaterThan(toInterval(merged[i - 1].prefix).end);
                    }
                });

                it("should emit aligned blocks", () => {
                    for (const output of merged) {
                        const size = 1n << BigInt(family.width - output.prefix.length);
                        expect(output.prefix.base % size).toBe(0n);
                    }
                });

                it("should never emit two siblings that could form their parent", () => {
                    for (let i = 1; i < merged.length; i++) {
                        const previous = merged[i - 1].prefix;
                        const current = merged[i].prefix;
                        if (previous.length !== current.length || previous.length === 0) {
                            continue;
                        }
                        const shift = BigInt(family.width - current.length + 1);
                        const siblings = toInterval(previous).end + 1n === current.base
                            && previous.base >> shift === current.base >> shift;
                        expect(siblings).toBe(false);
                    }
                });

                it("should reconcile metadata from every covering input", () => {
                    const runs = coveredRuns(generated, family);

                    for (const output of merged) {
                        const run = runs.find((candidate) =>
                            candidate.start <= output.prefix.base && output.prefix.base <= candidate.end);
                        expect(run).toBeDefined();

                        for (const field of METADATA_FIELDS) {
                            const values = new Set(run?.members.map((member) => member.metadata[field]));
                            expect(output.metadata[field] === OTHER).toBe(values.size > 1);
                        }
                    }
                });
            });
        }

        it("should mark every compacted field other", () => {
            for (const output of result.compacted) {
                expect(output.metadata).toEqual({
                    region              : OTHER,
                    service             : OTHER,
                    network_border_group: OTHER,
                });
            }
        });

        it("should list the same blocks in merged and compacted", () => {
            expect(texts(result.compacted)).toEqual(texts(result.merged));
        });

        it("should be idempotent over its merged output", () => {
            const again = aggregate(result.merged);

            expect(texts(again.merged)).toEqual(texts(result.merged));
            expect(again.merged.every((output, i) => metadataEquals(output.metadata, result.merged[i].metadata)))
                .toBe(true);
        });

        it("should not depend on input order", () => {
            const random = createRandom(99);
            const shuffled = [...generated];
            for (let i = shuffled.length - 1; i > 0; i--) {
                const j = random(i + 1);
                [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
            }

            expect(aggregate(shuffled)).toEqual(result);
        });
    });

    describe("logging", () => {
        function createMockLogger(): EngineLogger {
            return {
                debug: vi.fn(),
                info : vi.fn(),
                warn : vi.fn(),
                error: vi.fn(),
            };
        }

        it("should log per-family counts at debug level", () => {
            const logger = createMockLogger();
            const aggregator = new RangeAggregator({ logger });

            aggregator.aggregate([entry("3.4.8.0/24"), entry("3.4.9.0/24"), entry("3.4.9.0/24")]);

            expect(logger.debug).toHaveBeenCalledWith("Duplicate entries dropped", { dropped: 1 });
            expect(logger.debug).toHaveBeenCalledWith("Family aggregated", {
                family   : "IPv4",
                entries  : 3,
                intervals: 1,
                blocks   : 1,
            });
            expect(logger.info).not.toHaveBeenCalled();
        });

        it("should not log anything for families absent from the input", () => {
            const logger = createMockLogger();

            new RangeAggregator({ logger }).aggregate([entry("2600:1f14::/35")]);

            expect(logger.debug).toHaveBeenCalledTimes(1);
            expect(logger.debug).toHaveBeenCalledWith("Family aggregated", expect.objectContaining({ family: "IPv6" }));
        });
    });

    describe("summarizeAggregation", () => {
        it("should count entries per family in each collection", () => {
            const result = aggregate([
                entry("3.4.8.0/24"),
                entry("3.4.9.0/24"),
                entry("3.4.20.0/24"),
                entry("2600:1f14::/36"),
            ]);

            expect(summarizeAggregation(result)).toEqual({
                original : { IPv4: 3, IPv6: 1 },
                merged   : { IPv4: 2, IPv6: 1 },
                compacted: { IPv4: 2, IPv6: 1 },
            });
        });
    });

    it("should return frozen collections", () => {
        const result = aggregate([entry("3.4.8.0/24")]);

        expect(Object.isFrozen(result)).toBe(true);
        expect(Object.isFrozen(result.merged)).toBe(true);
        expect(Object.isFrozen(result.merged[0])).toBe(true);
    });
});
