/**
 * @fileoverview Compaction run
 *
 * One run of the compactor: read the upstream document, parse its records,
 * aggregate them once, and write the original, merged and compacted
 * documents.
 *
 * @module compactor
 */

import { mkdirSync } from "fs";
import { join } from "path";
import {
    ParseError,
    RangeAggregator,
    consoleLogger,
    parseRangeRecord,
    summarizeAggregation,
    toRangeRecord,
    type AggregationCollection,
    type AggregationSummary,
    type EngineLogger,
    type InputEntry,
} from "@rangefold/engine";
import type { CompactorConfig, InvalidRecordPolicy } from "./config/index.js";
import {
    buildRangeDocument,
    readRangeDocument,
    writeRangeDocument,
} from "./io/rangeDocument.js";

const kCOLLECTIONS: readonly AggregationCollection[] = ["original", "merged", "compacted"];

/**
 * Outcome of one run.
 */
export interface CompactionSummary {
    /** Records in the upstream document */
    readonly records: number;

    /** Records left out under the "skip" policy */
    readonly rejected: readonly ParseError[];

    /** Entries per family in each collection */
    readonly counts: AggregationSummary;

    /** Absolute path of each written document */
    readonly files: Readonly<Record<AggregationCollection, string>>;
}

interface ParsedRecords {
    readonly entries: InputEntry[];
    readonly rejected: ParseError[];
}

/**
 * Parse one upstream record list under the configured policy.
 *
 * @param list - Name of the list in the document, for log output
 * @throws ParseError on the first bad record when the policy is "fail"
 */
export function parseRecordList(
    list: string,
    records: readonly unknown[],
    policy: InvalidRecordPolicy,
    logger: EngineLogger
): ParsedRecords {
    const entries: InputEntry[] = [];
    const rejected: ParseError[] = [];

    records.forEach((record, index) => {
        try {
            entries.push(parseRangeRecord(record, index));
        }
        catch (error) {
            if (!(error instanceof ParseError) || policy === "fail") {
                throw error;
            }
            rejected.push(error);
            logger.warn("Skipping invalid record", {
                list,
                index,
                input : error.input,
                reason: error.reason,
            });
        }
    });

    return { entries, rejected };
}

/**
 * Run one compaction.
 *
 * @param config - Resolved configuration
 * @param logger - Logger for progress output
 * @returns Summary of what was read and written
 * @throws ParseError when a record is invalid and the policy is "fail"
 * @throws Error when the input document can't be read or an output can't be written
 */
export function runCompaction(config: CompactorConfig, logger: EngineLogger = consoleLogger): CompactionSummary {
    const document = readRangeDocument(config.input);
    const records = document.prefixes.length + document.ipv6_prefixes.length;

    logger.info("Loaded range document", {
        input     : config.input,
        syncToken : document.syncToken,
        createDate: document.createDate,
        records,
    });

    const ipv4 = parseRecordList("prefixes", document.prefixes, config.onInvalidRecord, logger);
    const ipv6 = parseRecordList("ipv6_prefixes", document.ipv6_prefixes, config.onInvalidRecord, logger);
    const rejected = [...ipv4.rejected, ...ipv6.rejected];

    if (rejected.length > 0) {
        logger.warn("Invalid records skipped", { rejected: rejected.length });
    }

    const result = new RangeAggregator({ logger }).aggregate([...ipv4.entries, ...ipv6.entries]);
    const counts = summarizeAggregation(result);

    logger.info("Aggregation complete", {
        original : counts.original,
        merged   : counts.merged,
        compacted: counts.compacted,
    });

    mkdirSync(config.outputDir, { recursive: true });

    const files = {
        original : join(config.outputDir, config.outputs.original),
        merged   : join(config.outputDir, config.outputs.merged),
        compacted: join(config.outputDir, config.outputs.compacted),
    };

    for (const collection of kCOLLECTIONS) {
        const output = buildRangeDocument(document, result[collection].map(toRangeRecord));
        writeRangeDocument(files[collection], output, config.indent);

        logger.info("Wrote range document", {
            collection,
            file         : files[collection],
            prefixes     : output.prefixes.length,
            ipv6_prefixes: output.ipv6_prefixes.length,
        });
    }

    return { records, rejected, counts, files };
}
