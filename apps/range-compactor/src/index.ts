/**
 * @fileoverview range-compactor - Main Entry Point
 *
 * Compacts an ip-ranges document into three documents: the original list
 * deduplicated and sorted, the merged list (metadata kept where merged
 * ranges agree), and the compacted list (metadata discarded).
 *
 * Fetching the upstream document and scheduling runs are left to the
 * caller; this program reads a local file and exits.
 *
 * Settings are layered, later wins:
 * 1. config/compactor.yml (or --config / RANGE_COMPACTOR_CONFIG)
 * 2. RANGE_COMPACTOR_* environment variables (.env is loaded)
 * 3. Command-line flags
 *
 * @module range-compactor
 */

// Load .env before reading any environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { consoleLogger } from "@rangefold/engine";
import {
    applyOverrides,
    loadConfig,
    overridesFromEnv,
} from "./config/index.js";
import { USAGE, parseCliArgs } from "./cli.js";
import { runCompaction } from "./compactor.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const DEFAULT_CONFIG_PATH = join(__dirname, "..", "config", "compactor.yml");

/**
 * Main entry point
 */
function main(): void {
    try {
        const options = parseCliArgs(process.argv.slice(2));

        if (options.help) {
            console.log(USAGE);
            return;
        }

        const configPath = options.configPath
            ?? (process.env.RANGE_COMPACTOR_CONFIG || DEFAULT_CONFIG_PATH);

        const config = applyOverrides(
            loadConfig(configPath),
            overridesFromEnv(process.env),
            options.overrides,
        );

        consoleLogger.info("range-compactor starting", {
            config         : configPath,
            onInvalidRecord: config.onInvalidRecord,
        });

        const summary = runCompaction(config, consoleLogger);

        consoleLogger.info("range-compactor finished", {
            records : summary.records,
            rejected: summary.rejected.length,
        });
    }
    catch (error) {
        console.error("[FATAL] Compaction failed:", error instanceof Error ? error.message : error);
        process.exitCode = 1;
    }
}

main();
