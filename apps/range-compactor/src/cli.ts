/**
 * @fileoverview Command-line arguments
 *
 * @module cli
 */

import type { ConfigOverrides } from "./config/index.js";

export interface CliOptions {
    /** Alternative config file, from --config */
    readonly configPath?: string;

    /** Settings given on the command line */
    readonly overrides: ConfigOverrides;

    /** --help was given */
    readonly help: boolean;
}

export const USAGE = `Usage: range-compactor [options]

Options:
  --config <path>      Configuration file (default: config/compactor.yml)
  --input <path>       Upstream ip-ranges document
  --output-dir <path>  Directory for the output documents
  --skip-invalid       Skip unparsable records instead of failing
  --help               Show this message`;

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws Error on an unknown flag or a flag missing its value
 *
 * @example
 * ```typescript
 * parseCliArgs(["--input", "ranges.json", "--skip-invalid"]);
 * // => { overrides: { input: "ranges.json", onInvalidRecord: "skip" }, help: false }
 * ```
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
    const overrides: ConfigOverrides = {};
    let configPath: string | undefined;
    let help = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        const value = (): string => {
            const next = args[i + 1];
            if (next === undefined || next.startsWith("--")) {
                throw new Error(`Missing value for ${arg}`);
            }
            i++;
            return next;
        };

        switch (arg) {
            case "--config":
                configPath = value();
                break;
            case "--input":
                overrides.input = value();
                break;
            case "--output-dir":
                overrides.outputDir = value();
                break;
            case "--skip-invalid":
                overrides.onInvalidRecord = "skip";
                break;
            case "--help":
            case "-h":
                help = true;
                break;
            default:
                throw new Error(`Unknown argument: ${arg}`);
        }
    }

    return {
        ...(configPath !== undefined && { configPath }),
        overrides,
        help,
    };
}
