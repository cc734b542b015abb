/**
 * @fileoverview Compactor Configuration Loader
 *
 * Loads run settings from a YAML file, then layers environment and CLI
 * overrides on top.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { dirname, resolve } from "path";
import { parse as parseYaml } from "yaml";
import type { AggregationCollection } from "@rangefold/engine";

/**
 * What to do with a record that fails to parse.
 */
export type InvalidRecordPolicy = "fail" | "skip";

/**
 * Output file name per collection, relative to the output directory.
 */
export type OutputFiles = Readonly<Record<AggregationCollection, string>>;

/**
 * Resolved compactor configuration. All paths are absolute.
 */
export interface CompactorConfig {
    /** Upstream ip-ranges document */
    readonly input: string;

    /** Directory the output documents are written to */
    readonly outputDir: string;

    /** File names of the three output documents */
    readonly outputs: OutputFiles;

    /** Policy for unparsable records */
    readonly onInvalidRecord: InvalidRecordPolicy;

    /** JSON indentation of the output documents */
    readonly indent: number;
}

/**
 * Settings that may be overridden from the environment or the command line.
 */
export interface ConfigOverrides {
    input?: string;
    outputDir?: string;
    onInvalidRecord?: InvalidRecordPolicy;
}

export const DEFAULT_OUTPUTS: OutputFiles = {
    original : "ip-ranges-original.json",
    merged   : "ip-ranges-merged.json",
    compacted: "ip-ranges-compacted.json",
};

const kDEFAULT_INDENT = 2;

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isInvalidRecordPolicy(value: unknown): value is InvalidRecordPolicy {
    return value === "fail" || value === "skip";
}

function requireString(raw: Record<string, unknown>, key: string, filePath: string): string {
    const value = raw[key];
    if (typeof value !== "string" || value.trim() === "") {
        throw new Error(`Invalid config ${filePath}: missing or invalid '${key}'`);
    }
    return value;
}

/**
 * Load the compactor configuration from a YAML file.
 *
 * `input` and `outputDir` are required; relative paths resolve against the
 * directory containing the file.
 *
 * @param filePath - Path to compactor.yml
 * @returns Resolved configuration
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig("/srv/compactor/config/compactor.yml");
 * config.outputs.merged; // => "ip-ranges-merged.json"
 * ```
 */
export function loadConfig(filePath: string): CompactorConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (!isPlainObject(parsed)) {
        throw new Error(`Invalid config ${filePath}: expected a mapping`);
    }

    const baseDir = dirname(filePath);
    const outputs = parseOutputs(parsed.outputs, filePath);

    const onInvalidRecord = parsed.onInvalidRecord ?? "fail";
    if (!isInvalidRecordPolicy(onInvalidRecord)) {
        throw new Error(`Invalid config ${filePath}: 'onInvalidRecord' must be "fail" or "skip"`);
    }

    const indent = parsed.indent ?? kDEFAULT_INDENT;
    if (typeof indent !== "number" || !Number.isInteger(indent) || indent < 0 || indent > 10) {
        throw new Error(`Invalid config ${filePath}: 'indent' must be an integer between 0 and 10`);
    }

    return {
        input    : resolve(baseDir, requireString(parsed, "input", filePath)),
        outputDir: resolve(baseDir, requireString(parsed, "outputDir", filePath)),
        outputs,
        onInvalidRecord,
        indent,
    };
}

function parseOutputs(raw: unknown, filePath: string): OutputFiles {
    if (raw === undefined || raw === null) {
        return DEFAULT_OUTPUTS;
    }
    if (!isPlainObject(raw)) {
        throw new Error(`Invalid config ${filePath}: 'outputs' must be a mapping`);
    }

    const name = (collection: AggregationCollection): string => {
        const value = raw[collection];
        if (value === undefined) {
            return DEFAULT_OUTPUTS[collection];
        }
        if (typeof value !== "string" || value.trim() === "") {
            throw new Error(`Invalid config ${filePath}: invalid 'outputs.${collection}'`);
        }
        return value;
    };

    return {
        original : name("original"),
        merged   : name("merged"),
        compacted: name("compacted"),
    };
}

/**
 * Read overrides from RANGE_COMPACTOR_* environment variables.
 * Empty values are ignored.
 *
 * @throws Error if RANGE_COMPACTOR_ON_INVALID is set to an unknown policy
 */
export function overridesFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    if (env.RANGE_COMPACTOR_INPUT) {
        overrides.input = env.RANGE_COMPACTOR_INPUT;
    }
    if (env.RANGE_COMPACTOR_OUTPUT_DIR) {
        overrides.outputDir = env.RANGE_COMPACTOR_OUTPUT_DIR;
    }
    if (env.RANGE_COMPACTOR_ON_INVALID) {
        const policy = env.RANGE_COMPACTOR_ON_INVALID;
        if (!isInvalidRecordPolicy(policy)) {
            throw new Error(`RANGE_COMPACTOR_ON_INVALID must be "fail" or "skip", got "${policy}"`);
        }
        overrides.onInvalidRecord = policy;
    }

    return overrides;
}

/**
 * Apply overrides to a loaded configuration. Override paths resolve against
 * the current working directory.
 */
export function applyOverrides(config: CompactorConfig, ...layers: ConfigOverrides[]): CompactorConfig {
    return layers.reduce<CompactorConfig>((current, overrides) => ({
        ...current,
        ...(overrides.input !== undefined && { input: resolve(overrides.input) }),
        ...(overrides.outputDir !== undefined && { outputDir: resolve(overrides.outputDir) }),
        ...(overrides.onInvalidRecord !== undefined && { onInvalidRecord: overrides.onInvalidRecord }),
    }), config);
}
