/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadConfig,
    overridesFromEnv,
    applyOverrides,
    DEFAULT_OUTPUTS,
    type CompactorConfig,
    type ConfigOverrides,
    type InvalidRecordPolicy,
    type OutputFiles,
} from "./loadConfig.js";
