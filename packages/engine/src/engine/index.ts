/**
 * @fileoverview Engine barrel exports
 *
 * @module @rangefold/engine/engine
 */

export {
    RangeAggregator,
    aggregate,
    summarizeAggregation,
    consoleLogger,
    silentLogger,
    type AggregationResult,
    type AggregationCollection,
    type AggregationSummary,
    type AggregatorConfig,
    type EngineLogger,
} from "./RangeAggregator.js";
