/**
 * @fileoverview Record codec barrel exports
 *
 * @module @rangefold/engine/records
 */

export { parseRangeRecord, toRangeRecord } from "./RangeRecordCodec.js";
