/**
 * @fileoverview Decomposer barrel exports
 *
 * @module @rangefold/engine/decompose
 */

export { decomposeInterval } from "./CidrDecomposer.js";
