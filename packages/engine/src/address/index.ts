/**
 * @fileoverview Address model barrel exports
 *
 * @module @rangefold/engine/address
 */

export {
    parsePrefix,
    formatPrefix,
    toInterval,
    fromInterval,
} from "./prefix.js";
