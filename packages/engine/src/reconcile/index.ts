/**
 * @fileoverview Reconciler barrel exports
 *
 * @module @rangefold/engine/reconcile
 */

export { reconcileMetadata, type MetadataPolicy } from "./MetadataReconciler.js";
