/**
 * @fileoverview Metadata Reconciler
 *
 * Decides the metadata attached to each output block.
 *
 * - `merged`: a field keeps its value when every contributor agrees on it,
 *   otherwise it becomes "other".
 * - `compacted`: every field is "other", whether or not anything merged.
 *
 * @module @rangefold/engine/reconcile/MetadataReconciler
 */

import {
    OTHER,
    OTHER_METADATA,
    createMetadata,
    type MetadataField,
    type MetadataRecord,
} from "../contracts/RangeMetadata.js";

export type MetadataPolicy = "merged" | "compacted";

/**
 * Synthesise the metadata for one output block.
 *
 * @param contributors - Every record absorbed by the block's interval
 * @param policy - Reconciliation policy
 * @returns A new frozen record; all "other" when there are no contributors
 *
 * @example
 * ```typescript
 * reconcileMetadata([
 *     { region: "us-east-1", service: "EC2", network_border_group: "us-east-1" },
 *     { region: "us-west-1", service: "EC2", network_border_group: "us-west-1" },
 * ], "merged");
 * // => { region: "other", service: "EC2", network_border_group: "other" }
 * ```
 */
export function reconcileMetadata(
    contributors: readonly MetadataRecord[],
    policy: MetadataPolicy
): MetadataRecord {
    const [first, ...rest] = contributors;

    if (policy === "compacted" || first === undefined) {
        return OTHER_METADATA;
    }

    const agreed = (field: MetadataField): string =>
        rest.every((record) => record[field] === first[field]) ? first[field] : OTHER;

    return createMetadata({
        region              : agreed("region"),
        service             : agreed("service"),
        network_border_group: agreed("network_border_group"),
    });
}

