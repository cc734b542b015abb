/**
 * @fileoverview Range Metadata
 *
 * The metadata published alongside every prefix. The field set is closed:
 * reconciliation walks exactly these fields.
 *
 * @module @rangefold/engine/contracts/RangeMetadata
 */

/**
 * Metadata fields, in the order they appear in published records.
 */
export const METADATA_FIELDS = ["region", "service", "network_border_group"] as const;

export type MetadataField = typeof METADATA_FIELDS[number];

/**
 * Metadata for one published prefix, or synthesised for one output block.
 *
 * @example
 * ```typescript
 * { region: "us-east-1", service: "EC2", network_border_group: "us-east-1" }
 * ```
 */
export type MetadataRecord = Readonly<Record<MetadataField, string>>;

/**
 * Value written into a field whose contributors disagree, and into every
 * field under the compacted policy.
 */
export const OTHER = "other";

/**
 * Create a frozen metadata record.
 */
export function createMetadata(fields: Record<MetadataField, string>): MetadataRecord {
    return Object.freeze({
        region              : fields.region,
        service             : fields.service,
        network_border_group: fields.network_border_group,
    });
}

/**
 * Record with every field set to {@link OTHER}.
 */
export const OTHER_METADATA: MetadataRecord = createMetadata({
    region              : OTHER,
    service             : OTHER,
    network_border_group: OTHER,
});

/**
 * Field-by-field equality.
 */
export function metadataEquals(a: MetadataRecord, b: MetadataRecord): boolean {
    return METADATA_FIELDS.every((field) => a[field] === b[field]);
}

/**
 * Lexicographic comparison over {@link METADATA_FIELDS}, in field order.
 */
export function compareMetadata(a: MetadataRecord, b: MetadataRecord): number {
    for (const field of METADATA_FIELDS) {
        if (a[field] !== b[field]) {
            return a[field] < b[field] ? -1 : 1;
        }
    }
    return 0;
}
