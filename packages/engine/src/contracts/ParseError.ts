/**
 * @fileoverview ParseError
 *
 * The only error the engine raises. Thrown by prefix parsing and by the
 * record codec; the engine never catches it, so the caller decides whether a
 * bad record aborts the run or is skipped.
 *
 * @module @rangefold/engine/contracts/ParseError
 */

import type { AddressFamilyName } from "./AddressFamily.js";

/**
 * Details attached to a ParseError.
 */
export interface ParseErrorDetails {
    /** The offending text (or a JSON rendering of a non-string value) */
    readonly input: string;

    /** What was wrong with it */
    readonly reason: string;

    /** Family the input was parsed as, when known */
    readonly family?: AddressFamilyName;

    /** Position of the record in the upstream list, when parsing records */
    readonly recordIndex?: number;
}

/**
 * Raised when a prefix or record is not structurally valid.
 *
 * @example
 * ```typescript
 * try {
 *     parsePrefix("10.0.0.0/33", IPv4);
 * }
 * catch (error) {
 *     if (error instanceof ParseError) {
 *         console.log(error.reason); // "mask length 33 is out of range 0-32"
 *     }
 * }
 * ```
 */
export class ParseError extends Error {
    readonly input: string;
    readonly reason: string;
    readonly family?: AddressFamilyName;
    readonly recordIndex?: number;

    constructor(details: ParseErrorDetails, options?: { cause?: unknown }) {
        super(ParseError.describe(details), options);
        this.name = "ParseError";
        this.input = details.input;
        this.reason = details.reason;
        this.family = details.family;
        this.recordIndex = details.recordIndex;
    }

    /**
     * Copy of this error tagged with the record it came from.
     */
    atRecord(recordIndex: number): ParseError {
        return new ParseError({
            input : this.input,
            reason: this.reason,
            family: this.family,
            recordIndex,
        }, { cause: this.cause });
    }

    private static describe(details: ParseErrorDetails): string {
        const where = details.recordIndex !== undefined ? `record ${details.recordIndex}: ` : "";
        const family = details.family ? ` ${details.family}` : "";
        return `${where}invalid${family} input "${details.input}": ${details.reason}`;
    }
}
