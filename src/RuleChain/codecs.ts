// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview String codecs for field values.
 *
 * Codecs convert between an in-memory value and the string that represents
 * it in JSON. The `date` and `datetime` field kinds use the built-in codecs
 * below; any chain can use a custom one through the `codec()` operator.
 */

import type { Codec } from "./types";

/**
 * Error raised when a codec cannot encode or decode a value.
 *
 * Write-mode operators that decode input catch this error and leave the raw
 * value in place, so the failure surfaces later as a validation error rather
 * than an exception.
 */
export class CodecError extends Error {
    /**
     * The underlying error that caused the codec failure, if any.
     */
    readonly cause?: unknown;

    /**
     * @param message - Human-readable error description
     * @param cause - Optional underlying error that caused this failure
     */
    constructor(message: string, cause?: unknown) {
        super(message);
        this.name = "CodecError";
        this.cause = cause;

        // Required for proper instanceof behavior when targeting ES5
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function isValidDate(value: Date): boolean {
    return !Number.isNaN(value.getTime());
}

/**
 * Calendar date codec. Encodes to `YYYY-MM-DD` in UTC and decodes the same
 * form (or a full ISO-8601 timestamp, truncated to its UTC date) to a
 * `Date` at UTC midnight.
 *
 * @example
 * ```typescript
 * DateCodec.encode(new Date("2024-03-05T18:30:00Z")); // "2024-03-05"
 * DateCodec.decode("2024-03-05").toISOString();        // "2024-03-05T00:00:00.000Z"
 * ```
 */
export const DateCodec: Codec<Date> = {
    encode: (value) => {
        if (!isValidDate(value)) throw new CodecError("Cannot encode an invalid date");
        return value.toISOString().slice(0, 10);
    },
    decode: (encoded) => {
        const match = DATE_PATTERN.exec(encoded);
        const source = match ? `${encoded}T00:00:00.000Z` : encoded;
        const parsed = new Date(source);
        if (!isValidDate(parsed)) {
            throw new CodecError(`Cannot decode "${encoded}" as a date`);
        }
        if (match) {
            // reject rollovers such as 2024-02-31
            const [, y, m, d] = match;
            if (parsed.toISOString().slice(0, 10) !== `${y}-${m}-${d}`) {
                throw new CodecError(`Cannot decode "${encoded}" as a date`);
            }
            return parsed;
        }
        return new Date(Date.UTC(parsed.getUTCFullYear(), parsed.getUTCMonth(), parsed.getUTCDate()));
    },
};

/**
 * Timestamp codec. Encodes with `Date.prototype.toISOString` and decodes
 * anything `Date` can parse.
 */
export const DateTimeCodec: Codec<Date> = {
    encode: (value) => {
        if (!isValidDate(value)) throw new CodecError("Cannot encode an invalid datetime");
        return value.toISOString();
    },
    decode: (encoded) => {
        const parsed = new Date(encoded);
        if (!isValidDate(parsed)) {
            throw new CodecError(`Cannot decode "${encoded}" as a datetime`);
        }
        return parsed;
    },
};

/**
 * Builds a {@link Codec} from separate encode and decode functions.
 *
 * @example
 * ```typescript
 * const TagSetCodec = createCodec<Set<string>>(
 *   (set) => Array.from(set).join(","),
 *   (str) => new Set(str.split(",").filter(Boolean)),
 * );
 *
 * const Post = defineRecord("Post", {
 *   tags: types.any.codec(TagSetCodec, (v): v is Set<string> => v instanceof Set),
 * });
 * ```
 */
export function createCodec<T>(encode: (value: T) => string, decode: (encoded: string) => T): Codec<T> {
    return { encode, decode };
}
