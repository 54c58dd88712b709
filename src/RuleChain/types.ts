// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview Shared type definitions for RuleChain.
 *
 * This module defines the JSON value universe, the operator protocol that
 * every rule in a chain implements, and the per-type options accepted by
 * the record binder.
 */

import type { SchemaRegistry } from "./registry";

/** A JSON scalar. */
export type JsonPrimitive = string | number | boolean | null;

/** Any value that survives a `JSON.stringify` / `JSON.parse` round trip unchanged. */
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** A JSON object with string keys. */
export type JsonObject = { [key: string]: JsonValue };

/**
 * The declared kind of a field. Every chain starts from exactly one kind
 * and operators declare which kinds they accept.
 */
export type FieldKind =
    | "string"
    | "integer"
    | "float"
    | "boolean"
    | "date"
    | "datetime"
    | "list"
    | "dict"
    | "instance"
    | "any";

/**
 * The three passes an operator can take part in.
 *
 * - `"write"` runs on construction and update (sanitize pass)
 * - `"validate"` runs on demand (validate pass)
 * - `"read"` runs when producing JSON output (serialize pass)
 */
export type PassMode = "write" | "validate" | "read";

/**
 * Read-only view of a record exposed to operators. Operators reach sibling
 * fields only through this view.
 */
export interface RecordView {
    /** Registered type name of the record. */
    readonly typeName: string;

    /**
     * Returns the current in-memory value of a field, or `undefined` when
     * the field holds no value.
     */
    get(field: string): unknown;
}

/**
 * Context handed to validate-mode and read-mode operator functions.
 */
export interface OperatorContext {
    /** The record that owns the field. */
    readonly record: RecordView;

    /** The field the chain is bound to. */
    readonly field: string;

    /** Dotted path of the value from the outermost record (e.g. `"address.zipcode"`). */
    readonly path: string;
}

/** Why a write operator vetoed a caller-supplied value. */
export type DiscardReason = "readonly" | "writeonce";

/**
 * Context handed to write-mode operator functions.
 */
export interface WriteContext extends OperatorContext {
    /** `"construct"` while building a new record, `"update"` for later writes. */
    readonly phase: "construct" | "update";

    /**
     * `true` for internal writes (`update`, trusted construction). Access
     * rules such as `readonly` do not veto trusted writes.
     */
    readonly trusted: boolean;

    /** `true` when the caller's input carried a value for this field. */
    readonly supplied: boolean;

    /** The value the field held before this write. */
    readonly previous: unknown;

    /**
     * Records that the supplied value was vetoed and returns the value the
     * field should keep. The pipeline applies the type's
     * {@link ReadonlyViolationPolicy} to every recorded discard.
     */
    discard(reason: DiscardReason): unknown;
}

/**
 * The atomic unit of a rule chain.
 *
 * An operator is a tagged structure holding up to three pure functions, one
 * per {@link PassMode}. A pass invokes whichever function is present and
 * skips operators that declare nothing for it. Parameters are captured when
 * the operator is built and never change.
 *
 * Validate functions return a failure message, or `undefined` when the value
 * passes. They are only called for present values unless
 * {@link checksAbsent} is set.
 */
export interface Operator {
    /** Operator name, e.g. `"maxLength"`. Used in reports and error messages. */
    readonly name: string;

    /** Parameters bound at build time. */
    readonly params: readonly unknown[];

    /** Field kinds this operator may be applied to. Omitted means any kind. */
    readonly kinds?: readonly FieldKind[];

    /** When set, the validate function also runs for absent values. */
    readonly checksAbsent?: boolean;

    readonly write?: (value: unknown, context: WriteContext) => unknown;
    readonly validate?: (value: unknown, context: OperatorContext) => string | undefined;
    readonly read?: (value: unknown, context: OperatorContext) => unknown;
}

/**
 * Codec for converting values to and from their string representation.
 *
 * Used by the `date` and `datetime` field kinds and by the `codec()`
 * operator: strings are decoded on write and values are encoded on read.
 *
 * @template T - The in-memory type of the value
 */
export interface Codec<T> {
    /**
     * Transforms an in-memory value into its string form.
     *
     * @throws {CodecError} If the value cannot be encoded
     */
    encode: (value: T) => string;

    /**
     * Transforms a string back into an in-memory value.
     *
     * @throws {CodecError} If the string cannot be decoded
     */
    decode: (encoded: string) => T;
}

/**
 * Bidirectional mapping between field names and wire (JSON) keys.
 *
 * Implementations must be deterministic and must return names that do not
 * cleanly map unchanged.
 */
export interface KeyCaseConverter {
    /** Field name → JSON key. */
    toWire(name: string): string;

    /** JSON key → field name. */
    fromWire(key: string): string;
}

/**
 * Key-case policy of a record type.
 *
 * - `"identity"`: JSON keys equal field names
 * - `"camelize"`: underscored field names, camelCase JSON keys
 * - `"snakeize"`: camelCase field names, underscored JSON keys
 * - a custom {@link KeyCaseConverter}
 *
 * @default "identity"
 */
export type KeyCasePolicy = "identity" | "camelize" | "snakeize" | KeyCaseConverter;

/**
 * What to do with input keys that match no declared field.
 *
 * @default "ignore"
 */
export type ExtraFieldPolicy = "ignore" | "reject";

/**
 * How a vetoed write to a `readonly` or `writeonce` field is reported.
 *
 * - `"discard"`: drop the value silently
 * - `"warn"`: drop the value and log a warning
 * - `"reject"`: drop the value and raise an `InputError` once the write completes
 *
 * @default "discard"
 */
export type ReadonlyViolationPolicy = "discard" | "warn" | "reject";

/**
 * Per-type options accepted by `defineRecord` and `SchemaRegistry.register`.
 *
 * @example
 * ```typescript
 * const User = defineRecord(
 *   "User",
 *   { first_name: types.str.required() },
 *   { keyCase: "camelize", extraFields: "reject" },
 * );
 * ```
 */
export interface RecordOptions {
    /** @default "ignore" */
    extraFields?: ExtraFieldPolicy;

    /** @default "identity" */
    keyCase?: KeyCasePolicy;

    /**
     * Whether instances accept `set` / `update` after construction.
     *
     * @default true
     */
    mutable?: boolean;

    /** @default "discard" */
    readonlyViolation?: ReadonlyViolationPolicy;

    /**
     * Registry the type is registered in.
     *
     * @default defaultRegistry
     */
    registry?: SchemaRegistry;
}

/**
 * Lifecycle status of a record instance.
 *
 * `"sanitized"` after construction or any update, `"validated"` after a
 * successful `validate()`, `"invalid"` after a failed one. `"invalid"` is
 * not terminal: the next update returns the record to `"sanitized"`.
 */
export type RecordStatus = "sanitized" | "validated" | "invalid";

/**
 * A single failure produced by the validate pass.
 */
export type ValidationError = {
    /** Dotted path to the failing value (e.g. `"address.zipcode"`, `"tags.0"`). */
    path: string;
    /** Human-readable error description. */
    message: string;
    /** The offending value. */
    value: unknown;
    /** Name of the operator that failed. */
    operator: string;
};

/** Ordered validation failures. Empty means the record is valid. */
export type ValidationReport = readonly ValidationError[];
