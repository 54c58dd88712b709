// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview Error classes raised by RuleChain.
 *
 * Schema errors are programming mistakes and abort immediately. Input errors
 * and validation failures describe bad data and carry enough structure for
 * the caller to decide what to do with them.
 */

import type { ValidationReport } from "./types";
import { formatReport } from "./report";

/**
 * Error thrown when a schema definition or lookup is wrong.
 *
 * These are programmer errors: they surface at registration time (or on
 * the first pass that needs an unregistered type) and are never caused by
 * the data flowing through a record.
 *
 * Error codes:
 *
 * | Code                           | Meaning                                                      |
 * | ------------------------------ | ------------------------------------------------------------ |
 * | `SCHEMA_NOT_FOUND`             | No type with that name is registered.                        |
 * | `SCHEMA_REGISTRATION_CONFLICT` | A type with the same name is already registered.             |
 * | `DUPLICATE_FIELD`              | Two fields share a name, or map to the same JSON key.        |
 * | `OPERATOR_KIND_MISMATCH`       | An operator was applied to a field kind it does not support. |
 * | `INVALID_OPERATOR_ARGUMENT`    | An operator was built with unusable parameters.              |
 */
export class SchemaError extends Error {
    /**
     * Machine-readable code identifying the category of schema failure.
     */
    readonly code:
        | "SCHEMA_NOT_FOUND"
        | "SCHEMA_REGISTRATION_CONFLICT"
        | "DUPLICATE_FIELD"
        | "OPERATOR_KIND_MISMATCH"
        | "INVALID_OPERATOR_ARGUMENT";

    /**
     * The underlying error that caused this failure, if any.
     */
    readonly cause?: unknown;

    constructor(code: SchemaError["code"], message: string, cause?: unknown) {
        super(message);
        this.name = "SchemaError";
        this.code = code;
        this.cause = cause;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Error thrown when caller input cannot be accepted as given.
 *
 * Raised after every acceptable field has been written, so the record still
 * reflects the well-formed part of the input.
 *
 * | Code               | Meaning                                                   |
 * | ------------------ | --------------------------------------------------------- |
 * | `INVALID_INPUT`    | The input is not a key/value mapping.                     |
 * | `UNEXPECTED_FIELD` | Unknown keys were supplied to a type that rejects them.   |
 * | `READONLY_FIELD`   | A readonly or writeonce field vetoed a supplied value.    |
 * | `IMMUTABLE_RECORD` | The record type does not accept updates.                  |
 */
export class InputError extends Error {
    readonly code: "INVALID_INPUT" | "UNEXPECTED_FIELD" | "READONLY_FIELD" | "IMMUTABLE_RECORD";

    /** The offending keys, as dotted paths for nested input. */
    readonly keys: readonly string[];

    constructor(code: InputError["code"], message: string, keys: readonly string[] = []) {
        super(message);
        this.name = "InputError";
        this.code = code;
        this.keys = keys;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Error thrown by `validate()` when the validation report is not empty.
 *
 * The message lists every failure; the full structured report is available
 * on {@link report}.
 *
 * @example
 * ```typescript
 * try {
 *   article.validate();
 * } catch (error) {
 *   if (error instanceof ValidationException) {
 *     for (const { path, message } of error.report) showFieldError(path, message);
 *   }
 * }
 * ```
 */
export class ValidationException extends Error {
    readonly code = "VALIDATION_FAILED";

    /** Every failure found by the pass, in field declaration order. */
    readonly report: ValidationReport;

    constructor(typeName: string, report: ValidationReport) {
        super(`Validation failed for "${typeName}": ${formatReport(report)}`);
        this.name = "ValidationException";
        this.report = report;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
