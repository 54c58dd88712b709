// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview Built-in operators.
 *
 * Each factory returns a frozen {@link Operator} with its parameters bound.
 * Chains never call these directly from user code; they are appended by the
 * fluent methods on `RuleChain`. Parameter errors are raised here, at build
 * time, and kind compatibility is checked when the schema is registered.
 */

import type { Codec, FieldKind, Operator, OperatorContext, PassMode, WriteContext } from "./types";
import { CodecError, DateCodec, DateTimeCodec } from "./codecs";
import { SchemaError } from "./errors";
import { describeValue, isAbsent, isPlainObject, typeLabel, valuesEqual } from "./values";

const STRING_KINDS: readonly FieldKind[] = ["string"];
const LENGTH_KINDS: readonly FieldKind[] = ["string", "list"];
const NUMBER_KINDS: readonly FieldKind[] = ["integer", "float"];
const SCALAR_KINDS: readonly FieldKind[] = ["string", "integer", "float", "boolean", "date", "datetime", "any"];

const INTEGER_TEXT = /^[+-]?\d+$/;
const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function operator(spec: Operator): Operator {
    return Object.freeze({ ...spec, params: Object.freeze([...spec.params]) });
}

/** Returns the passes an operator takes part in. */
export function operatorModes(op: Operator): PassMode[] {
    const modes: PassMode[] = [];
    if (op.write) modes.push("write");
    if (op.validate) modes.push("validate");
    if (op.read) modes.push("read");
    return modes;
}

function expectedType(kind: string, value: unknown): string {
    return `Expected type ${JSON.stringify(kind)}, got ${typeLabel(value)}`;
}

function requireCount(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw new SchemaError(
            "INVALID_OPERATOR_ARGUMENT",
            `${name} expects a non-negative integer, got ${describeValue(value)}`,
        );
    }
}

function requireFinite(name: string, value: number): void {
    if (!Number.isFinite(value)) {
        throw new SchemaError(
            "INVALID_OPERATOR_ARGUMENT",
            `${name} expects a finite number, got ${describeValue(value)}`,
        );
    }
}

function decodeWith<T>(codec: Codec<T>, value: unknown): unknown {
    if (typeof value !== "string") return value;
    try {
        return codec.decode(value);
    } catch (err) {
        // leave undecodable input for the validate pass to report
        if (err instanceof CodecError) return value;
        throw err;
    }
}

function isValidDate(value: unknown): value is Date {
    return value instanceof Date && !Number.isNaN(value.getTime());
}

// ---------------------------------------------------------------------------
// Kind roots
// ---------------------------------------------------------------------------

export function stringType(): Operator {
    return operator({
        name: "string",
        params: [],
        validate: (value) => (typeof value === "string" ? undefined : expectedType("string", value)),
    });
}

export function integerType(): Operator {
    return operator({
        name: "integer",
        params: [],
        write: (value) => {
            if (typeof value !== "string" || !INTEGER_TEXT.test(value.trim())) return value;
            // text beyond 2^53 would round to a different integer
            const parsed = Number(value.trim());
            return Number.isSafeInteger(parsed) ? parsed : value;
        },
        validate: (value) =>
            typeof value === "number" && Number.isSafeInteger(value) ? undefined : expectedType("integer", value),
    });
}

export function floatType(): Operator {
    return operator({
        name: "float",
        params: [],
        write: (value) => {
            if (typeof value === "string" && value.trim() !== "") {
                const parsed = Number(value);
                return Number.isFinite(parsed) ? parsed : value;
            }
            return value;
        },
        validate: (value) =>
            typeof value === "number" && Number.isFinite(value) ? undefined : expectedType("float", value),
    });
}

export function booleanType(): Operator {
    return operator({
        name: "boolean",
        params: [],
        write: (value) => {
            if (typeof value !== "string") return value;
            const text = value.trim().toLowerCase();
            if (text === "true") return true;
            if (text === "false") return false;
            return value;
        },
        validate: (value) => (typeof value === "boolean" ? undefined : expectedType("boolean", value)),
    });
}

export function dateType(): Operator {
    return operator({
        name: "date",
        params: [],
        write: (value) => decodeWith(DateCodec, value),
        validate: (value) => (isValidDate(value) ? undefined : expectedType("date", value)),
        read: (value) => (isValidDate(value) ? DateCodec.encode(value) : value),
    });
}

export function datetimeType(): Operator {
    return operator({
        name: "datetime",
        params: [],
        write: (value) => decodeWith(DateTimeCodec, value),
        validate: (value) => (isValidDate(value) ? undefined : expectedType("datetime", value)),
        read: (value) => (isValidDate(value) ? DateTimeCodec.encode(value) : value),
    });
}

export function listType(): Operator {
    return operator({
        name: "list",
        params: [],
        validate: (value) => (Array.isArray(value) ? undefined : expectedType("list", value)),
    });
}

export function dictType(): Operator {
    return operator({
        name: "dict",
        params: [],
        validate: (value) => (isPlainObject(value) ? undefined : expectedType("dict", value)),
    });
}

/**
 * Root of an instance chain. The record-type check itself needs the
 * registry, so the pipeline performs it after the chain's own operators.
 */
export function instanceType(target: string): Operator {
    return operator({ name: "instance", params: [target] });
}

export function anyType(): Operator {
    return operator({ name: "any", params: [] });
}

// ---------------------------------------------------------------------------
// Presence and access
// ---------------------------------------------------------------------------

export function required(): Operator {
    return operator({
        name: "required",
        params: [],
        checksAbsent: true,
        validate: (value) => (isAbsent(value) ? "Value is required" : undefined),
    });
}

/**
 * Fill-if-absent. A factory is called for every fill; a literal object or
 * array is cloned so records never share a default.
 */
export function defaultValue(value: unknown): Operator {
    const provide = (): unknown => (typeof value === "function" ? value() : structuredClone(value));
    return operator({
        name: "default",
        params: [value],
        write: (current) => (isAbsent(current) ? provide() : current),
    });
}

/** Returns the fill function of a `default` operator. */
export function defaultProvider(op: Operator): (() => unknown) | undefined {
    if (op.name !== "default" || op.write === undefined) return undefined;
    const write = op.write;
    return () => write(undefined, NO_WRITE_CONTEXT);
}

const NO_WRITE_CONTEXT: WriteContext = Object.freeze({
    record: Object.freeze({ typeName: "", get: () => undefined }),
    field: "",
    path: "",
    phase: "construct" as const,
    trusted: true,
    supplied: false,
    previous: undefined,
    discard: () => undefined,
});

export function readonly(): Operator {
    return operator({
        name: "readonly",
        params: [],
        write: (value, context) =>
            context.supplied && !context.trusted ? context.discard("readonly") : value,
    });
}

export function writeonce(): Operator {
    return operator({
        name: "writeonce",
        params: [],
        write: (value, context) =>
            context.supplied && !context.trusted && context.phase === "update" && !isAbsent(context.previous)
                ? context.discard("writeonce")
                : value,
    });
}

/** Marks a field as accepted on input but omitted from output. */
export function writeonly(): Operator {
    return operator({ name: "writeonly", params: [] });
}

// ---------------------------------------------------------------------------
// Validators
// ---------------------------------------------------------------------------

function lengthOf(value: unknown): number | undefined {
    if (typeof value === "string" || Array.isArray(value)) return value.length;
    return undefined;
}

export function minLength(min: number): Operator {
    requireCount("minLength", min);
    return operator({
        name: "minLength",
        params: [min],
        kinds: LENGTH_KINDS,
        validate: (value) => {
            const length = lengthOf(value);
            if (length === undefined || length >= min) return undefined;
            return `Length ${length} is less than minLength ${min}`;
        },
    });
}

export function maxLength(max: number): Operator {
    requireCount("maxLength", max);
    return operator({
        name: "maxLength",
        params: [max],
        kinds: LENGTH_KINDS,
        validate: (value) => {
            const length = lengthOf(value);
            if (length === undefined || length <= max) return undefined;
            return `Length ${length} is greater than maxLength ${max}`;
        },
    });
}

export function length(min: number, max: number = min): Operator {
    requireCount("length", min);
    requireCount("length", max);
    if (min > max) {
        throw new SchemaError("INVALID_OPERATOR_ARGUMENT", `length expects min <= max, got ${min} > ${max}`);
    }
    return operator({
        name: "length",
        params: [min, max],
        kinds: LENGTH_KINDS,
        validate: (value) => {
            const actual = lengthOf(value);
            if (actual === undefined || (actual >= min && actual <= max)) return undefined;
            return min === max
                ? `Length ${actual} is not ${min}`
                : `Length ${actual} is not between ${min} and ${max}`;
        },
    });
}

export function oneOf(values: readonly unknown[]): Operator {
    if (values.length === 0) {
        throw new SchemaError("INVALID_OPERATOR_ARGUMENT", "oneOf expects at least one allowed value");
    }
    const allowed = Object.freeze([...values]);
    const label = allowed.map(describeValue).join(", ");
    return operator({
        name: "oneOf",
        params: [allowed],
        kinds: SCALAR_KINDS,
        validate: (value) =>
            allowed.some((entry) => valuesEqual(value, entry))
                ? undefined
                : `Value ${describeValue(value)} is not one of ${label}`,
    });
}

export function min(bound: number): Operator {
    requireFinite("min", bound);
    return operator({
        name: "min",
        params: [bound],
        kinds: NUMBER_KINDS,
        validate: (value) =>
            typeof value === "number" && value < bound ? `Value ${value} is less than minimum ${bound}` : undefined,
    });
}

export function max(bound: number): Operator {
    requireFinite("max", bound);
    return operator({
        name: "max",
        params: [bound],
        kinds: NUMBER_KINDS,
        validate: (value) =>
            typeof value === "number" && value > bound
                ? `Value ${value} is greater than maximum ${bound}`
                : undefined,
    });
}

export function range(lower: number, upper: number): Operator {
    requireFinite("range", lower);
    requireFinite("range", upper);
    if (lower > upper) {
        throw new SchemaError("INVALID_OPERATOR_ARGUMENT", `range expects min <= max, got ${lower} > ${upper}`);
    }
    return operator({
        name: "range",
        params: [lower, upper],
        kinds: NUMBER_KINDS,
        validate: (value) => {
            if (typeof value !== "number") return undefined;
            if (value < lower) return `Value ${value} is less than minimum ${lower}`;
            if (value > upper) return `Value ${value} is greater than maximum ${upper}`;
            return undefined;
        },
    });
}

export function match(pattern: RegExp, message?: string): Operator {
    // a global or sticky regex keeps lastIndex between test() calls
    const re = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
    return operator({
        name: "match",
        params: [re, message],
        kinds: STRING_KINDS,
        validate: (value) => {
            if (typeof value !== "string" || re.test(value)) return undefined;
            return message ?? `Value ${describeValue(value)} does not match pattern ${re}`;
        },
    });
}

export function email(): Operator {
    return operator({
        name: "email",
        params: [],
        kinds: STRING_KINDS,
        validate: (value) =>
            typeof value !== "string" || EMAIL.test(value)
                ? undefined
                : `Value ${describeValue(value)} is not a valid email address`,
    });
}

/**
 * Custom check. The function returns `true` to pass, `false` for a generic
 * failure, or a message.
 */
export function custom(check: (value: unknown, context: OperatorContext) => boolean | string): Operator {
    return operator({
        name: "validate",
        params: [check],
        validate: (value, context) => {
            const verdict = check(value, context);
            if (verdict === true) return undefined;
            return verdict === false ? "Value is invalid" : verdict;
        },
    });
}

// ---------------------------------------------------------------------------
// Sanitizers and conversions
// ---------------------------------------------------------------------------

function stringWrite(name: string, fn: (value: string) => string, params: readonly unknown[] = []): Operator {
    return operator({
        name,
        params,
        kinds: STRING_KINDS,
        write: (value) => (typeof value === "string" ? fn(value) : value),
    });
}

export function trim(): Operator {
    return stringWrite("trim", (value) => value.trim());
}

export function toLowerCase(): Operator {
    return stringWrite("toLowerCase", (value) => value.toLowerCase());
}

export function toUpperCase(): Operator {
    return stringWrite("toUpperCase", (value) => value.toUpperCase());
}

export function truncate(maxChars: number): Operator {
    requireCount("truncate", maxChars);
    // counts code points so a surrogate pair is never split
    return stringWrite("truncate", (value) => Array.from(value).slice(0, maxChars).join(""), [maxChars]);
}

export function transform(fn: (value: unknown, context: WriteContext) => unknown): Operator {
    return operator({ name: "transform", params: [fn], write: fn });
}

export function serializeWith(fn: (value: unknown, context: OperatorContext) => unknown): Operator {
    return operator({ name: "serializeWith", params: [fn], read: fn });
}

/**
 * Decodes string input with `codec` on write and encodes values accepted
 * by `accepts` on read.
 */
export function codec<T>(codec: Codec<T>, accepts: (value: unknown) => value is T): Operator {
    return operator({
        name: "codec",
        params: [codec],
        write: (value) => decodeWith(codec, value),
        read: (value) => (accepts(value) ? codec.encode(value) : value),
    });
}
