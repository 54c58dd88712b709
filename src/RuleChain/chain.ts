// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview Fluent, immutable rule chains.
 *
 * A chain starts from a kind root in {@link types} and every fluent call
 * returns a new chain with one more operator appended, so a chain can be
 * stored in a constant and reused by any number of fields.
 *
 * ```typescript
 * const title = types.str.trim().maxLength(100).required();
 * const Article = defineRecord("Article", { title, subtitle: title });
 * ```
 */

import type { Codec, FieldKind, Operator, OperatorContext, WriteContext } from "./types";
import type { SchemaEntry } from "./registry";
import type { RecordInstance, RecordType } from "./record";
import * as ops from "./operators";

/**
 * Reference from an instance chain to the record type it holds. `entry` is
 * set when the chain was built from a record type; a name alone is
 * resolved in the owning type's registry when a pass first needs it.
 */
export type InstanceTarget = {
    readonly name: string;
    readonly entry?: SchemaEntry;
};

/**
 * An ordered, immutable sequence of operators bound to one field kind.
 *
 * @template T - The value type a field holds once it validates
 */
export class RuleChain<T> {
    /** Carries the value type for {@link ChainValue}; never set. */
    declare readonly valueType?: T;

    readonly operators: readonly Operator[];

    constructor(
        readonly kind: FieldKind,
        operators: readonly Operator[],
        /** Element chain of a `list` or `dict` chain. */
        readonly item?: RuleChain<unknown>,
        /** Record type of an `instance` chain. */
        readonly target?: InstanceTarget,
    ) {
        this.operators = Object.freeze([...operators]);
    }

    /** Whether any operator in the chain has the given name. */
    has(name: string): boolean {
        return this.operators.some((op) => op.name === name);
    }

    /** Appends an arbitrary operator. */
    use(op: Operator): RuleChain<T> {
        return new RuleChain<T>(this.kind, [...this.operators, op], this.item, this.target);
    }

    /** Fails validation when the field is `null` or `undefined`. */
    required(): RuleChain<T> {
        return this.use(ops.required());
    }

    /**
     * Fills the field when it has no value. Pass a factory for values that
     * must not be shared, or a plain value (objects are cloned per fill).
     */
    default(value: T | (() => T)): RuleChain<T> {
        return this.use(ops.defaultValue(value));
    }

    /** Discards untrusted writes. The field can only be filled by a default or a trusted write. */
    readonly(): RuleChain<T> {
        return this.use(ops.readonly());
    }

    /** Accepts an untrusted update only while the field has no value. */
    writeonce(): RuleChain<T> {
        return this.use(ops.writeonce());
    }

    /** Accepted on input, omitted from JSON output. */
    writeonly(): RuleChain<T> {
        return this.use(ops.writeonly());
    }

    /**
     * Minimum length of a string or list, inclusive.
     *
     * @param min - Non-negative integer; checked when the chain is built
     */
    minLength(min: number): RuleChain<T> {
        return this.use(ops.minLength(min));
    }

    /** Maximum length of a string or list, inclusive. */
    maxLength(max: number): RuleChain<T> {
        return this.use(ops.maxLength(max));
    }

    /**
     * Length bounds of a string or list, both inclusive. With one argument
     * the length must be exact.
     *
     * @example
     * ```typescript
     * const pin = types.str.length(4);
     * const handle = types.str.length(3, 15);
     * ```
     */
    length(min: number, max?: number): RuleChain<T> {
        return this.use(ops.length(min, max));
    }

    /** Value must equal one of `values`. */
    oneOf(values: readonly T[]): RuleChain<T> {
        return this.use(ops.oneOf(values));
    }

    /** Inclusive lower bound for numbers. */
    min(bound: number): RuleChain<T> {
        return this.use(ops.min(bound));
    }

    /** Inclusive upper bound for numbers. */
    max(bound: number): RuleChain<T> {
        return this.use(ops.max(bound));
    }

    /**
     * Inclusive numeric range. Equivalent to `min(min).max(max)` but reports
     * a single failure.
     */
    range(min: number, max: number): RuleChain<T> {
        return this.use(ops.range(min, max));
    }

    /**
     * String must match `pattern`.
     *
     * @param pattern - Tested as given; global and sticky flags are dropped
     * @param message - Replaces the default failure message
     */
    match(pattern: RegExp, message?: string): RuleChain<T> {
        return this.use(ops.match(pattern, message));
    }

    email(): RuleChain<T> {
        return this.use(ops.email());
    }

    // Sanitizers run in the write pass and leave non-string values alone.

    trim(): RuleChain<T> {
        return this.use(ops.trim());
    }

    toLowerCase(): RuleChain<T> {
        return this.use(ops.toLowerCase());
    }

    toUpperCase(): RuleChain<T> {
        return this.use(ops.toUpperCase());
    }

    /** Cuts strings to at most `maxChars` code points. */
    truncate(maxChars: number): RuleChain<T> {
        return this.use(ops.truncate(maxChars));
    }

    /**
     * Custom write-mode transform. The function sees whatever the earlier
     * operators produced, which is not guaranteed to be `T` yet.
     */
    transform(fn: (value: unknown, context: WriteContext) => unknown): RuleChain<T> {
        return this.use(ops.transform(fn));
    }

    /** Custom check returning `true`, `false` or a failure message. */
    validate(check: (value: unknown, context: OperatorContext) => boolean | string): RuleChain<T> {
        return this.use(ops.custom(check));
    }

    /** Custom read-mode transform applied before the value is written to JSON. */
    serializeWith(fn: (value: unknown, context: OperatorContext) => unknown): RuleChain<T> {
        return this.use(ops.serializeWith(fn));
    }

    /**
     * Decodes string input with `codec` on write and encodes values that
     * pass `accepts` on read. Text the codec rejects is kept for the
     * validate pass to report.
     *
     * @example
     * ```typescript
     * const at = types.any.codec(DateTimeCodec, (v): v is Date => v instanceof Date);
     * ```
     */
    codec<V>(codec: Codec<V>, accepts: (value: unknown) => value is V): RuleChain<T> {
        return this.use(ops.codec(codec, accepts));
    }
}

/** The validated value type of a chain. */
export type ChainValue<C> = C extends RuleChain<infer T> ? T : never;

/** Field name → chain mapping of a record type, in declaration order. */
export type Shape = { readonly [field: string]: RuleChain<unknown> };

/**
 * Kind roots. Every chain starts here.
 *
 * @example
 * ```typescript
 * const Profile = defineRecord("Profile", {
 *   name: types.str.required(),
 *   age: types.int.range(0, 150),
 *   tags: types.listOf(types.str.trim()),
 *   address: types.instanceOf(Address),
 *   manager: types.instanceOf("Profile"),
 * });
 * ```
 */
export const types = {
    str: new RuleChain<string>("string", [ops.stringType()]),
    int: new RuleChain<number>("integer", [ops.integerType()]),
    float: new RuleChain<number>("float", [ops.floatType()]),
    bool: new RuleChain<boolean>("boolean", [ops.booleanType()]),
    date: new RuleChain<Date>("date", [ops.dateType()]),
    datetime: new RuleChain<Date>("datetime", [ops.datetimeType()]),
    any: new RuleChain<unknown>("any", [ops.anyType()]),

    listOf<T>(item: RuleChain<T>): RuleChain<readonly T[]> {
        return new RuleChain<readonly T[]>("list", [ops.listType()], item);
    },

    dictOf<T>(item: RuleChain<T>): RuleChain<Readonly<Record<string, T>>> {
        return new RuleChain<Readonly<Record<string, T>>>("dict", [ops.dictType()], item);
    },

    /**
     * A nested record. Pass the record type, or its registered name to refer
     * to a type that is defined later (or to the type being defined).
     */
    instanceOf<S extends Shape = Shape>(type: RecordType<S> | string): RuleChain<RecordInstance<S>> {
        const target: InstanceTarget =
            typeof type === "string" ? { name: type } : { name: type.name, entry: type.entry };
        return new RuleChain<RecordInstance<S>>("instance", [ops.instanceType(target.name)], undefined, target);
    },
} as const;
