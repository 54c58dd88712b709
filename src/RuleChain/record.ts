// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview Record types and instances.
 *
 * `defineRecord` is the binder: it registers a shape once, when the type is
 * defined, and returns a handle that constructs instances. Every write to
 * an instance goes through the sanitize pass, so field values have always
 * passed their chain's write-mode operators.
 */

import type { ChainValue, Shape } from "./chain";
import type { SchemaEntry } from "./registry";
import type { JsonObject, RecordOptions, RecordStatus, RecordView, ValidationReport } from "./types";
import { defaultRegistry } from "./registry";
import { ValidationException } from "./errors";
import { ErrorAggregator } from "./report";
import * as pipeline from "./pipeline";

/** Construction or update input: a JSON-shaped mapping keyed by field name or JSON key. */
export type RecordInput = Readonly<Record<string, unknown>>;

export type WriteOptions = {
    /**
     * Trusted writes come from application code rather than from clients:
     * `readonly` and `writeonce` do not veto them.
     *
     * @default false
     */
    trusted?: boolean;
};

/**
 * An instance of a registered record type.
 *
 * @template S - The shape the type was defined with
 */
export class RecordInstance<S extends Shape = Shape> implements RecordView {
    /**
     * Field values keyed by field name. Written only by the pipeline.
     *
     * @internal
     */
    readonly store = new Map<string, unknown>();

    private lifecycle: RecordStatus = "sanitized";

    constructor(readonly entry: SchemaEntry) {}

    get typeName(): string {
        return this.entry.name;
    }

    get status(): RecordStatus {
        return this.lifecycle;
    }

    /**
     * Returns a field's value. The declared type is only guaranteed once the
     * record validates.
     */
    get<K extends keyof S & string>(field: K): ChainValue<S[K]> | undefined;
    get(field: string): unknown;
    get(field: string): unknown {
        return this.store.get(field);
    }

    /** Snapshot of all field values keyed by field name. */
    get values(): Readonly<Record<string, unknown>> {
        const out: Record<string, unknown> = {};
        for (const field of this.entry.fields) out[field.name] = this.store.get(field.name);
        return out;
    }

    /**
     * Writes client input. `readonly` fields are kept, `writeonce` fields
     * only accept a value while empty.
     *
     * @throws {InputError} See {@link pipeline.sanitize}
     */
    set(updates: RecordInput): this {
        return this.write(updates, false);
    }

    /**
     * Writes trusted input from application code. Values are still
     * sanitized, but access rules do not veto them.
     */
    update(updates: RecordInput): this {
        return this.write(updates, true);
    }

    private write(updates: RecordInput, trusted: boolean): this {
        this.lifecycle = "sanitized";
        pipeline.sanitize(this.entry, this, updates, { phase: "update", trusted });
        return this;
    }

    /** Runs the validate pass and returns every failure without throwing. */
    validationReport(): ValidationReport {
        return pipeline.validate(this.entry, this);
    }

    /**
     * @throws {ValidationException} carrying the full report when any field fails
     */
    validate(): this {
        const report = this.validationReport();
        this.lifecycle = report.length > 0 ? "invalid" : "validated";
        if (report.length > 0) throw new ValidationException(this.entry.name, report);
        return this;
    }

    /** Whether the record validates. Stops at the first failure. */
    isValid(): boolean {
        return pipeline.validate(this.entry, this, new ErrorAggregator(true)).length === 0;
    }

    toJSON(): JsonObject {
        return pipeline.serialize(this.entry, this);
    }

    serialize(options?: pipeline.SerializeOptions): JsonObject {
        return pipeline.serialize(this.entry, this, options);
    }
}

/**
 * Handle returned by {@link defineRecord}.
 */
export interface RecordType<S extends Shape> {
    readonly name: string;
    readonly entry: SchemaEntry;
    readonly shape: S;

    /**
     * Builds an instance from construction input. Declared fields missing
     * from the input receive their defaults; unknown keys are dropped (or
     * rejected, per the type's options).
     *
     * @throws {InputError} See {@link pipeline.sanitize}
     */
    create(input?: RecordInput, options?: WriteOptions): RecordInstance<S>;

    is(value: unknown): value is RecordInstance<S>;
}

/**
 * Registers a record type and returns its handle. Field declaration order
 * is the key order of `shape`.
 *
 * @throws {SchemaError} if the name is taken in the registry or the shape is invalid
 *
 * @example
 * ```typescript
 * const Article = defineRecord("Article", {
 *   title: types.str.maxLength(100).required(),
 *   content: types.str.required(),
 *   read_count: types.int.default(0).required(),
 * });
 *
 * const article = Article.create({ title: "Hi", content: "Body" }).validate();
 * article.toJSON(); // { title: "Hi", content: "Body", read_count: 0 }
 * ```
 */
export function defineRecord<S extends Shape>(name: string, shape: S, options: RecordOptions = {}): RecordType<S> {
    const registry = options.registry ?? defaultRegistry;
    const fields = Object.entries(shape).map(([field, chain]) => ({ name: field, chain }));
    const entry = registry.register(name, fields, options);

    return Object.freeze({
        name,
        entry,
        shape,
        create: (input: RecordInput = {}, writeOptions: WriteOptions = {}) =>
            pipeline.construct<S>(entry, input, writeOptions),
        is: (value: unknown): value is RecordInstance<S> =>
            value instanceof RecordInstance && value.entry === entry,
    });
}
