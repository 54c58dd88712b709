// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview The three passes over a record.
 *
 * - {@link sanitize} runs write-mode operators on construction and update
 * - {@link validate} runs validate-mode operators and collects every failure
 * - {@link serialize} runs read-mode operators and builds a fresh JSON tree
 *
 * Fields are visited in declaration order and each chain's operators in
 * chain order. Nested records, and lists or dicts of them, go through the
 * same passes with their paths prefixed by the parent path. Lists and
 * dicts built by the write pass are frozen, so they only change through
 * another write.
 */

import type { Shape, InstanceTarget, RuleChain } from "./chain";
import type { FieldDescriptor, SchemaEntry } from "./registry";
import type {
    DiscardReason,
    JsonObject,
    JsonValue,
    OperatorContext,
    ValidationReport,
    WriteContext,
} from "./types";
import { InputError } from "./errors";
import { ErrorAggregator, joinPath } from "./report";
import { RecordInstance } from "./record";
import { isAbsent, isPlainObject, typeLabel } from "./values";

/**
 * How a sanitize pass treats its input.
 */
export type SanitizeOptions = {
    /** `"construct"` visits every field and fills defaults; `"update"` only visits supplied fields. */
    readonly phase: "construct" | "update";
    /** Trusted writes bypass `readonly` and `writeonce`. */
    readonly trusted: boolean;
};

export type SerializeOptions = {
    /**
     * Include `writeonly` fields in the output.
     *
     * @default false
     */
    readonly includeWriteonly?: boolean;
};

/** Problems collected while sanitizing, raised once the pass completes. */
type Trail = {
    readonly unexpected: string[];
    readonly rejected: string[];
};

function resolveTarget(owner: SchemaEntry, target: InstanceTarget): SchemaEntry {
    return target.entry ?? owner.registry.lookup(target.name);
}

function quoteList(keys: readonly string[]): string {
    return keys.map((k) => `"${k}"`).join(", ");
}

// ---------------------------------------------------------------------------
// Sanitize
// ---------------------------------------------------------------------------

/**
 * Writes `input` onto `record` through each field's write-mode operators.
 *
 * Known fields are always written first; unexpected keys (under
 * `extraFields: "reject"`) and rejected readonly writes (under
 * `readonlyViolation: "reject"`) are raised afterwards as one error each.
 *
 * @throws {InputError} `INVALID_INPUT`, `IMMUTABLE_RECORD`, `UNEXPECTED_FIELD`
 *   or `READONLY_FIELD`
 * @throws {SchemaError} `SCHEMA_NOT_FOUND` when a nested type name does not resolve
 */
export function sanitize(
    entry: SchemaEntry,
    record: RecordInstance,
    input: Readonly<Record<string, unknown>>,
    options: SanitizeOptions,
): void {
    if (!isPlainObject(input)) {
        throw new InputError(
            "INVALID_INPUT",
            `Input for "${entry.name}" must be a key/value mapping, got ${typeLabel(input)}`,
        );
    }
    if (options.phase === "update" && !entry.options.mutable) {
        throw new InputError("IMMUTABLE_RECORD", `Record type "${entry.name}" does not accept updates`);
    }

    const trail: Trail = { unexpected: [], rejected: [] };
    sanitizeInto(entry, record, input, options, "", trail);

    if (trail.unexpected.length > 0) {
        throw new InputError(
            "UNEXPECTED_FIELD",
            `Unexpected field(s) ${quoteList(trail.unexpected)} for "${entry.name}"`,
            trail.unexpected,
        );
    }
    if (trail.rejected.length > 0) {
        throw new InputError(
            "READONLY_FIELD",
            `Field(s) ${quoteList(trail.rejected)} of "${entry.name}" cannot be written`,
            trail.rejected,
        );
    }
}

/**
 * Builds a new record of the given type from construction input.
 */
export function construct<S extends Shape = Shape>(
    entry: SchemaEntry,
    input: Readonly<Record<string, unknown>>,
    options: { trusted?: boolean } = {},
): RecordInstance<S> {
    const record = new RecordInstance<S>(entry);
    sanitize(entry, record, input, { phase: "construct", trusted: options.trusted ?? false });
    return record;
}

function matchField(entry: SchemaEntry, key: string): FieldDescriptor | undefined {
    return entry.byWireName.get(key) ?? entry.byName.get(entry.keyCase.fromWire(key)) ?? entry.byName.get(key);
}

function sanitizeInto(
    entry: SchemaEntry,
    record: RecordInstance,
    input: Record<string, unknown>,
    options: SanitizeOptions,
    path: string,
    trail: Trail,
): void {
    const supplied = new Map<string, unknown>();
    for (const key of Object.keys(input)) {
        const field = matchField(entry, key);
        if (!field) {
            if (entry.options.extraFields === "reject") trail.unexpected.push(joinPath(path, key));
            continue;
        }
        supplied.set(field.name, input[key]);
    }

    for (const field of entry.fields) {
        if (options.phase === "update" && !supplied.has(field.name)) continue;
        const raw = supplied.get(field.name);
        writeField(entry, record, field, raw, raw !== undefined, options, joinPath(path, field.name), trail);
    }
}

function reportDiscard(entry: SchemaEntry, path: string, reason: DiscardReason, trail: Trail): void {
    switch (entry.options.readonlyViolation) {
        case "warn":
            console.warn(`[RuleChain] Discarded ${reason} value for "${path}" on "${entry.name}"`);
            break;
        case "reject":
            trail.rejected.push(path);
            break;
        default:
            break;
    }
}

function writeField(
    entry: SchemaEntry,
    record: RecordInstance,
    field: FieldDescriptor,
    raw: unknown,
    supplied: boolean,
    options: SanitizeOptions,
    path: string,
    trail: Trail,
): void {
    const previous = record.store.get(field.name);
    let vetoed = false;
    const context: WriteContext = {
        record,
        field: field.name,
        path,
        phase: options.phase,
        trusted: options.trusted,
        supplied,
        previous,
        discard: (reason) => {
            if (!vetoed) {
                vetoed = true;
                reportDiscard(entry, path, reason, trail);
            }
            return previous;
        },
    };

    let value = runWrite(field.chain, raw, context);
    // a veto may have emptied a field whose default ran earlier in the chain
    if (isAbsent(value) && field.defaultValue && (options.phase === "construct" || vetoed)) {
        value = field.defaultValue();
    }
    record.store.set(field.name, writeNested(entry, field.chain, value, context, options, trail));
}

function runWrite(chain: RuleChain<unknown>, value: unknown, context: WriteContext): unknown {
    let current = value;
    for (const op of chain.operators) {
        if (op.write) current = op.write(current, context);
    }
    return current;
}

function writeNested(
    owner: SchemaEntry,
    chain: RuleChain<unknown>,
    value: unknown,
    context: WriteContext,
    options: SanitizeOptions,
    trail: Trail,
): unknown {
    switch (chain.kind) {
        case "instance": {
            if (!chain.target || !isPlainObject(value)) return value;
            const target = resolveTarget(owner, chain.target);
            const nested = new RecordInstance(target);
            sanitizeInto(target, nested, value, { phase: "construct", trusted: options.trusted }, context.path, trail);
            return nested;
        }
        case "list": {
            const item = chain.item;
            if (!item || !Array.isArray(value)) return value;
            return Object.freeze(
                value.map((element, index) => writeElement(owner, item, element, context, index, options, trail)),
            );
        }
        case "dict": {
            const item = chain.item;
            if (!item || !isPlainObject(value)) return value;
            // fromEntries keeps a "__proto__" key as an own property
            return Object.freeze(
                Object.fromEntries(
                    Object.entries(value).map(([key, element]): [string, unknown] => [
                        key,
                        writeElement(owner, item, element, context, key, options, trail),
                    ]),
                ),
            );
        }
        default:
            return value;
    }
}

function writeElement(
    owner: SchemaEntry,
    chain: RuleChain<unknown>,
    element: unknown,
    parent: WriteContext,
    segment: string | number,
    options: SanitizeOptions,
    trail: Trail,
): unknown {
    const path = joinPath(parent.path, segment);
    const context: WriteContext = {
        record: parent.record,
        field: parent.field,
        path,
        phase: parent.phase,
        trusted: parent.trusted,
        supplied: element !== undefined,
        previous: undefined,
        discard: (reason) => {
            reportDiscard(owner, path, reason, trail);
            return undefined;
        },
    };
    return writeNested(owner, chain, runWrite(chain, element, context), context, options, trail);
}

// ---------------------------------------------------------------------------
// Validate
// ---------------------------------------------------------------------------

/**
 * Runs every field's validate-mode operators and returns the collected
 * failures.
 *
 * Within one chain the first failing operator ends that chain; the pass
 * itself continues with the remaining fields unless the aggregator was
 * created with `stopAtFirst`.
 *
 * @param path - Prefix for error paths when validating a nested record
 */
export function validate(
    entry: SchemaEntry,
    record: RecordInstance,
    aggregator: ErrorAggregator = new ErrorAggregator(),
    path: string = "",
): ValidationReport {
    collect(entry, record, aggregator, path);
    return aggregator.toReport();
}

function collect(entry: SchemaEntry, record: RecordInstance, aggregator: ErrorAggregator, path: string): void {
    for (const field of entry.fields) {
        if (aggregator.done) return;
        const context: OperatorContext = { record, field: field.name, path: joinPath(path, field.name) };
        check(entry, field.chain, record.store.get(field.name), context, aggregator);
    }
}

function check(
    owner: SchemaEntry,
    chain: RuleChain<unknown>,
    value: unknown,
    context: OperatorContext,
    aggregator: ErrorAggregator,
): void {
    const absent = isAbsent(value);
    for (const op of chain.operators) {
        if (!op.validate || (absent && !op.checksAbsent)) continue;
        const message = op.validate(value, context);
        if (message !== undefined) {
            aggregator.add(context.path, message, value, op.name);
            return;
        }
    }
    if (absent) return;

    const elementContext = (segment: string | number): OperatorContext => ({
        record: context.record,
        field: context.field,
        path: joinPath(context.path, segment),
    });

    switch (chain.kind) {
        case "instance": {
            if (!chain.target) return;
            const target = resolveTarget(owner, chain.target);
            if (!(value instanceof RecordInstance) || value.entry !== target) {
                const actual = value instanceof RecordInstance ? `"${value.typeName}"` : typeLabel(value);
                aggregator.add(context.path, `Expected instance of "${target.name}", got ${actual}`, value, "instance");
                return;
            }
            collect(target, value, aggregator, context.path);
            return;
        }
        case "list": {
            const item = chain.item;
            if (!item || !Array.isArray(value)) return;
            value.forEach((element, index) => {
                if (!aggregator.done) check(owner, item, element, elementContext(index), aggregator);
            });
            return;
        }
        case "dict": {
            const item = chain.item;
            if (!item || !isPlainObject(value)) return;
            for (const [key, element] of Object.entries(value)) {
                if (aggregator.done) return;
                check(owner, item, element, elementContext(key), aggregator);
            }
            return;
        }
        default:
            return;
    }
}

// ---------------------------------------------------------------------------
// Serialize
// ---------------------------------------------------------------------------

/**
 * Produces the JSON form of a record: read-mode operators applied, nested
 * values expanded, keys renamed by the type's key-case policy, declaration
 * order kept. Absent values become `null`. The record is not modified.
 */
export function serialize(entry: SchemaEntry, record: RecordInstance, options: SerializeOptions = {}): JsonObject {
    const out: JsonObject = {};
    for (const field of entry.fields) {
        if (field.writeonly && !options.includeWriteonly) continue;
        const context: OperatorContext = { record, field: field.name, path: field.name };
        out[field.wireName] = readValue(field.chain, record.store.get(field.name), context, options);
    }
    return out;
}

function readValue(
    chain: RuleChain<unknown>,
    value: unknown,
    context: OperatorContext,
    options: SerializeOptions,
): JsonValue {
    let current = value;
    if (!isAbsent(current)) {
        for (const op of chain.operators) {
            if (op.read) current = op.read(current, context);
        }
    }
    const item = chain.kind === "list" || chain.kind === "dict" ? chain.item : undefined;
    return toJson(current, item, context, options);
}

function toJson(
    value: unknown,
    item: RuleChain<unknown> | undefined,
    context: OperatorContext,
    options: SerializeOptions,
): JsonValue {
    if (value === undefined || value === null) return null;
    if (value instanceof RecordInstance) return serialize(value.entry, value, options);

    const child = (segment: string | number): OperatorContext => ({
        record: context.record,
        field: context.field,
        path: joinPath(context.path, segment),
    });

    if (Array.isArray(value)) {
        return value.map((element, index) =>
            item ? readValue(item, element, child(index), options) : toJson(element, undefined, child(index), options),
        );
    }
    if (isPlainObject(value)) {
        return Object.fromEntries(
            Object.entries(value).map(([key, element]): [string, JsonValue] => [
                key,
                item ? readValue(item, element, child(key), options) : toJson(element, undefined, child(key), options),
            ]),
        );
    }
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();

    switch (typeof value) {
        case "string":
        case "boolean":
            return value;
        case "number":
            return Number.isFinite(value) ? value : null;
        case "bigint":
            return value.toString();
        default:
            return null;
    }
}
