// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview Schema registry.
 *
 * A registry maps record type names to frozen {@link SchemaEntry} values.
 * Entries are written once, when a type is defined, and only read after
 * that. All three pipeline passes take an entry.
 */

import type {
    ExtraFieldPolicy,
    FieldKind,
    KeyCaseConverter,
    Operator,
    ReadonlyViolationPolicy,
    RecordOptions,
} from "./types";
import type { RuleChain } from "./chain";
import { SchemaError } from "./errors";
import { resolveKeyCase } from "./keycase";
import { defaultProvider } from "./operators";

/**
 * One field handed to {@link SchemaRegistry.register}.
 */
export type FieldSpec = {
    readonly name: string;
    readonly chain: RuleChain<unknown>;
};

/**
 * Registered description of one field. Flags are derived from the chain's
 * operators when the type is registered.
 */
export type FieldDescriptor = {
    readonly name: string;
    /** JSON key after key-case conversion. */
    readonly wireName: string;
    readonly chain: RuleChain<unknown>;
    readonly kind: FieldKind;
    readonly required: boolean;
    readonly readonly: boolean;
    readonly writeonly: boolean;
    readonly writeonce: boolean;
    /** Fill function of the chain's last `default` operator. */
    readonly defaultValue?: () => unknown;
};

/**
 * Type-level options after defaults were applied.
 */
export type ResolvedOptions = {
    readonly extraFields: ExtraFieldPolicy;
    readonly mutable: boolean;
    readonly readonlyViolation: ReadonlyViolationPolicy;
};

/**
 * Everything the pipeline needs to know about one record type.
 */
export type SchemaEntry = {
    readonly name: string;
    /** Fields in declaration order. */
    readonly fields: readonly FieldDescriptor[];
    readonly byName: ReadonlyMap<string, FieldDescriptor>;
    readonly byWireName: ReadonlyMap<string, FieldDescriptor>;
    readonly options: ResolvedOptions;
    readonly keyCase: KeyCaseConverter;
    /** Registry the entry belongs to; instance targets given by name resolve here. */
    readonly registry: SchemaRegistry;
};

function checkKinds(typeName: string, path: string, chain: RuleChain<unknown>): void {
    for (const op of chain.operators) {
        if (op.kinds !== undefined && !op.kinds.includes(chain.kind)) {
            throw new SchemaError(
                "OPERATOR_KIND_MISMATCH",
                `Operator "${op.name}" cannot be applied to ${chain.kind} field "${typeName}.${path}" ` +
                    `(accepts ${op.kinds.join(", ")})`,
            );
        }
    }
    if (chain.item) checkKinds(typeName, `${path}[]`, chain.item);
}

function lastDefault(operators: readonly Operator[]): (() => unknown) | undefined {
    let provider: (() => unknown) | undefined;
    for (const op of operators) {
        provider = defaultProvider(op) ?? provider;
    }
    return provider;
}

/**
 * Holds the schema entries of one set of record types.
 *
 * Most applications use {@link defaultRegistry}. Separate registries let
 * independent schema sets reuse type names, e.g. in tests or plugins.
 */
export class SchemaRegistry {
    private readonly entries = new Map<string, SchemaEntry>();

    constructor(readonly name: string = "default") {}

    /**
     * Registers a record type.
     *
     * @throws {SchemaError} `SCHEMA_REGISTRATION_CONFLICT` if the name is taken,
     *   `DUPLICATE_FIELD` if two fields share a name or JSON key,
     *   `OPERATOR_KIND_MISMATCH` if an operator does not fit its field kind
     */
    register(typeName: string, fields: readonly FieldSpec[], options: RecordOptions = {}): SchemaEntry {
        if (this.entries.has(typeName)) {
            throw new SchemaError(
                "SCHEMA_REGISTRATION_CONFLICT",
                `Record type "${typeName}" is already registered in registry "${this.name}"`,
            );
        }

        const keyCase = resolveKeyCase(options.keyCase);
        const byName = new Map<string, FieldDescriptor>();
        const byWireName = new Map<string, FieldDescriptor>();

        for (const { name, chain } of fields) {
            if (byName.has(name)) {
                throw new SchemaError("DUPLICATE_FIELD", `Field "${name}" is declared twice on "${typeName}"`);
            }
            checkKinds(typeName, name, chain);

            const wireName = keyCase.toWire(name);
            const clash = byWireName.get(wireName);
            if (clash) {
                throw new SchemaError(
                    "DUPLICATE_FIELD",
                    `Fields "${clash.name}" and "${name}" on "${typeName}" both map to JSON key "${wireName}"`,
                );
            }

            const descriptor: FieldDescriptor = Object.freeze({
                name,
                wireName,
                chain,
                kind: chain.kind,
                required: chain.has("required"),
                readonly: chain.has("readonly"),
                writeonly: chain.has("writeonly"),
                writeonce: chain.has("writeonce"),
                defaultValue: lastDefault(chain.operators),
            });
            byName.set(name, descriptor);
            byWireName.set(wireName, descriptor);
        }

        const entry: SchemaEntry = Object.freeze({
            name: typeName,
            fields: Object.freeze([...byName.values()]),
            byName,
            byWireName,
            options: Object.freeze({
                extraFields: options.extraFields ?? "ignore",
                mutable: options.mutable ?? true,
                readonlyViolation: options.readonlyViolation ?? "discard",
            }),
            keyCase,
            registry: this,
        });
        this.entries.set(typeName, entry);
        return entry;
    }

    /**
     * @throws {SchemaError} `SCHEMA_NOT_FOUND` for an unregistered name
     */
    lookup(typeName: string): SchemaEntry {
        const entry = this.entries.get(typeName);
        if (!entry) {
            throw new SchemaError(
                "SCHEMA_NOT_FOUND",
                `No record type named "${typeName}" in registry "${this.name}"`,
            );
        }
        return entry;
    }

    has(typeName: string): boolean {
        return this.entries.has(typeName);
    }

    /** Registered type names in registration order. */
    names(): string[] {
        return [...this.entries.keys()];
    }
}

/** The process-wide registry used when a type names no other. */
export const defaultRegistry = new SchemaRegistry();

const namedRegistries = new Map<string, SchemaRegistry>([["default", defaultRegistry]]);

/**
 * Returns the registry with the given name, creating it on first use.
 * `registryFor("default")` is {@link defaultRegistry}.
 */
export function registryFor(name: string): SchemaRegistry {
    let registry = namedRegistries.get(name);
    if (!registry) {
        registry = new SchemaRegistry(name);
        namedRegistries.set(name, registry);
    }
    return registry;
}
