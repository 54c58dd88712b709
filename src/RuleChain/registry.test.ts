// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

import { describe, it, expect } from "vitest";
import { SchemaRegistry, defaultRegistry, registryFor } from "./registry";
import { SchemaError } from "./errors";
import { types } from "./chain";
import { camelizeCase, identityCase } from "./keycase";

function schemaErrorOf(fn: () => unknown): SchemaError {
    try {
        fn();
    } catch (err) {
        if (err instanceof SchemaError) return err;
        throw err;
    }
    throw new Error("expected a SchemaError");
}

describe("SchemaRegistry", () => {
    it("registers and looks up entries", () => {
        const registry = new SchemaRegistry();
        const entry = registry.register("Article", [{ name: "title", chain: types.str.required() }]);
        expect(registry.lookup("Article")).toBe(entry);
        expect(registry.has("Article")).toBe(true);
        expect(entry.fields.map((f) => f.name)).toEqual(["title"]);
        expect(entry.registry).toBe(registry);
    });

    it("lists names in registration order", () => {
        const registry = new SchemaRegistry();
        registry.register("B", []);
        registry.register("A", []);
        expect(registry.names()).toEqual(["B", "A"]);
    });

    it("rejects a second registration under the same name", () => {
        const registry = new SchemaRegistry();
        registry.register("Article", []);
        const err = schemaErrorOf(() => registry.register("Article", []));
        expect(err.code).toBe("SCHEMA_REGISTRATION_CONFLICT");
        expect(err.message).toBe('Record type "Article" is already registered in registry "default"');
    });

    it("fails lookups of unknown names", () => {
        const err = schemaErrorOf(() => new SchemaRegistry().lookup("Ghost"));
        expect(err.code).toBe("SCHEMA_NOT_FOUND");
        expect(err.message).toBe('No record type named "Ghost" in registry "default"');
    });

    it("rejects duplicate field names", () => {
        const err = schemaErrorOf(() =>
            new SchemaRegistry().register("T", [
                { name: "a", chain: types.str },
                { name: "a", chain: types.int },
            ]),
        );
        expect(err.code).toBe("DUPLICATE_FIELD");
        expect(err.message).toBe('Field "a" is declared twice on "T"');
    });

    it("rejects fields that map to the same JSON key", () => {
        const err = schemaErrorOf(() =>
            new SchemaRegistry().register(
                "User",
                [
                    { name: "first_name", chain: types.str },
                    { name: "firstName", chain: types.str },
                ],
                { keyCase: "camelize" },
            ),
        );
        expect(err.code).toBe("DUPLICATE_FIELD");
        expect(err.message).toBe('Fields "first_name" and "firstName" on "User" both map to JSON key "firstName"');
    });

    it("rejects operators applied to the wrong kind", () => {
        const err = schemaErrorOf(() =>
            new SchemaRegistry().register("T", [{ name: "count", chain: types.int.minLength(1) }]),
        );
        expect(err.code).toBe("OPERATOR_KIND_MISMATCH");
        expect(err.message).toBe(
            'Operator "minLength" cannot be applied to integer field "T.count" (accepts string, list)',
        );
    });

    it("checks element chains too", () => {
        const err = schemaErrorOf(() =>
            new SchemaRegistry().register("T", [{ name: "ids", chain: types.listOf(types.int.email()) }]),
        );
        expect(err.message).toBe('Operator "email" cannot be applied to integer field "T.ids[]" (accepts string)');
    });

    it("leaves the registry untouched when registration fails", () => {
        const registry = new SchemaRegistry();
        schemaErrorOf(() => registry.register("T", [{ name: "n", chain: types.bool.trim() }]));
        expect(registry.has("T")).toBe(false);
    });

    it("derives field descriptors from the chain", () => {
        const entry = new SchemaRegistry().register(
            "Coupon",
            [
                { name: "code", chain: types.str.required() },
                { name: "used", chain: types.bool.readonly().default(true).default(false) },
                { name: "secret", chain: types.str.writeonly() },
                { name: "owner", chain: types.str.writeonce() },
            ],
            { keyCase: "camelize" },
        );
        const [code, used, secret, owner] = entry.fields;
        expect(code.required).toBe(true);
        expect(code.defaultValue).toBeUndefined();
        expect(used.readonly).toBe(true);
        expect(used.defaultValue?.()).toBe(false);
        expect(secret.writeonly).toBe(true);
        expect(owner.writeonce).toBe(true);
        expect(entry.keyCase).toBe(camelizeCase);
    });

    it("applies option defaults", () => {
        const entry = new SchemaRegistry().register("T", []);
        expect(entry.options).toEqual({ extraFields: "ignore", mutable: true, readonlyViolation: "discard" });
        expect(entry.keyCase).toBe(identityCase);
        expect(Object.isFrozen(entry)).toBe(true);
    });
});

describe("registryFor", () => {
    it("returns the default registry for its name", () => {
        expect(registryFor("default")).toBe(defaultRegistry);
    });

    it("creates a named registry once", () => {
        const plugins = registryFor("plugins");
        expect(registryFor("plugins")).toBe(plugins);
        expect(plugins.name).toBe("plugins");
    });
});
