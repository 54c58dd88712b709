// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

import { describe, it, expect } from "vitest";
import {
    types,
    defineRecord,
    SchemaRegistry,
    defaultRegistry,
    registryFor,
    useRecord,
    createCodec,
    CodecError,
    SchemaError,
    InputError,
    ValidationException,
    operators,
    formatReport,
} from "./index";
import type { Codec, RecordOptions, ValidationReport } from "./index";

describe("Public API exports", () => {
    it("exports the kind roots", () => {
        expect(types.str.kind).toBe("string");
        expect(types.int.kind).toBe("integer");
        expect(typeof types.listOf).toBe("function");
    });

    it("exports defineRecord and useRecord", () => {
        expect(typeof defineRecord).toBe("function");
        expect(typeof useRecord).toBe("function");
    });

    it("exports the registries", () => {
        expect(defaultRegistry).toBeInstanceOf(SchemaRegistry);
        expect(registryFor("default")).toBe(defaultRegistry);
    });

    it("exports the error classes", () => {
        expect(new CodecError("test")).toBeInstanceOf(Error);
        expect(new SchemaError("SCHEMA_NOT_FOUND", "test")).toBeInstanceOf(Error);
        expect(new InputError("INVALID_INPUT", "test")).toBeInstanceOf(Error);
        expect(new ValidationException("T", [])).toBeInstanceOf(Error);
    });

    it("exports the operator factories", () => {
        expect(operators.required().name).toBe("required");
        expect(operators.trim().name).toBe("trim");
    });

    it("exports createCodec", () => {
        const codec = createCodec<number>(String, Number);
        expect(codec.encode(4)).toBe("4");
        expect(codec.decode("4")).toBe(4);
    });

    it("exports types", () => {
        // Type-level check: these should compile
        const codec: Codec<string> = { encode: (v) => v, decode: (v) => v };
        const options: RecordOptions = { keyCase: "camelize", extraFields: "reject" };
        const report: ValidationReport = [];
        expect(codec).toBeDefined();
        expect(options.keyCase).toBe("camelize");
        expect(formatReport(report)).toBe("");
    });
});

describe("End-to-end", () => {
    it("defines, builds, validates and serializes a record", () => {
        const registry = new SchemaRegistry();
        const Note = defineRecord(
            "Note",
            { note_title: types.str.trim().required(), pinned: types.bool.default(false) },
            { registry, keyCase: "camelize" },
        );

        const note = Note.create({ noteTitle: "  hello " }).validate();
        expect(note.status).toBe("validated");
        expect(note.toJSON()).toEqual({ noteTitle: "hello", pinned: false });
    });
});
