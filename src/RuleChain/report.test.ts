// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

import { describe, it, expect } from "vitest";
import { ErrorAggregator, formatReport, joinPath } from "./report";
import { InputError, SchemaError, ValidationException } from "./errors";
import type { ValidationReport } from "./types";

// ---------------------------------------------------------------------------
// joinPath
// ---------------------------------------------------------------------------
describe("joinPath", () => {
    it("returns the segment for an empty parent", () => {
        expect(joinPath("", "title")).toBe("title");
    });

    it("joins with dots, indexes included", () => {
        expect(joinPath("address", "zipcode")).toBe("address.zipcode");
        expect(joinPath("tags", 0)).toBe("tags.0");
    });
});

// ---------------------------------------------------------------------------
// ErrorAggregator
// ---------------------------------------------------------------------------
describe("ErrorAggregator", () => {
    it("keeps insertion order", () => {
        const agg = new ErrorAggregator();
        agg.add("b", "second?", 1, "min");
        agg.add("a", "first?", 2, "max");
        expect(agg.toReport().map((e) => e.path)).toEqual(["b", "a"]);
        expect(agg.size).toBe(2);
    });

    it("does not deduplicate", () => {
        const agg = new ErrorAggregator();
        agg.add("a", "m", 1, "x");
        agg.add("a", "m", 1, "x");
        expect(agg.size).toBe(2);
    });

    it("is never done without stopAtFirst", () => {
        const agg = new ErrorAggregator();
        agg.add("a", "m", 1, "x");
        expect(agg.done).toBe(false);
    });

    it("is done after one failure with stopAtFirst", () => {
        const agg = new ErrorAggregator(true);
        expect(agg.done).toBe(false);
        agg.add("a", "m", 1, "x");
        expect(agg.done).toBe(true);
    });

    it("returns a copy of its entries", () => {
        const agg = new ErrorAggregator();
        const report = agg.toReport();
        agg.add("a", "m", 1, "x");
        expect(report).toEqual([]);
    });
});

// ---------------------------------------------------------------------------
// formatReport
// ---------------------------------------------------------------------------
describe("formatReport", () => {
    it("joins path/message pairs", () => {
        const report: ValidationReport = [
            { path: "title", message: "Value is required", value: undefined, operator: "required" },
            { path: "", message: "Bad record", value: null, operator: "validate" },
        ];
        expect(formatReport(report)).toBe("title: Value is required; /: Bad record");
    });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------
describe("SchemaError", () => {
    it("carries a code and optional cause", () => {
        const cause = new Error("inner");
        const err = new SchemaError("SCHEMA_NOT_FOUND", "missing", cause);
        expect(err.code).toBe("SCHEMA_NOT_FOUND");
        expect(err.cause).toBe(cause);
        expect(err.name).toBe("SchemaError");
        expect(err).toBeInstanceOf(SchemaError);
    });
});

describe("InputError", () => {
    it("defaults keys to an empty list", () => {
        const err = new InputError("INVALID_INPUT", "bad");
        expect(err.keys).toEqual([]);
        expect(err.name).toBe("InputError");
        expect(err).toBeInstanceOf(InputError);
    });
});

describe("ValidationException", () => {
    it("formats the report into its message", () => {
        const report: ValidationReport = [
            { path: "gender", message: 'Value "mlae" is not one of "male", "female"', value: "mlae", operator: "oneOf" },
        ];
        const err = new ValidationException("Person", report);
        expect(err.message).toBe('Validation failed for "Person": gender: Value "mlae" is not one of "male", "female"');
        expect(err.code).toBe("VALIDATION_FAILED");
        expect(err.report).toBe(report);
        expect(err).toBeInstanceOf(ValidationException);
    });
});
