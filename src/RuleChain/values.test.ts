// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

import { describe, it, expect } from "vitest";
import { describeValue, isAbsent, isPlainObject, typeLabel, valuesEqual } from "./values";

describe("isAbsent", () => {
    it("treats null and undefined as absent", () => {
        expect(isAbsent(null)).toBe(true);
        expect(isAbsent(undefined)).toBe(true);
    });

    it("treats falsy values as present", () => {
        expect(isAbsent(0)).toBe(false);
        expect(isAbsent("")).toBe(false);
        expect(isAbsent(false)).toBe(false);
    });
});

describe("isPlainObject", () => {
    it("accepts object literals and null-prototype objects", () => {
        expect(isPlainObject({ a: 1 })).toBe(true);
        expect(isPlainObject(Object.create(null))).toBe(true);
    });

    it("rejects arrays, dates and class instances", () => {
        class Thing {}
        expect(isPlainObject([])).toBe(false);
        expect(isPlainObject(new Date())).toBe(false);
        expect(isPlainObject(new Thing())).toBe(false);
        expect(isPlainObject(null)).toBe(false);
    });
});

describe("valuesEqual", () => {
    it("compares nested structures", () => {
        expect(valuesEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true);
        expect(valuesEqual([1, 2], [1, 2, 3])).toBe(false);
        expect(valuesEqual({ a: 1 }, { a: 1, b: undefined })).toBe(false);
    });

    it("compares dates by time", () => {
        expect(valuesEqual(new Date(5), new Date(5))).toBe(true);
        expect(valuesEqual(new Date(5), 5)).toBe(false);
    });

    it("does not coerce", () => {
        expect(valuesEqual(1, "1")).toBe(false);
        expect(valuesEqual(null, {})).toBe(false);
    });
});

describe("typeLabel", () => {
    it("labels values", () => {
        expect(typeLabel(null)).toBe("null");
        expect(typeLabel([])).toBe("array");
        expect(typeLabel(new Date())).toBe("date");
        expect(typeLabel(1)).toBe("number");
        expect(typeLabel("x")).toBe("string");
    });
});

describe("describeValue", () => {
    it("quotes strings", () => {
        expect(describeValue("x")).toBe('"x"');
    });

    it("renders dates and other values", () => {
        expect(describeValue(new Date(0))).toBe("1970-01-01T00:00:00.000Z");
        expect(describeValue(new Date(NaN))).toBe("Invalid Date");
        expect(describeValue(10n)).toBe("10n");
        expect(describeValue(undefined)).toBe("undefined");
        expect(describeValue([1, "a"])).toBe('[1,"a"]');
    });
});
