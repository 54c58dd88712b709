// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

import { describe, it, expect } from "vitest";
import { CodecError, DateCodec, DateTimeCodec, createCodec } from "./codecs";

// ---------------------------------------------------------------------------
// CodecError
// ---------------------------------------------------------------------------
describe("CodecError", () => {
    it("creates an error with a message", () => {
        expect(new CodecError("boom").message).toBe("boom");
    });

    it("stores an optional cause", () => {
        const cause = new TypeError("inner");
        expect(new CodecError("outer", cause).cause).toBe(cause);
    });

    it("has name CodecError", () => {
        expect(new CodecError("x").name).toBe("CodecError");
    });

    it("is an instance of Error and CodecError", () => {
        const err = new CodecError("x");
        expect(err).toBeInstanceOf(Error);
        expect(err).toBeInstanceOf(CodecError);
    });
});

// ---------------------------------------------------------------------------
// DateCodec
// ---------------------------------------------------------------------------
describe("DateCodec", () => {
    it("encodes the UTC calendar date", () => {
        expect(DateCodec.encode(new Date("2024-03-05T18:30:00Z"))).toBe("2024-03-05");
    });

    it("decodes YYYY-MM-DD to UTC midnight", () => {
        expect(DateCodec.decode("2024-03-05").toISOString()).toBe("2024-03-05T00:00:00.000Z");
    });

    it("truncates a full timestamp to its UTC date", () => {
        expect(DateCodec.decode("2024-03-05T23:59:00Z").toISOString()).toBe("2024-03-05T00:00:00.000Z");
    });

    it("rejects a day that does not exist", () => {
        expect(() => DateCodec.decode("2024-02-31")).toThrow(CodecError);
    });

    it("rejects text that is not a date", () => {
        expect(() => DateCodec.decode("not a date")).toThrow('Cannot decode "not a date" as a date');
    });

    it("refuses to encode an invalid date", () => {
        expect(() => DateCodec.encode(new Date(NaN))).toThrow(CodecError);
    });
});

// ---------------------------------------------------------------------------
// DateTimeCodec
// ---------------------------------------------------------------------------
describe("DateTimeCodec", () => {
    it("encodes to ISO-8601", () => {
        expect(DateTimeCodec.encode(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe("2024-01-02T03:04:05.000Z");
    });

    it("decodes ISO-8601", () => {
        expect(DateTimeCodec.decode("2024-01-02T03:04:05Z").getTime()).toBe(Date.UTC(2024, 0, 2, 3, 4, 5));
    });

    it("rejects text that is not a timestamp", () => {
        expect(() => DateTimeCodec.decode("soon")).toThrow('Cannot decode "soon" as a datetime');
    });
});

// ---------------------------------------------------------------------------
// createCodec
// ---------------------------------------------------------------------------
describe("createCodec", () => {
    it("builds a codec from encode and decode functions", () => {
        const TagSetCodec = createCodec<Set<string>>(
            (set) => Array.from(set).join(","),
            (str) => new Set(str.split(",").filter(Boolean)),
        );
        expect(TagSetCodec.encode(new Set(["a", "b"]))).toBe("a,b");
        expect(TagSetCodec.decode("a,,b")).toEqual(new Set(["a", "b"]));
    });
});
