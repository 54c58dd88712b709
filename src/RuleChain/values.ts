// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview Value helpers shared by operators and the pipeline.
 */

/** `undefined` and `null` both mean "no value". */
export function isAbsent(value: unknown): value is null | undefined {
    return value === undefined || value === null;
}

/** Whether a value is a plain key/value object (not an array, date or class instance). */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Structural deep equality for JSON-shaped values plus `Date`. Used by
 * `oneOf`.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (a === null || b === null) return false;
    if (typeof a !== typeof b) return false;

    if (a instanceof Date || b instanceof Date) {
        return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
    }

    if (Array.isArray(a)) {
        if (!Array.isArray(b)) return false;
        if (a.length !== b.length) return false;
        for (let i = 0; i < a.length; i++) {
            if (!valuesEqual(a[i], b[i])) return false;
        }
        return true;
    }

    if (isPlainObject(a)) {
        if (!isPlainObject(b)) return false;
        const aKeys = Object.keys(a);
        const bKeys = Object.keys(b);
        if (aKeys.length !== bKeys.length) return false;
        for (const key of aKeys) {
            if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
            if (!valuesEqual(a[key], b[key])) return false;
        }
        return true;
    }

    return false;
}

/**
 * Returns a human-readable label for the type of a value, for messages.
 */
export function typeLabel(value: unknown): string {
    if (value === null) return "null";
    if (Array.isArray(value)) return "array";
    if (value instanceof Date) return "date";
    return typeof value;
}

/**
 * Renders a value for inclusion in a message: strings are quoted, dates
 * are shown in ISO form.
 */
export function describeValue(value: unknown): string {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
    }
    if (typeof value === "string") return JSON.stringify(value);
    if (typeof value === "bigint") return `${value}n`;
    if (typeof value === "function" || typeof value === "symbol" || value === undefined) {
        return String(value);
    }
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}
