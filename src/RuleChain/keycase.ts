// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview Field name ↔ JSON key conversion.
 *
 * Converters are applied only where data crosses the JSON boundary: when
 * construction input is matched to fields and when output keys are
 * written. Field names inside the schema never change.
 */

import type { KeyCaseConverter, KeyCasePolicy } from "./types";

const UNDERSCORED = /^[a-z][a-z0-9]*(?:_[a-z][a-z0-9]*)*$/;
const CAMEL = /^[a-z][a-z0-9]*(?:[A-Z][a-z0-9]*)*$/;

/**
 * `first_name` → `firstName`. Names outside the lowercase-underscored
 * form (leading underscores, doubled underscores, digits right after an
 * underscore, capitals) are returned unchanged.
 */
export function underscoredToCamel(name: string): string {
    if (!UNDERSCORED.test(name)) return name;
    return name.replace(/_([a-z])/g, (_: string, char: string) => char.toUpperCase());
}

/**
 * `firstName` → `first_name`. Names outside the lower-camel form are
 * returned unchanged.
 */
export function camelToUnderscored(name: string): string {
    if (!CAMEL.test(name)) return name;
    return name.replace(/[A-Z]/g, (char: string) => `_${char.toLowerCase()}`);
}

export const identityCase: KeyCaseConverter = {
    toWire: (name) => name,
    fromWire: (key) => key,
};

/** Underscored field names, camelCase JSON keys. */
export const camelizeCase: KeyCaseConverter = {
    toWire: underscoredToCamel,
    fromWire: camelToUnderscored,
};

/** CamelCase field names, underscored JSON keys. */
export const snakeizeCase: KeyCaseConverter = {
    toWire: camelToUnderscored,
    fromWire: underscoredToCamel,
};

/**
 * Resolves a {@link KeyCasePolicy} to its converter.
 */
export function resolveKeyCase(policy: KeyCasePolicy = "identity"): KeyCaseConverter {
    switch (policy) {
        case "identity":
            return identityCase;
        case "camelize":
            return camelizeCase;
        case "snakeize":
            return snakeizeCase;
        default:
            return policy;
    }
}
