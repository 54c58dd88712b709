// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview Validation failure aggregation.
 */

import type { ValidationError, ValidationReport } from "./types";

/**
 * Joins a parent path and a child segment with a dot. An empty parent
 * yields the segment alone.
 */
export function joinPath(parent: string, segment: string | number): string {
    return parent === "" ? String(segment) : `${parent}.${segment}`;
}

/**
 * Collects validation failures during one validate pass.
 *
 * Entries keep insertion order (field declaration order, then nested
 * recursion order) and are never deduplicated.
 */
export class ErrorAggregator {
    private readonly entries: ValidationError[] = [];

    /**
     * @param stopAtFirst - When `true`, {@link done} reports completion as
     *   soon as one failure is recorded
     */
    constructor(readonly stopAtFirst: boolean = false) {}

    add(path: string, message: string, value: unknown, operator: string): void {
        this.entries.push({ path, message, value, operator });
    }

    get size(): number {
        return this.entries.length;
    }

    /** Whether the pass may stop collecting. */
    get done(): boolean {
        return this.stopAtFirst && this.entries.length > 0;
    }

    toReport(): ValidationReport {
        return [...this.entries];
    }
}

/**
 * Renders a report as `path: message` pairs joined by `"; "`.
 *
 * @example
 * ```typescript
 * formatReport([{ path: "name", message: "Value is required", value: null, operator: "required" }]);
 * // "name: Value is required"
 * ```
 */
export function formatReport(report: ValidationReport): string {
    return report.map((e) => `${e.path || "/"}: ${e.message}`).join("; ");
}
