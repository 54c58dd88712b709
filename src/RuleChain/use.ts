// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

/**
 * @fileoverview React hook binding a record instance to component state.
 *
 * The hook owns one {@link RecordInstance} for the lifetime of the
 * component. Writes go through the record's sanitize pass and bump a
 * revision counter so that derived snapshots (`values`, `json`) re-render.
 */

import { useCallback, useMemo, useRef, useState } from "react";
import type { Shape } from "./chain";
import type { RecordInput, RecordInstance, RecordType } from "./record";
import type { JsonObject, ValidationReport } from "./types";
import { InputError } from "./errors";

/**
 * Configuration options for {@link useRecord}.
 */
export type UseRecordOptions = {
    /**
     * Re-run the validate pass after every `set` / `update` and keep the
     * report current.
     *
     * @default false
     */
    validateOnChange?: boolean;
};

/**
 * Value returned by {@link useRecord}.
 *
 * @template S - The shape of the record type
 */
export type UseRecordResult<S extends Shape> = {
    /** The live record. Mutating it directly does not re-render. */
    record: RecordInstance<S>;
    /** Field values keyed by field name, as of the last render. */
    values: Readonly<Record<string, unknown>>;
    /** Serialized form, as of the last render. */
    json: JsonObject;
    /** Report of the last validate pass; empty before the first one. */
    report: ValidationReport;
    /** Writes client input (access rules apply). */
    set: (updates: RecordInput) => void;
    /** Writes trusted input. */
    update: (updates: RecordInput) => void;
    /** Runs the validate pass, stores its report, and returns whether it is empty. */
    validate: () => boolean;
    /** Rebuilds the record from the initial input and clears the report. */
    reset: () => void;
};

/**
 * React hook for editing one record.
 *
 * Input errors raised by `set` and `update` (unknown keys under
 * `extraFields: "reject"`, vetoed readonly writes under
 * `readonlyViolation: "reject"`, immutable types) are logged, not thrown;
 * every acceptable field of the input has still been written.
 *
 * @template S - The shape of the record type
 *
 * @param type - Handle returned by `defineRecord`
 * @param initial - Construction input, read on mount and by `reset`
 * @param options - Hook behavior
 *
 * @throws {InputError} If `initial` itself cannot be accepted on mount
 *
 * @example
 * ```tsx
 * function ArticleForm() {
 *   const { values, report, set, validate } = useRecord(Article, { title: "" });
 *   return (
 *     <form onSubmit={(e) => { e.preventDefault(); if (validate()) save(); }}>
 *       <input value={String(values.title ?? "")} onChange={(e) => set({ title: e.target.value })} />
 *       {report.map((e) => <p key={e.path}>{e.message}</p>)}
 *     </form>
 *   );
 * }
 * ```
 */
export function useRecord<S extends Shape>(
    type: RecordType<S>,
    initial: RecordInput = {},
    options: UseRecordOptions = {},
): UseRecordResult<S> {
    const { validateOnChange = false } = options;

    // only the mount-time input is kept, so callers may pass a fresh literal on every render
    const initialRef = useRef(initial);
    const [record, setRecord] = useState(() => type.create(initialRef.current));
    const [revision, setRevision] = useState(0);
    const [report, setReport] = useState<ValidationReport>([]);

    const write = useCallback(
        (updates: RecordInput, trusted: boolean) => {
            try {
                if (trusted) record.update(updates);
                else record.set(updates);
            } catch (err) {
                if (!(err instanceof InputError)) throw err;
                console.error(`[RuleChain] Input error for "${type.name}" (${err.code}):`, err.message);
            }
            if (validateOnChange) setReport(record.validationReport());
            setRevision((r) => r + 1);
        },
        [record, type, validateOnChange],
    );

    const set = useCallback((updates: RecordInput) => write(updates, false), [write]);
    const update = useCallback((updates: RecordInput) => write(updates, true), [write]);

    const validate = useCallback(() => {
        const next = record.validationReport();
        setReport(next);
        return next.length === 0;
    }, [record]);

    const reset = useCallback(() => {
        setRecord(type.create(initialRef.current));
        setReport([]);
        setRevision((r) => r + 1);
    }, [type]);

    // record is mutated in place; revision marks each write
    const values = useMemo(() => record.values, [record, revision]);
    const json = useMemo(() => record.toJSON(), [record, revision]);

    return useMemo(
        () => ({ record, values, json, report, set, update, validate, reset }),
        [record, values, json, report, set, update, validate, reset],
    );
}
