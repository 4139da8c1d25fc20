/**
 * @fileoverview Oracle output parsing
 *
 * Normalize, decode and validate oracle text in one step.
 *
 * @module @mockpilot/engine/parsing/parseOracleOutput
 */

import type { z } from "zod";
import { ParseFailure } from "../contracts/errors.js";
import { normalizeOracleText } from "./normalize.js";

export type ParseResult<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly failure: ParseFailure };

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
        .join("; ");
}

/**
 * Parse oracle text as JSON matching `schema`.
 *
 * @param text - Raw oracle output
 * @param schema - Expected shape
 * @param label - What is being parsed, used in the failure message
 */
export function parseOracleOutput<T>(
    text: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string
): ParseResult<T> {
    const cleaned = normalizeOracleText(text);

    let decoded: unknown;
    try {
        decoded = JSON.parse(cleaned);
    }
    catch (error) {
        return {
            ok     : false,
            failure: new ParseFailure(label, "output is not valid JSON", text, { cause: error }),
        };
    }

    const result = schema.safeParse(decoded);
    if (!result.success) {
        return {
            ok     : false,
            failure: new ParseFailure(label, describeIssues(result.error), text),
        };
    }

    return { ok: true, value: result.data };
}

/**
 * Like parseOracleOutput, but throws the ParseFailure.
 */
export function parseOracleOutputOrThrow<T>(
    text: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string
): T {
    const result = parseOracleOutput(text, schema, label);
    if (!result.ok) {
        throw result.failure;
    }
    return result.value;
}
