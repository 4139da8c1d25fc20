/**
 * @fileoverview Error taxonomy
 *
 * Every failure inside the pipeline is one of these kinds. The engine
 * converts them into failed responses; none of them reach the caller.
 *
 * @module @mockpilot/engine/contracts/errors
 */

import type { AssistantResponse } from "./Response.js";
import { failureResponse } from "./Response.js";

export type AssistantErrorKind =
    | "oracle_failure"
    | "parse_failure"
    | "target_unresolved"
    | "validation_conflict"
    | "configuration_error";

export class AssistantError extends Error {
    readonly kind: AssistantErrorKind;

    constructor(kind: AssistantErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.kind = kind;
        this.name = new.target.name;
    }
}

/**
 * The language model could not be reached or returned nothing.
 */
export class OracleFailure extends AssistantError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("oracle_failure", message, options);
    }
}

/**
 * Oracle text did not decode to the expected structure.
 */
export class ParseFailure extends AssistantError {
    /** What was being parsed, e.g. "bulk update plan" */
    readonly label: string;

    readonly rawText: string;

    constructor(label: string, reason: string, rawText: string, options?: { cause?: unknown }) {
        super("parse_failure", `Could not parse ${label}: ${reason}`, options);
        this.label = label;
        this.rawText = rawText;
    }
}

/**
 * No entity matched; the caller should retry with more specific wording.
 */
export class TargetUnresolved extends AssistantError {
    /** Listing of the entities that were available */
    readonly availableContext: string;

    constructor(message: string, availableContext: string) {
        super("target_unresolved", message);
        this.availableContext = availableContext;
    }
}

/**
 * The operation is blocked by existing state.
 */
export class ValidationConflict extends AssistantError {
    readonly remediation: string;

    constructor(message: string, remediation: string) {
        super("validation_conflict", message);
        this.remediation = remediation;
    }
}

/**
 * Convert any thrown value into a failed response.
 */
export function responseFromError(error: unknown): AssistantResponse {
    if (error instanceof TargetUnresolved) {
        return failureResponse(
            error.message,
            `❓ ${error.message}\n\nAvailable endpoints:\n\n${error.availableContext}`
        );
    }

    if (error instanceof ValidationConflict) {
        return failureResponse(error.message, `❌ ${error.message} ${error.remediation}`);
    }

    if (error instanceof ParseFailure) {
        return failureResponse(
            "Could not understand the generated output",
            `${error.message}. Please rephrase the request and try again.`
        );
    }

    if (error instanceof OracleFailure) {
        return failureResponse("Language model request failed", error.message);
    }

    const detail = error instanceof Error ? error.message : String(error);
    return failureResponse("Failed to process request", `Failed to process request: ${detail}`);
}
