/**
 * @fileoverview Response contract
 *
 * The terminal output of exactly one request.
 *
 * @module @mockpilot/engine/contracts/Response
 */

import type { Mapping } from "./Mapping.js";

/**
 * Machine-readable tag telling the caller what happened.
 */
export type ResponseAction =
    | "create"
    | "modify_complete"
    | "delete"
    | "move"
    | "bulk_update"
    | "list"
    | "show_details"
    | "explain"
    | "debug"
    | "optimize"
    | "suggest_response"
    | "analyze_payload"
    | "analyze_curl"
    | "check_endpoint_match"
    | "generate_from_openapi"
    | "info"
    | "create_namespace"
    | "modify_namespace"
    | "delete_namespace"
    | "list_namespaces"
    | "create_user"
    | "modify_user"
    | "delete_user"
    | "list_users"
    | "user_status"
    | "assign_namespace"
    | "error";

export interface AssistantResponse {
    readonly success: boolean;

    /** Short status line */
    readonly message: string;

    /** Human-readable answer, usually markdown */
    readonly explanation: string;

    readonly action?: ResponseAction;

    /** Mapping id, workspace name or userId the response is about */
    readonly targetEntityId?: string;

    readonly entities?: readonly Mapping[];
    readonly generatedEntity?: Mapping;
    readonly suggestions?: readonly string[];
}

/**
 * Build a failed response.
 */
export function failureResponse(message: string, explanation?: string): AssistantResponse {
    return {
        success    : false,
        action     : "error",
        message,
        explanation: explanation ?? message,
    };
}
