/**
 * @fileoverview Task kinds
 *
 * The closed set of things a request can ask the assistant to do.
 *
 * @module @mockpilot/engine/contracts/TaskKind
 */

export const TASK_KINDS = [
    // Mapping CRUD
    "CREATE_MAPPING",
    "MODIFY_MAPPING",
    "DELETE_MAPPING",
    "MOVE_MAPPING",
    "BULK_UPDATE_MAPPING",
    "LIST_MAPPINGS",

    // Mapping helpers
    "DEBUG_MAPPING",
    "EXPLAIN_MAPPING",
    "OPTIMIZE_MAPPING",
    "SUGGEST_RESPONSE",
    "GENERATE_FROM_OPENAPI",

    // Payload and endpoint analysis
    "ANALYZE_PAYLOAD",
    "ANALYZE_CURL",
    "CHECK_ENDPOINT_MATCH",

    // Workspace administration
    "CREATE_NAMESPACE",
    "MODIFY_NAMESPACE",
    "DELETE_NAMESPACE",
    "LIST_NAMESPACES",

    // User administration
    "CREATE_USER",
    "MODIFY_USER",
    "DELETE_USER",
    "LIST_USERS",
    "ENABLE_DISABLE_USER",
    "ASSIGN_NAMESPACE",
] as const;

export type TaskKind = typeof TASK_KINDS[number];

/** Kind used whenever a classification cannot be trusted. */
export const DEFAULT_TASK_KIND: TaskKind = "CREATE_MAPPING";

const TASK_KIND_SET: ReadonlySet<string> = new Set(TASK_KINDS);

/**
 * Type guard for task kind strings coming from configuration, CLI flags or the oracle.
 */
export function isTaskKind(value: unknown): value is TaskKind {
    return typeof value === "string" && TASK_KIND_SET.has(value);
}
