/**
 * Task Handler Contract
 *
 * Pluggable strategies consulted before the built-in actions. Handlers
 * self-declare which task kinds they support and a priority; the engine
 * asks each candidate, lowest priority first, whether it wants the
 * specific request.
 *
 * Design principles:
 * - Declarative: handlers declare kinds, the engine decides when to ask
 * - Focused: handlers answer, they do not classify
 * - Total: a handler returns a response or throws; the engine converts throws
 */

import type { TaskKind } from "./TaskKind.js";
import type { ResolvedRequest } from "./Request.js";
import type { AssistantResponse } from "./Response.js";
import type { Mapping } from "./Mapping.js";
import type { EntityStore } from "./EntityStore.js";
import type { Oracle } from "./Oracle.js";
import type { PasswordHasher } from "./PasswordHasher.js";
import type { Logger } from "./Logger.js";
import type { PromptComposer } from "../prompts/PromptComposer.js";

/** Priority used when a handler does not declare one. */
export const DEFAULT_HANDLER_PRIORITY = 100;

/**
 * Collaborators available while serving a request.
 */
export interface TaskServices {
    readonly store: EntityStore;
    readonly oracle: Oracle;
    readonly composer: PromptComposer;
    readonly passwordHasher: PasswordHasher;

    /** Clock used for every timestamp the engine writes */
    readonly now: () => Date;
}

/**
 * Context provided to handlers and built-in actions.
 */
export interface TaskContext {
    readonly request: ResolvedRequest;

    /**
     * Mappings of the request's workspace, read once per request.
     */
    readonly mappings: readonly Mapping[];

    readonly services: TaskServices;

    /** Logger prefixed with the workspace and handler id */
    readonly logger: Logger;

    /** Unique trace ID for this request */
    readonly traceId: string;
}

/**
 * Task Handler interface.
 *
 * @example
 * ```typescript
 * const healthHandler: TaskHandler = {
 *     id: "health-check",
 *     supportedKinds: ["EXPLAIN_MAPPING"],
 *     priority: 1,
 *     canHandle: ({ request }) => /health/i.test(request.userPrompt),
 *     async handle() {
 *         return { success: true, message: "ok", explanation: "All endpoints respond." };
 *     },
 * };
 * ```
 */
export interface TaskHandler {
    /**
     * Unique identifier for this handler.
     */
    readonly id: string;

    readonly name?: string;
    readonly description?: string;

    /**
     * Task kinds this handler may claim.
     */
    readonly supportedKinds: readonly TaskKind[];

    /**
     * Lower is consulted first. Defaults to DEFAULT_HANDLER_PRIORITY.
     */
    readonly priority?: number;

    /**
     * Decide whether this handler wants this specific request.
     */
    canHandle(context: TaskContext): boolean | Promise<boolean>;

    handle(context: TaskContext): Promise<AssistantResponse>;
}

export function handlerPriority(handler: TaskHandler): number {
    return handler.priority ?? DEFAULT_HANDLER_PRIORITY;
}

export function supportsKind(handler: TaskHandler, kind: TaskKind): boolean {
    return handler.supportedKinds.includes(kind);
}

/**
 * Type guard to check if an object is a TaskHandler.
 *
 * @param obj - The object to check
 * @returns True if the object implements TaskHandler
 */
export function isTaskHandler(obj: unknown): obj is TaskHandler {
    if (typeof obj !== "object" || obj === null) {
        return false;
    }

    return (
        "id" in obj &&
        typeof obj.id === "string" &&
        "supportedKinds" in obj &&
        Array.isArray(obj.supportedKinds) &&
        "canHandle" in obj &&
        typeof obj.canHandle === "function" &&
        "handle" in obj &&
        typeof obj.handle === "function"
    );
}
