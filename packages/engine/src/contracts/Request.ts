/**
 * @fileoverview Request and conversation contracts
 *
 * @module @mockpilot/engine/contracts/Request
 */

import type { TaskKind } from "./TaskKind.js";

export type TurnRole = "user" | "assistant";

/**
 * One message of the conversation, oldest first.
 */
export interface Turn {
    readonly role: TurnRole;
    readonly content: string;
}

export interface AssistantRequest {
    readonly userPrompt: string;

    /**
     * When present the kind is trusted and classification is skipped.
     */
    readonly taskType?: TaskKind;

    /** Workspace the request operates in */
    readonly namespace: string;

    readonly conversationHistory: readonly Turn[];
}

/**
 * A request whose task kind has been decided.
 */
export interface ResolvedRequest extends AssistantRequest {
    readonly taskType: TaskKind;
}
