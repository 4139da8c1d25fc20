/**
 * @fileoverview Prompt Composer
 *
 * Builds the oracle-facing instructions for each task kind: a role, the
 * context block that fits the task, output-schema rules and examples.
 *
 * @module @mockpilot/engine/prompts/PromptComposer
 */

import type { TaskKind } from "../contracts/TaskKind.js";
import type { Mapping } from "../contracts/Mapping.js";
import type { Turn } from "../contracts/Request.js";
import type { Workspace, UserAccount } from "../contracts/Workspace.js";
import type { OracleCallOptions } from "../contracts/Oracle.js";
import type { AssistantSettings } from "../contracts/Settings.js";
import { selectRelevant } from "../context/keywords.js";
import {
    buildSummaryContext,
    buildDetailedContext,
    buildDeepContext,
    buildFollowUpContext,
    buildWorkspaceListing,
    buildUserListing,
} from "../context/ContextBuilder.js";
import * as mappingPrompts from "./mappingPrompts.js";
import * as adminPrompts from "./adminPrompts.js";

/**
 * Task kinds answered without asking the oracle.
 */
export type DirectTaskKind = "LIST_MAPPINGS" | "LIST_NAMESPACES" | "LIST_USERS";

export type ComposableKind = Exclude<TaskKind, DirectTaskKind>;

/**
 * Facts describing one OpenAPI operation response.
 */
export interface SpecOperationFacts {
    readonly method: string;
    readonly path: string;
    readonly status: number;
    readonly statusDescription: string;
    readonly operation: string;
}

export interface ComposeInput {
    readonly namespace: string;
    readonly userPrompt: string;

    /** Mappings of the workspace */
    readonly mappings?: readonly Mapping[];

    /** Resolved target mapping, if any */
    readonly target?: Mapping;

    /** Prior turns; a target plus history selects the follow-up context */
    readonly history?: readonly Turn[];

    readonly workspaces?: readonly Workspace[];
    readonly users?: readonly UserAccount[];

    /** Required for GENERATE_FROM_OPENAPI */
    readonly specOperation?: SpecOperationFacts;
}

export interface ComposedPrompt {
    readonly instructions: string;
    readonly userContent: string;
    readonly options?: OracleCallOptions;
}

const FOLLOW_UP_TURNS = 4;
const FOLLOW_UP_TURN_CHARS = 200;

function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Prompt Composer.
 *
 * @example
 * ```typescript
 * const composer = new PromptComposer(createSettings({ maxContextMappings: 5 }));
 * const prompt = composer.compose("CREATE_MAPPING", {
 *     namespace: "demo",
 *     userPrompt: "GET /orders returning two orders",
 *     mappings,
 * });
 * const text = await oracle.complete(prompt.instructions, [], prompt.userContent, prompt.options);
 * ```
 */
export class PromptComposer {
    constructor(private readonly settings: AssistantSettings) {}

    /**
     * Compose the prompt for a task kind.
     *
     * @throws Error if an input the kind depends on is missing
     */
    compose(kind: ComposableKind, input: ComposeInput): ComposedPrompt {
        const { namespace, userPrompt } = input;
        const mappings = input.mappings ?? [];

        switch (kind) {
            case "CREATE_MAPPING": {
                const relevant = selectRelevant(mappings, userPrompt, this.settings.maxContextMappings);
                return this.prompt(mappingPrompts.createMappingInstructions(namespace, buildSummaryContext(relevant)), userPrompt);
            }
            case "MODIFY_MAPPING": {
                const target = this.require(input.target, kind, "target mapping");
                const existing = JSON.stringify(target, null, 2);
                return this.prompt(mappingPrompts.modifyMappingInstructions(namespace, existing, userPrompt), userPrompt);
            }
            case "DELETE_MAPPING":
                return this.prompt(mappingPrompts.deleteMappingInstructions(namespace, buildDetailedContext(mappings)), userPrompt);
            case "MOVE_MAPPING": {
                const workspaces = (input.workspaces ?? []).map(ws => ws.name).join(", ") || "default";
                return this.prompt(
                    mappingPrompts.moveMappingInstructions(namespace, workspaces, buildDetailedContext(mappings)),
                    userPrompt
                );
            }
            case "BULK_UPDATE_MAPPING":
                return this.prompt(mappingPrompts.bulkUpdateInstructions(namespace, buildDetailedContext(mappings)), userPrompt);
            case "DEBUG_MAPPING":
                return this.prompt(mappingPrompts.debugMappingInstructions(namespace, this.analysisContext(input)), userPrompt);
            case "EXPLAIN_MAPPING":
                return this.prompt(mappingPrompts.explainMappingInstructions(namespace, this.analysisContext(input)), userPrompt);
            case "OPTIMIZE_MAPPING":
                return this.prompt(mappingPrompts.optimizeMappingInstructions(namespace, buildDetailedContext(mappings)), userPrompt);
            case "SUGGEST_RESPONSE":
                return this.prompt(mappingPrompts.suggestResponseInstructions(), userPrompt);
            case "GENERATE_FROM_OPENAPI": {
                const facts = this.require(input.specOperation, kind, "spec operation");
                return this.prompt(mappingPrompts.specEndpointInstructions(), [
                    `Operation: ${facts.method} ${facts.path}`,
                    `Summary: ${facts.operation}`,
                    `Status: ${facts.status} (${facts.statusDescription})`,
                ].join("\n"));
            }
            case "ANALYZE_PAYLOAD":
                return this.prompt(mappingPrompts.analyzePayloadInstructions(namespace, this.analysisContext(input)), userPrompt);
            case "ANALYZE_CURL":
                return this.prompt(mappingPrompts.analyzeCurlInstructions(namespace, this.analysisContext(input)), userPrompt);
            case "CHECK_ENDPOINT_MATCH":
                return this.prompt(mappingPrompts.checkEndpointMatchInstructions(namespace, this.analysisContext(input)), userPrompt);
            case "CREATE_NAMESPACE":
                return this.prompt(adminPrompts.createNamespaceInstructions(), userPrompt);
            case "MODIFY_NAMESPACE":
                return this.prompt(adminPrompts.modifyNamespaceInstructions(buildWorkspaceListing(input.workspaces ?? [])), userPrompt);
            case "DELETE_NAMESPACE":
                return this.prompt(adminPrompts.deleteNamespaceInstructions(buildWorkspaceListing(input.workspaces ?? [])), userPrompt);
            case "CREATE_USER":
                return this.prompt(adminPrompts.createUserInstructions(), userPrompt);
            case "MODIFY_USER":
                return this.prompt(adminPrompts.modifyUserInstructions(buildUserListing(input.users ?? [])), userPrompt);
            case "DELETE_USER":
                return this.prompt(adminPrompts.deleteUserInstructions(buildUserListing(input.users ?? [])), userPrompt);
            case "ENABLE_DISABLE_USER":
                return this.prompt(adminPrompts.userStatusInstructions(buildUserListing(input.users ?? [])), userPrompt);
            case "ASSIGN_NAMESPACE":
                return this.prompt(
                    adminPrompts.assignNamespaceInstructions(
                        buildWorkspaceListing(input.workspaces ?? []),
                        buildUserListing(input.users ?? [])
                    ),
                    userPrompt
                );
            default: {
                const unsupported: never = kind;
                throw new Error(`No prompt template for task kind: ${String(unsupported)}`);
            }
        }
    }

    /**
     * Ask for the id of the mapping a modification targets.
     */
    identifyMapping(namespace: string, userPrompt: string, mappings: readonly Mapping[]): ComposedPrompt {
        return this.prompt(
            mappingPrompts.identifyMappingInstructions(namespace, buildDetailedContext(mappings)),
            userPrompt,
            { temperature: 0.1, maxTokens: 50 }
        );
    }

    /**
     * Ask whether a message continues the recent conversation.
     */
    detectFollowUp(history: readonly Turn[], userPrompt: string): ComposedPrompt {
        const recent = history
            .slice(-FOLLOW_UP_TURNS)
            .map(turn => `${turn.role}: ${truncate(turn.content, FOLLOW_UP_TURN_CHARS)}`)
            .join("\n");

        return this.prompt(
            mappingPrompts.followUpDetectionInstructions(recent),
            userPrompt,
            { temperature: 0.1, maxTokens: 10 }
        );
    }

    /**
     * Answer a follow-up about mappings discussed in earlier turns.
     */
    answerFollowUp(namespace: string, userPrompt: string, discussed: readonly Mapping[]): ComposedPrompt {
        const context = discussed.map(mapping => buildDeepContext(mapping)).join("\n\n");
        return this.prompt(
            mappingPrompts.followUpAnswerInstructions(namespace, context),
            userPrompt,
            { temperature: 0.3, maxTokens: 500 }
        );
    }

    /**
     * Ask which numbered mappings a query refers to.
     */
    filterMappings(mappings: readonly Mapping[], userPrompt: string): ComposedPrompt {
        const listing = mappings
            .map((mapping, index) => `${index + 1}. ${mapping.name} - ${mapping.request.method} ${mapping.request.path}` +
                (mapping.tags.length > 0 ? ` [${mapping.tags.join(", ")}]` : ""))
            .join("\n");

        return this.prompt(
            mappingPrompts.queryFilterInstructions(listing),
            userPrompt,
            { temperature: 0.1, maxTokens: 30 }
        );
    }

    /**
     * Deep or follow-up context when a target is known, the detailed
     * workspace listing otherwise.
     */
    private analysisContext(input: ComposeInput): string {
        const mappings = input.mappings ?? [];
        if (!input.target) {
            return buildDetailedContext(mappings);
        }
        if (input.history && input.history.length > 0) {
            return buildFollowUpContext(input.target, mappings);
        }
        return buildDeepContext(input.target);
    }

    /**
     * Settings supply the call defaults; per-task overrides win.
     */
    private prompt(instructions: string, userContent: string, overrides?: OracleCallOptions): ComposedPrompt {
        const { model, temperature, maxTokens } = this.settings;
        return { instructions, userContent, options: { model, temperature, maxTokens, ...overrides } };
    }

    private require<T>(value: T | undefined, kind: TaskKind, what: string): T {
        if (value === undefined) {
            throw new Error(`${kind} prompt requires a ${what}`);
        }
        return value;
    }
}
