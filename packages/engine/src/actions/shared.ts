/**
 * @fileoverview Helpers shared by the built-in actions
 *
 * @module @mockpilot/engine/actions/shared
 */

import { randomUUID } from "node:crypto";
import type { Mapping } from "../contracts/Mapping.js";
import type { TaskContext } from "../contracts/TaskHandler.js";
import type { ComposedPrompt } from "../prompts/PromptComposer.js";
import type { GeneratedMapping } from "../parsing/schemas.js";
import { askOracle } from "../oracle/askOracle.js";

/**
 * Identity and timestamps the engine imposes on generated mappings.
 */
export interface MappingIdentity {
    readonly id: string;
    readonly namespace: string;
    readonly createdAt: string;
    readonly updatedAt: string;
}

export function newEntityId(): string {
    return randomUUID();
}

/** ISO timestamp from the context's clock */
export function timestamp(ctx: TaskContext): string {
    return ctx.services.now().toISOString();
}

/**
 * Send a task prompt together with the request's conversation history.
 */
export function askWithHistory(ctx: TaskContext, prompt: ComposedPrompt): Promise<string> {
    return askOracle(ctx.services.oracle, prompt, ctx.request.conversationHistory);
}

/**
 * Turn a generated mapping into a stored one. Whatever id or namespace
 * the oracle wrote is discarded.
 */
export function materializeMapping(generated: GeneratedMapping, identity: MappingIdentity): Mapping {
    return {
        id          : identity.id,
        name        : generated.name,
        namespace   : identity.namespace,
        priority    : generated.priority,
        request     : generated.request,
        response    : generated.response,
        delays      : generated.delays,
        enabled     : generated.enabled,
        tags        : generated.tags,
        endpointType: generated.endpointType,
        createdAt   : identity.createdAt,
        updatedAt   : identity.updatedAt,
    };
}

/**
 * Find the mapping an oracle answer names. An exact id wins; otherwise
 * the first mapping whose id or name occurs in the answer.
 */
export function findMappingInAnswer(answer: string, mappings: readonly Mapping[]): Mapping | null {
    const trimmed = answer.trim();
    const exact = mappings.find(mapping => mapping.id === trimmed);
    if (exact) {
        return exact;
    }

    const lowered = trimmed.toLowerCase();
    return mappings.find(mapping =>
        lowered.includes(mapping.id.toLowerCase()) ||
        (mapping.name.length > 0 && lowered.includes(mapping.name.toLowerCase()))
    ) ?? null;
}

/**
 * Numbered, human-readable listing of mappings.
 */
export function formatMappingList(mappings: readonly Mapping[], heading: string): string {
    let text = `${heading}\n\n`;
    mappings.forEach((mapping, index) => {
        text += `${index + 1}. **${mapping.name}**\n`;
        text += `   └─ \`${mapping.request.method} ${mapping.request.path}\`\n`;
        text += `   └─ Status: ${mapping.response.status} | Priority: ${mapping.priority} | ` +
            `${mapping.enabled ? "✅ Enabled" : "❌ Disabled"}\n\n`;
    });
    return text;
}
