/**
 * @fileoverview Query mapping handler
 *
 * Answers "list" and "show" questions about the workspace's mappings:
 * one match shows its full configuration, several are listed, and no
 * match lists everything.
 *
 * @module @mockpilot/engine/handlers/QueryMappingHandler
 */

import type { Mapping } from "../contracts/Mapping.js";
import type { TaskKind } from "../contracts/TaskKind.js";
import type { TaskContext, TaskHandler } from "../contracts/TaskHandler.js";
import type { AssistantResponse } from "../contracts/Response.js";
import { errorMessage } from "../contracts/Logger.js";
import { buildDeepContext } from "../context/ContextBuilder.js";
import { extractKeywords } from "../context/keywords.js";
import { askOracle } from "../oracle/askOracle.js";
import { listMappings } from "../actions/mappingActions.js";
import { formatMappingList } from "../actions/shared.js";

/** Phrases that ask for every endpoint of the workspace */
export const ALL_ENDPOINT_PHRASES: readonly string[] = [
    "all endpoints",
    "all mappings",
    "workspace endpoints",
    "namespace endpoints",
    "current workspace",
    "this workspace",
];

/**
 * Parse a "1,3" style answer into mappings. Indexes are 1-based;
 * out-of-range and duplicate indexes are ignored.
 */
export function pickByIndexes(answer: string, mappings: readonly Mapping[]): Mapping[] {
    if (answer.trim().toUpperCase() === "NONE") {
        return [];
    }
    const picked: Mapping[] = [];
    for (const token of answer.replace(/[^0-9,]/g, "").split(",")) {
        if (token.length === 0) {
            continue;
        }
        const mapping = mappings[Number.parseInt(token, 10) - 1];
        if (mapping && !picked.includes(mapping)) {
            picked.push(mapping);
        }
    }
    return picked;
}

/**
 * Mappings whose name contains one of the prompt's keywords.
 */
export function keywordMatches(prompt: string, mappings: readonly Mapping[]): Mapping[] {
    const keywords = [...extractKeywords(prompt)];
    if (keywords.length === 0) {
        return [];
    }
    return mappings.filter(mapping => {
        const name = mapping.name.toLowerCase();
        return keywords.some(keyword => name.includes(keyword));
    });
}

export class QueryMappingHandler implements TaskHandler {
    readonly id          = "query-mapping";
    readonly name        = "Query Mapping Handler";
    readonly description = "Lists or shows mappings matching a question";
    readonly priority    = 10;

    readonly supportedKinds: readonly TaskKind[] = ["LIST_MAPPINGS", "EXPLAIN_MAPPING"];

    canHandle(): boolean {
        return true;
    }

    async handle(ctx: TaskContext): Promise<AssistantResponse> {
        const { request, mappings } = ctx;
        const lowered = request.userPrompt.toLowerCase();

        if (mappings.length === 0 || ALL_ENDPOINT_PHRASES.some(phrase => lowered.includes(phrase))) {
            return listMappings(ctx);
        }

        const matches = await this.findMatches(ctx);
        ctx.logger.debug("Query matched mappings", { count: matches.length });

        if (matches.length === 1) {
            const [mapping] = matches;
            return {
                success       : true,
                action        : "show_details",
                message       : "Endpoint details",
                explanation   : buildDeepContext(mapping),
                targetEntityId: mapping.id,
                entities      : matches,
            };
        }

        if (matches.length > 1) {
            return {
                success    : true,
                action     : "list",
                message    : `Found ${matches.length} matching endpoints`,
                explanation: formatMappingList(
                    matches,
                    `📋 **Found ${matches.length} matching endpoints in workspace \`${request.namespace}\`:**`
                ),
                entities: matches,
            };
        }

        return listMappings(ctx);
    }

    /**
     * Oracle filtering, with keyword matching when the oracle fails.
     */
    private async findMatches(ctx: TaskContext): Promise<Mapping[]> {
        const { request, mappings, services } = ctx;
        try {
            const answer = await askOracle(services.oracle, services.composer.filterMappings(mappings, request.userPrompt));
            return pickByIndexes(answer, mappings);
        }
        catch (error) {
            ctx.logger.warn("Oracle filtering failed, using keywords", { error: errorMessage(error) });
            return keywordMatches(request.userPrompt, mappings);
        }
    }
}
