/**
 * @fileoverview Follow-up question handler
 *
 * Answers vague questions ("does it need a header?") about endpoints
 * the assistant mentioned in its last few turns.
 *
 * @module @mockpilot/engine/handlers/FollowUpQuestionHandler
 */

import type { Mapping } from "../contracts/Mapping.js";
import type { TaskKind } from "../contracts/TaskKind.js";
import type { Turn } from "../contracts/Request.js";
import type { TaskContext, TaskHandler } from "../contracts/TaskHandler.js";
import type { AssistantResponse } from "../contracts/Response.js";
import { failureResponse } from "../contracts/Response.js";
import { errorMessage } from "../contracts/Logger.js";
import { mappingsMentionedIn } from "../context/EntityResolver.js";
import { askOracle } from "../oracle/askOracle.js";
import { normalizeAnswerText } from "../parsing/normalize.js";

/** How many of the latest turns are searched for discussed endpoints */
const RECENT_TURNS = 3;

/**
 * Mappings named in the latest assistant turns, most recent turn first.
 */
export function mappingsDiscussed(history: readonly Turn[], mappings: readonly Mapping[]): Mapping[] {
    const found: Mapping[] = [];
    for (const turn of history.slice(-RECENT_TURNS).reverse()) {
        if (turn.role !== "assistant") {
            continue;
        }
        for (const mapping of mappingsMentionedIn(turn.content, mappings)) {
            if (!found.includes(mapping)) {
                found.push(mapping);
            }
        }
    }
    return found;
}

export class FollowUpQuestionHandler implements TaskHandler {
    readonly id          = "follow-up-question";
    readonly name        = "Follow-up Question Handler";
    readonly description = "Answers questions that continue the previous conversation";
    readonly priority    = 5;

    readonly supportedKinds: readonly TaskKind[] = [
        "EXPLAIN_MAPPING",
        "LIST_MAPPINGS",
        "DEBUG_MAPPING",
        "ANALYZE_PAYLOAD",
        "ANALYZE_CURL",
        "CHECK_ENDPOINT_MATCH",
    ];

    async canHandle(ctx: TaskContext): Promise<boolean> {
        const { request, mappings } = ctx;
        if (request.conversationHistory.length === 0) {
            return false;
        }
        if (mappingsMentionedIn(request.userPrompt, mappings).length > 0) {
            return false;
        }
        return this.isFollowUp(ctx);
    }

    async handle(ctx: TaskContext): Promise<AssistantResponse> {
        const { request, mappings, services } = ctx;

        const discussed = mappingsDiscussed(request.conversationHistory, mappings);
        if (discussed.length === 0) {
            return failureResponse(
                "Could not determine which endpoints you're asking about",
                "Please specify which endpoint(s) you want to know about."
            );
        }
        ctx.logger.debug("Answering follow-up", { endpoints: discussed.map(m => m.name) });

        const prompt = services.composer.answerFollowUp(request.namespace, request.userPrompt, discussed);
        const answer = await askOracle(services.oracle, prompt);

        return {
            success    : true,
            action     : "explain",
            message    : "Answer based on previous context",
            explanation: normalizeAnswerText(answer),
            entities   : discussed,
        };
    }

    /**
     * A failed detection call means "not a follow-up".
     */
    private async isFollowUp(ctx: TaskContext): Promise<boolean> {
        const { request, services } = ctx;
        try {
            const prompt = services.composer.detectFollowUp(request.conversationHistory, request.userPrompt);
            const answer = await askOracle(services.oracle, prompt);
            return answer.toUpperCase().includes("FOLLOWUP");
        }
        catch (error) {
            ctx.logger.warn("Follow-up detection failed", { error: errorMessage(error) });
            return false;
        }
    }
}
