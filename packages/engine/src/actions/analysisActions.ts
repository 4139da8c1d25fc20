/**
 * @fileoverview Analysis actions
 *
 * Read-only tasks: the oracle's answer is the explanation. When the
 * prompt or history points at a mapping, the context carries its full
 * configuration.
 *
 * @module @mockpilot/engine/actions/analysisActions
 */

import type { TaskContext } from "../contracts/TaskHandler.js";
import type { AssistantResponse, ResponseAction } from "../contracts/Response.js";
import type { ComposableKind } from "../prompts/PromptComposer.js";
import { resolveRequestTarget } from "../context/EntityResolver.js";
import { normalizeAnswerText } from "../parsing/normalize.js";
import { askWithHistory } from "./shared.js";

type AnalysisKind = Extract<
    ComposableKind,
    "EXPLAIN_MAPPING" | "DEBUG_MAPPING" | "ANALYZE_PAYLOAD" | "ANALYZE_CURL" | "CHECK_ENDPOINT_MATCH"
>;

async function analyze(
    ctx: TaskContext,
    kind: AnalysisKind,
    action: ResponseAction,
    message: string
): Promise<AssistantResponse> {
    const { request, mappings, services } = ctx;
    const target = resolveRequestTarget(request, mappings);
    if (target) {
        ctx.logger.debug("Analysis target resolved", { mappingId: target.id });
    }

    const prompt = services.composer.compose(kind, {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        mappings,
        history   : request.conversationHistory,
        ...(target ? { target } : {}),
    });
    const text = await askWithHistory(ctx, prompt);

    return {
        success    : true,
        action,
        message,
        explanation: normalizeAnswerText(text),
        ...(target ? { targetEntityId: target.id } : {}),
    };
}

export function explainMapping(ctx: TaskContext): Promise<AssistantResponse> {
    return analyze(ctx, "EXPLAIN_MAPPING", "explain", "Explanation generated");
}

export function debugMapping(ctx: TaskContext): Promise<AssistantResponse> {
    return analyze(ctx, "DEBUG_MAPPING", "debug", "Debug analysis complete");
}

export function analyzePayload(ctx: TaskContext): Promise<AssistantResponse> {
    return analyze(ctx, "ANALYZE_PAYLOAD", "analyze_payload", "Deep payload analysis complete");
}

export function analyzeCurl(ctx: TaskContext): Promise<AssistantResponse> {
    return analyze(ctx, "ANALYZE_CURL", "analyze_curl", "Curl analysis complete");
}

export function checkEndpointMatch(ctx: TaskContext): Promise<AssistantResponse> {
    return analyze(ctx, "CHECK_ENDPOINT_MATCH", "check_endpoint_match", "Endpoint match check complete");
}

/**
 * Each non-blank line of the answer becomes one suggestion.
 */
export async function optimizeMappings(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, mappings, services } = ctx;

    const prompt = services.composer.compose("OPTIMIZE_MAPPING", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        mappings,
    });
    const text = normalizeAnswerText(await askWithHistory(ctx, prompt));
    const suggestions = text
        .split("\n")
        .map(line => line.trim())
        .filter(line => line.length > 0);

    return {
        success    : true,
        action     : "optimize",
        message    : "Optimization suggestions generated",
        explanation: text,
        suggestions,
    };
}

export async function suggestResponse(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, services } = ctx;

    const prompt = services.composer.compose("SUGGEST_RESPONSE", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
    });
    const text = await askWithHistory(ctx, prompt);

    return {
        success    : true,
        action     : "suggest_response",
        message    : "Response suggestion generated",
        explanation: normalizeAnswerText(text),
    };
}
