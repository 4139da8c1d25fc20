/**
 * @fileoverview Mapping actions
 *
 * Create, modify, delete, move and list mappings of the request's
 * workspace. Deletion only prepares the operation; the caller confirms
 * it through the engine.
 *
 * @module @mockpilot/engine/actions/mappingActions
 */

import type { TaskContext } from "../contracts/TaskHandler.js";
import type { AssistantResponse } from "../contracts/Response.js";
import { failureResponse } from "../contracts/Response.js";
import { responseFromError, TargetUnresolved } from "../contracts/errors.js";
import { buildDetailedContext } from "../context/ContextBuilder.js";
import { askOracle } from "../oracle/askOracle.js";
import { normalizeAnswerText, normalizeOracleText } from "../parsing/normalize.js";
import { parseOracleOutput } from "../parsing/parseOracleOutput.js";
import { GeneratedMappingSchema, MovePlanSchema } from "../parsing/schemas.js";
import {
    askWithHistory,
    findMappingInAnswer,
    formatMappingList,
    materializeMapping,
    newEntityId,
    timestamp,
} from "./shared.js";

export async function createMapping(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, mappings, services } = ctx;

    const prompt = services.composer.compose("CREATE_MAPPING", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        mappings,
    });
    const text = await askWithHistory(ctx, prompt);

    const parsed = parseOracleOutput(text, GeneratedMappingSchema, "generated mapping");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }

    const now = timestamp(ctx);
    const mapping = materializeMapping(parsed.value, {
        id       : newEntityId(),
        namespace: request.namespace,
        createdAt: now,
        updatedAt: now,
    });
    const saved = await services.store.save(mapping, request.namespace);
    ctx.logger.info("Mapping created", { mappingId: saved.id, name: saved.name });

    return {
        success        : true,
        action         : "create",
        message        : "Mapping created successfully",
        explanation    : `✅ Created mapping: **${saved.name}**\n\n\`${saved.request.method} ${saved.request.path}\` ` +
            `responds with status ${saved.response.status}.`,
        targetEntityId : saved.id,
        generatedEntity: saved,
    };
}

/**
 * Two oracle calls: one to identify the mapping, one to regenerate it.
 * The stored mapping keeps its id, namespace and creation time.
 */
export async function modifyMapping(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, mappings, services } = ctx;

    if (mappings.length === 0) {
        return failureResponse(
            "No mappings to modify",
            `📋 Workspace **${request.namespace}** has no endpoints yet. Create one first.`
        );
    }

    const identifyPrompt = services.composer.identifyMapping(request.namespace, request.userPrompt, mappings);
    const answer = normalizeOracleText(await askOracle(services.oracle, identifyPrompt));

    if (answer.toUpperCase() === "UNKNOWN") {
        return failureResponse(
            "Could not identify mapping",
            "❓ I couldn't tell which endpoint you want to modify. Mention its name or path and try again."
        );
    }

    const existing = findMappingInAnswer(answer, mappings);
    if (!existing) {
        throw new TargetUnresolved("Mapping not found", buildDetailedContext(mappings));
    }
    ctx.logger.debug("Modification target identified", { mappingId: existing.id });

    const prompt = services.composer.compose("MODIFY_MAPPING", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        target    : existing,
    });
    const text = await askWithHistory(ctx, prompt);

    const parsed = parseOracleOutput(text, GeneratedMappingSchema, "modified mapping");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }

    const updated = materializeMapping(parsed.value, {
        id       : existing.id,
        namespace: existing.namespace,
        createdAt: existing.createdAt,
        updatedAt: timestamp(ctx),
    });
    const saved = await services.store.save(updated, existing.namespace);
    ctx.logger.info("Mapping updated", { mappingId: saved.id });

    return {
        success        : true,
        action         : "modify_complete",
        message        : "Mapping updated successfully",
        explanation    : `✅ Updated mapping: **${saved.name}**\n\nChanges applied based on your request.`,
        targetEntityId : saved.id,
        generatedEntity: saved,
    };
}

export async function deleteMapping(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, mappings, services } = ctx;

    const prompt = services.composer.compose("DELETE_MAPPING", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        mappings,
    });
    const text = await askWithHistory(ctx, prompt);

    const target = findMappingInAnswer(text, mappings);
    if (!target) {
        throw new TargetUnresolved("Could not identify the mapping to delete", buildDetailedContext(mappings));
    }

    return {
        success       : true,
        action        : "delete",
        message       : "Ready to delete mapping",
        explanation   : normalizeAnswerText(text),
        targetEntityId: target.id,
    };
}

export async function moveMapping(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, mappings, services } = ctx;
    const workspaces = await services.store.listWorkspaces();

    const prompt = services.composer.compose("MOVE_MAPPING", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        mappings,
        workspaces,
    });
    const text = await askWithHistory(ctx, prompt);

    const parsed = parseOracleOutput(text, MovePlanSchema, "move plan");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }
    const plan = parsed.value;

    const wanted = plan.targetNamespace.toLowerCase();
    const destination = workspaces.find(ws => ws.name.toLowerCase() === wanted);
    if (!destination) {
        const available = workspaces.map(ws => ws.name).join(", ") || "none";
        return failureResponse(
            `Target workspace '${plan.targetNamespace}' does not exist`,
            `❌ Target workspace '${plan.targetNamespace}' does not exist. Available: ${available}`
        );
    }

    const mappingName = plan.mappingName?.toLowerCase();
    const mapping = mappings.find(m => m.id === plan.mappingId) ??
        (mappingName ? mappings.find(m => m.name.toLowerCase() === mappingName) : undefined);
    if (!mapping) {
        throw new TargetUnresolved(
            `Could not find endpoint '${plan.mappingName ?? plan.mappingId}' to move`,
            buildDetailedContext(mappings)
        );
    }

    const moved = await services.store.move(mapping.id, destination.name);
    ctx.logger.info("Mapping moved", { mappingId: moved.id, to: destination.name });

    return {
        success       : true,
        action        : "move",
        message       : "Endpoint moved successfully",
        explanation   : [plan.explanation, "✅ **Move completed!**"].filter(part => part.length > 0).join("\n\n"),
        targetEntityId: moved.id,
    };
}

/**
 * Answered from the store alone.
 */
export async function listMappings(ctx: TaskContext): Promise<AssistantResponse> {
    const { mappings } = ctx;

    if (mappings.length === 0) {
        return {
            success    : true,
            action     : "list",
            message    : "No mappings found",
            explanation: "📋 You currently have no API mappings configured in this workspace.",
            entities   : [],
        };
    }

    return {
        success    : true,
        action     : "list",
        message    : `Listed ${mappings.length} mappings`,
        explanation: formatMappingList(mappings, `📋 **Found ${mappings.length} endpoints in your workspace:**`),
        entities   : mappings,
    };
}
