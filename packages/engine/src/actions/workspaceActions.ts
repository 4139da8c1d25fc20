/**
 * @fileoverview Workspace (namespace) administration
 *
 * @module @mockpilot/engine/actions/workspaceActions
 */

import type { TaskContext } from "../contracts/TaskHandler.js";
import type { AssistantResponse } from "../contracts/Response.js";
import type { Workspace } from "../contracts/Workspace.js";
import type { EntityStore } from "../contracts/EntityStore.js";
import { failureResponse } from "../contracts/Response.js";
import { ValidationConflict, responseFromError } from "../contracts/errors.js";
import { ADMIN_USER_ID, workspaceLabel } from "../contracts/Workspace.js";
import { parseOracleOutput } from "../parsing/parseOracleOutput.js";
import { NamespaceChangeSchema, NamespaceDraftSchema, NamespaceRefSchema } from "../parsing/schemas.js";
import { askWithHistory, newEntityId, timestamp } from "./shared.js";

/**
 * Workspace names are lowercase with hyphens instead of spaces.
 */
export function normalizeWorkspaceName(name: string): string {
    return name.trim().toLowerCase().replace(/\s+/g, "-");
}

function findWorkspace(workspaces: readonly Workspace[], name: string): Workspace | undefined {
    const wanted = name.trim().toLowerCase();
    return workspaces.find(ws => ws.name.toLowerCase() === wanted);
}

function notFound(name: string): AssistantResponse {
    return failureResponse(`Namespace not found: ${name}`, `❌ Workspace '${name}' does not exist.`);
}

/**
 * Refuse to drop a workspace that still holds mappings.
 *
 * @throws ValidationConflict when mappings remain
 */
export async function assertWorkspaceEmpty(store: EntityStore, workspace: Workspace): Promise<void> {
    const remaining = await store.listByNamespace(workspace.name);
    if (remaining.length > 0) {
        throw new ValidationConflict(
            `Cannot delete workspace **${workspaceLabel(workspace)}** because it contains ${remaining.length} API mappings.`,
            "Please delete all mappings first."
        );
    }
}

export async function createNamespace(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, services } = ctx;

    const prompt = services.composer.compose("CREATE_NAMESPACE", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
    });
    const parsed = parseOracleOutput(await askWithHistory(ctx, prompt), NamespaceDraftSchema, "workspace details");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }

    const name = normalizeWorkspaceName(parsed.value.name);
    if (await services.store.getWorkspace(name)) {
        return failureResponse(
            "Namespace already exists",
            `❌ A workspace named '${name}' already exists. Choose a different name.`
        );
    }

    const workspace = await services.store.saveWorkspace({
        id         : newEntityId(),
        name,
        displayName: parsed.value.displayName,
        description: parsed.value.description,
        members    : [],
        owner      : ADMIN_USER_ID,
        createdAt  : timestamp(ctx),
        active     : true,
    });
    ctx.logger.info("Workspace created", { name });

    const description = workspace.description ? `\n\n${workspace.description}` : "";
    return {
        success       : true,
        action        : "create_namespace",
        message       : "Namespace created successfully",
        explanation   : `✅ Created namespace: **${workspaceLabel(workspace)}** (${name})${description}`,
        targetEntityId: name,
    };
}

export async function modifyNamespace(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, services } = ctx;
    const workspaces = await services.store.listWorkspaces();

    const prompt = services.composer.compose("MODIFY_NAMESPACE", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        workspaces,
    });
    const parsed = parseOracleOutput(await askWithHistory(ctx, prompt), NamespaceChangeSchema, "workspace changes");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }
    const change = parsed.value;

    const existing = findWorkspace(workspaces, change.namespaceName);
    if (!existing) {
        return notFound(change.namespaceName);
    }

    const saved = await services.store.saveWorkspace({
        ...existing,
        displayName: change.displayName ?? existing.displayName,
        description: change.description ?? existing.description,
        active     : change.active ?? existing.active,
    });
    ctx.logger.info("Workspace updated", { name: saved.name });

    return {
        success       : true,
        action        : "modify_namespace",
        message       : "Namespace updated successfully",
        explanation   : `✅ Updated namespace: **${workspaceLabel(saved)}** (${saved.name})`,
        targetEntityId: saved.name,
    };
}

export async function deleteNamespace(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, services } = ctx;
    const workspaces = await services.store.listWorkspaces();

    const prompt = services.composer.compose("DELETE_NAMESPACE", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        workspaces,
    });
    const parsed = parseOracleOutput(await askWithHistory(ctx, prompt), NamespaceRefSchema, "workspace reference");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }

    const workspace = findWorkspace(workspaces, parsed.value.namespaceName);
    if (!workspace) {
        return notFound(parsed.value.namespaceName);
    }
    await assertWorkspaceEmpty(services.store, workspace);

    return {
        success       : true,
        action        : "delete_namespace",
        message       : "Ready to delete namespace",
        explanation   : `🗑️ Ready to delete namespace: **${workspaceLabel(workspace)}** (${workspace.name})\n\n` +
            "⚠️ This action cannot be undone.",
        targetEntityId: workspace.name,
    };
}

export async function listNamespaces(ctx: TaskContext): Promise<AssistantResponse> {
    const workspaces = await ctx.services.store.listWorkspaces();

    if (workspaces.length === 0) {
        return {
            success    : true,
            action     : "list_namespaces",
            message    : "No namespaces found",
            explanation: "📋 No namespaces configured in the system.",
        };
    }

    let text = "📁 **Namespaces:**\n\n";
    for (const ws of workspaces) {
        text += `**${workspaceLabel(ws)}** (\`${ws.name}\`)\n`;
        if (ws.description) {
            text += `   └─ ${ws.description}\n`;
        }
        text += `   └─ Members: ${ws.members.length} | ${ws.active ? "✅ Active" : "❌ Inactive"}\n\n`;
    }

    return {
        success    : true,
        action     : "list_namespaces",
        message    : `Listed ${workspaces.length} namespaces`,
        explanation: text,
    };
}
