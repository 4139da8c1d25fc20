/**
 * @fileoverview Workspace query handler
 *
 * @module @mockpilot/engine/handlers/WorkspaceQueryHandler
 */

import type { TaskKind } from "../contracts/TaskKind.js";
import type { TaskContext, TaskHandler } from "../contracts/TaskHandler.js";
import type { AssistantResponse } from "../contracts/Response.js";

const CURRENT_WORKSPACE_WORDS: readonly string[] = ["current", "which", "what workspace"];

export class WorkspaceQueryHandler implements TaskHandler {
    readonly id          = "workspace-query";
    readonly name        = "Workspace Query Handler";
    readonly description = "Answers which workspace is in use and lists workspaces";
    readonly priority    = 10;

    readonly supportedKinds: readonly TaskKind[] = ["LIST_NAMESPACES"];

    canHandle(): boolean {
        return true;
    }

    async handle(ctx: TaskContext): Promise<AssistantResponse> {
        const { request, mappings, services } = ctx;
        const current = request.namespace;
        const lowered = request.userPrompt.toLowerCase();

        if (CURRENT_WORKSPACE_WORDS.some(word => lowered.includes(word))) {
            let explanation = `You are currently in the **\`${current}\`** workspace.`;
            if (mappings.length > 0) {
                explanation += `\n\nThis workspace contains **${mappings.length} endpoints**.`;
            }
            return {
                success: true,
                action : "info",
                message: "Current workspace",
                explanation,
            };
        }

        const workspaces = await services.store.listWorkspaces();
        let explanation = `📁 **Available workspaces:** (${workspaces.length} total)\n\n`;
        workspaces.forEach((ws, index) => {
            explanation += `${index + 1}. **${ws.name}**${ws.name === current ? " ← **(Current)**" : ""}\n`;
            if (ws.displayName && ws.displayName !== ws.name) {
                explanation += `   └─ ${ws.displayName}\n`;
            }
            if (ws.description) {
                explanation += `   └─ ${ws.description}\n`;
            }
            explanation += "\n";
        });

        return {
            success: true,
            action : "list_namespaces",
            message: `Found ${workspaces.length} workspaces`,
            explanation,
        };
    }
}
