/**
 * @fileoverview Deletion confirmation
 *
 * Delete tasks only prepare a deletion. Passing the prepared response
 * back here performs it, re-checking the conflicts that block it.
 *
 * @module @mockpilot/engine/actions/confirmDeletion
 */

import type { EntityStore } from "../contracts/EntityStore.js";
import type { AssistantResponse } from "../contracts/Response.js";
import { failureResponse } from "../contracts/Response.js";
import { assertWorkspaceEmpty } from "./workspaceActions.js";
import { assertDeletableUser } from "./userActions.js";

/**
 * @throws ValidationConflict when the deletion is no longer allowed
 */
export async function confirmDeletion(store: EntityStore, prepared: AssistantResponse): Promise<AssistantResponse> {
    const targetId = prepared.targetEntityId;
    if (!prepared.success || targetId === undefined) {
        return failureResponse("Nothing to confirm", "❌ Only a prepared deletion with a target can be confirmed.");
    }

    switch (prepared.action) {
        case "delete": {
            const mapping = await store.getById(targetId);
            if (!mapping) {
                return failureResponse("Mapping not found", `❌ Mapping '${targetId}' no longer exists.`);
            }
            await store.delete(targetId);
            return {
                success       : true,
                action        : "delete",
                message       : "Mapping deleted",
                explanation   : `🗑️ Deleted mapping: **${mapping.name}**`,
                targetEntityId: targetId,
            };
        }
        case "delete_namespace": {
            const workspace = await store.getWorkspace(targetId);
            if (!workspace) {
                return failureResponse(`Namespace not found: ${targetId}`, `❌ Workspace '${targetId}' does not exist.`);
            }
            await assertWorkspaceEmpty(store, workspace);
            await store.deleteWorkspace(targetId);
            return {
                success       : true,
                action        : "delete_namespace",
                message       : "Namespace deleted",
                explanation   : `🗑️ Deleted namespace: **${targetId}**`,
                targetEntityId: targetId,
            };
        }
        case "delete_user": {
            assertDeletableUser(targetId);
            const user = await store.getUser(targetId);
            if (!user) {
                return failureResponse(`User not found: ${targetId}`, `❌ User '${targetId}' does not exist.`);
            }
            await store.deleteUser(targetId);
            return {
                success       : true,
                action        : "delete_user",
                message       : "User deleted",
                explanation   : `🗑️ Deleted user: **@${targetId}**`,
                targetEntityId: targetId,
            };
        }
        default:
            return failureResponse("Nothing to confirm", `❌ A '${prepared.action ?? "unknown"}' response is not a deletion.`);
    }
}
