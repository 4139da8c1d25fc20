/**
 * @fileoverview User account administration
 *
 * Passwords are hashed through the injected PasswordHasher and never
 * echoed back.
 *
 * @module @mockpilot/engine/actions/userActions
 */

import type { TaskContext } from "../contracts/TaskHandler.js";
import type { AssistantResponse } from "../contracts/Response.js";
import type { UserAccount, Workspace } from "../contracts/Workspace.js";
import { failureResponse } from "../contracts/Response.js";
import { ValidationConflict, responseFromError } from "../contracts/errors.js";
import { ADMIN_USER_ID, fullName, workspaceLabel } from "../contracts/Workspace.js";
import { parseOracleOutput } from "../parsing/parseOracleOutput.js";
import {
    AssignmentSchema,
    UserChangeSchema,
    UserDraftSchema,
    UserRefSchema,
    UserStatusSchema,
} from "../parsing/schemas.js";
import { askWithHistory, newEntityId } from "./shared.js";

function findUser(users: readonly UserAccount[], userId: string): UserAccount | undefined {
    const wanted = userId.trim().toLowerCase();
    return users.find(user => user.userId.toLowerCase() === wanted);
}

function userNotFound(userId: string): AssistantResponse {
    return failureResponse(`User not found: ${userId}`, `❌ User '${userId}' does not exist.`);
}

function describeUser(user: UserAccount): string {
    const name = fullName(user);
    return name.length > 0 ? `**${name}** (@${user.userId})` : `**@${user.userId}**`;
}

/**
 * @throws ValidationConflict for the administrator account
 */
export function assertDeletableUser(userId: string): void {
    if (userId.toLowerCase() === ADMIN_USER_ID) {
        throw new ValidationConflict("Cannot delete the admin user account.", "Disable it instead if access must be revoked.");
    }
}

export async function createUser(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, services } = ctx;

    const prompt = services.composer.compose("CREATE_USER", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
    });
    const parsed = parseOracleOutput(await askWithHistory(ctx, prompt), UserDraftSchema, "user details");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }
    const draft = parsed.value;
    const userId = draft.userId.trim().toLowerCase();

    if (await services.store.getUser(userId)) {
        return failureResponse("User already exists", `❌ User '${userId}' already exists.`);
    }

    const user = await services.store.saveUser({
        id          : newEntityId(),
        userId,
        email       : draft.email,
        firstName   : draft.firstName,
        lastName    : draft.lastName,
        passwordHash: draft.password ? await services.passwordHasher.hash(draft.password) : "",
        namespaces  : [],
        active      : true,
    });
    ctx.logger.info("User created", { userId });

    const passwordNote = draft.password
        ? "🔑 Password set."
        : "🔑 No password was given; set one with a modify request before this user signs in.";
    return {
        success       : true,
        action        : "create_user",
        message       : "User created successfully",
        explanation   : `✅ Created user: ${describeUser(user)}\n📧 ${user.email}\n${passwordNote}`,
        targetEntityId: userId,
    };
}

export async function modifyUser(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, services } = ctx;
    const users = await services.store.listUsers();

    const prompt = services.composer.compose("MODIFY_USER", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        users,
    });
    const parsed = parseOracleOutput(await askWithHistory(ctx, prompt), UserChangeSchema, "user changes");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }
    const change = parsed.value;

    const existing = findUser(users, change.userId);
    if (!existing) {
        return userNotFound(change.userId);
    }

    const saved = await services.store.saveUser({
        ...existing,
        firstName   : change.firstName ?? existing.firstName,
        lastName    : change.lastName ?? existing.lastName,
        email       : change.email ?? existing.email,
        passwordHash: change.password ? await services.passwordHasher.hash(change.password) : existing.passwordHash,
    });
    ctx.logger.info("User updated", { userId: saved.userId, passwordChanged: Boolean(change.password) });

    return {
        success       : true,
        action        : "modify_user",
        message       : "User updated successfully",
        explanation   : `✅ Updated user: ${describeUser(saved)}`,
        targetEntityId: saved.userId,
    };
}

export async function deleteUser(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, services } = ctx;
    const users = await services.store.listUsers();

    const prompt = services.composer.compose("DELETE_USER", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        users,
    });
    const parsed = parseOracleOutput(await askWithHistory(ctx, prompt), UserRefSchema, "user reference");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }

    const user = findUser(users, parsed.value.userId);
    if (!user) {
        return userNotFound(parsed.value.userId);
    }
    assertDeletableUser(user.userId);

    return {
        success       : true,
        action        : "delete_user",
        message       : "Ready to delete user",
        explanation   : `🗑️ Ready to delete user: ${describeUser(user)}\n\n⚠️ This action cannot be undone.`,
        targetEntityId: user.userId,
    };
}

export async function listUsers(ctx: TaskContext): Promise<AssistantResponse> {
    const users = await ctx.services.store.listUsers();

    if (users.length === 0) {
        return {
            success    : true,
            action     : "list_users",
            message    : "No users found",
            explanation: "👥 No users in the system.",
        };
    }

    let text = "👥 **Users:**\n\n";
    for (const user of users) {
        text += `${describeUser(user)}\n`;
        if (user.email) {
            text += `   └─ 📧 ${user.email}\n`;
        }
        text += `   └─ Namespaces: ${user.namespaces.length} | ${user.active ? "✅ Active" : "❌ Disabled"}\n\n`;
    }

    return {
        success    : true,
        action     : "list_users",
        message    : `Listed ${users.length} users`,
        explanation: text,
    };
}

export async function setUserStatus(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, services } = ctx;
    const users = await services.store.listUsers();

    const prompt = services.composer.compose("ENABLE_DISABLE_USER", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        users,
    });
    const parsed = parseOracleOutput(await askWithHistory(ctx, prompt), UserStatusSchema, "user status change");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }
    const { action, reason } = parsed.value;

    const user = findUser(users, parsed.value.userId);
    if (!user) {
        return userNotFound(parsed.value.userId);
    }

    const enable = action === "enable";
    const saved = await services.store.saveUser({ ...user, active: enable });
    ctx.logger.info("User status changed", { userId: saved.userId, active: enable });

    const why = reason ? `\n\nReason: ${reason}` : "";
    return {
        success       : true,
        action        : "user_status",
        message       : `User ${enable ? "enabled" : "disabled"}`,
        explanation   : `${enable ? "✅" : "🚫"} User ${describeUser(saved)} has been ${enable ? "enabled" : "disabled"}.${why}`,
        targetEntityId: saved.userId,
    };
}

/**
 * Grant a user access to a workspace. Both sides of the membership are
 * updated; an existing grant is left as it is.
 */
export async function assignNamespace(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, services } = ctx;
    const workspaces = await services.store.listWorkspaces();
    const users = await services.store.listUsers();

    const prompt = services.composer.compose("ASSIGN_NAMESPACE", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        workspaces,
        users,
    });
    const parsed = parseOracleOutput(await askWithHistory(ctx, prompt), AssignmentSchema, "namespace assignment");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }

    const user = findUser(users, parsed.value.userId);
    if (!user) {
        return userNotFound(parsed.value.userId);
    }
    const wanted = parsed.value.namespaceName.trim().toLowerCase();
    const workspace: Workspace | undefined = workspaces.find(ws => ws.name.toLowerCase() === wanted);
    if (!workspace) {
        return failureResponse(
            `Namespace not found: ${parsed.value.namespaceName}`,
            `❌ Workspace '${parsed.value.namespaceName}' does not exist.`
        );
    }

    if (!workspace.members.includes(user.userId)) {
        await services.store.saveWorkspace({ ...workspace, members: [...workspace.members, user.userId] });
    }
    if (!user.namespaces.includes(workspace.name)) {
        await services.store.saveUser({ ...user, namespaces: [...user.namespaces, workspace.name] });
    }
    ctx.logger.info("Namespace assigned", { userId: user.userId, namespace: workspace.name });

    return {
        success       : true,
        action        : "assign_namespace",
        message       : "Namespace assigned successfully",
        explanation   : `✅ Assigned ${describeUser(user)} to namespace **${workspaceLabel(workspace)}** (${workspace.name})`,
        targetEntityId: user.userId,
    };
}
