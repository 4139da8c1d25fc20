/**
 * @fileoverview Workspace and user account contracts
 *
 * Workspaces (namespaces) partition mappings; user accounts are granted
 * access to workspaces.
 *
 * @module @mockpilot/engine/contracts/Workspace
 */

export interface Workspace {
    readonly id: string;

    /** Unique, lowercase, hyphenated */
    readonly name: string;

    readonly displayName?: string;
    readonly description?: string;

    /** userIds with access */
    readonly members: readonly string[];

    readonly owner: string;
    readonly createdAt: string;
    readonly active: boolean;
}

export interface UserAccount {
    readonly id: string;

    /** Login name, unique */
    readonly userId: string;

    readonly email: string;
    readonly firstName: string;
    readonly lastName: string;
    readonly passwordHash: string;

    /** Workspace names this user can use */
    readonly namespaces: readonly string[];

    readonly defaultNamespace?: string;
    readonly active: boolean;
}

/** The built-in administrator account; it can never be deleted. */
export const ADMIN_USER_ID = "admin";

/**
 * Display label used in listings and explanations.
 */
export function workspaceLabel(workspace: Workspace): string {
    return workspace.displayName ?? workspace.name;
}

export function fullName(user: UserAccount): string {
    return `${user.firstName} ${user.lastName}`.trim();
}
