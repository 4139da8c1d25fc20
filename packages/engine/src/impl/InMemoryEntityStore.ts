/**
 * @fileoverview In-Memory EntityStore Implementation
 *
 * Map-backed store used by tests and by callers that do not need
 * persistence. Maps keep insertion order, which is the listing order;
 * replacing an entity keeps its position.
 *
 * @module @mockpilot/engine/impl/InMemoryEntityStore
 */

import type { EntityStore } from "../contracts/EntityStore.js";
import type { Mapping } from "../contracts/Mapping.js";
import type { UserAccount, Workspace } from "../contracts/Workspace.js";

export interface InMemoryEntityStoreSeed {
    readonly mappings?: readonly Mapping[];
    readonly workspaces?: readonly Workspace[];
    readonly users?: readonly UserAccount[];
}

export class InMemoryEntityStore implements EntityStore {
    private readonly mappings = new Map<string, Mapping>();
    private readonly workspaces = new Map<string, Workspace>();
    private readonly users = new Map<string, UserAccount>();

    constructor(seed: InMemoryEntityStoreSeed = {}) {
        for (const mapping of seed.mappings ?? []) {
            this.mappings.set(mapping.id, mapping);
        }
        for (const workspace of seed.workspaces ?? []) {
            this.workspaces.set(workspace.name, workspace);
        }
        for (const user of seed.users ?? []) {
            this.users.set(user.userId, user);
        }
    }

    async listByNamespace(namespace: string): Promise<readonly Mapping[]> {
        return [...this.mappings.values()].filter(mapping => mapping.namespace === namespace);
    }

    async getById(id: string): Promise<Mapping | null> {
        return this.mappings.get(id) ?? null;
    }

    async save(mapping: Mapping, namespace?: string): Promise<Mapping> {
        const stored = namespace === undefined ? mapping : { ...mapping, namespace };
        this.mappings.set(stored.id, stored);
        return stored;
    }

    async delete(id: string): Promise<void> {
        this.mappings.delete(id);
    }

    async move(id: string, targetNamespace: string): Promise<Mapping> {
        const mapping = this.mappings.get(id);
        if (!mapping) {
            throw new Error(`Mapping not found: ${id}`);
        }
        const moved = { ...mapping, namespace: targetNamespace };
        this.mappings.set(id, moved);
        return moved;
    }

    async listWorkspaces(): Promise<readonly Workspace[]> {
        return [...this.workspaces.values()];
    }

    async getWorkspace(name: string): Promise<Workspace | null> {
        return this.workspaces.get(name) ?? null;
    }

    async saveWorkspace(workspace: Workspace): Promise<Workspace> {
        this.workspaces.set(workspace.name, workspace);
        return workspace;
    }

    async deleteWorkspace(name: string): Promise<void> {
        this.workspaces.delete(name);
    }

    async listUsers(): Promise<readonly UserAccount[]> {
        return [...this.users.values()];
    }

    async getUser(userId: string): Promise<UserAccount | null> {
        return this.users.get(userId) ?? null;
    }

    async saveUser(user: UserAccount): Promise<UserAccount> {
        this.users.set(user.userId, user);
        return user;
    }

    async deleteUser(userId: string): Promise<void> {
        this.users.delete(userId);
    }
}
