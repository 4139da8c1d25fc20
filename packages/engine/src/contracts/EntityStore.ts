/**
 * @fileoverview EntityStore Contract
 *
 * The externally owned CRUD store for mappings, workspaces and user
 * accounts. The engine reads and writes through it for the duration of
 * one request and never caches what it returns.
 *
 * Design decisions:
 * - Async everywhere so network-backed stores fit the same contract
 * - Listing order is the store's insertion order
 * - Consistency under concurrent requests is the store's responsibility
 *
 * @module @mockpilot/engine/contracts/EntityStore
 */

import type { Mapping } from "./Mapping.js";
import type { Workspace, UserAccount } from "./Workspace.js";

export interface MappingStore {
    /** All mappings of a workspace, in insertion order */
    listByNamespace(namespace: string): Promise<readonly Mapping[]>;

    getById(id: string): Promise<Mapping | null>;

    /**
     * Insert or replace a mapping.
     *
     * @param mapping - Mapping to store
     * @param namespace - When given, overrides `mapping.namespace`
     * @returns The stored mapping
     */
    save(mapping: Mapping, namespace?: string): Promise<Mapping>;

    delete(id: string): Promise<void>;

    /**
     * Move a mapping to another workspace.
     *
     * @throws Error if the mapping does not exist
     */
    move(id: string, targetNamespace: string): Promise<Mapping>;
}

export interface WorkspaceStore {
    listWorkspaces(): Promise<readonly Workspace[]>;
    getWorkspace(name: string): Promise<Workspace | null>;
    saveWorkspace(workspace: Workspace): Promise<Workspace>;
    deleteWorkspace(name: string): Promise<void>;
}

export interface UserStore {
    listUsers(): Promise<readonly UserAccount[]>;
    getUser(userId: string): Promise<UserAccount | null>;
    saveUser(user: UserAccount): Promise<UserAccount>;
    deleteUser(userId: string): Promise<void>;
}

/**
 * Combined store handed to the engine.
 *
 * @example
 * ```typescript
 * const store: EntityStore = new InMemoryEntityStore();
 * await store.saveWorkspace({ id: "ws-1", name: "demo", members: [], owner: "admin", createdAt, active: true });
 * const mappings = await store.listByNamespace("demo");
 * ```
 */
export interface EntityStore extends MappingStore, WorkspaceStore, UserStore {}
