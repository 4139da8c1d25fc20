/**
 * SQLite entity store
 *
 * Persists mappings, workspaces and user accounts in a local SQLite
 * database. Each entity is kept as a JSON document next to the columns
 * it is looked up by; rowid order is the listing order.
 */

import Database from "better-sqlite3";
import type { EntityStore, Mapping, UserAccount, Workspace } from "@mockpilot/engine";

/**
 * Raw mapping row from the database
 */
interface MappingRow {
    id: string;
    namespace: string;
    data: string;
}

/**
 * Raw document row (workspaces and users)
 */
interface DocumentRow {
    data: string;
}

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS mappings (
        id        TEXT PRIMARY KEY,
        namespace TEXT NOT NULL,
        data      TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS mappings_namespace ON mappings (namespace);
    CREATE TABLE IF NOT EXISTS workspaces (
        name TEXT PRIMARY KEY,
        data TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS users (
        user_id TEXT PRIMARY KEY,
        data    TEXT NOT NULL
    );
`;

/**
 * SQLite-backed EntityStore
 */
export class SqliteEntityStore implements EntityStore {
    private readonly db: Database.Database;

    /**
     * @param dbPath - Database file, or ":memory:"
     */
    constructor(dbPath: string) {
        this.db = new Database(dbPath);
        this.db.pragma("journal_mode = WAL");
        this.db.exec(SCHEMA);
    }

    /**
     * Close the database connection
     */
    close(): void {
        this.db.close();
    }

    private rowToMapping(row: MappingRow): Mapping {
        const mapping = JSON.parse(row.data) as Mapping;
        return { ...mapping, id: row.id, namespace: row.namespace };
    }

    async listByNamespace(namespace: string): Promise<readonly Mapping[]> {
        const rows = this.db
            .prepare("SELECT id, namespace, data FROM mappings WHERE namespace = ? ORDER BY rowid")
            .all(namespace) as MappingRow[];
        return rows.map(row => this.rowToMapping(row));
    }

    async getById(id: string): Promise<Mapping | null> {
        const row = this.db
            .prepare("SELECT id, namespace, data FROM mappings WHERE id = ?")
            .get(id) as MappingRow | undefined;
        return row ? this.rowToMapping(row) : null;
    }

    async save(mapping: Mapping, namespace?: string): Promise<Mapping> {
        const stored = namespace === undefined ? mapping : { ...mapping, namespace };
        this.db
            .prepare(`
                INSERT INTO mappings (id, namespace, data) VALUES (?, ?, ?)
                ON CONFLICT (id) DO UPDATE SET namespace = excluded.namespace, data = excluded.data
            `)
            .run(stored.id, stored.namespace, JSON.stringify(stored));
        return stored;
    }

    async delete(id: string): Promise<void> {
        this.db.prepare("DELETE FROM mappings WHERE id = ?").run(id);
    }

    async move(id: string, targetNamespace: string): Promise<Mapping> {
        const mapping = await this.getById(id);
        if (!mapping) {
            throw new Error(`Mapping not found: ${id}`);
        }
        return this.save(mapping, targetNamespace);
    }

    async listWorkspaces(): Promise<readonly Workspace[]> {
        const rows = this.db.prepare("SELECT data FROM workspaces ORDER BY rowid").all() as DocumentRow[];
        return rows.map(row => JSON.parse(row.data) as Workspace);
    }

    async getWorkspace(name: string): Promise<Workspace | null> {
        const row = this.db
            .prepare("SELECT data FROM workspaces WHERE name = ?")
            .get(name) as DocumentRow | undefined;
        return row ? (JSON.parse(row.data) as Workspace) : null;
    }

    async saveWorkspace(workspace: Workspace): Promise<Workspace> {
        this.db
            .prepare(`
                INSERT INTO workspaces (name, data) VALUES (?, ?)
                ON CONFLICT (name) DO UPDATE SET data = excluded.data
            `)
            .run(workspace.name, JSON.stringify(workspace));
        return workspace;
    }

    async deleteWorkspace(name: string): Promise<void> {
        this.db.prepare("DELETE FROM workspaces WHERE name = ?").run(name);
    }

    async listUsers(): Promise<readonly UserAccount[]> {
        const rows = this.db.prepare("SELECT data FROM users ORDER BY rowid").all() as DocumentRow[];
        return rows.map(row => JSON.parse(row.data) as UserAccount);
    }

    async getUser(userId: string): Promise<UserAccount | null> {
        const row = this.db
            .prepare("SELECT data FROM users WHERE user_id = ?")
            .get(userId) as DocumentRow | undefined;
        return row ? (JSON.parse(row.data) as UserAccount) : null;
    }

    async saveUser(user: UserAccount): Promise<UserAccount> {
        this.db
            .prepare(`
                INSERT INTO users (user_id, data) VALUES (?, ?)
                ON CONFLICT (user_id) DO UPDATE SET data = excluded.data
            `)
            .run(user.userId, JSON.stringify(user));
        return user;
    }

    async deleteUser(userId: string): Promise<void> {
        this.db.prepare("DELETE FROM users WHERE user_id = ?").run(userId);
    }
}
