/**
 * @fileoverview Unit tests for InMemoryEntityStore
 *
 * @module @mockpilot/engine/__tests__/InMemoryEntityStore
 */

import { describe, it, expect } from "vitest";
import { InMemoryEntityStore } from "../impl/InMemoryEntityStore.js";
import { makeMapping, makeUser, makeWorkspace } from "./fixtures.js";

describe("InMemoryEntityStore", () => {
    // Scenario: Listing keeps insertion order and filters by workspace
    it("should list mappings of one workspace in insertion order", async () => {
        const store = new InMemoryEntityStore({
            mappings: [
                makeMapping({ id: "m1", namespace: "demo" }),
                makeMapping({ id: "m2", namespace: "other" }),
                makeMapping({ id: "m3", namespace: "demo" }),
            ],
        });

        const listed = await store.listByNamespace("demo");

        expect(listed.map(mapping => mapping.id)).toEqual(["m1", "m3"]);
    });

    // Scenario: Replacing a mapping keeps its position
    it("should keep position when a mapping is replaced", async () => {
        const store = new InMemoryEntityStore({
            mappings: [makeMapping({ id: "m1" }), makeMapping({ id: "m2" })],
        });

        await store.save(makeMapping({ id: "m1", name: "Renamed" }));
        const listed = await store.listByNamespace("demo");

        expect(listed.map(mapping => mapping.name)).toEqual(["Renamed", "Test Mapping"]);
    });

    // Scenario: save() with a namespace overrides the mapping's own
    it("should store under the given namespace", async () => {
        const store = new InMemoryEntityStore();

        const saved = await store.save(makeMapping({ id: "m1", namespace: "demo" }), "staging");

        expect(saved.namespace).toBe("staging");
        expect(await store.listByNamespace("demo")).toEqual([]);
        expect((await store.getById("m1"))?.namespace).toBe("staging");
    });

    // Scenario: Moving a mapping that does not exist
    it("should throw when moving an unknown mapping", async () => {
        const store = new InMemoryEntityStore();

        await expect(store.move("missing", "staging")).rejects.toThrow("Mapping not found: missing");
    });

    // Scenario: Workspace and user round trip
    it("should save, read and delete workspaces and users", async () => {
        const store = new InMemoryEntityStore();

        await store.saveWorkspace(makeWorkspace({ name: "payments" }));
        await store.saveUser(makeUser({ userId: "jdoe" }));

        expect((await store.getWorkspace("payments"))?.name).toBe("payments");
        expect((await store.getUser("jdoe"))?.userId).toBe("jdoe");

        await store.deleteWorkspace("payments");
        await store.deleteUser("jdoe");

        expect(await store.listWorkspaces()).toEqual([]);
        expect(await store.listUsers()).toEqual([]);
    });
});
