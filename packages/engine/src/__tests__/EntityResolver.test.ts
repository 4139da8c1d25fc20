/**
 * @fileoverview Unit tests for entity resolution
 *
 * @module @mockpilot/engine/__tests__/EntityResolver
 */

import { describe, it, expect } from "vitest";
import {
    resolveTarget,
    resolveFromHistory,
    resolveRequestTarget,
    mappingsMentionedIn,
} from "../context/EntityResolver.js";
import { makeMapping } from "./fixtures.js";

describe("EntityResolver", () => {
    const namedOrders = makeMapping({ id: "m1", name: "orders", path: "/a" });
    const ordersPath = makeMapping({ id: "m2", name: "Listing", path: "/orders" });
    const memo = makeMapping({ id: "abc123", name: "Memo", path: "/memo" });

    describe("resolveTarget", () => {
        // Scenario: Path match wins over an earlier name match
        it("should prefer a path match to a name match", () => {
            expect(resolveTarget("update /orders to return 404", [namedOrders, ordersPath])?.id).toBe("m2");
        });

        // Scenario: Name match, case-insensitive
        it("should match by name", () => {
            expect(resolveTarget("what does the MEMO endpoint return", [namedOrders, memo])?.id).toBe("abc123");
        });

        // Scenario: Id match
        it("should match by id", () => {
            const hidden = makeMapping({ id: "xyz789", name: "Hidden", path: "/hidden" });

            expect(resolveTarget("modify xyz789 please", [memo, hidden])?.id).toBe("xyz789");
        });

        // Scenario: Several mappings satisfy one strategy
        it("should return the first in store order", () => {
            const first = makeMapping({ id: "u1", name: "Users", path: "/users" });
            const second = makeMapping({ id: "u2", name: "Users", path: "/people" });

            expect(resolveTarget("explain users", [first, second])?.id).toBe("u1");
        });

        // Scenario: Only one mapping in the workspace
        it("should fall back to the only mapping", () => {
            expect(resolveTarget("change it to 500", [memo])?.id).toBe("abc123");
        });

        // Scenario: Nothing matches and several exist
        it("should return null when nothing matches", () => {
            expect(resolveTarget("change it to 500", [memo, ordersPath])).toBeNull();
        });
    });

    describe("resolveFromHistory", () => {
        // Scenario: Most recent turn first
        it("should search turns from newest to oldest", () => {
            const turns = [
                { role: "user" as const, content: "tell me about the memo endpoint" },
                { role: "assistant" as const, content: "The /orders endpoint returns a list." },
            ];

            expect(resolveFromHistory(turns, [memo, ordersPath])?.id).toBe("m2");
        });

        // Scenario: No single-mapping fallback in history
        it("should not fall back to the only mapping", () => {
            expect(resolveFromHistory([{ role: "user", content: "hello" }], [memo])).toBeNull();
        });
    });

    describe("resolveRequestTarget", () => {
        // Scenario: Prompt is vague, history names the mapping
        it("should use history when the prompt resolves nothing", () => {
            const target = resolveRequestTarget({
                userPrompt         : "make it return 404",
                namespace          : "demo",
                conversationHistory: [{ role: "assistant", content: "Memo returns 200." }],
            }, [memo, ordersPath]);

            expect(target?.id).toBe("abc123");
        });

        // Scenario: Direct match ignores history
        it("should prefer the prompt over history", () => {
            const target = resolveRequestTarget({
                userPrompt         : "explain /orders",
                namespace          : "demo",
                conversationHistory: [{ role: "assistant", content: "Memo returns 200." }],
            }, [memo, ordersPath]);

            expect(target?.id).toBe("m2");
        });
    });

    describe("mappingsMentionedIn", () => {
        // Scenario: Every mention in store order
        it("should return all mentioned mappings", () => {
            const mentioned = mappingsMentionedIn("Compare Memo with /orders", [namedOrders, ordersPath, memo]);

            expect(mentioned.map(mapping => mapping.id)).toEqual(["m1", "m2", "abc123"]);
        });
    });
});
