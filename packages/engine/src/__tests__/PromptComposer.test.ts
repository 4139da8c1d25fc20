/**
 * @fileoverview Unit tests for PromptComposer
 *
 * @module @mockpilot/engine/__tests__/PromptComposer
 */

import { describe, it, expect } from "vitest";
import { PromptComposer } from "../prompts/PromptComposer.js";
import { createSettings } from "../contracts/Settings.js";
import { buildDeepContext, buildDetailedContext, buildFollowUpContext } from "../context/ContextBuilder.js";
import { makeMapping, makeWorkspace } from "./fixtures.js";

describe("PromptComposer", () => {
    const composer = new PromptComposer(createSettings({ model: "test-model", maxContextMappings: 1 }));
    const orders = makeMapping({ id: "m1", name: "Orders", path: "/orders" });
    const users = makeMapping({ id: "m2", name: "Users", path: "/users" });

    // Scenario: Settings become the call defaults
    it("should carry the configured defaults as call options", () => {
        const prompt = composer.compose("SUGGEST_RESPONSE", { namespace: "demo", userPrompt: "a product" });

        expect(prompt.options).toEqual({ model: "test-model", temperature: 0.7, maxTokens: 2000 });
        expect(prompt.userContent).toBe("a product");
    });

    // Scenario: Creation embeds only the most relevant mappings
    it("should limit creation context to the relevant mappings", () => {
        const prompt = composer.compose("CREATE_MAPPING", {
            namespace : "demo",
            userPrompt: "create another users endpoint",
            mappings  : [orders, users],
        });

        expect(prompt.instructions).toContain("WORKSPACE: demo");
        expect(prompt.instructions).toContain("- GET /users (Priority: 5, Status: 200)");
        expect(prompt.instructions).not.toContain("- GET /orders");
    });

    // Scenario: Modification shows the current mapping as JSON
    it("should embed the target mapping for modification", () => {
        const prompt = composer.compose("MODIFY_MAPPING", {
            namespace : "demo",
            userPrompt: "return 404",
            target    : orders,
        });

        expect(prompt.instructions).toContain(JSON.stringify(orders, null, 2));
        expect(prompt.instructions).toContain("USER REQUEST: return 404");
    });

    // Scenario: Modification without a target
    it("should throw when a required input is missing", () => {
        expect(() => composer.compose("MODIFY_MAPPING", { namespace: "demo", userPrompt: "x" }))
            .toThrow("MODIFY_MAPPING prompt requires a target mapping");
    });

    // Scenario: Move lists the workspace names
    it("should list available workspaces for a move", () => {
        const prompt = composer.compose("MOVE_MAPPING", {
            namespace : "demo",
            userPrompt: "move orders to qa",
            mappings  : [orders],
            workspaces: [makeWorkspace({ name: "demo" }), makeWorkspace({ name: "qa" })],
        });

        expect(prompt.instructions).toContain("AVAILABLE WORKSPACES: demo, qa");
    });

    describe("analysis context", () => {
        // Scenario: No target means the detailed listing
        it("should use the detailed listing without a target", () => {
            const prompt = composer.compose("EXPLAIN_MAPPING", {
                namespace : "demo",
                userPrompt: "explain",
                mappings  : [orders, users],
            });

            expect(prompt.instructions).toContain(buildDetailedContext([orders, users]));
        });

        // Scenario: Target without history
        it("should use the deep context for a target", () => {
            const prompt = composer.compose("DEBUG_MAPPING", {
                namespace : "demo",
                userPrompt: "why does orders not match",
                mappings  : [orders, users],
                target    : orders,
            });

            expect(prompt.instructions).toContain(buildDeepContext(orders));
            expect(prompt.instructions).not.toContain("ALL WORKSPACE ENDPOINTS");
        });

        // Scenario: Target with history
        it("should use the follow-up context for a target with history", () => {
            const prompt = composer.compose("ANALYZE_CURL", {
                namespace : "demo",
                userPrompt: "and with this curl?",
                mappings  : [orders, users],
                target    : orders,
                history   : [{ role: "user", content: "explain orders" }],
            });

            expect(prompt.instructions).toContain(buildFollowUpContext(orders, [orders, users]));
        });
    });

    describe("helper prompts", () => {
        // Scenario: Identification uses low temperature
        it("should override temperature and tokens for identification", () => {
            const prompt = composer.identifyMapping("demo", "change orders", [orders]);

            expect(prompt.options).toEqual({ model: "test-model", temperature: 0.1, maxTokens: 50 });
        });

        // Scenario: Follow-up detection shows the last four turns, truncated
        it("should render recent turns for follow-up detection", () => {
            const long = "x".repeat(210);
            const prompt = composer.detectFollowUp([
                { role: "user", content: "first" },
                { role: "assistant", content: "second" },
                { role: "user", content: "third" },
                { role: "assistant", content: "fourth" },
                { role: "user", content: long },
            ], "and the other one?");

            expect(prompt.instructions).not.toContain("user: first");
            expect(prompt.instructions).toContain(`assistant: second\nuser: third\nassistant: fourth\nuser: ${"x".repeat(200)}...`);
            expect(prompt.options).toEqual({ model: "test-model", temperature: 0.1, maxTokens: 10 });
        });

        // Scenario: Numbered listing for query filtering
        it("should number mappings for filtering", () => {
            const tagged = makeMapping({ name: "Memo", path: "/memo", tags: ["notes", "memo"] });
            const prompt = composer.filterMappings([orders, tagged], "memo endpoints");

            expect(prompt.instructions).toContain("1. Orders - GET /orders\n2. Memo - GET /memo [notes, memo]");
        });
    });
});
