/**
 * @fileoverview Unit tests for analysis actions
 *
 * @module @mockpilot/engine/__tests__/analysisActions
 */

import { describe, it, expect } from "vitest";
import {
    explainMapping,
    debugMapping,
    analyzeCurl,
    analyzePayload,
    optimizeMappings,
    suggestResponse,
} from "../actions/analysisActions.js";
import { makeContext, makeMapping, scriptedOracle } from "./fixtures.js";

const orders = makeMapping({ id: "m-orders", name: "Orders", path: "/orders" });
const users = makeMapping({ id: "m-users", name: "Users", path: "/users" });

describe("analysis actions", () => {
    // Scenario: Prompt names a mapping
    it("should embed the complete configuration of the resolved mapping", async () => {
        const oracle = scriptedOracle("```\nOrders returns 200 for any GET.\n```");
        const ctx = await makeContext({ prompt: "explain /orders", mappings: [orders, users], oracle });

        const response = await explainMapping(ctx);

        expect(response).toEqual({
            success       : true,
            action        : "explain",
            message       : "Explanation generated",
            explanation   : "Orders returns 200 for any GET.",
            targetEntityId: "m-orders",
        });
        const instructions = oracle.complete.mock.calls[0][0];
        expect(instructions).toContain("=== COMPLETE ENDPOINT CONFIGURATION ===");
        expect(instructions).toContain("ID: m-orders");
    });

    // Scenario: Target only in history
    it("should resolve the target from earlier turns", async () => {
        const history = [{ role: "assistant" as const, content: "The Users endpoint is at /users." }];
        const ctx = await makeContext({
            prompt  : "why does it fail?",
            mappings: [orders, users],
            history,
            oracle  : scriptedOracle("Path mismatch."),
        });

        const response = await debugMapping(ctx);

        expect(response.action).toBe("debug");
        expect(response.targetEntityId).toBe("m-users");
    });

    // Scenario: Nothing resolved
    it("should omit the target and use the detailed listing", async () => {
        const oracle = scriptedOracle("Send it to /orders.");
        const ctx = await makeContext({ prompt: "curl -X GET http://localhost/unknown", mappings: [orders, users], oracle });

        const response = await analyzeCurl(ctx);

        expect(response.targetEntityId).toBeUndefined();
        expect("targetEntityId" in response).toBe(false);
        expect(oracle.complete.mock.calls[0][0]).toContain("📍 **Orders** (ID: m-orders)");
    });

    // Scenario: Answer ends with a code block
    it("should keep the closing fence of a trailing code block", async () => {
        const answer = "**Test**:\n```bash\ncurl -X POST http://localhost/orders\n```";
        const ctx = await makeContext({ prompt: "will this body match /orders?", mappings: [orders, users], oracle: scriptedOracle(answer) });

        const response = await analyzePayload(ctx);

        expect(response.action).toBe("analyze_payload");
        expect(response.targetEntityId).toBe("m-orders");
        expect(response.explanation).toBe(answer);
    });
});

describe("optimizeMappings", () => {
    // Scenario: One suggestion per non-blank line
    it("should split the answer into suggestions", async () => {
        const ctx = await makeContext({
            mappings: [orders],
            oracle  : scriptedOracle("- Merge duplicates\n\n  - Add tags  \n"),
        });

        const response = await optimizeMappings(ctx);

        expect(response.action).toBe("optimize");
        expect(response.explanation).toBe("- Merge duplicates\n\n  - Add tags");
        expect(response.suggestions).toEqual(["- Merge duplicates", "- Add tags"]);
    });
});

describe("suggestResponse", () => {
    it("should return the normalized suggestion", async () => {
        const ctx = await makeContext({ prompt: "a login response", oracle: scriptedOracle("```json\n{\"token\":\"abc\"}\n```") });

        const response = await suggestResponse(ctx);

        expect(response.action).toBe("suggest_response");
        expect(response.explanation).toBe("{\"token\":\"abc\"}");
    });
});
