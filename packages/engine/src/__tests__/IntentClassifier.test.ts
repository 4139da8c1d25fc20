/**
 * @fileoverview Unit tests for IntentClassifier and its fallback rules
 *
 * @module @mockpilot/engine/__tests__/IntentClassifier
 */

import { describe, it, expect } from "vitest";
import { IntentClassifier } from "../classifier/IntentClassifier.js";
import { applyHeuristics, DEFAULT_HEURISTIC_RULES, withUserRules } from "../classifier/heuristics.js";
import { buildCategoryList } from "../classifier/taskKinds.js";
import { askOracle } from "../oracle/askOracle.js";
import { OracleFailure } from "../contracts/errors.js";
import { createMockLogger, scriptedOracle } from "./fixtures.js";

describe("applyHeuristics", () => {
    // Scenario: Spec keywords win first
    it("should detect spec imports", () => {
        expect(applyHeuristics("Here is my Swagger file, create user endpoints")).toBe("GENERATE_FROM_OPENAPI");
    });

    // Scenario: Both words required
    it("should need namespace and create together", () => {
        expect(applyHeuristics("create a namespace for payments")).toBe("CREATE_NAMESPACE");
        expect(applyHeuristics("delete the payments namespace")).toBe("CREATE_MAPPING");
    });

    // Scenario: User creation
    it("should detect user creation", () => {
        expect(applyHeuristics("Create user jdoe")).toBe("CREATE_USER");
    });

    // Scenario: Nothing matches
    it("should default to mapping creation", () => {
        expect(applyHeuristics("GET /health returning UP")).toBe("CREATE_MAPPING");
    });

    // Scenario: Custom rules replace the built-in ones
    it("should apply custom rules in order", () => {
        const rules = [
            { name: "users", kind: "LIST_USERS" as const, anyOf: ["users"] },
            ...DEFAULT_HEURISTIC_RULES,
        ];

        expect(applyHeuristics("create users", rules)).toBe("LIST_USERS");
    });

    // Scenario: User rules ahead of the built-in set
    it("should consult user rules before the base rules", () => {
        const rules = withUserRules([{ name: "user-report", kind: "LIST_USERS", anyOf: ["user"] }]);

        expect(rules).toHaveLength(DEFAULT_HEURISTIC_RULES.length + 1);
        expect(applyHeuristics("create a user bob")).toBe("CREATE_USER");
        expect(applyHeuristics("create a user bob", rules)).toBe("LIST_USERS");
    });
});

describe("buildCategoryList", () => {
    // Scenario: Groups in order of first appearance, examples inline
    it("should group definitions under headings", () => {
        const list = buildCategoryList([
            { id: "CREATE_MAPPING", group: "Mappings", description: "Create", examples: ["add GET /x"] },
            { id: "LIST_USERS", group: "Users", description: "List users" },
            { id: "DELETE_MAPPING", group: "Mappings", description: "Delete" },
        ]);

        expect(list).toBe(
            "**Mappings:**\n" +
            "- CREATE_MAPPING: Create\n    Examples: \"add GET /x\"\n" +
            "- DELETE_MAPPING: Delete\n\n" +
            "**Users:**\n" +
            "- LIST_USERS: List users"
        );
    });
});

describe("askOracle", () => {
    // Scenario: Transport errors are wrapped
    it("should wrap oracle errors in OracleFailure", async () => {
        const oracle = scriptedOracle(new Error("socket hang up"));

        const call = askOracle(oracle, { instructions: "i", userContent: "u" });

        await expect(call).rejects.toBeInstanceOf(OracleFailure);
        await expect(askOracle(scriptedOracle(new Error("socket hang up")), { instructions: "i", userContent: "u" }))
            .rejects.toThrow("Oracle \"scripted\" request failed: socket hang up");
    });

    // Scenario: History goes between instructions and user content
    it("should pass history through", async () => {
        const oracle = scriptedOracle("ok");
        const history = [{ role: "user" as const, content: "earlier" }];

        await askOracle(oracle, { instructions: "i", userContent: "u" }, history);

        expect(oracle.complete).toHaveBeenCalledWith("i", history, "u", undefined);
    });
});

describe("IntentClassifier", () => {
    // Scenario: Oracle answer decides
    it("should classify from the oracle answer", async () => {
        const oracle = scriptedOracle("**LIST_MAPPINGS**");
        const classifier = new IntentClassifier({ oracle, logger: createMockLogger() });

        expect(await classifier.classify("show me everything")).toEqual({ kind: "LIST_MAPPINGS", source: "oracle" });
    });

    // Scenario: Classification call options
    it("should call the oracle at low temperature with no history", async () => {
        const oracle = scriptedOracle("LIST_USERS");
        const classifier = new IntentClassifier({ oracle, model: "test-model", logger: createMockLogger() });

        await classifier.classify("who has access?");

        expect(oracle.complete).toHaveBeenCalledWith(
            classifier.systemPrompt,
            [],
            "who has access?",
            { model: "test-model", temperature: 0.1, maxTokens: 20 }
        );
    });

    // Scenario: Unreadable answer is not a fallback trigger
    it("should default unknown answers to CREATE_MAPPING without heuristics", async () => {
        const oracle = scriptedOracle("I am not sure");
        const classifier = new IntentClassifier({ oracle, logger: createMockLogger() });

        expect(await classifier.classify("create a namespace qa")).toEqual({ kind: "CREATE_MAPPING", source: "oracle" });
    });

    // Scenario: Oracle failure triggers the keyword rules
    it("should fall back to heuristics when the oracle fails", async () => {
        const oracle = scriptedOracle(new Error("timeout"));
        const logger = createMockLogger();
        const classifier = new IntentClassifier({ oracle, logger });

        expect(await classifier.classify("create a namespace qa")).toEqual({ kind: "CREATE_NAMESPACE", source: "heuristic" });
        expect(logger.warn).toHaveBeenCalledWith("Oracle classification failed, using heuristics", {
            kind : "CREATE_NAMESPACE",
            error: "Oracle \"scripted\" request failed: timeout",
        });
    });

    // Scenario: Template placeholder
    it("should render categories into the placeholder or append them", () => {
        const kinds = [{ id: "LIST_USERS" as const, description: "List users" }];
        const withPlaceholder = new IntentClassifier({ oracle: scriptedOracle(), kinds, systemPrompt: "Kinds:\n{{categories}}\nEnd" });
        const without = new IntentClassifier({ oracle: scriptedOracle(), kinds, systemPrompt: "Classify." });

        expect(withPlaceholder.systemPrompt).toBe("Kinds:\n- LIST_USERS: List users\nEnd");
        expect(without.systemPrompt).toBe("Classify.\n\nAvailable task types:\n- LIST_USERS: List users");
    });
});
