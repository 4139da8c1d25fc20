/**
 * @fileoverview Unit tests for oracle output normalization and parsing
 *
 * @module @mockpilot/engine/__tests__/parsing
 */

import { describe, it, expect } from "vitest";
import { normalizeAnswerText, normalizeOracleText, normalizeTaskKind } from "../parsing/normalize.js";
import { parseOracleOutput, parseOracleOutputOrThrow } from "../parsing/parseOracleOutput.js";
import { GeneratedMappingSchema, MovePlanSchema, BulkUpdatePlanSchema } from "../parsing/schemas.js";
import { ParseFailure } from "../contracts/errors.js";

describe("normalizeOracleText", () => {
    // Scenario: Fenced JSON
    it("should strip a language-tagged fence", () => {
        expect(normalizeOracleText("```json\n{\"a\":1}\n```")).toBe("{\"a\":1}");
    });

    // Scenario: Nested fences collapse completely
    it("should strip repeated fences", () => {
        expect(normalizeOracleText("  ```\n```yaml\nname: x\n```\n```  ")).toBe("name: x");
    });

    // Scenario: Normalizing twice changes nothing
    it("should be idempotent", () => {
        const once = normalizeOracleText("```json\n[1, 2]\n```");

        expect(normalizeOracleText(once)).toBe(once);
    });

    // Scenario: Plain text is only trimmed
    it("should leave unfenced text alone", () => {
        expect(normalizeOracleText("  hello  ")).toBe("hello");
    });
});

describe("normalizeAnswerText", () => {
    // Scenario: Whole answer wrapped in one fence
    it("should unwrap an answer that is a single fenced block", () => {
        expect(normalizeAnswerText("```markdown\nUse a REGEX path.\n```\n")).toBe("Use a REGEX path.");
    });

    // Scenario: Prose followed by a code block
    it("should keep fences that belong to a code block inside the answer", () => {
        const answer = "**Test**:\n```bash\ncurl x\n```";

        expect(normalizeAnswerText(`  ${answer}\n`)).toBe(answer);
    });

    // Scenario: Answer made of two code blocks
    it("should keep separate blocks intact", () => {
        const answer = "```json\n{}\n```\nthen\n```bash\ncurl x\n```";

        expect(normalizeAnswerText(answer)).toBe(answer);
    });
});

describe("normalizeTaskKind", () => {
    // Scenario: Emphasis and case are ignored
    it("should read decorated kind names", () => {
        expect(normalizeTaskKind("**list_mappings**")).toBe("LIST_MAPPINGS");
        expect(normalizeTaskKind("`DELETE_USER`")).toBe("DELETE_USER");
        expect(normalizeTaskKind("## analyze_curl")).toBe("ANALYZE_CURL");
    });

    // Scenario: Unknown answers default to creation
    it("should fall back to CREATE_MAPPING", () => {
        expect(normalizeTaskKind("I think you want to create something")).toBe("CREATE_MAPPING");
        expect(normalizeTaskKind("")).toBe("CREATE_MAPPING");
    });
});

describe("parseOracleOutput", () => {
    // Scenario: Minimal mapping gets every default
    it("should fill defaults for a minimal generated mapping", () => {
        const result = parseOracleOutput(
            "```json\n{\"name\": \"Users\", \"request\": {\"method\": \"get\", \"path\": \"/users\"}}\n```",
            GeneratedMappingSchema,
            "generated mapping"
        );

        expect(result).toEqual({
            ok   : true,
            value: {
                name        : "Users",
                priority    : 5,
                enabled     : true,
                tags        : [],
                endpointType: "REST",
                delays      : undefined,
                request     : {
                    method            : "GET",
                    path              : "/users",
                    pathPattern       : undefined,
                    queryParams       : {},
                    queryParamPatterns: {},
                    headers           : {},
                    headerPatterns    : {},
                    bodyPatterns      : [],
                },
                response    : {
                    status              : 200,
                    headers             : {},
                    body                : "",
                    templatingEnabled   : false,
                    conditionalResponses: undefined,
                },
            },
        });
    });

    // Scenario: JSON bodies become pretty-printed strings
    it("should stringify object response bodies", () => {
        const value = parseOracleOutputOrThrow(
            JSON.stringify({ name: "Item", request: { path: "/item" }, response: { body: { id: 1 } } }),
            GeneratedMappingSchema,
            "generated mapping"
        );

        expect(value.response.body).toBe("{\n  \"id\": 1\n}");
    });

    // Scenario: Numeric header values are accepted as text
    it("should coerce scalar header values to strings", () => {
        const value = parseOracleOutputOrThrow(
            JSON.stringify({ name: "Item", request: { path: "/item", headers: { "X-Version": 2 } } }),
            GeneratedMappingSchema,
            "generated mapping"
        );

        expect(value.request.headers).toEqual({ "X-Version": "2" });
    });

    // Scenario: A bare number where a delay object belongs
    it("should reject a numeric delay", () => {
        const result = parseOracleOutput(
            JSON.stringify({ name: "Slow", request: { path: "/slow" }, delays: 500 }),
            GeneratedMappingSchema,
            "generated mapping"
        );

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.failure).toBeInstanceOf(ParseFailure);
            expect(result.failure.message).toBe("Could not parse generated mapping: delays: Expected object, received number");
        }
    });

    // Scenario: Missing required field
    it("should fail when a required field is missing", () => {
        expect(() => parseOracleOutputOrThrow("{\"targetNamespace\": \"qa\"}", MovePlanSchema, "move plan"))
            .toThrow("Could not parse move plan: mappingId: Required");
    });

    // Scenario: Not JSON at all
    it("should fail on non-JSON text and keep the raw text", () => {
        const result = parseOracleOutput("Sure! Here you go.", MovePlanSchema, "move plan");

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.failure.message).toBe("Could not parse move plan: output is not valid JSON");
            expect(result.failure.rawText).toBe("Sure! Here you go.");
        }
    });

    // Scenario: Bulk plan is renamed into engine terms
    it("should rename bulk update plan fields", () => {
        const value = parseOracleOutputOrThrow(
            JSON.stringify({
                updateType     : "ADD_HEADER",
                targetEndpoints: "All",
                updateDetails  : { headerName: "X-Api-Key", headerValue: "required" },
                affectedCount  : 2,
                summary        : "Adds X-Api-Key",
            }),
            BulkUpdatePlanSchema,
            "bulk update plan"
        );

        expect(value).toEqual({
            updateKind   : "add_header",
            targetMode   : "all",
            targetIds    : [],
            updateDetails: { headerName: "X-Api-Key", headerValue: "required" },
            affectedCount: 2,
            summary      : "Adds X-Api-Key",
        });
    });
});
