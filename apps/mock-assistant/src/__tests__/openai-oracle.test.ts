/**
 * @fileoverview Unit tests for the OpenAI oracle
 *
 * @module oracle/__tests__/openai-oracle
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { OracleFailure } from "@mockpilot/engine";

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

// Mock the OpenAI SDK
vi.mock("openai", () => ({
    default: vi.fn(function () {
        return { chat: { completions: { create: mockCreate } } };
    }),
}));

import OpenAI from "openai";
import { OpenAIOracle } from "../oracle/openai-oracle.js";

const MockedOpenAI = vi.mocked(OpenAI);

const config = {
    apiKey     : "test-key",
    model      : "gpt-4o-mini",
    temperature: 0.7,
    maxTokens  : 2000,
};

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

function completion(content: string | null) {
    return { choices: [{ message: { role: "assistant", content } }] };
}

describe("OpenAIOracle", () => {
    beforeEach(() => {
        vi.clearAllMocks();
        mockCreate.mockReset();
    });

    // Scenario: Client built from the API key
    it("should create a client with the configured key", () => {
        new OpenAIOracle({ config, logger: createMockLogger() });

        expect(MockedOpenAI).toHaveBeenCalledWith({ apiKey: "test-key" });
    });

    // Scenario: Instructions, history, then the user content
    it("should send messages in order with configured defaults", async () => {
        mockCreate.mockResolvedValue(completion("LIST_MAPPINGS"));
        const oracle = new OpenAIOracle({ config, logger: createMockLogger() });

        const answer = await oracle.complete(
            "Classify the request.",
            [
                { role: "user", content: "hi" },
                { role: "assistant", content: "hello" },
            ],
            "show endpoints"
        );

        expect(answer).toBe("LIST_MAPPINGS");
        expect(mockCreate).toHaveBeenCalledWith({
            model      : "gpt-4o-mini",
            temperature: 0.7,
            max_tokens : 2000,
            messages   : [
                { role: "system", content: "Classify the request." },
                { role: "user", content: "hi" },
                { role: "assistant", content: "hello" },
                { role: "user", content: "show endpoints" },
            ],
        });
    });

    // Scenario: Per-call options win
    it("should apply per-call overrides", async () => {
        mockCreate.mockResolvedValue(completion("ok"));
        const oracle = new OpenAIOracle({ config, logger: createMockLogger() });

        await oracle.complete("sys", [], "user", { model: "gpt-4o", temperature: 0.1, maxTokens: 20 });

        expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({
            model      : "gpt-4o",
            temperature: 0.1,
            max_tokens : 20,
        }));
    });

    // Scenario: SDK error
    it("should wrap SDK errors in OracleFailure", async () => {
        mockCreate.mockRejectedValue(new Error("429 Too Many Requests"));
        const oracle = new OpenAIOracle({ config, logger: createMockLogger() });

        const result = oracle.complete("sys", [], "user");

        await expect(result).rejects.toBeInstanceOf(OracleFailure);
        await expect(result).rejects.toThrow("OpenAI request failed: 429 Too Many Requests");
    });

    // Scenario: Empty answer
    it("should throw OracleFailure when the answer is empty", async () => {
        mockCreate.mockResolvedValue(completion(null));
        const logger = createMockLogger();
        const oracle = new OpenAIOracle({ config, logger });

        await expect(oracle.complete("sys", [], "user")).rejects.toThrow("No response from OpenAI");
        expect(logger.debug).toHaveBeenCalledWith("OpenAI completion", expect.objectContaining({
            model   : "gpt-4o-mini",
            messages: 2,
        }));
    });
});
