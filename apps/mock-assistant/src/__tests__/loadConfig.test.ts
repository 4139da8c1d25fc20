/**
 * @fileoverview Unit tests for environment configuration
 *
 * @module config/__tests__/loadConfig
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError, loadAssistantConfig } from "../config/loadConfig.js";

describe("loadAssistantConfig", () => {
    // Scenario: Only the key is set
    it("should apply defaults for everything but the API key", () => {
        const config = loadAssistantConfig({ OPENAI_API_KEY: "test-key" });

        expect(config).toEqual({
            apiKey            : "test-key",
            model             : "gpt-4o-mini",
            temperature       : 0.7,
            maxTokens         : 2000,
            maxContextMappings: 10,
            databasePath      : "mock-assistant.db",
        });
        expect(Object.isFrozen(config)).toBe(true);
    });

    // Scenario: Every variable overridden
    it("should read overrides from the environment", () => {
        const config = loadAssistantConfig({
            OPENAI_API_KEY                : " test-key ",
            OPENAI_MODEL                  : "gpt-4o",
            OPENAI_TEMPERATURE            : "0",
            OPENAI_MAX_TOKENS             : "500",
            ASSISTANT_MAX_CONTEXT_MAPPINGS: "3",
            ASSISTANT_DB_PATH             : "/tmp/assistant.db",
        });

        expect(config).toEqual({
            apiKey            : "test-key",
            model             : "gpt-4o",
            temperature       : 0,
            maxTokens         : 500,
            maxContextMappings: 3,
            databasePath      : "/tmp/assistant.db",
        });
    });

    // Scenario: Missing key
    it("should throw ConfigurationError without an API key", () => {
        try {
            loadAssistantConfig({ OPENAI_API_KEY: "  " });
            expect.fail("expected a ConfigurationError");
        }
        catch (error) {
            expect(error).toBeInstanceOf(ConfigurationError);
            expect(error).toMatchObject({
                kind    : "configuration_error",
                variable: "OPENAI_API_KEY",
                message : "OPENAI_API_KEY is required",
            });
        }
    });

    it("should reject a temperature out of range", () => {
        expect(() => loadAssistantConfig({ OPENAI_API_KEY: "test-key", OPENAI_TEMPERATURE: "3" })).toThrow(
            "OPENAI_TEMPERATURE must be a number between 0 and 2, got '3'"
        );
    });

    it("should reject a non-integer token limit", () => {
        expect(() => loadAssistantConfig({ OPENAI_API_KEY: "test-key", OPENAI_MAX_TOKENS: "1.5" })).toThrow(
            "OPENAI_MAX_TOKENS must be a positive integer, got '1.5'"
        );
    });

    it("should reject a zero context size", () => {
        expect(() => loadAssistantConfig({ OPENAI_API_KEY: "test-key", ASSISTANT_MAX_CONTEXT_MAPPINGS: "0" })).toThrow(
            ConfigurationError
        );
    });
});
