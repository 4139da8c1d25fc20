/**
 * @fileoverview Assistant configuration
 *
 * Builds the immutable runtime configuration from environment variables.
 *
 * @module config/loadConfig
 */

import { AssistantError } from "@mockpilot/engine";

/**
 * Runtime configuration, fixed at startup.
 */
export interface AssistantConfig {
    /** OpenAI API key */
    readonly apiKey: string;

    /** Model for every oracle call unless overridden per call */
    readonly model: string;

    /** Default sampling temperature, 0 to 2 */
    readonly temperature: number;

    /** Default completion token limit */
    readonly maxTokens: number;

    /** Relevant mappings embedded in creation prompts */
    readonly maxContextMappings: number;

    /** SQLite database file */
    readonly databasePath: string;
}

/**
 * A required variable is missing or holds an unusable value.
 */
export class ConfigurationError extends AssistantError {
    /** Environment variable at fault */
    readonly variable: string;

    constructor(variable: string, message: string) {
        super("configuration_error", message);
        this.variable = variable;
    }
}

type Env = Record<string, string | undefined>;

function readString(env: Env, variable: string, fallback: string): string {
    const value = env[variable]?.trim();
    return value ? value : fallback;
}

function readPositiveInt(env: Env, variable: string, fallback: number): number {
    const raw = env[variable]?.trim();
    if (!raw) {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError(variable, `${variable} must be a positive integer, got '${raw}'`);
    }
    return value;
}

function readTemperature(env: Env, variable: string, fallback: number): number {
    const raw = env[variable]?.trim();
    if (!raw) {
        return fallback;
    }

    const value = Number(raw);
    if (Number.isNaN(value) || value < 0 || value > 2) {
        throw new ConfigurationError(variable, `${variable} must be a number between 0 and 2, got '${raw}'`);
    }
    return value;
}

/**
 * Load configuration from the environment.
 *
 * @param env - Variables to read (default: process.env)
 * @throws ConfigurationError naming the offending variable
 *
 * @example
 * ```typescript
 * import "dotenv/config";
 *
 * const config = loadAssistantConfig();
 * console.log(config.model); // "gpt-4o-mini"
 * ```
 */
export function loadAssistantConfig(env: Env = process.env): AssistantConfig {
    const apiKey = env.OPENAI_API_KEY?.trim();
    if (!apiKey) {
        throw new ConfigurationError("OPENAI_API_KEY", "OPENAI_API_KEY is required");
    }

    return Object.freeze({
        apiKey,
        model             : readString(env, "OPENAI_MODEL", "gpt-4o-mini"),
        temperature       : readTemperature(env, "OPENAI_TEMPERATURE", 0.7),
        maxTokens         : readPositiveInt(env, "OPENAI_MAX_TOKENS", 2000),
        maxContextMappings: readPositiveInt(env, "ASSISTANT_MAX_CONTEXT_MAPPINGS", 10),
        databasePath      : readString(env, "ASSISTANT_DB_PATH", "mock-assistant.db"),
    });
}
