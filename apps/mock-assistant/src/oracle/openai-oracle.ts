/**
 * OpenAI-backed oracle
 *
 * Sends one chat completion per call: system instructions, the prior
 * conversation turns, then the user content.
 */

import OpenAI from "openai";
import {
    OracleFailure,
    consoleLogger,
    errorMessage,
    type Logger,
    type Oracle,
    type OracleCallOptions,
    type Turn,
} from "@mockpilot/engine";
import type { AssistantConfig } from "../config/index.js";

/**
 * Configuration options for the OpenAI oracle
 */
export interface OpenAIOracleConfig {
    /** Values from the assistant configuration */
    config: Pick<AssistantConfig, "apiKey" | "model" | "temperature" | "maxTokens">;

    /** Pre-built client (default: one created from the API key) */
    client?: OpenAI;

    logger?: Logger;
}

function toMessage(turn: Turn): OpenAI.Chat.ChatCompletionMessageParam {
    return turn.role === "assistant"
        ? { role: "assistant", content: turn.content }
        : { role: "user", content: turn.content };
}

/**
 * OpenAI oracle implementation
 */
export class OpenAIOracle implements Oracle {
    readonly id: string = "openai";

    private readonly client: OpenAI;
    private readonly defaults: Required<OracleCallOptions>;
    private readonly logger: Logger;

    constructor(options: OpenAIOracleConfig) {
        this.client = options.client ?? new OpenAI({ apiKey: options.config.apiKey });
        this.logger = options.logger ?? consoleLogger;
        this.defaults = {
            model      : options.config.model,
            temperature: options.config.temperature,
            maxTokens  : options.config.maxTokens,
        };
    }

    async complete(
        systemInstructions: string,
        priorTurns: readonly Turn[],
        userContent: string,
        options: OracleCallOptions = {}
    ): Promise<string> {
        const model = options.model ?? this.defaults.model;
        const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
            { role: "system", content: systemInstructions },
            ...priorTurns.map(toMessage),
            { role: "user", content: userContent },
        ];

        const started = Date.now();
        let content: string | null | undefined;
        try {
            const response = await this.client.chat.completions.create({
                model,
                temperature: options.temperature ?? this.defaults.temperature,
                max_tokens : options.maxTokens ?? this.defaults.maxTokens,
                messages,
            });
            content = response.choices[0]?.message?.content;
        }
        catch (error) {
            throw new OracleFailure(`OpenAI request failed: ${errorMessage(error)}`, { cause: error });
        }

        this.logger.debug("OpenAI completion", {
            model,
            messages : messages.length,
            latencyMs: Date.now() - started,
        });

        if (!content) {
            throw new OracleFailure("No response from OpenAI");
        }

        return content;
    }
}
