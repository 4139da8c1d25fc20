/**
 * @fileoverview Intent classifier
 *
 * Decides which task kind a request represents.
 *
 * - primary: the oracle, with the task kinds listed in its instructions
 * - fallback: keyword rules, only when the oracle call itself fails
 *
 * An answer the oracle gives that is not a known kind is not a failure;
 * it maps to the default creation kind.
 *
 * @module @mockpilot/engine/classifier/IntentClassifier
 */

import type { TaskKind } from "../contracts/TaskKind.js";
import type { Oracle, OracleCallOptions } from "../contracts/Oracle.js";
import type { Logger } from "../contracts/Logger.js";
import { consoleLogger, errorMessage } from "../contracts/Logger.js";
import { normalizeTaskKind } from "../parsing/normalize.js";
import { askOracle } from "../oracle/askOracle.js";
import type { TaskKindDefinition } from "./taskKinds.js";
import { buildCategoryList, defaultTaskKindDefinitions } from "./taskKinds.js";
import type { HeuristicRule } from "./heuristics.js";
import { applyHeuristics, DEFAULT_HEURISTIC_RULES } from "./heuristics.js";

/**
 * Default classification instructions. `{{categories}}` is replaced with
 * the rendered task kind list.
 */
export const DEFAULT_CLASSIFICATION_PROMPT = `You classify requests made to a mock API configuration assistant.

Available task types:

{{categories}}

KEY DISTINCTIONS:
- A request that names a specific endpoint (a word such as "memo" or "order", or a path) is EXPLAIN_MAPPING
- LIST_MAPPINGS only when the user wants everything: "all endpoints", "list all", "show everything"
- An OpenAPI or Swagger document, YAML API definitions, or "generate from spec" mean GENERATE_FROM_OPENAPI
- Choose a workspace or user task only when the request is clearly about workspaces, namespaces or users
- Requests mentioning "endpoint", "api" or "mapping" are mapping tasks
- For delete and modify requests, decide WHAT is being changed: a mapping, a workspace or a user

Respond with ONLY the task type name, for example CREATE_MAPPING.`;

export interface IntentClassifierConfig {
    readonly oracle: Oracle;

    /** Kind descriptions (default: derived from the kind names) */
    readonly kinds?: readonly TaskKindDefinition[];

    /** Fallback rules (default: DEFAULT_HEURISTIC_RULES) */
    readonly rules?: readonly HeuristicRule[];

    /**
     * Instruction template. Use {{categories}} for the kind list; without
     * the placeholder the list is appended.
     */
    readonly systemPrompt?: string;

    /** Model for classification calls (default: the oracle's own) */
    readonly model?: string;

    readonly logger?: Logger;
}

export interface ClassificationResult {
    readonly kind: TaskKind;
    readonly source: "oracle" | "heuristic";
}

/**
 * Intent classifier.
 *
 * @example
 * ```typescript
 * const classifier = new IntentClassifier({ oracle, kinds: loadTaskKindDefinitions(path) });
 * const { kind } = await classifier.classify("add an X-Api-Key header to all endpoints");
 * ```
 */
export class IntentClassifier {
    /** Final instructions sent to the oracle */
    readonly systemPrompt: string;

    private readonly oracle: Oracle;
    private readonly rules: readonly HeuristicRule[];
    private readonly options: OracleCallOptions;
    private readonly logger: Logger;

    constructor(config: IntentClassifierConfig) {
        this.oracle = config.oracle;
        this.rules = config.rules ?? DEFAULT_HEURISTIC_RULES;
        this.logger = config.logger ?? consoleLogger;
        this.options = config.model === undefined
            ? { temperature: 0.1, maxTokens: 20 }
            : { model: config.model, temperature: 0.1, maxTokens: 20 };

        const categories = buildCategoryList(config.kinds ?? defaultTaskKindDefinitions());
        const template = config.systemPrompt ?? DEFAULT_CLASSIFICATION_PROMPT;
        this.systemPrompt = template.includes("{{categories}}")
            ? template.replace("{{categories}}", categories)
            : `${template}\n\nAvailable task types:\n${categories}`;
    }

    async classify(prompt: string): Promise<ClassificationResult> {
        let answer: string;
        try {
            answer = await askOracle(this.oracle, {
                instructions: this.systemPrompt,
                userContent : prompt,
                options     : this.options,
            });
        }
        catch (error) {
            const kind = applyHeuristics(prompt, this.rules);
            this.logger.warn("Oracle classification failed, using heuristics", {
                kind,
                error: errorMessage(error),
            });
            return { kind, source: "heuristic" };
        }

        const kind = normalizeTaskKind(answer);
        this.logger.debug("Classified request", { kind, answer: answer.trim() });
        return { kind, source: "oracle" };
    }
}
