/**
 * @fileoverview Mock API assistant engine
 *
 * Turns natural-language requests into changes to a mock API server's
 * configuration.
 *
 * The engine provides:
 * - Intent classification (oracle first, keyword rules as fallback)
 * - Prioritized task handlers ahead of the built-in actions
 * - Prompt composition with workspace context
 * - Validated parsing of oracle output
 *
 * @module @mockpilot/engine
 * @example
 * ```typescript
 * import { AssistantEngine, InMemoryEntityStore } from "@mockpilot/engine";
 *
 * const engine = new AssistantEngine({ store: new InMemoryEntityStore(), oracle, passwordHasher });
 * const response = await engine.process({ prompt: "create GET /users returning 200", namespace: "demo" });
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Parsing and context
// ============================================================================

export { normalizeAnswerText, normalizeOracleText, normalizeTaskKind } from "./parsing/normalize.js";
export {
    type ParseResult,
    parseOracleOutput,
    parseOracleOutputOrThrow,
} from "./parsing/parseOracleOutput.js";
export {
    GeneratedMappingSchema,
    type GeneratedMapping,
    MovePlanSchema,
    type MovePlan,
    BulkUpdatePlanSchema,
    type BulkUpdatePlan,
    SpecEndpointDetailsSchema,
    type SpecEndpointDetails,
} from "./parsing/schemas.js";
export { extractKeywords, relevance, selectRelevant, STOP_WORDS } from "./context/keywords.js";
export {
    EMPTY_WORKSPACE_CONTEXT,
    type TemplateVariables,
    extractTemplateVariables,
    buildSummaryContext,
    buildDetailedContext,
    buildDeepContext,
    buildFollowUpContext,
    buildWorkspaceListing,
    buildUserListing,
} from "./context/ContextBuilder.js";
export {
    resolveTarget,
    resolveFromHistory,
    resolveRequestTarget,
    mappingsMentionedIn,
} from "./context/EntityResolver.js";

// ============================================================================
// Prompts, oracle and classification
// ============================================================================

export {
    PromptComposer,
    type ComposableKind,
    type ComposeInput,
    type ComposedPrompt,
    type DirectTaskKind,
    type SpecOperationFacts,
} from "./prompts/PromptComposer.js";
export { askOracle } from "./oracle/askOracle.js";
export {
    IntentClassifier,
    type IntentClassifierConfig,
    type ClassificationResult,
    DEFAULT_CLASSIFICATION_PROMPT,
} from "./classifier/IntentClassifier.js";
export {
    type HeuristicRule,
    HeuristicRuleSchema,
    DEFAULT_HEURISTIC_RULES,
    applyHeuristics,
    withUserRules,
} from "./classifier/heuristics.js";
export {
    type TaskKindDefinition,
    defaultTaskKindDefinitions,
    buildCategoryList,
} from "./classifier/taskKinds.js";

// ============================================================================
// Actions and handlers
// ============================================================================

export { runBuiltinAction } from "./actions/builtinActions.js";
export { confirmDeletion } from "./actions/confirmDeletion.js";
export { BULK_UPDATE_KINDS, type BulkOperation } from "./actions/bulkUpdate.js";
export { extractSpecDocument, parseSpecDocument } from "./actions/specImport.js";
export {
    FollowUpQuestionHandler,
    QueryMappingHandler,
    WorkspaceQueryHandler,
    SpecImportHandler,
    createDefaultHandlers,
} from "./handlers/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus, InMemoryEntityStore, type InMemoryEntityStoreSeed } from "./impl/index.js";
export { PluginLoader, type LoadedPlugins, type PluginLoaderConfig } from "./plugins/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export { AssistantEngine, type AssistantEngineConfig } from "./engine/index.js";
