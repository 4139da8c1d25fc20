/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadAssistantConfig,
    ConfigurationError,
    type AssistantConfig,
} from "./loadConfig.js";
export {
    loadTaskKindDefinitions,
    loadTaskKindDefinitionsWithFallback,
} from "./loadTaskKinds.js";
export { loadHeuristicRules } from "./loadHeuristics.js";
