/**
 * @fileoverview Engine barrel exports
 *
 * @module @mockpilot/engine/engine
 */

export {
    AssistantEngine,
    type AssistantEngineConfig,
} from "./AssistantEngine.js";
