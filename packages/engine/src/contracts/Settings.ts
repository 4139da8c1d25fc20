/**
 * @fileoverview Engine settings
 *
 * Immutable values fixed when the engine is assembled.
 *
 * @module @mockpilot/engine/contracts/Settings
 */

export interface AssistantSettings {
    /** Default model for oracle calls */
    readonly model: string;

    /** Default sampling temperature */
    readonly temperature: number;

    /** Default completion token limit */
    readonly maxTokens: number;

    /** How many relevant mappings are embedded in creation prompts */
    readonly maxContextMappings: number;
}

export const DEFAULT_SETTINGS: AssistantSettings = Object.freeze({
    model             : "gpt-4o-mini",
    temperature       : 0.7,
    maxTokens         : 2000,
    maxContextMappings: 10,
});

/**
 * Merge overrides onto the defaults and freeze the result.
 */
export function createSettings(overrides: Partial<AssistantSettings> = {}): AssistantSettings {
    return Object.freeze({ ...DEFAULT_SETTINGS, ...overrides });
}
