/**
 * @fileoverview Entity resolution
 *
 * Works out which mapping a prompt, or the conversation before it,
 * refers to. Strategies run in a fixed order and the first one that
 * matches anything wins:
 *
 * 1. the mapping's path appears in the text
 * 2. the mapping's name appears in the text
 * 3. the mapping's id appears in the text
 * 4. direct prompts only: the workspace holds exactly one mapping
 *
 * When several mappings satisfy the same strategy, the first in store
 * order is returned.
 *
 * @module @mockpilot/engine/context/EntityResolver
 */

import type { Mapping } from "../contracts/Mapping.js";
import type { AssistantRequest, Turn } from "../contracts/Request.js";

type Strategy = (text: string, mapping: Mapping) => boolean;

function containsTerm(text: string, term: string): boolean {
    const needle = term.toLowerCase();
    return needle.length > 0 && text.includes(needle);
}

const STRATEGIES: readonly Strategy[] = [
    (text, mapping) => containsTerm(text, mapping.request.path),
    (text, mapping) => containsTerm(text, mapping.name),
    (text, mapping) => containsTerm(text, mapping.id),
];

function matchText(text: string, mappings: readonly Mapping[]): Mapping | null {
    const lowered = text.toLowerCase();
    for (const strategy of STRATEGIES) {
        const hit = mappings.find(mapping => strategy(lowered, mapping));
        if (hit) {
            return hit;
        }
    }
    return null;
}

/**
 * Resolve a mapping from the prompt itself.
 */
export function resolveTarget(prompt: string, mappings: readonly Mapping[]): Mapping | null {
    const hit = matchText(prompt, mappings);
    if (hit) {
        return hit;
    }
    return mappings.length === 1 ? mappings[0] : null;
}

/**
 * Resolve a mapping from earlier turns, most recent first.
 * There is no single-mapping fallback here.
 */
export function resolveFromHistory(turns: readonly Turn[], mappings: readonly Mapping[]): Mapping | null {
    for (let i = turns.length - 1; i >= 0; i--) {
        const hit = matchText(turns[i].content, mappings);
        if (hit) {
            return hit;
        }
    }
    return null;
}

/**
 * Direct resolution first; history only when that finds nothing.
 */
export function resolveRequestTarget(request: AssistantRequest, mappings: readonly Mapping[]): Mapping | null {
    const direct = resolveTarget(request.userPrompt, mappings);
    if (direct || request.conversationHistory.length === 0) {
        return direct;
    }
    return resolveFromHistory(request.conversationHistory, mappings);
}

/**
 * Every mapping whose name or path appears in the text, in store order.
 */
export function mappingsMentionedIn(text: string, mappings: readonly Mapping[]): Mapping[] {
    const lowered = text.toLowerCase();
    return mappings.filter(mapping =>
        containsTerm(lowered, mapping.name) || containsTerm(lowered, mapping.request.path)
    );
}
