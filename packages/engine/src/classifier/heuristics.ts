/**
 * @fileoverview Heuristic classification rules
 *
 * Ordered keyword rules used only when the oracle cannot be reached.
 * The first matching rule decides; no match means the default kind.
 *
 * @module @mockpilot/engine/classifier/heuristics
 */

import { z } from "zod";
import type { TaskKind } from "../contracts/TaskKind.js";
import { TASK_KINDS, DEFAULT_TASK_KIND } from "../contracts/TaskKind.js";

export interface HeuristicRule {
    /** Rule identifier for logs */
    readonly name: string;

    /** Kind returned when the rule matches */
    readonly kind: TaskKind;

    /** At least one of these must occur in the lowercased prompt */
    readonly anyOf?: readonly string[];

    /** All of these must occur in the lowercased prompt */
    readonly allOf?: readonly string[];
}

const Keywords = z.array(z.string().min(1).transform(keyword => keyword.toLowerCase()));

/**
 * Schema for rules read from YAML.
 */
export const HeuristicRuleSchema = z
    .object({
        name : z.string().min(1),
        kind : z.enum(TASK_KINDS),
        anyOf: Keywords.optional(),
        allOf: Keywords.optional(),
    })
    .refine(rule => (rule.anyOf?.length ?? 0) + (rule.allOf?.length ?? 0) > 0, {
        message: "rule needs anyOf or allOf keywords",
    });

export const DEFAULT_HEURISTIC_RULES: readonly HeuristicRule[] = [
    { name: "spec-import", kind: "GENERATE_FROM_OPENAPI", anyOf: ["openapi", "swagger", "generate from spec"] },
    { name: "create-namespace", kind: "CREATE_NAMESPACE", allOf: ["namespace", "create"] },
    { name: "create-user", kind: "CREATE_USER", allOf: ["user", "create"] },
];

/**
 * Check a rule against an already lowercased prompt.
 */
export function ruleMatches(rule: HeuristicRule, loweredPrompt: string): boolean {
    const anyOf = rule.anyOf ?? [];
    const allOf = rule.allOf ?? [];

    if (anyOf.length === 0 && allOf.length === 0) {
        return false;
    }
    if (anyOf.length > 0 && !anyOf.some(keyword => loweredPrompt.includes(keyword))) {
        return false;
    }
    return allOf.every(keyword => loweredPrompt.includes(keyword));
}

/**
 * Classify by rules. Always returns a kind.
 */
export function applyHeuristics(
    prompt: string,
    rules: readonly HeuristicRule[] = DEFAULT_HEURISTIC_RULES
): TaskKind {
    const lowered = prompt.toLowerCase();
    const rule = rules.find(candidate => ruleMatches(candidate, lowered));
    return rule?.kind ?? DEFAULT_TASK_KIND;
}

/**
 * Put user rules ahead of the configured ones, so a user rule wins
 * whenever both match.
 */
export function withUserRules(
    userRules: readonly HeuristicRule[],
    base: readonly HeuristicRule[] = DEFAULT_HEURISTIC_RULES
): HeuristicRule[] {
    return [...userRules, ...base];
}
