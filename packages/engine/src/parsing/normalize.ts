/**
 * @fileoverview Oracle text normalization
 *
 * The one place where markdown fencing is removed from oracle output.
 * Every parse goes through normalizeOracleText first.
 *
 * @module @mockpilot/engine/parsing/normalize
 */

import type { TaskKind } from "../contracts/TaskKind.js";
import { DEFAULT_TASK_KIND, isTaskKind } from "../contracts/TaskKind.js";

const FENCE = "```";
const LEADING_FENCE = /^```[A-Za-z0-9_+-]*/;

/**
 * Strip leading and trailing code fences and surrounding whitespace.
 *
 * Fences are removed until none remain at either end, so the result is a
 * fixed point: normalizing it again returns it unchanged.
 *
 * @example
 * ```typescript
 * normalizeOracleText("```json\n{\"a\":1}\n```"); // '{"a":1}'
 * ```
 */
export function normalizeOracleText(text: string): string {
    let cleaned = text.trim();

    while (cleaned.startsWith(FENCE) || cleaned.endsWith(FENCE)) {
        if (cleaned.startsWith(FENCE)) {
            cleaned = cleaned.replace(LEADING_FENCE, "").trim();
        }
        if (cleaned.endsWith(FENCE)) {
            cleaned = cleaned.slice(0, -FENCE.length).trim();
        }
    }

    return cleaned;
}

/**
 * Tidy a free-text answer shown to the user.
 *
 * Only an answer that is one fenced block as a whole is unwrapped; fences
 * inside prose, including a code block at the very end, are kept.
 */
export function normalizeAnswerText(text: string): string {
    const trimmed = text.trim();
    const isSingleBlock = trimmed.startsWith(FENCE)
        && trimmed.endsWith(FENCE)
        && trimmed.split(FENCE).length === 3;

    return isSingleBlock ? normalizeOracleText(trimmed) : trimmed;
}

/**
 * Map a classification answer to a task kind.
 *
 * Emphasis and heading markers are removed and the text upper-cased.
 * Anything that is not a known kind maps to the default creation kind.
 */
export function normalizeTaskKind(text: string): TaskKind {
    const candidate = normalizeOracleText(text)
        .replace(/`|\*\*|##/g, "")
        .trim()
        .toUpperCase();

    return isTaskKind(candidate) ? candidate : DEFAULT_TASK_KIND;
}
