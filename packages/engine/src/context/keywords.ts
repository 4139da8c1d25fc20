/**
 * @fileoverview Keyword extraction and relevance ranking
 *
 * Pure functions used to pick which existing mappings are worth showing
 * the oracle for a given prompt.
 *
 * @module @mockpilot/engine/context/keywords
 */

import type { Mapping } from "../contracts/Mapping.js";

/**
 * Filler words that say nothing about which endpoint is meant.
 */
export const STOP_WORDS: ReadonlySet<string> = new Set([
    "create",
    "make",
    "need",
    "want",
    "endpoint",
    "mapping",
    "please",
    "can",
    "you",
    "help",
    "add",
]);

/**
 * Turn free text into a normalized keyword set.
 *
 * Tokens of two characters or fewer and stop words are dropped before
 * non-alphanumerics are stripped; tokens left empty are discarded.
 */
export function extractKeywords(text: string): Set<string> {
    const keywords = new Set<string>();

    for (const token of text.toLowerCase().split(/\s+/)) {
        if (token.length <= 2 || STOP_WORDS.has(token)) {
            continue;
        }

        const cleaned = token.replace(/[^a-z0-9]/g, "");
        if (cleaned.length > 0) {
            keywords.add(cleaned);
        }
    }

    return keywords;
}

/**
 * Lowercase text a mapping is searched by: name, path, method and tags.
 */
export function searchText(mapping: Mapping): string {
    return [
        mapping.name,
        mapping.request.path,
        mapping.request.method,
        mapping.tags.join(" "),
    ].join(" ").toLowerCase();
}

/**
 * Fraction of keywords found in the mapping's search text.
 *
 * @returns 1.0 for an empty keyword set, otherwise a value in [0, 1]
 */
export function relevance(mapping: Mapping, keywords: ReadonlySet<string>): number {
    if (keywords.size === 0) {
        return 1.0;
    }

    const haystack = searchText(mapping);
    let found = 0;
    for (const keyword of keywords) {
        if (haystack.includes(keyword)) {
            found++;
        }
    }

    return found / keywords.size;
}

/**
 * Rank mappings by relevance to a prompt and keep the first `limit`.
 *
 * Equal scores keep their original relative order.
 */
export function selectRelevant(
    mappings: readonly Mapping[],
    prompt: string,
    limit: number
): Mapping[] {
    const keywords = extractKeywords(prompt);

    return mappings
        .map((mapping, index) => ({ mapping, index, score: relevance(mapping, keywords) }))
        .sort((a, b) => (b.score - a.score) || (a.index - b.index))
        .slice(0, Math.max(0, limit))
        .map(entry => entry.mapping);
}
