/**
 * @fileoverview Oracle Contract
 *
 * The language-model text completion service, treated as a black box.
 *
 * @module @mockpilot/engine/contracts/Oracle
 */

import type { Turn } from "./Request.js";

/**
 * Per-call overrides. Anything omitted falls back to the adapter's
 * configured defaults.
 */
export interface OracleCallOptions {
    readonly model?: string;
    readonly temperature?: number;
    readonly maxTokens?: number;
}

/**
 * Oracle interface.
 *
 * Implementations must send one ordered message sequence: the system
 * instructions, then `priorTurns` oldest first, then `userContent`.
 * There is no retry and no timeout at this level.
 *
 * @example
 * ```typescript
 * const text = await oracle.complete(
 *     "You classify requests.",
 *     [{ role: "user", content: "hi" }, { role: "assistant", content: "hello" }],
 *     "list all endpoints",
 *     { temperature: 0.1, maxTokens: 20 }
 * );
 * ```
 */
export interface Oracle {
    /** Identifier used in logs */
    readonly id: string;

    complete(
        systemInstructions: string,
        priorTurns: readonly Turn[],
        userContent: string,
        options?: OracleCallOptions
    ): Promise<string>;
}
