/**
 * @fileoverview Oracle call helper
 *
 * Every oracle call in the engine goes through here so that transport
 * errors surface uniformly as OracleFailure.
 *
 * @module @mockpilot/engine/oracle/askOracle
 */

import type { Oracle } from "../contracts/Oracle.js";
import type { Turn } from "../contracts/Request.js";
import type { ComposedPrompt } from "../prompts/PromptComposer.js";
import { OracleFailure } from "../contracts/errors.js";
import { errorMessage } from "../contracts/Logger.js";

/**
 * Send a composed prompt, optionally preceded by conversation history.
 *
 * @throws OracleFailure if the oracle call fails
 */
export async function askOracle(
    oracle: Oracle,
    prompt: ComposedPrompt,
    history: readonly Turn[] = []
): Promise<string> {
    try {
        return await oracle.complete(prompt.instructions, history, prompt.userContent, prompt.options);
    }
    catch (error) {
        if (error instanceof OracleFailure) {
            throw error;
        }
        throw new OracleFailure(`Oracle "${oracle.id}" request failed: ${errorMessage(error)}`, { cause: error });
    }
}
