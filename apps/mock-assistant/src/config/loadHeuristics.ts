/**
 * @fileoverview Classifier fallback rules
 *
 * Rules come from config/heuristics.yml (or the built-in set when the
 * file is missing or holds no valid rule), with rules found in the user
 * plugin directory consulted first.
 *
 * @module config/loadHeuristics
 */

import { existsSync } from "fs";
import {
    DEFAULT_HEURISTIC_RULES,
    withUserRules,
    type HeuristicRule,
    type Logger,
    type PluginLoader,
} from "@mockpilot/engine";

export function loadHeuristicRules(
    loader: PluginLoader,
    configFile: string | null,
    userRules: readonly HeuristicRule[],
    logger: Logger
): HeuristicRule[] {
    let configured: readonly HeuristicRule[] = [];
    if (configFile && existsSync(configFile)) {
        configured = loader.loadYamlFile(configFile).rules;
    }
    if (configured.length === 0) {
        logger.debug("No heuristic rules configured, using built-in rules");
        configured = DEFAULT_HEURISTIC_RULES;
    }

    logger.debug("Heuristic rules ready", { configured: configured.length, user: userRules.length });
    return withUserRules(userRules, configured);
}
