/**
 * @fileoverview Task Kind Definition Loader
 *
 * Loads the descriptions shown to the classifier from YAML configuration.
 *
 * @module config/loadTaskKinds
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
    isTaskKind,
    defaultTaskKindDefinitions,
    consoleLogger,
    errorMessage,
    type Logger,
    type TaskKindDefinition,
} from "@mockpilot/engine";

/**
 * Raw task kind entry from the YAML file
 */
interface RawTaskKind {
    id?: unknown;
    group?: unknown;
    description?: unknown;
    examples?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load task kind definitions from a YAML file.
 *
 * @param filePath - Path to the task-kinds.yml file
 * @throws Error if the file doesn't exist or an entry is invalid
 *
 * @example
 * ```typescript
 * const kinds = loadTaskKindDefinitions("./config/task-kinds.yml");
 * // [{ id: "CREATE_MAPPING", group: "Mappings", description: "..." }, ...]
 * ```
 */
export function loadTaskKindDefinitions(filePath: string): TaskKindDefinition[] {
    if (!existsSync(filePath)) {
        throw new Error(`Task kind definitions file not found: ${filePath}`);
    }

    const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));

    if (!isRecord(parsed) || !Array.isArray(parsed.kinds)) {
        throw new Error("Invalid task kinds file format: expected { kinds: [...] }");
    }

    const entries: unknown[] = parsed.kinds;
    return entries.map((entry, index) => {
        const raw: RawTaskKind = isRecord(entry) ? entry : {};

        if (typeof raw.id !== "string" || !isTaskKind(raw.id)) {
            throw new Error(`Invalid task kind at index ${index}: unknown or missing 'id'`);
        }

        if (typeof raw.description !== "string" || raw.description.length === 0) {
            throw new Error(`Invalid task kind at index ${index}: missing or invalid 'description'`);
        }

        const examples = Array.isArray(raw.examples)
            ? raw.examples.filter((example): example is string => typeof example === "string")
            : undefined;

        return {
            id         : raw.id,
            description: raw.description,
            ...(typeof raw.group === "string" ? { group: raw.group } : {}),
            ...(examples?.length ? { examples } : {}),
        };
    });
}

/**
 * Load task kind definitions, falling back to the built-in ones.
 */
export function loadTaskKindDefinitionsWithFallback(
    filePath: string,
    logger: Logger = consoleLogger
): TaskKindDefinition[] {
    try {
        return loadTaskKindDefinitions(filePath);
    }
    catch (error) {
        logger.warn("Failed to load task kinds, using defaults", { filePath, error: errorMessage(error) });
        return defaultTaskKindDefinitions();
    }
}
