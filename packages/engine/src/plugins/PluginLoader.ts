/**
 * @fileoverview Plugin Loader
 *
 * Loads assistant extensions from:
 * - YAML files (classifier fallback keyword rules)
 * - Code files (JS exporting TaskHandler objects)
 *
 * @module @mockpilot/engine/plugins/PluginLoader
 */

import { readFileSync, readdirSync, existsSync, statSync } from "fs";
import { join, extname } from "path";
import { pathToFileURL } from "url";
import { parse as parseYaml } from "yaml";
import type { TaskHandler } from "../contracts/TaskHandler.js";
import type { Logger } from "../contracts/Logger.js";
import type { HeuristicRule } from "../classifier/heuristics.js";
import { isTaskHandler } from "../contracts/TaskHandler.js";
import { errorMessage } from "../contracts/Logger.js";
import { HeuristicRuleSchema } from "../classifier/heuristics.js";

/**
 * Loaded plugins result.
 */
export interface LoadedPlugins {
    handlers: TaskHandler[];
    rules: HeuristicRule[];
}

/**
 * Plugin loader configuration.
 */
export interface PluginLoaderConfig {
    /** Logger for plugin loading */
    logger?: Logger;
}

/**
 * Default console logger.
 */
const defaultLogger: Logger = {
    debug: (msg, data) => console.debug(`[PluginLoader] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[PluginLoader] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[PluginLoader] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[PluginLoader] ${msg}`, data ?? ""),
};

function emptyResult(): LoadedPlugins {
    return { handlers: [], rules: [] };
}

/**
 * Plugin Loader
 *
 * @example
 * ```typescript
 * const loader = new PluginLoader();
 *
 * const { rules } = loader.loadYamlFile("./config/heuristics.yml");
 * const { handlers } = await loader.loadFromDirectory("./user/plugins");
 *
 * for (const handler of handlers) {
 *     engine.registerHandler(handler);
 * }
 * ```
 */
export class PluginLoader {
    private readonly logger: Logger;

    constructor(config: PluginLoaderConfig = {}) {
        this.logger = config.logger ?? defaultLogger;
    }

    /**
     * Load all plugins from a directory.
     *
     * Scans for:
     * - .yml/.yaml files → heuristic rules
     * - .js/.mjs files → task handlers
     *
     * A file that fails to load is logged and skipped.
     */
    async loadFromDirectory(dirPath: string): Promise<LoadedPlugins> {
        const result = emptyResult();

        if (!existsSync(dirPath)) {
            this.logger.warn("Plugin directory does not exist", { dirPath });
            return result;
        }

        if (!statSync(dirPath).isDirectory()) {
            this.logger.warn("Plugin path is not a directory", { dirPath });
            return result;
        }

        for (const file of readdirSync(dirPath)) {
            const filePath = join(dirPath, file);
            const ext = extname(file).toLowerCase();

            try {
                if (ext === ".yml" || ext === ".yaml") {
                    const loaded = this.loadYamlFile(filePath);
                    result.rules.push(...loaded.rules);
                }
                else if (ext === ".js" || ext === ".mjs") {
                    const loaded = await this.loadCodeFile(filePath);
                    result.handlers.push(...loaded.handlers);
                }
            }
            catch (error) {
                this.logger.error("Failed to load plugin file", { filePath, error: errorMessage(error) });
            }
        }

        this.logger.info("Plugins loaded from directory", {
            dirPath,
            handlers: result.handlers.length,
            rules   : result.rules.length,
        });

        return result;
    }

    /**
     * Load heuristic rules from a YAML file holding either a list of
     * rules or `{ rules: [...] }`. Invalid entries are skipped.
     */
    loadYamlFile(filePath: string): LoadedPlugins {
        const result = emptyResult();

        const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));
        if (!parsed) {
            return result;
        }

        let definitions: unknown[];
        if (Array.isArray(parsed)) {
            definitions = parsed;
        }
        else if (typeof parsed === "object" && "rules" in parsed && Array.isArray(parsed.rules)) {
            definitions = parsed.rules;
        }
        else {
            definitions = [parsed];
        }

        for (const definition of definitions) {
            const rule = HeuristicRuleSchema.safeParse(definition);
            if (rule.success) {
                result.rules.push(rule.data);
                this.logger.debug("Loaded heuristic rule", { name: rule.data.name, kind: rule.data.kind });
            }
            else {
                this.logger.warn("Skipping invalid heuristic rule", {
                    filePath,
                    error: rule.error.issues.map(issue => issue.message).join("; "),
                });
            }
        }

        return result;
    }

    /**
     * Load task handlers from a JS module: every export, the default
     * export, or a default-exported array.
     */
    async loadCodeFile(filePath: string): Promise<LoadedPlugins> {
        const result = emptyResult();

        const module: Record<string, unknown> = await import(pathToFileURL(filePath).href);

        for (const [key, exported] of Object.entries(module)) {
            const candidates = key === "default" && Array.isArray(exported) ? exported : [exported];
            for (const candidate of candidates) {
                if (isTaskHandler(candidate) && !result.handlers.includes(candidate)) {
                    result.handlers.push(candidate);
                    this.logger.debug("Loaded task handler", { id: candidate.id, export: key });
                }
            }
        }

        return result;
    }
}
