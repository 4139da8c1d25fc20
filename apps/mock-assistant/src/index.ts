#!/usr/bin/env node
/**
 * @fileoverview Mock Assistant - Main Entry Point
 *
 * Runs one natural-language request against the local mock API
 * configuration and prints the answer.
 *
 * Handler loading order:
 * 1. Built-in handlers (follow-up, query, workspace, spec import)
 * 2. User plugins (./user/plugins) - custom handlers, and keyword rules
 *    that run ahead of config/heuristics.yml when classification falls back
 *
 * @module mock-assistant
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { existsSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

// Engine
import {
    AssistantEngine,
    PluginLoader,
    createDefaultHandlers,
    errorMessage,
    type AssistantResponse,
    type Logger,
} from "@mockpilot/engine";

// Adapters
import {
    loadAssistantConfig,
    loadHeuristicRules,
    loadTaskKindDefinitionsWithFallback,
    type AssistantConfig,
} from "./config/index.js";
import { OpenAIOracle } from "./oracle/index.js";
import { SqliteEntityStore } from "./store/index.js";
import { ScryptPasswordHasher } from "./security/index.js";
import { USAGE, createCliLogger, loadHistory, parseCliArgs, type CliOptions } from "./cli.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const APP_ROOT = join(__dirname, "..");

/** Actions that wait for --confirm */
const PENDING_DELETIONS = new Set(["delete", "delete_namespace", "delete_user"]);

/**
 * Find the configuration directory next to the sources or in the
 * working directory.
 */
function findConfigDir(): string | null {
    const candidates = [join(APP_ROOT, "config"), join(process.cwd(), "config")];
    return candidates.find(dir => existsSync(dir)) ?? null;
}

/**
 * Wire the engine from configuration.
 */
async function createEngine(
    config: AssistantConfig,
    store: SqliteEntityStore,
    logger: Logger
): Promise<AssistantEngine> {
    const configDir = findConfigDir();
    const pluginLoader = new PluginLoader({ logger });

    const taskKinds = configDir
        ? loadTaskKindDefinitionsWithFallback(join(configDir, "task-kinds.yml"), logger)
        : undefined;

    const userPlugins = await pluginLoader.loadFromDirectory(join(APP_ROOT, "user", "plugins"));
    logger.debug("User plugins loaded", { handlers: userPlugins.handlers.length, rules: userPlugins.rules.length });

    const heuristics = loadHeuristicRules(
        pluginLoader,
        configDir ? join(configDir, "heuristics.yml") : null,
        userPlugins.rules,
        logger
    );

    const engine = new AssistantEngine({
        store,
        oracle        : new OpenAIOracle({ config, logger }),
        passwordHasher: new ScryptPasswordHasher(),
        settings      : {
            model             : config.model,
            temperature       : config.temperature,
            maxTokens         : config.maxTokens,
            maxContextMappings: config.maxContextMappings,
        },
        taskKinds,
        heuristics,
        handlers      : [...createDefaultHandlers(), ...userPlugins.handlers],
        logger,
    });

    // Subscribe to engine events for observability
    engine.eventBus.subscribe("request:classified", (event) => {
        logger.debug("Classified", { ...event.data, traceId: event.traceId });
    });

    engine.eventBus.subscribe("request:dispatched", (event) => {
        logger.debug("Dispatched", { ...event.data, traceId: event.traceId });
    });

    engine.eventBus.subscribe("request:failed", (event) => {
        logger.error("Request failed", { ...event.data, traceId: event.traceId });
    });

    return engine;
}

function print(response: AssistantResponse, options: CliOptions): void {
    if (options.json) {
        console.log(JSON.stringify(response, null, 2));
        return;
    }
    console.log(response.explanation);
    if (response.action && PENDING_DELETIONS.has(response.action) && !options.confirm && response.success) {
        console.log("\nRun again with --confirm to delete.");
    }
}

/**
 * Main entry point
 */
async function main(): Promise<number> {
    let options: CliOptions;
    try {
        options = parseCliArgs(process.argv.slice(2));
    }
    catch (error) {
        console.error(errorMessage(error));
        console.error(USAGE);
        return 1;
    }

    const logger = createCliLogger(options.verbose);
    const config = loadAssistantConfig();
    const store = new SqliteEntityStore(config.databasePath);

    try {
        const engine = await createEngine(config, store, logger);

        let response = await engine.process({
            userPrompt         : options.prompt,
            namespace          : options.namespace,
            taskType           : options.kind,
            conversationHistory: options.historyFile ? loadHistory(options.historyFile) : [],
        });

        if (options.confirm && response.success && response.action && PENDING_DELETIONS.has(response.action)) {
            response = await engine.confirm(response);
        }

        print(response, options);
        return response.success ? 0 : 1;
    }
    finally {
        store.close();
    }
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch(error => {
        console.error("[FATAL]", errorMessage(error));
        process.exitCode = 1;
    });
