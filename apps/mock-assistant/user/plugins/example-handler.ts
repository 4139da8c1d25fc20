/**
 * Example User Handler Plugin
 * ===========================
 *
 * This is an example task handler plugin that you can use as a template
 * for creating your own handlers.
 *
 * To create your own plugin:
 * 1. Copy this file and rename it (e.g., my-handler.ts)
 * 2. Update the id, name, and description
 * 3. Decide which requests to claim in canHandle()
 * 4. Rebuild and restart the app
 *
 * The plugin will be automatically loaded from the user/plugins/ directory.
 * Handlers are consulted before the built-in actions, lowest priority first.
 *
 * @example
 * To answer "ping" without calling the language model:
 * ```typescript
 * canHandle: ({ request }) => request.userPrompt.trim() === "ping",
 * handle: async () => ({ success: true, message: "pong", explanation: "pong" }),
 * ```
 */

import { randomUUID } from "crypto";
import type { Mapping, TaskContext, TaskHandler } from "@mockpilot/engine";

const HEALTH_PATH = "/health";

const HEALTH_PHRASES = ["health check", "healthcheck", "health endpoint"];

/**
 * Creates a standard health check endpoint without asking the language
 * model, unless the workspace already has one.
 */
export const healthCheckHandler: TaskHandler = {
    id          : "user-health-check",
    name        : "Health Check Handler",
    description : "Example plugin - creates GET /health directly",
    priority    : 1,

    supportedKinds: ["CREATE_MAPPING"],

    canHandle({ request, mappings }: TaskContext): boolean {
        const prompt = request.userPrompt.toLowerCase();
        if (!HEALTH_PHRASES.some(phrase => prompt.includes(phrase))) {
            return false;
        }
        return !mappings.some(mapping => mapping.request.path === HEALTH_PATH);
    },

    async handle({ request, services, logger }: TaskContext) {
        const now = services.now().toISOString();
        const mapping: Mapping = {
            id          : randomUUID(),
            name        : "Health Check",
            namespace   : request.namespace,
            priority    : 1,
            enabled     : true,
            tags        : ["health"],
            endpointType: "REST",
            createdAt   : now,
            updatedAt   : now,
            request     : {
                method            : "GET",
                path              : HEALTH_PATH,
                queryParams       : {},
                queryParamPatterns: {},
                headers           : {},
                headerPatterns    : {},
                bodyPatterns      : [],
            },
            response    : {
                status           : 200,
                headers          : { "Content-Type": "application/json" },
                body             : JSON.stringify({ status: "UP" }),
                templatingEnabled: false,
            },
        };

        const saved = await services.store.save(mapping, request.namespace);
        logger.info("Created health check mapping", { id: saved.id });

        return {
            success        : true,
            action         : "create",
            message        : "Mapping created successfully",
            explanation    : `✅ Created mapping: **${saved.name}**\n\n\`GET ${HEALTH_PATH}\` responds with status 200.`,
            targetEntityId : saved.id,
            generatedEntity: saved,
        };
    },
};

// Default export for the plugin loader
export default healthCheckHandler;
