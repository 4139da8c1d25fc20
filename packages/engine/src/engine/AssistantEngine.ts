/**
 * @fileoverview AssistantEngine
 *
 * The task dispatcher. One request in, one response out.
 *
 * Pipeline flow:
 * 1. Task kind taken from the request, or classified
 * 2. Workspace mappings read once from the store
 * 3. Registered handlers consulted in ascending priority
 * 4. Built-in action for the kind when no handler claims the request
 *
 * Design principles:
 * - Total: process() never rejects; errors become failed responses
 * - Observable: emits events at each lifecycle stage
 * - Stateless between requests: the store is re-read every time
 *
 * @module @mockpilot/engine/engine/AssistantEngine
 */

import type { AssistantRequest, ResolvedRequest } from "../contracts/Request.js";
import type { AssistantResponse } from "../contracts/Response.js";
import type { Mapping } from "../contracts/Mapping.js";
import type { TaskKind } from "../contracts/TaskKind.js";
import type { EntityStore } from "../contracts/EntityStore.js";
import type { Oracle } from "../contracts/Oracle.js";
import type { PasswordHasher } from "../contracts/PasswordHasher.js";
import type { Logger } from "../contracts/Logger.js";
import type { AssistantSettings } from "../contracts/Settings.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import type { TaskContext, TaskHandler, TaskServices } from "../contracts/TaskHandler.js";
import type { TaskKindDefinition } from "../classifier/taskKinds.js";
import type { HeuristicRule } from "../classifier/heuristics.js";
import type { ClassificationResult } from "../classifier/IntentClassifier.js";
import { handlerPriority, supportsKind } from "../contracts/TaskHandler.js";
import { consoleLogger, errorMessage } from "../contracts/Logger.js";
import { createSettings } from "../contracts/Settings.js";
import { createEvent } from "../contracts/EventBus.js";
import { responseFromError } from "../contracts/errors.js";
import { IntentClassifier } from "../classifier/IntentClassifier.js";
import { PromptComposer } from "../prompts/PromptComposer.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { runBuiltinAction } from "../actions/builtinActions.js";
import { confirmDeletion } from "../actions/confirmDeletion.js";
import { createDefaultHandlers } from "../handlers/index.js";

/**
 * Engine configuration options.
 */
export interface AssistantEngineConfig {
    readonly store: EntityStore;
    readonly oracle: Oracle;
    readonly passwordHasher: PasswordHasher;

    /** Overrides for model, temperature, token and context limits */
    readonly settings?: Partial<AssistantSettings>;

    /** Task kind descriptions rendered into the classifier prompt */
    readonly taskKinds?: readonly TaskKindDefinition[];

    /** Classifier fallback rules (default: the built-in rules) */
    readonly heuristics?: readonly HeuristicRule[];

    /** Classifier system prompt; `{{categories}}` is replaced by the kind list */
    readonly classificationPrompt?: string;

    /** Handlers registered at construction (default: createDefaultHandlers()) */
    readonly handlers?: readonly TaskHandler[];

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    readonly logger?: Logger;

    /** Clock for every timestamp the engine writes (default: current time) */
    readonly now?: () => Date;
}

/**
 * Generate a unique trace ID for request processing.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * AssistantEngine - the task dispatcher.
 *
 * @example
 * ```typescript
 * const engine = new AssistantEngine({
 *     store         : new InMemoryEntityStore(),
 *     oracle        : new OpenAIOracle(config),
 *     passwordHasher: new ScryptPasswordHasher(),
 * });
 *
 * engine.eventBus.subscribe("request:classified", (event) => {
 *     console.log("Classified:", event.data);
 * });
 *
 * const response = await engine.process({
 *     userPrompt         : "list all endpoints",
 *     namespace          : "demo",
 *     conversationHistory: [],
 * });
 * ```
 */
export class AssistantEngine {
    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    private readonly handlers: TaskHandler[] = [];
    private readonly services: TaskServices;
    private readonly classifier: IntentClassifier;
    private readonly logger: Logger;

    constructor(config: AssistantEngineConfig) {
        this.logger = config.logger ?? consoleLogger;
        this.eventBus = config.eventBus ?? new InMemoryEventBus(this.logger);

        const settings = createSettings(config.settings);
        this.services = {
            store         : config.store,
            oracle        : config.oracle,
            composer      : new PromptComposer(settings),
            passwordHasher: config.passwordHasher,
            now           : config.now ?? (() => new Date()),
        };

        this.classifier = new IntentClassifier({
            oracle      : config.oracle,
            kinds       : config.taskKinds,
            rules       : config.heuristics,
            systemPrompt: config.classificationPrompt,
            model       : settings.model,
            logger      : this.logger,
        });

        for (const handler of config.handlers ?? createDefaultHandlers()) {
            this.registerHandler(handler);
        }
    }

    /**
     * Register a task handler. Handlers with equal priority keep their
     * registration order.
     *
     * @throws Error if a handler with the same id is already registered
     */
    registerHandler(handler: TaskHandler): void {
        if (this.handlers.some(existing => existing.id === handler.id)) {
            throw new Error(`Handler already registered: ${handler.id}`);
        }

        this.handlers.push(handler);
        this.handlers.sort((a, b) => handlerPriority(a) - handlerPriority(b));

        this.logger.debug("Handler registered", {
            handlerId: handler.id,
            priority : handlerPriority(handler),
            kinds    : handler.supportedKinds,
        });
        this.emit(createEvent("handler:registered", { handlerId: handler.id }));
    }

    /**
     * @returns true if a handler was removed
     */
    unregisterHandler(handlerId: string): boolean {
        const index = this.handlers.findIndex(handler => handler.id === handlerId);
        if (index === -1) {
            return false;
        }
        this.handlers.splice(index, 1);
        this.emit(createEvent("handler:unregistered", { handlerId }));
        return true;
    }

    /**
     * Registered handlers in consultation order.
     */
    get registeredHandlers(): readonly TaskHandler[] {
        return [...this.handlers];
    }

    /**
     * Process one request.
     *
     * Pipeline:
     * 1. Assign trace ID, emit request:received
     * 2. Resolve the task kind, emit request:classified
     * 3. Dispatch to a handler or built-in action, emit request:dispatched
     * 4. Emit request:handled, or request:failed when something threw
     */
    async process(request: AssistantRequest): Promise<AssistantResponse> {
        const traceId = generateTraceId();
        const startTime = Date.now();

        this.emit(createEvent("request:received", {
            namespace: request.namespace,
            taskType : request.taskType,
            turns    : request.conversationHistory.length,
        }, traceId));

        try {
            const taskType = await this.resolveTaskType(request, traceId);
            const resolved: ResolvedRequest = { ...request, taskType };
            const mappings = await this.services.store.listByNamespace(request.namespace);

            const response = await this.dispatch(resolved, mappings, traceId);

            const duration = Date.now() - startTime;
            this.emit(createEvent("request:handled", {
                taskType,
                success: response.success,
                action : response.action,
                duration,
            }, traceId));

            this.logger.debug("Request handled", { taskType, success: response.success, traceId, duration });
            return response;
        }
        catch (error) {
            this.emit(createEvent("request:failed", { error: errorMessage(error) }, traceId));
            this.logger.error("Request processing error", {
                namespace: request.namespace,
                traceId,
                error    : errorMessage(error),
            });
            return responseFromError(error);
        }
    }

    /**
     * Carry out a deletion prepared by a delete task. Never rejects.
     */
    async confirm(prepared: AssistantResponse): Promise<AssistantResponse> {
        const traceId = generateTraceId();
        try {
            const response = await confirmDeletion(this.services.store, prepared);
            this.emit(createEvent("request:confirmed", {
                action  : prepared.action,
                targetId: prepared.targetEntityId,
                success : response.success,
            }, traceId));
            this.logger.info("Deletion confirmed", { action: prepared.action, success: response.success, traceId });
            return response;
        }
        catch (error) {
            this.emit(createEvent("request:failed", { error: errorMessage(error) }, traceId));
            this.logger.error("Deletion confirmation error", { traceId, error: errorMessage(error) });
            return responseFromError(error);
        }
    }

    private async resolveTaskType(request: AssistantRequest, traceId: string): Promise<TaskKind> {
        if (request.taskType !== undefined) {
            this.emit(createEvent("request:classified", { taskType: request.taskType, source: "request" }, traceId));
            return request.taskType;
        }

        const result = await this.classifier.classify(request.userPrompt);
        this.emit(createEvent("request:classified", { taskType: result.kind, source: result.source }, traceId));
        return result.kind;
    }

    /**
     * First claiming handler wins; otherwise the built-in action runs.
     */
    private async dispatch(
        request: ResolvedRequest,
        mappings: readonly Mapping[],
        traceId: string
    ): Promise<AssistantResponse> {
        for (const handler of this.handlers) {
            if (!supportsKind(handler, request.taskType)) {
                continue;
            }

            const context = this.createContext(request, mappings, handler.id, traceId);
            if (!(await handler.canHandle(context))) {
                continue;
            }

            this.emit(createEvent("request:dispatched", {
                taskType : request.taskType,
                handlerId: handler.id,
            }, traceId));
            return handler.handle(context);
        }

        this.emit(createEvent("request:dispatched", { taskType: request.taskType, handlerId: "builtin" }, traceId));
        return runBuiltinAction(request.taskType, this.createContext(request, mappings, "builtin", traceId));
    }

    private createContext(
        request: ResolvedRequest,
        mappings: readonly Mapping[],
        handlerId: string,
        traceId: string
    ): TaskContext {
        return {
            request,
            mappings,
            services: this.services,
            logger  : this.createHandlerLogger(request.namespace, handlerId, traceId),
            traceId,
        };
    }

    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }

    /**
     * Create a logger for a handler, prefixed with workspace and handler id.
     */
    private createHandlerLogger(namespace: string, handlerId: string, traceId: string): Logger {
        return {
            debug: (msg, data) => this.logger.debug(`[${namespace}:${handlerId}] ${msg}`, { ...data, traceId }),
            info : (msg, data) => this.logger.info(`[${namespace}:${handlerId}] ${msg}`, { ...data, traceId }),
            warn : (msg, data) => this.logger.warn(`[${namespace}:${handlerId}] ${msg}`, { ...data, traceId }),
            error: (msg, data) => this.logger.error(`[${namespace}:${handlerId}] ${msg}`, { ...data, traceId }),
        };
    }
}
