/**
 * @fileoverview Shared test builders
 *
 * @module @mockpilot/engine/__tests__/fixtures
 */

import { vi, type Mock } from "vitest";
import type { Mapping, RequestMatcher, ResponseDefinition } from "../contracts/Mapping.js";
import type { Workspace, UserAccount } from "../contracts/Workspace.js";
import type { Oracle } from "../contracts/Oracle.js";
import type { Logger } from "../contracts/Logger.js";
import type { Turn } from "../contracts/Request.js";
import type { TaskKind } from "../contracts/TaskKind.js";
import type { TaskContext } from "../contracts/TaskHandler.js";
import type { EntityStore } from "../contracts/EntityStore.js";
import type { PasswordHasher } from "../contracts/PasswordHasher.js";
import { createSettings } from "../contracts/Settings.js";
import { PromptComposer } from "../prompts/PromptComposer.js";
import { InMemoryEntityStore } from "../impl/InMemoryEntityStore.js";

export const FIXED_NOW = new Date("2025-01-15T10:00:00.000Z");
export const FIXED_ISO = FIXED_NOW.toISOString();

export interface MappingOverrides extends Partial<Omit<Mapping, "request" | "response">> {
    method?: string;
    path?: string;
    request?: Partial<RequestMatcher>;
    response?: Partial<ResponseDefinition>;
}

/**
 * Create a mapping for testing
 */
export function makeMapping(overrides: MappingOverrides = {}): Mapping {
    const { method, path, request, response, ...rest } = overrides;
    return {
        id          : "mapping-1",
        name        : "Test Mapping",
        namespace   : "demo",
        priority    : 5,
        enabled     : true,
        tags        : [],
        endpointType: "REST",
        createdAt   : "2025-01-01T00:00:00.000Z",
        updatedAt   : "2025-01-01T00:00:00.000Z",
        ...rest,
        request: {
            method            : method ?? "GET",
            path              : path ?? "/test",
            queryParams       : {},
            queryParamPatterns: {},
            headers           : {},
            headerPatterns    : {},
            bodyPatterns      : [],
            ...request,
        },
        response: {
            status           : 200,
            headers          : {},
            body             : "{}",
            templatingEnabled: false,
            ...response,
        },
    };
}

export function makeWorkspace(overrides: Partial<Workspace> = {}): Workspace {
    return {
        id       : "ws-1",
        name     : "demo",
        members  : [],
        owner    : "admin",
        createdAt: "2025-01-01T00:00:00.000Z",
        active   : true,
        ...overrides,
    };
}

export function makeUser(overrides: Partial<UserAccount> = {}): UserAccount {
    return {
        id          : "user-1",
        userId      : "jdoe",
        email       : "jdoe@example.com",
        firstName   : "Jane",
        lastName    : "Doe",
        passwordHash: "",
        namespaces  : [],
        active      : true,
        ...overrides,
    };
}

export type ScriptedOracle = Oracle & { complete: Mock<Oracle["complete"]> };

/**
 * Oracle that returns queued answers in order. An Error in the queue is
 * thrown instead of returned.
 */
export function scriptedOracle(...answers: Array<string | Error>): ScriptedOracle {
    const queue = [...answers];
    const complete = vi.fn<Oracle["complete"]>(async () => {
        const next = queue.shift();
        if (next === undefined) {
            throw new Error("No scripted answer left");
        }
        if (next instanceof Error) {
            throw next;
        }
        return next;
    });
    return { id: "scripted", complete };
}

export function createMockLogger(): Logger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

/**
 * Hasher producing a readable, predictable value.
 */
export const fakeHasher: PasswordHasher = {
    hash: async (password: string) => `hashed:${password}`,
};

export interface ContextOptions {
    prompt?: string;
    taskType?: TaskKind;
    namespace?: string;
    history?: readonly Turn[];
    mappings?: readonly Mapping[];
    store?: EntityStore;
    oracle?: Oracle;
    logger?: Logger;
}

/**
 * Create a task context for testing. Mappings default to the store's
 * listing for the namespace when a store is given.
 */
export async function makeContext(options: ContextOptions = {}): Promise<TaskContext> {
    const namespace = options.namespace ?? "demo";
    const store = options.store ?? new InMemoryEntityStore({ mappings: options.mappings ?? [] });
    const mappings = options.mappings ?? await store.listByNamespace(namespace);

    return {
        request: {
            userPrompt         : options.prompt ?? "",
            taskType           : options.taskType ?? "CREATE_MAPPING",
            namespace,
            conversationHistory: options.history ?? [],
        },
        mappings,
        services: {
            store,
            oracle        : options.oracle ?? scriptedOracle(),
            composer      : new PromptComposer(createSettings()),
            passwordHasher: fakeHasher,
            now           : () => FIXED_NOW,
        },
        logger : options.logger ?? createMockLogger(),
        traceId: "tr_test",
    };
}
