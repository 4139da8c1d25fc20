/**
 * @fileoverview Unit tests for PluginLoader
 *
 * Tests cover:
 * - Heuristic rules from YAML (list and { rules } forms)
 * - Invalid rule entries
 * - Task handlers from code files
 * - Directory scanning
 *
 * @module @mockpilot/engine/__tests__/PluginLoader
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { PluginLoader } from "../plugins/PluginLoader.js";
import { createMockLogger } from "./fixtures.js";

const HANDLER_MODULE = `
export const pingHandler = {
    id: "ping",
    supportedKinds: ["EXPLAIN_MAPPING"],
    canHandle: () => true,
    handle: async () => ({ success: true, message: "pong", explanation: "pong" }),
};

export const notAHandler = { id: "nope" };

export default [
    pingHandler,
    {
        id: "pong",
        supportedKinds: ["LIST_MAPPINGS"],
        canHandle: () => false,
        handle: async () => ({ success: true, message: "ping", explanation: "ping" }),
    },
];
`;

describe("PluginLoader", () => {
    let dir: string;
    let loader: PluginLoader;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "plugin-loader-"));
        loader = new PluginLoader({ logger: createMockLogger() });
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe("loadYamlFile", () => {
        // Scenario: Rules under a rules key, keywords lowercased
        it("should load rules from a { rules } document", () => {
            const file = join(dir, "heuristics.yml");
            writeFileSync(file, `
rules:
  - name: spec-import
    kind: GENERATE_FROM_OPENAPI
    anyOf: [OpenAPI, swagger]
  - name: create-user
    kind: CREATE_USER
    allOf: [user, create]
`);

            const { rules, handlers } = loader.loadYamlFile(file);

            expect(handlers).toEqual([]);
            expect(rules).toEqual([
                { name: "spec-import", kind: "GENERATE_FROM_OPENAPI", anyOf: ["openapi", "swagger"] },
                { name: "create-user", kind: "CREATE_USER", allOf: ["user", "create"] },
            ]);
        });

        // Scenario: A bare list of rules
        it("should load rules from a top-level list", () => {
            const file = join(dir, "rules.yaml");
            writeFileSync(file, `
- name: list-users
  kind: LIST_USERS
  allOf: [users, list]
`);

            const { rules } = loader.loadYamlFile(file);

            expect(rules.map(rule => rule.name)).toEqual(["list-users"]);
        });

        // Scenario: Unknown kinds and keyword-less rules are skipped
        it("should skip invalid rules and keep valid ones", () => {
            const file = join(dir, "heuristics.yml");
            writeFileSync(file, `
rules:
  - name: bad-kind
    kind: MAKE_COFFEE
    anyOf: [coffee]
  - name: no-keywords
    kind: LIST_USERS
  - name: good
    kind: LIST_NAMESPACES
    anyOf: [workspaces]
`);

            const { rules } = loader.loadYamlFile(file);

            expect(rules.map(rule => rule.name)).toEqual(["good"]);
        });

        // Scenario: Empty file
        it("should return nothing for an empty file", () => {
            const file = join(dir, "empty.yml");
            writeFileSync(file, "");

            expect(loader.loadYamlFile(file)).toEqual({ handlers: [], rules: [] });
        });
    });

    describe("loadCodeFile", () => {
        // Scenario: Named exports and a default-exported array
        it("should collect each task handler once", async () => {
            const file = join(dir, "handlers.mjs");
            writeFileSync(file, HANDLER_MODULE);

            const { handlers } = await loader.loadCodeFile(file);

            expect(handlers.map(handler => handler.id).sort()).toEqual(["ping", "pong"]);
        });
    });

    describe("loadFromDirectory", () => {
        // Scenario: Mixed directory
        it("should load YAML rules and code handlers together", async () => {
            writeFileSync(join(dir, "handlers.mjs"), HANDLER_MODULE);
            writeFileSync(join(dir, "rules.yml"), `
- name: list-users
  kind: LIST_USERS
  allOf: [users]
`);
            writeFileSync(join(dir, "README.md"), "ignored");

            const result = await loader.loadFromDirectory(dir);

            expect(result.handlers).toHaveLength(2);
            expect(result.rules.map(rule => rule.name)).toEqual(["list-users"]);
        });

        // Scenario: A broken file does not stop the others
        it("should skip files that fail to load", async () => {
            writeFileSync(join(dir, "broken.yml"), "rules: [unclosed");
            writeFileSync(join(dir, "ok.yml"), `
- name: ok
  kind: LIST_USERS
  anyOf: [users]
`);

            const result = await loader.loadFromDirectory(dir);

            expect(result.rules.map(rule => rule.name)).toEqual(["ok"]);
        });

        // Scenario: Missing directory
        it("should return nothing for a missing directory", async () => {
            const result = await loader.loadFromDirectory(join(dir, "missing"));

            expect(result).toEqual({ handlers: [], rules: [] });
        });
    });
});
