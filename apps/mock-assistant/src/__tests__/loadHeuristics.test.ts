/**
 * @fileoverview Unit tests for classifier fallback rule loading
 *
 * @module config/__tests__/loadHeuristics
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { PluginLoader, applyHeuristics, type Logger } from "@mockpilot/engine";
import { loadHeuristicRules } from "../config/loadHeuristics.js";

const CONFIG_RULES = `rules:
  - name: create-user
    kind: CREATE_USER
    allOf: [user, create]
`;

const USER_RULES = `- name: user-report
  kind: LIST_USERS
  anyOf: [user]
`;

function createMockLogger(): Logger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("loadHeuristicRules", () => {
    let dir: string;
    let logger: Logger;
    let loader: PluginLoader;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "mock-assistant-rules-"));
        logger = createMockLogger();
        loader = new PluginLoader({ logger });
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    // Scenario: Rule file dropped into the user plugin directory
    it("should let user plugin rules change the fallback outcome", async () => {
        const configFile = join(dir, "heuristics.yml");
        writeFileSync(configFile, CONFIG_RULES);
        const pluginDir = join(dir, "plugins");
        mkdirSync(pluginDir);
        writeFileSync(join(pluginDir, "reports.yml"), USER_RULES);

        const { rules: userRules } = await loader.loadFromDirectory(pluginDir);
        const withUser = loadHeuristicRules(loader, configFile, userRules, logger);
        const withoutUser = loadHeuristicRules(loader, configFile, [], logger);

        expect(withUser.map(rule => rule.name)).toEqual(["user-report", "create-user"]);
        expect(applyHeuristics("create a user bob", withoutUser)).toBe("CREATE_USER");
        expect(applyHeuristics("create a user bob", withUser)).toBe("LIST_USERS");
    });

    // Scenario: No config file
    it("should fall back to the built-in rules behind the user rules", () => {
        const rules = loadHeuristicRules(loader, join(dir, "missing.yml"), [], logger);

        expect(rules.map(rule => rule.name)).toEqual(["spec-import", "create-namespace", "create-user"]);
        expect(applyHeuristics("create a new namespace called billing", rules)).toBe("CREATE_NAMESPACE");
    });

    // Scenario: Config directory not found at all
    it("should accept a missing config path", () => {
        const rules = loadHeuristicRules(loader, null, [{ name: "swagger-first", kind: "LIST_MAPPINGS", anyOf: ["swagger"] }], logger);

        expect(rules[0]?.name).toBe("swagger-first");
        expect(applyHeuristics("import this swagger file", rules)).toBe("LIST_MAPPINGS");
    });
});
