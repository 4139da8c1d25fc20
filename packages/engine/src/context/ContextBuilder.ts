/**
 * @fileoverview Context blocks
 *
 * Text renderings of existing mappings embedded in oracle instructions.
 *
 * - summary: one line per mapping, used for creation
 * - detailed: name, id and key settings per mapping, used for identification
 * - deep: the complete configuration of one mapping
 * - follow-up: deep block of the target plus the detailed workspace listing
 * - workspace and user listings for administration prompts
 *
 * @module @mockpilot/engine/context/ContextBuilder
 */

import type { Mapping, ParameterPattern } from "../contracts/Mapping.js";
import type { Workspace, UserAccount } from "../contracts/Workspace.js";
import { workspaceLabel, fullName } from "../contracts/Workspace.js";

export const EMPTY_WORKSPACE_CONTEXT = "No existing mappings in workspace.";

/**
 * Templating references found in a stored response body.
 */
export interface TemplateVariables {
    /** Every `{{ ... }}` or `{{{ ... }}}` expression, trimmed */
    readonly variables: string[];

    /** Request body fields read through `{{{jsonPath request.body '$.field'}}}` */
    readonly jsonPathFields: string[];
}

const INTERPOLATION = /\{\{\{?([^{}]+)\}?\}\}/g;
const JSON_PATH_EXTRACTION = /\{\{\{jsonPath\s+request\.body\s+'\$\.([^']+)'\}\}\}/g;

function uniqueMatches(text: string, pattern: RegExp): string[] {
    const found = new Set<string>();
    for (const match of text.matchAll(pattern)) {
        const value = match[1]?.trim();
        if (value) {
            found.add(value);
        }
    }
    return [...found];
}

/**
 * Static scan of a response body for template references.
 */
export function extractTemplateVariables(body: string): TemplateVariables {
    return {
        variables     : uniqueMatches(body, INTERPOLATION),
        jsonPathFields: uniqueMatches(body, JSON_PATH_EXTRACTION),
    };
}

/**
 * One line per mapping: method, path, priority and status.
 */
export function buildSummaryContext(mappings: readonly Mapping[]): string {
    if (mappings.length === 0) {
        return EMPTY_WORKSPACE_CONTEXT;
    }

    let context = "EXISTING ENDPOINTS:\n";
    for (const mapping of mappings) {
        context += `- ${mapping.request.method} ${mapping.request.path} ` +
            `(Priority: ${mapping.priority}, Status: ${mapping.response.status})\n`;
        if (mapping.tags.length > 0) {
            context += `  Tags: ${mapping.tags.join(", ")}\n`;
        }
    }
    return context;
}

/**
 * Name, id and main settings of every mapping.
 */
export function buildDetailedContext(mappings: readonly Mapping[]): string {
    if (mappings.length === 0) {
        return EMPTY_WORKSPACE_CONTEXT;
    }

    let context = "EXISTING ENDPOINTS:\n\n";
    for (const mapping of mappings) {
        context += `📍 **${mapping.name}** (ID: ${mapping.id})\n`;
        context += `   Method: ${mapping.request.method} ${mapping.request.path}\n`;
        context += `   Priority: ${mapping.priority} | Status: ${mapping.response.status} | Enabled: ${mapping.enabled}\n`;
        if (mapping.tags.length > 0) {
            context += `   Tags: ${mapping.tags.join(", ")}\n`;
        }
        if (mapping.delays) {
            context += `   Delay: ${mapping.delays.mode}\n`;
        }
        context += "\n";
    }
    return context;
}

function describePattern(pattern: ParameterPattern): string {
    return `matchType=${pattern.matchType}, pattern=${pattern.pattern}` +
        (pattern.ignoreCase ? ", ignoreCase" : "");
}

function pushMap(lines: string[], title: string, map: Readonly<Record<string, string>>): void {
    const entries = Object.entries(map);
    if (entries.length === 0) {
        return;
    }
    lines.push(`  ${title}:`);
    for (const [key, value] of entries) {
        lines.push(`    - ${key}: ${value}`);
    }
}

function pushPatterns(lines: string[], title: string, map: Readonly<Record<string, ParameterPattern>>): void {
    const entries = Object.entries(map);
    if (entries.length === 0) {
        return;
    }
    lines.push(`  ${title}:`);
    for (const [key, pattern] of entries) {
        lines.push(`    - ${key}: ${describePattern(pattern)}`);
    }
}

function prettyBody(body: string): string {
    try {
        return JSON.stringify(JSON.parse(body), null, 2);
    }
    catch {
        return body;
    }
}

/**
 * Complete configuration of a single mapping.
 */
export function buildDeepContext(mapping: Mapping): string {
    const { request, response, delays } = mapping;
    const lines: string[] = [
        "=== COMPLETE ENDPOINT CONFIGURATION ===",
        "",
        `Name: ${mapping.name}`,
        `ID: ${mapping.id}`,
        `Priority: ${mapping.priority} (lower = higher precedence)`,
        `Enabled: ${mapping.enabled}`,
        `Type: ${mapping.endpointType}`,
        "",
        "REQUEST CONFIGURATION:",
        `  Method: ${request.method}`,
        `  Path: ${request.path}`,
    ];

    if (request.pathPattern) {
        lines.push(`  Path Pattern: matchType=${request.pathPattern.matchType}, pattern=${request.pathPattern.pattern}`);
    }
    pushMap(lines, "Headers", request.headers);
    pushPatterns(lines, "Header Patterns", request.headerPatterns);
    pushMap(lines, "Query Params", request.queryParams);
    pushPatterns(lines, "Query Param Patterns", request.queryParamPatterns);
    if (request.bodyPatterns.length > 0) {
        lines.push("  Body Patterns:");
        for (const pattern of request.bodyPatterns) {
            lines.push(`    - Type: ${pattern.matchType}, Expression: ${pattern.expr}, Expected: ${pattern.expected ?? "(any)"}`);
        }
    }

    lines.push(
        "",
        "RESPONSE CONFIGURATION:",
        `  Status: ${response.status}`,
        `  Templating Enabled: ${response.templatingEnabled}`,
    );
    pushMap(lines, "Headers", response.headers);

    if (response.body) {
        lines.push("  Body:", "```json", prettyBody(response.body), "```");

        const templates = extractTemplateVariables(response.body);
        if (templates.variables.length > 0) {
            lines.push("  Template Variables Analysis:");
            lines.push(`    Variables: ${templates.variables.join(", ")}`);
            if (templates.jsonPathFields.length > 0) {
                lines.push(`    Request Body Fields Used: ${templates.jsonPathFields.join(", ")}`);
            }
        }
    }

    const conditional = response.conditionalResponses;
    if (conditional?.enabled) {
        lines.push("", "CONDITIONAL RESPONSES:", `  Request ID Header: ${conditional.requestIdHeader}`);
        for (const variant of conditional.requestIdMappings) {
            lines.push(`    - ${variant.requestId} -> Status ${variant.status}`);
        }
    }

    if (delays) {
        lines.push("", "DELAY CONFIGURATION:", `  Mode: ${delays.mode}`);
        if (delays.mode === "fixed") {
            lines.push(`  Fixed Delay: ${delays.fixedMs ?? 0}ms`);
        }
        else {
            lines.push(`  Variable Delay: ${delays.variableMinMs ?? 0}-${delays.variableMaxMs ?? 0}ms`);
        }
        if (delays.errorRatePercent > 0) {
            lines.push(`  Error Rate: ${delays.errorRatePercent}%`);
            if (delays.errorResponse) {
                lines.push(`  Error Response: Status ${delays.errorResponse.status}`);
            }
        }
    }

    if (mapping.tags.length > 0) {
        lines.push("", `Tags: ${mapping.tags.join(", ")}`);
    }

    return lines.join("\n");
}

/**
 * Context for a conversational follow-up about one mapping.
 */
export function buildFollowUpContext(target: Mapping, mappings: readonly Mapping[]): string {
    return `${buildDeepContext(target)}\n\n=== ALL WORKSPACE ENDPOINTS (for context) ===\n\n${buildDetailedContext(mappings)}`;
}

/**
 * `- Display Name (name)` per workspace.
 */
export function buildWorkspaceListing(workspaces: readonly Workspace[]): string {
    if (workspaces.length === 0) {
        return "(no workspaces)";
    }
    return workspaces.map(ws => `- ${workspaceLabel(ws)} (${ws.name})`).join("\n");
}

/**
 * `- First Last (@userId) - Active` per user.
 */
export function buildUserListing(users: readonly UserAccount[]): string {
    if (users.length === 0) {
        return "(no users)";
    }
    return users
        .map(user => `- ${fullName(user)} (@${user.userId}) - ${user.active ? "Active" : "Disabled"}`)
        .join("\n");
}
