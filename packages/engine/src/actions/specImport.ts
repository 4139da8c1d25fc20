/**
 * @fileoverview OpenAPI import
 *
 * Finds an OpenAPI/Swagger document in the prompt and generates one
 * mapping per path, method and declared status code. The oracle only
 * fills in names and example bodies; method, path and status come from
 * the document.
 *
 * @module @mockpilot/engine/actions/specImport
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { Mapping, ParameterPattern } from "../contracts/Mapping.js";
import type { TaskContext } from "../contracts/TaskHandler.js";
import type { AssistantResponse } from "../contracts/Response.js";
import type { SpecOperationFacts } from "../prompts/PromptComposer.js";
import type { SpecEndpointDetails } from "../parsing/schemas.js";
import { failureResponse } from "../contracts/Response.js";
import { ParseFailure, responseFromError } from "../contracts/errors.js";
import { errorMessage } from "../contracts/Logger.js";
import { DEFAULT_MAPPING_PRIORITY } from "../contracts/Mapping.js";
import { askOracle } from "../oracle/askOracle.js";
import { parseOracleOutputOrThrow } from "../parsing/parseOracleOutput.js";
import { SpecEndpointDetailsSchema } from "../parsing/schemas.js";
import { newEntityId, timestamp } from "./shared.js";

export const SPEC_METHODS = ["get", "post", "put", "delete", "patch"] as const;

/** Priority given to error variants so they win over the success variant */
export const ERROR_VARIANT_PRIORITY = 3;

const FENCE_MARKERS = ["```yaml", "```yml", "```"] as const;
const DOCUMENT_PREFIXES = ["openapi:", "swagger:", "info:", "paths:"] as const;

const STATUS_DESCRIPTIONS: Readonly<Record<number, string>> = {
    200: "Success",
    201: "Created",
    204: "No Content",
    400: "Bad Request",
    401: "Unauthorized",
    403: "Forbidden",
    404: "Not Found",
    409: "Conflict",
    422: "Validation Error",
    500: "Server Error",
    503: "Service Unavailable",
};

const OperationSchema = z.object({
    summary    : z.string().optional(),
    description: z.string().optional(),
    responses  : z.record(z.unknown()).default({}),
});

const SpecDocumentSchema = z.object({
    paths: z.record(z.record(z.unknown())).default({}),
});

export interface SpecOperation {
    readonly method: string;
    readonly path: string;
    readonly summary?: string;
    readonly statuses: readonly number[];
}

/**
 * Pull the document out of the prompt: a fenced block first, then
 * everything from an `openapi:` or `swagger:` key, then the whole
 * prompt when it already starts like a document.
 */
export function extractSpecDocument(prompt: string): string | null {
    for (const marker of FENCE_MARKERS) {
        const start = prompt.indexOf(marker);
        if (start === -1) {
            continue;
        }
        const end = prompt.indexOf("```", start + marker.length);
        if (end !== -1) {
            const body = prompt.slice(start + marker.length, end).trim();
            return body.length > 0 ? body : null;
        }
    }

    const lowered = prompt.toLowerCase();
    for (const key of ["openapi:", "swagger:"]) {
        const index = lowered.indexOf(key);
        if (index !== -1) {
            return prompt.slice(index).trim();
        }
    }

    const trimmed = prompt.trim();
    return DOCUMENT_PREFIXES.some(prefix => trimmed.startsWith(prefix)) ? trimmed : null;
}

/**
 * Operations with at least one numeric status code, in document order.
 * `default` responses are skipped.
 *
 * @throws ParseFailure if the text is not a YAML mapping with paths
 */
export function parseSpecDocument(text: string): SpecOperation[] {
    let raw: unknown;
    try {
        raw = parseYaml(text);
    }
    catch (error) {
        throw new ParseFailure("OpenAPI document", `invalid YAML (${errorMessage(error)})`, text, { cause: error });
    }

    const document = SpecDocumentSchema.safeParse(raw);
    if (!document.success) {
        throw new ParseFailure("OpenAPI document", "expected a mapping with a paths section", text);
    }

    const operations: SpecOperation[] = [];
    for (const [path, item] of Object.entries(document.data.paths)) {
        for (const method of SPEC_METHODS) {
            const operation = OperationSchema.safeParse(item[method]);
            if (!operation.success) {
                continue;
            }
            const statuses = Object.keys(operation.data.responses)
                .filter(code => code !== "default")
                .map(code => Number.parseInt(code, 10))
                .filter(code => Number.isInteger(code));
            if (statuses.length === 0) {
                continue;
            }
            operations.push({
                method  : method.toUpperCase(),
                path,
                summary : operation.data.summary ?? operation.data.description,
                statuses,
            });
        }
    }
    return operations;
}

export function statusDescription(status: number): string {
    return STATUS_DESCRIPTIONS[status] ?? `Status ${status}`;
}

export function defaultPriorityFor(status: number): number {
    return status >= 400 ? ERROR_VARIANT_PRIORITY : DEFAULT_MAPPING_PRIORITY;
}

export function operationFacts(operation: SpecOperation, status: number): SpecOperationFacts {
    return {
        method           : operation.method,
        path             : operation.path,
        status,
        statusDescription: statusDescription(status),
        operation        : operation.summary ?? `${operation.method} ${operation.path}`,
    };
}

/**
 * Assemble a mapping from the document's facts and the oracle's details.
 */
export function buildSpecMapping(
    facts: SpecOperationFacts,
    details: SpecEndpointDetails,
    namespace: string,
    now: string
): Mapping {
    const headerPatterns: Record<string, ParameterPattern> = {};
    for (const header of details.requiredHeaders) {
        headerPatterns[header] = { matchType: "EXISTS", pattern: "", ignoreCase: false };
    }

    const body = details.responseBody === undefined
        ? "{}"
        : typeof details.responseBody === "string" ? details.responseBody : JSON.stringify(details.responseBody, null, 2);

    return {
        id      : newEntityId(),
        name    : details.name,
        namespace,
        priority: details.priority ?? defaultPriorityFor(facts.status),
        request : {
            method            : facts.method,
            path              : facts.path,
            queryParams       : {},
            queryParamPatterns: {},
            headers           : {},
            headerPatterns,
            bodyPatterns      : [],
        },
        response: {
            status           : facts.status,
            headers          : { "Content-Type": "application/json" },
            body,
            templatingEnabled: body.includes("{{"),
        },
        delays: details.fixedDelayMs !== undefined && details.fixedDelayMs > 0
            ? { mode: "fixed", fixedMs: details.fixedDelayMs, errorRatePercent: 0 }
            : undefined,
        enabled     : true,
        tags        : details.tags,
        endpointType: "REST",
        createdAt   : now,
        updatedAt   : now,
    };
}

export async function generateFromOpenApi(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, services } = ctx;

    const document = extractSpecDocument(request.userPrompt);
    if (document === null) {
        return failureResponse(
            "No OpenAPI spec provided",
            "❌ **Could not find an OpenAPI spec in your message**\n\n" +
                "Paste the document in a ```yaml block, or start the message with `openapi:` or `swagger:`."
        );
    }

    let operations: SpecOperation[];
    try {
        operations = parseSpecDocument(document);
    }
    catch (error) {
        return responseFromError(error);
    }
    if (operations.length === 0) {
        return failureResponse(
            "No endpoints found in OpenAPI spec",
            "❌ The document has no operations with declared response codes."
        );
    }

    const generated: Mapping[] = [];
    let skipped = 0;
    for (const operation of operations) {
        for (const status of operation.statuses) {
            const facts = operationFacts(operation, status);
            const prompt = services.composer.compose("GENERATE_FROM_OPENAPI", {
                namespace    : request.namespace,
                userPrompt   : request.userPrompt,
                specOperation: facts,
            });

            // Oracle and parse failures skip the variant; store failures abort the import
            let details: SpecEndpointDetails;
            try {
                const text = await askOracle(services.oracle, prompt);
                details = parseOracleOutputOrThrow(text, SpecEndpointDetailsSchema, "endpoint details");
            }
            catch (error) {
                skipped++;
                ctx.logger.warn("Skipping spec variant", {
                    endpoint: `${facts.method} ${facts.path}`,
                    status,
                    error   : errorMessage(error),
                });
                continue;
            }

            const mapping = buildSpecMapping(facts, details, request.namespace, timestamp(ctx));
            generated.push(await services.store.save(mapping, request.namespace));
        }
    }

    if (generated.length === 0) {
        return failureResponse(
            "Failed to generate from OpenAPI spec",
            `❌ None of the ${skipped} endpoint variant(s) could be generated.`
        );
    }
    ctx.logger.info("Spec import complete", { generated: generated.length, skipped });

    let explanation = `✅ **Generated ${generated.length} endpoint mappings** from OpenAPI spec\n\n**Summary:**\n`;
    for (const operation of operations) {
        explanation += `- \`${operation.method} ${operation.path}\`: ${operation.statuses.length} variants ` +
            `(${operation.statuses.join(", ")})\n`;
    }
    if (skipped > 0) {
        explanation += `\n⚠️ ${skipped} variant(s) could not be generated.`;
    }

    return {
        success    : true,
        action     : "generate_from_openapi",
        message    : `Generated ${generated.length} endpoints`,
        explanation,
        entities   : generated,
    };
}
