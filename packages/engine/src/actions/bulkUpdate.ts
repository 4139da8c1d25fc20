/**
 * @fileoverview Bulk update
 *
 * The oracle plans the update; the engine validates the plan up front
 * and applies it to every targeted mapping itself.
 *
 * @module @mockpilot/engine/actions/bulkUpdate
 */

import type { z } from "zod";
import type { Mapping } from "../contracts/Mapping.js";
import type { TaskContext } from "../contracts/TaskHandler.js";
import type { AssistantResponse } from "../contracts/Response.js";
import { failureResponse } from "../contracts/Response.js";
import { ParseFailure, responseFromError } from "../contracts/errors.js";
import type { ParseResult } from "../parsing/parseOracleOutput.js";
import { parseOracleOutput } from "../parsing/parseOracleOutput.js";
import type { BulkUpdatePlan } from "../parsing/schemas.js";
import { AddHeaderDetailsSchema, BulkUpdatePlanSchema, SetPriorityDetailsSchema } from "../parsing/schemas.js";
import { askWithHistory, timestamp } from "./shared.js";

export const BULK_UPDATE_KINDS = ["add_header", "set_priority", "enable", "disable"] as const;

export type BulkOperation =
    | { readonly kind: "add_header"; readonly headerName: string; readonly headerValue: string }
    | { readonly kind: "set_priority"; readonly priority: number }
    | { readonly kind: "enable" }
    | { readonly kind: "disable" };

/** Header values that mean "must be present", not a literal value */
const PRESENCE_VALUES: ReadonlySet<string> = new Set(["required", "exists"]);

/**
 * Name the first detail field that failed validation.
 */
function detailProblem(error: z.ZodError, details: Record<string, unknown>): string {
    const key = error.issues[0]?.path[0];
    if (key === undefined) {
        return "details are invalid";
    }
    const field = String(key);
    return details[field] === undefined || details[field] === null
        ? `${field} is required`
        : `${field} is invalid`;
}

/**
 * Validate the plan's details for its update kind.
 */
export function toBulkOperation(plan: BulkUpdatePlan): ParseResult<BulkOperation> | null {
    const raw = JSON.stringify(plan.updateDetails);

    switch (plan.updateKind) {
        case "add_header": {
            const details = AddHeaderDetailsSchema.safeParse(plan.updateDetails);
            if (!details.success) {
                const reason = detailProblem(details.error, plan.updateDetails);
                return { ok: false, failure: new ParseFailure("add_header details", reason, raw) };
            }
            return { ok: true, value: { kind: "add_header", ...details.data } };
        }
        case "set_priority": {
            const details = SetPriorityDetailsSchema.safeParse(plan.updateDetails);
            if (!details.success) {
                return { ok: false, failure: new ParseFailure("set_priority details", "priority must be an integer", raw) };
            }
            return { ok: true, value: { kind: "set_priority", priority: details.data.priority } };
        }
        case "enable":
        case "disable":
            return { ok: true, value: plan.updateKind === "enable" ? { kind: "enable" } : { kind: "disable" } };
        default:
            return null;
    }
}

/**
 * Mappings the plan targets, in store order. Listed ids that do not
 * exist are skipped.
 */
export function resolveBulkTargets(plan: BulkUpdatePlan, mappings: readonly Mapping[]): Mapping[] {
    if (plan.targetMode === "all") {
        return [...mappings];
    }
    const ids = new Set(plan.targetIds);
    return mappings.filter(mapping => ids.has(mapping.id));
}

export function applyBulkOperation(mapping: Mapping, operation: BulkOperation, updatedAt: string): Mapping {
    switch (operation.kind) {
        case "add_header": {
            const { headerName, headerValue } = operation;
            if (PRESENCE_VALUES.has(headerValue.toLowerCase())) {
                return {
                    ...mapping,
                    updatedAt,
                    request: {
                        ...mapping.request,
                        headerPatterns: {
                            ...mapping.request.headerPatterns,
                            [headerName]: { matchType: "EXISTS", pattern: "", ignoreCase: false },
                        },
                    },
                };
            }
            return {
                ...mapping,
                updatedAt,
                request: {
                    ...mapping.request,
                    headers: { ...mapping.request.headers, [headerName]: headerValue },
                },
            };
        }
        case "set_priority":
            return { ...mapping, priority: operation.priority, updatedAt };
        case "enable":
            return { ...mapping, enabled: true, updatedAt };
        case "disable":
            return { ...mapping, enabled: false, updatedAt };
    }
}

export async function bulkUpdateMappings(ctx: TaskContext): Promise<AssistantResponse> {
    const { request, mappings, services } = ctx;

    const prompt = services.composer.compose("BULK_UPDATE_MAPPING", {
        namespace : request.namespace,
        userPrompt: request.userPrompt,
        mappings,
    });
    const text = await askWithHistory(ctx, prompt);

    const parsed = parseOracleOutput(text, BulkUpdatePlanSchema, "bulk update plan");
    if (!parsed.ok) {
        return responseFromError(parsed.failure);
    }
    const plan = parsed.value;

    const operation = toBulkOperation(plan);
    if (operation === null) {
        return failureResponse(
            `Unsupported bulk update type: ${plan.updateKind}`,
            `❌ I can't apply '${plan.updateKind}' in bulk. Supported updates: ${BULK_UPDATE_KINDS.join(", ")}.`
        );
    }
    if (!operation.ok) {
        return responseFromError(operation.failure);
    }

    const targets = resolveBulkTargets(plan, mappings);
    if (plan.affectedCount !== undefined && plan.affectedCount !== targets.length) {
        ctx.logger.warn("Bulk update count differs from plan", {
            planned: plan.affectedCount,
            actual : targets.length,
        });
    }

    const updatedAt = timestamp(ctx);
    const updated: Mapping[] = [];
    for (const mapping of targets) {
        updated.push(await services.store.save(applyBulkOperation(mapping, operation.value, updatedAt), request.namespace));
    }
    ctx.logger.info("Bulk update applied", { kind: operation.value.kind, count: updated.length });

    return {
        success    : true,
        action     : "bulk_update",
        message    : `Updated ${updated.length} endpoints`,
        explanation: `${plan.summary}\n\n✅ **Bulk update completed!** Updated ${updated.length} endpoint(s).`,
        entities   : updated,
    };
}
