/**
 * @fileoverview Oracle payload schemas
 *
 * One schema per structured answer the oracle is asked for. Required
 * fields that are missing make the parse fail; optional fields get
 * explicit defaults.
 *
 * @module @mockpilot/engine/parsing/schemas
 */

import { z } from "zod";
import {
    PATH_MATCH_TYPES,
    PARAMETER_MATCH_TYPES,
    BODY_MATCH_TYPES,
    ENDPOINT_TYPES,
    DELAY_MODES,
    DEFAULT_MAPPING_PRIORITY,
    DEFAULT_RESPONSE_STATUS,
} from "../contracts/Mapping.js";

const upperCased = (value: unknown): unknown => typeof value === "string" ? value.trim().toUpperCase() : value;
const lowerCased = (value: unknown): unknown => typeof value === "string" ? value.trim().toLowerCase() : value;

/** Scalars the oracle likes to emit for header values */
const ScalarText = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const StringMap = z.record(ScalarText).default({});

/** Response bodies may come back as JSON values rather than strings */
const BodyText = z
    .union([z.string(), z.record(z.unknown()), z.array(z.unknown()), z.null()])
    .transform(value => {
        if (value === null) {
            return "";
        }
        return typeof value === "string" ? value : JSON.stringify(value, null, 2);
    });

export const ParameterPatternSchema = z.object({
    matchType : z.preprocess(upperCased, z.enum(PARAMETER_MATCH_TYPES)),
    pattern   : z.string().nullish().transform(value => value ?? ""),
    ignoreCase: z.boolean().default(false),
});

export const PathPatternSchema = z.object({
    matchType : z.preprocess(upperCased, z.enum(PATH_MATCH_TYPES)),
    pattern   : z.string(),
    ignoreCase: z.boolean().default(false),
});

export const BodyPatternSchema = z.object({
    matchType : z.preprocess(upperCased, z.enum(BODY_MATCH_TYPES)),
    expr      : z.string(),
    expected  : ScalarText.optional(),
    ignoreCase: z.boolean().default(false),
});

const PatternMap = z.record(ParameterPatternSchema).default({});

export const RequestMatcherSchema = z.object({
    method            : z.preprocess(upperCased, z.string().min(1)).default("GET"),
    path              : z.string().min(1),
    pathPattern       : PathPatternSchema.nullish().transform(value => value ?? undefined),
    queryParams       : StringMap,
    queryParamPatterns: PatternMap,
    headers           : StringMap,
    headerPatterns    : PatternMap,
    bodyPatterns      : z.array(BodyPatternSchema).default([]),
});

export const ConditionalResponsesSchema = z.object({
    enabled          : z.boolean().default(false),
    requestIdHeader  : z.string().default("X-Request-ID"),
    requestIdMappings: z.array(z.object({
        requestId: z.string(),
        status   : z.number().int().default(DEFAULT_RESPONSE_STATUS),
        body     : BodyText.default(""),
        headers  : z.record(ScalarText).optional(),
    })).default([]),
});

export const ResponseDefinitionSchema = z.object({
    status              : z.number().int().default(DEFAULT_RESPONSE_STATUS),
    headers             : StringMap,
    body                : BodyText.default(""),
    templatingEnabled   : z.boolean().default(false),
    conditionalResponses: ConditionalResponsesSchema.nullish().transform(value => value ?? undefined),
});

/**
 * Delays must be an object; a bare number is rejected.
 */
export const DelayDefinitionSchema = z.object({
    mode            : z.preprocess(lowerCased, z.enum(DELAY_MODES)),
    fixedMs         : z.number().nonnegative().optional(),
    variableMinMs   : z.number().nonnegative().optional(),
    variableMaxMs   : z.number().nonnegative().optional(),
    errorRatePercent: z.number().min(0).max(100).default(0),
    errorResponse   : z.object({
        status: z.number().int(),
        body  : BodyText.default(""),
    }).optional(),
});

/**
 * A mapping as generated by the oracle. Identity and timestamps are
 * accepted but never used; the engine imposes its own.
 */
export const GeneratedMappingSchema = z.object({
    id          : z.string().optional(),
    namespace   : z.string().optional(),
    name        : z.string().min(1),
    priority    : z.number().int().default(DEFAULT_MAPPING_PRIORITY),
    request     : RequestMatcherSchema,
    response    : ResponseDefinitionSchema.default({}),
    delays      : DelayDefinitionSchema.nullish().transform(value => value ?? undefined),
    enabled     : z.boolean().default(true),
    tags        : z.array(z.string()).default([]),
    endpointType: z.preprocess(upperCased, z.enum(ENDPOINT_TYPES)).default("REST"),
});
export type GeneratedMapping = z.infer<typeof GeneratedMappingSchema>;

export const MovePlanSchema = z.object({
    mappingId      : z.string().min(1),
    mappingName    : z.string().optional(),
    targetNamespace: z.string().min(1),
    explanation    : z.string().default(""),
});
export type MovePlan = z.infer<typeof MovePlanSchema>;

/**
 * Bulk update plan as emitted by the oracle, renamed to engine terms.
 */
export const BulkUpdatePlanSchema = z
    .object({
        updateType     : z.preprocess(lowerCased, z.string().min(1)),
        targetEndpoints: z.preprocess(lowerCased, z.enum(["all", "subset"])),
        endpointIds    : z.array(z.string()).default([]),
        updateDetails  : z.record(z.unknown()).default({}),
        affectedCount  : z.number().int().optional(),
        summary        : z.string(),
    })
    .transform(raw => ({
        updateKind   : raw.updateType,
        targetMode   : raw.targetEndpoints,
        targetIds    : raw.endpointIds,
        updateDetails: raw.updateDetails,
        affectedCount: raw.affectedCount,
        summary      : raw.summary,
    }));
export type BulkUpdatePlan = z.infer<typeof BulkUpdatePlanSchema>;

export const AddHeaderDetailsSchema = z.object({
    headerName : z.string().min(1),
    headerValue: ScalarText,
});

export const SetPriorityDetailsSchema = z.object({
    priority: z.union([
        z.number().int(),
        z.string().trim().regex(/^-?\d+$/).transform(Number),
    ]),
});

export const NamespaceDraftSchema = z.object({
    name       : z.string().min(1),
    displayName: z.string().optional(),
    description: z.string().optional(),
});

export const NamespaceChangeSchema = z.object({
    namespaceName: z.string().min(1),
    displayName  : z.string().optional(),
    description  : z.string().optional(),
    active       : z.boolean().optional(),
});

export const NamespaceRefSchema = z.object({
    namespaceName: z.string().min(1),
});

export const UserDraftSchema = z.object({
    userId   : z.string().min(1),
    firstName: z.string().default(""),
    lastName : z.string().default(""),
    email    : z.string().min(1),
    password : z.string().optional(),
});

export const UserChangeSchema = z.object({
    userId   : z.string().min(1),
    firstName: z.string().optional(),
    lastName : z.string().optional(),
    email    : z.string().optional(),
    password : z.string().optional(),
});

export const UserRefSchema = z.object({
    userId: z.string().min(1),
});

export const UserStatusSchema = z.object({
    userId: z.string().min(1),
    action: z.preprocess(lowerCased, z.enum(["enable", "disable"])),
    reason: z.string().optional(),
});

export const AssignmentSchema = z.object({
    userId       : z.string().min(1),
    namespaceName: z.string().min(1),
});

/**
 * Details the oracle fills in for one generated spec endpoint variant.
 */
export const SpecEndpointDetailsSchema = z.object({
    name           : z.string().min(1),
    priority       : z.number().int().optional(),
    tags           : z.array(z.string()).default([]),
    requiredHeaders: z.array(z.string()).default([]),
    responseBody   : z.unknown().optional(),
    fixedDelayMs   : z.number().nonnegative().optional(),
});
export type SpecEndpointDetails = z.infer<typeof SpecEndpointDetailsSchema>;
