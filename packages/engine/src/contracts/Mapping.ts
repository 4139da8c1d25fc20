/**
 * @fileoverview Mapping contract
 *
 * A mapping is one simulated API endpoint: how an incoming request is
 * matched and what the simulator answers with.
 *
 * @module @mockpilot/engine/contracts/Mapping
 */

export const PATH_MATCH_TYPES = ["EXACT", "REGEX", "WILDCARD"] as const;
export const PARAMETER_MATCH_TYPES = ["EXACT", "REGEX", "CONTAINS", "EXISTS"] as const;
export const BODY_MATCH_TYPES = ["EXACT", "REGEX", "JSONPATH", "XPATH", "CONTAINS"] as const;
export const ENDPOINT_TYPES = ["REST", "GRAPHQL"] as const;
export const DELAY_MODES = ["fixed", "variable"] as const;

export type PathMatchType = typeof PATH_MATCH_TYPES[number];
export type ParameterMatchType = typeof PARAMETER_MATCH_TYPES[number];
export type BodyMatchType = typeof BODY_MATCH_TYPES[number];
export type EndpointType = typeof ENDPOINT_TYPES[number];
export type DelayMode = typeof DELAY_MODES[number];

/** Lower numbers win when several mappings match the same request. */
export const DEFAULT_MAPPING_PRIORITY = 5;
export const DEFAULT_RESPONSE_STATUS = 200;

export interface PathPattern {
    readonly matchType: PathMatchType;
    readonly pattern: string;
    readonly ignoreCase: boolean;
}

/**
 * Pattern applied to a single header or query parameter.
 * EXISTS ignores `pattern` and only checks presence.
 */
export interface ParameterPattern {
    readonly matchType: ParameterMatchType;
    readonly pattern: string;
    readonly ignoreCase: boolean;
}

export interface BodyPattern {
    readonly matchType: BodyMatchType;
    readonly expr: string;
    readonly expected?: string;
    readonly ignoreCase: boolean;
}

export interface RequestMatcher {
    readonly method: string;
    readonly path: string;
    readonly pathPattern?: PathPattern;
    readonly queryParams: Readonly<Record<string, string>>;
    readonly queryParamPatterns: Readonly<Record<string, ParameterPattern>>;
    readonly headers: Readonly<Record<string, string>>;
    readonly headerPatterns: Readonly<Record<string, ParameterPattern>>;
    readonly bodyPatterns: readonly BodyPattern[];
}

/**
 * Alternative response selected by the value of a request-id header.
 */
export interface RequestIdResponse {
    readonly requestId: string;
    readonly status: number;
    readonly body: string;
    readonly headers?: Readonly<Record<string, string>>;
}

export interface ConditionalResponses {
    readonly enabled: boolean;
    readonly requestIdHeader: string;
    readonly requestIdMappings: readonly RequestIdResponse[];
}

export interface ResponseDefinition {
    readonly status: number;
    readonly headers: Readonly<Record<string, string>>;
    readonly body: string;
    readonly templatingEnabled: boolean;
    readonly conditionalResponses?: ConditionalResponses;
}

export interface ErrorResponse {
    readonly status: number;
    readonly body: string;
}

export interface DelayDefinition {
    readonly mode: DelayMode;
    readonly fixedMs?: number;
    readonly variableMinMs?: number;
    readonly variableMaxMs?: number;
    readonly errorRatePercent: number;
    readonly errorResponse?: ErrorResponse;
}

export interface Mapping {
    readonly id: string;
    readonly name: string;
    readonly namespace: string;
    readonly priority: number;
    readonly request: RequestMatcher;
    readonly response: ResponseDefinition;
    readonly delays?: DelayDefinition;
    readonly enabled: boolean;
    readonly tags: readonly string[];
    readonly endpointType: EndpointType;

    /** ISO timestamps */
    readonly createdAt: string;
    readonly updatedAt: string;
}
