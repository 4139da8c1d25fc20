/**
 * @fileoverview Instruction templates for mapping tasks
 *
 * @module @mockpilot/engine/prompts/mappingPrompts
 */

/**
 * Nested-field rules repeated wherever the oracle writes a full mapping.
 */
export const MAPPING_SHAPE_RULES = `FIELD RULES:
- headerPatterns and queryParamPatterns are JSON OBJECTS keyed by header or parameter name, NEVER arrays:
  "headerPatterns": {
    "X-Api-Key": { "matchType": "EXACT|REGEX|CONTAINS|EXISTS", "pattern": "value", "ignoreCase": false }
  }
  For EXISTS use an empty pattern string.
- bodyPatterns is an array of { "matchType": "EXACT|REGEX|JSONPATH|XPATH|CONTAINS", "expr": "...", "expected": "...", "ignoreCase": false }.
- delays is either omitted or a COMPLETE object, NEVER a plain number such as "delays": 5000.
  Fixed:    { "mode": "fixed", "fixedMs": 200, "errorRatePercent": 0 }
  Variable: { "mode": "variable", "variableMinMs": 100, "variableMaxMs": 500, "errorRatePercent": 15,
              "errorResponse": { "status": 500, "body": "{\\"error\\": \\"Service unavailable\\"}" } }
- response.body is a string containing JSON.`;

export const MAPPING_OUTPUT_FORMAT = `OUTPUT FORMAT (JSON only):
{
  "name": "Descriptive endpoint name",
  "endpointType": "REST",
  "priority": 5,
  "enabled": true,
  "tags": ["category", "operation"],
  "request": {
    "method": "GET|POST|PUT|DELETE|PATCH",
    "path": "/api/resource/{id}",
    "headers": {},
    "headerPatterns": {},
    "queryParams": {},
    "queryParamPatterns": {},
    "bodyPatterns": []
  },
  "response": {
    "status": 200,
    "headers": { "Content-Type": "application/json" },
    "body": "{\\"key\\": \\"value\\"}",
    "templatingEnabled": true
  },
  "delays": { "mode": "fixed", "fixedMs": 200, "errorRatePercent": 0 }
}`;

export function createMappingInstructions(namespace: string, context: string): string {
    return `You are an API mapping assistant for a mock API server.
Generate one mapping configuration for the user's request.

WORKSPACE: ${namespace}

${context}

RULES:
1. Follow the conventions of the existing endpoints
2. Use the HTTP method that fits the operation
3. Priority: lower wins, 5 is the default, use lower values for more specific paths
4. Return a realistic JSON response body
5. Tag the endpoint by resource and operation
6. Templating helpers available in response bodies:
   - Path segment: {{request.pathSegments.[2]}}
   - Random UUID: {{randomValue type='UUID'}}
   - Request body field: {{{jsonPath request.body '$.fieldName'}}} (triple braces)
   - Whole request body: {{request.body}}
   - Current time: {{now}}

${MAPPING_OUTPUT_FORMAT}

${MAPPING_SHAPE_RULES}

Return ONLY the JSON object.`;
}

export function identifyMappingInstructions(namespace: string, context: string): string {
    return `You identify which existing mapping a request is about.

WORKSPACE: ${namespace}

${context}

Look at names, paths, methods and tags mentioned in the request.
Respond with ONLY the mapping ID, or "UNKNOWN" if no single mapping is clearly meant.`;
}

export function modifyMappingInstructions(namespace: string, existingJson: string, userPrompt: string): string {
    return `You modify an existing mock API mapping.

WORKSPACE: ${namespace}

CURRENT MAPPING:
\`\`\`json
${existingJson}
\`\`\`

USER REQUEST: ${userPrompt}

Return the COMPLETE updated mapping:
1. Change only what the request asks for
2. Keep every other field exactly as it is
3. Append to bodyPatterns rather than replacing them unless told otherwise

${MAPPING_SHAPE_RULES}

Return ONLY the JSON object.`;
}

export function deleteMappingInstructions(namespace: string, context: string): string {
    return `You help remove mock API mappings.

WORKSPACE: ${namespace}

${context}

Identify the mapping the user wants to delete.
Put the mapping ID alone on the first line, then:
- **Mapping to Delete**: name and ID
- **Confirmation**: what will be removed
- **Impact**: anything that depends on it`;
}

export function moveMappingInstructions(namespace: string, workspaces: string, context: string): string {
    return `You move a mock API endpoint from one workspace to another.

CURRENT WORKSPACE: ${namespace}
AVAILABLE WORKSPACES: ${workspaces}

${context}

Identify the endpoint to move and the target workspace.

Respond with JSON only:
{
  "mappingId": "id of the endpoint",
  "mappingName": "Endpoint name",
  "targetNamespace": "target workspace name",
  "explanation": "Moving <name> from <current> to <target>."
}`;
}

export function bulkUpdateInstructions(namespace: string, context: string): string {
    return `You plan an update applied to several mock API endpoints at once.

WORKSPACE: ${namespace}

${context}

Supported updateType values and their updateDetails:
- "add_header": { "headerName": "X-Api-Key", "headerValue": "literal value" }
  Use "headerValue": "required" when the header only has to be present.
- "set_priority": { "priority": 3 }
- "enable": {}
- "disable": {}

Use "targetEndpoints": "all" when every endpoint is meant, otherwise "subset" with the IDs in endpointIds.

Respond with JSON only:
{
  "updateType": "add_header",
  "targetEndpoints": "all",
  "endpointIds": [],
  "updateDetails": { "headerName": "X-Api-Key", "headerValue": "required" },
  "affectedCount": 3,
  "summary": "Adding required X-Api-Key header to all 3 endpoints."
}`;
}

export function debugMappingInstructions(namespace: string, context: string): string {
    return `You debug mock API endpoints.

WORKSPACE: ${namespace}

${context}

Find why the endpoint does not behave as the user expects: priority conflicts,
pattern mismatches, wrong paths or methods, template errors.

Answer with:
- **Problem**: one line
- **Root Cause**: what causes it
- **Solution**: the steps to fix it
- **Related Mappings**: names or IDs involved`;
}

export function explainMappingInstructions(namespace: string, context: string): string {
    return `You explain mock API endpoints in plain language.

WORKSPACE: ${namespace}

${context}

Describe what the endpoints do, how requests are matched, what they return,
and any delays, priorities or patterns worth knowing. Use short examples.`;
}

export function optimizeMappingInstructions(namespace: string, context: string): string {
    return `You review mock API configurations for improvements.

WORKSPACE: ${namespace}

${context}

Suggest concrete changes: priority ordering, simpler patterns, realistic delays,
clearer names and tags. Put each suggestion on its own line.`;
}

export function suggestResponseInstructions(): string {
    return `You design realistic API response bodies.

Use consistent field names and types, common conventions such as pagination
metadata, and a status code that fits.

Return ONLY valid JSON.`;
}

export function analyzePayloadInstructions(namespace: string, context: string): string {
    return `You check request payloads against mock API endpoint configuration.

WORKSPACE: ${namespace}

${context}

1. Identify the endpoint the user means
2. Extract the payload fields they send
3. Compare them with the fields the response templates read
4. Report case differences, typos, missing fields and template syntax errors

Keep it short unless the user asks for detail:
❌ **Issue**: one line
**Fix**: corrected field name or template
**Test**: a curl command that exercises the fix`;
}

export function analyzeCurlInstructions(namespace: string, context: string): string {
    return `You explain how a curl command will be matched by the mock API server.

WORKSPACE: ${namespace}

${context}

Parse the method, path, headers, query parameters and body of the command.
Say which endpoint matches (lowest priority value wins), which one would have
matched if something were different, and what the response will be.
Call out header or body patterns that fail.`;
}

export function checkEndpointMatchInstructions(namespace: string, context: string): string {
    return `You verify whether a request would match a specific mock API endpoint.

WORKSPACE: ${namespace}

${context}

Go through method, path, headers, query parameters and body patterns one by one.
Say ✅ or ❌ for each, then give the overall verdict and the change needed if it fails.`;
}

export function specEndpointInstructions(): string {
    return `You turn one OpenAPI operation and status code into a mock endpoint.

Respond with JSON only:
{
  "name": "Get User - Success",
  "priority": 5,
  "tags": ["users", "read"],
  "requiredHeaders": ["Authorization"],
  "responseBody": { "id": "{{request.pathSegments.[2]}}", "name": "Jane" },
  "fixedDelayMs": 150
}

responseBody is the JSON body for this status code. Use templating for values
taken from the request. requiredHeaders lists headers the operation requires.`;
}

export function followUpDetectionInstructions(recentTurns: string): string {
    return `Decide whether the new message continues the conversation below
(asks about the same endpoints) or starts a new topic.

RECENT CONVERSATION:
${recentTurns}

Answer with exactly one word: FOLLOWUP or INITIAL.`;
}

export function followUpAnswerInstructions(namespace: string, context: string): string {
    return `You answer a follow-up question about mock API endpoints that were
just discussed.

WORKSPACE: ${namespace}

${context}

Answer the question directly using the configuration above. Be concise.`;
}

export function queryFilterInstructions(listing: string): string {
    return `Pick the endpoints the user is asking about.

ENDPOINTS:
${listing}

Respond with the matching numbers separated by commas (for example "1,3"),
or NONE if nothing matches. No other text.`;
}
