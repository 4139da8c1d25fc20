/**
 * @fileoverview Built-in actions
 *
 * The fallback behavior for every task kind, used when no registered
 * handler claims the request.
 *
 * @module @mockpilot/engine/actions/builtinActions
 */

import type { TaskKind } from "../contracts/TaskKind.js";
import type { TaskContext } from "../contracts/TaskHandler.js";
import type { AssistantResponse } from "../contracts/Response.js";
import { failureResponse } from "../contracts/Response.js";
import { createMapping, modifyMapping, deleteMapping, moveMapping, listMappings } from "./mappingActions.js";
import { bulkUpdateMappings } from "./bulkUpdate.js";
import {
    explainMapping,
    debugMapping,
    optimizeMappings,
    suggestResponse,
    analyzePayload,
    analyzeCurl,
    checkEndpointMatch,
} from "./analysisActions.js";
import { createNamespace, modifyNamespace, deleteNamespace, listNamespaces } from "./workspaceActions.js";
import { createUser, modifyUser, deleteUser, listUsers, setUserStatus, assignNamespace } from "./userActions.js";
import { generateFromOpenApi } from "./specImport.js";

export function runBuiltinAction(kind: TaskKind, ctx: TaskContext): Promise<AssistantResponse> {
    switch (kind) {
        case "CREATE_MAPPING":        return createMapping(ctx);
        case "MODIFY_MAPPING":        return modifyMapping(ctx);
        case "DELETE_MAPPING":        return deleteMapping(ctx);
        case "MOVE_MAPPING":          return moveMapping(ctx);
        case "BULK_UPDATE_MAPPING":   return bulkUpdateMappings(ctx);
        case "LIST_MAPPINGS":         return listMappings(ctx);
        case "EXPLAIN_MAPPING":       return explainMapping(ctx);
        case "DEBUG_MAPPING":         return debugMapping(ctx);
        case "OPTIMIZE_MAPPING":      return optimizeMappings(ctx);
        case "SUGGEST_RESPONSE":      return suggestResponse(ctx);
        case "GENERATE_FROM_OPENAPI": return generateFromOpenApi(ctx);
        case "ANALYZE_PAYLOAD":       return analyzePayload(ctx);
        case "ANALYZE_CURL":          return analyzeCurl(ctx);
        case "CHECK_ENDPOINT_MATCH":  return checkEndpointMatch(ctx);
        case "CREATE_NAMESPACE":      return createNamespace(ctx);
        case "MODIFY_NAMESPACE":      return modifyNamespace(ctx);
        case "DELETE_NAMESPACE":      return deleteNamespace(ctx);
        case "LIST_NAMESPACES":       return listNamespaces(ctx);
        case "CREATE_USER":           return createUser(ctx);
        case "MODIFY_USER":           return modifyUser(ctx);
        case "DELETE_USER":           return deleteUser(ctx);
        case "LIST_USERS":            return listUsers(ctx);
        case "ENABLE_DISABLE_USER":   return setUserStatus(ctx);
        case "ASSIGN_NAMESPACE":      return assignNamespace(ctx);
        default: {
            const unsupported: never = kind;
            return Promise.resolve(failureResponse(`Unsupported task type: ${String(unsupported)}`));
        }
    }
}
