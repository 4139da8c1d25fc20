/**
 * @fileoverview Spec import handler
 *
 * Claims GENERATE_FROM_OPENAPI requests that carry a document; without
 * one the built-in action explains what to paste.
 *
 * @module @mockpilot/engine/handlers/SpecImportHandler
 */

import type { TaskKind } from "../contracts/TaskKind.js";
import type { TaskContext, TaskHandler } from "../contracts/TaskHandler.js";
import type { AssistantResponse } from "../contracts/Response.js";
import { extractSpecDocument, generateFromOpenApi } from "../actions/specImport.js";

export class SpecImportHandler implements TaskHandler {
    readonly id          = "spec-import";
    readonly name        = "OpenAPI Import Handler";
    readonly description = "Generates one mapping per operation and status code of an OpenAPI document";
    readonly priority    = 10;

    readonly supportedKinds: readonly TaskKind[] = ["GENERATE_FROM_OPENAPI"];

    canHandle({ request }: TaskContext): boolean {
        return extractSpecDocument(request.userPrompt) !== null;
    }

    handle(ctx: TaskContext): Promise<AssistantResponse> {
        return generateFromOpenApi(ctx);
    }
}
