/**
 * @fileoverview Built-in task handlers
 *
 * @module @mockpilot/engine/handlers
 */

import type { TaskHandler } from "../contracts/TaskHandler.js";
import { FollowUpQuestionHandler } from "./FollowUpQuestionHandler.js";
import { QueryMappingHandler } from "./QueryMappingHandler.js";
import { WorkspaceQueryHandler } from "./WorkspaceQueryHandler.js";
import { SpecImportHandler } from "./SpecImportHandler.js";

export { FollowUpQuestionHandler, mappingsDiscussed } from "./FollowUpQuestionHandler.js";
export { QueryMappingHandler, ALL_ENDPOINT_PHRASES, pickByIndexes, keywordMatches } from "./QueryMappingHandler.js";
export { WorkspaceQueryHandler } from "./WorkspaceQueryHandler.js";
export { SpecImportHandler } from "./SpecImportHandler.js";

/**
 * Fresh instances of every built-in handler.
 */
export function createDefaultHandlers(): TaskHandler[] {
    return [
        new FollowUpQuestionHandler(),
        new QueryMappingHandler(),
        new WorkspaceQueryHandler(),
        new SpecImportHandler(),
    ];
}
