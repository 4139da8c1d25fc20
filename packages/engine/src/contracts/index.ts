/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces and types that define the assistant engine contract.
 *
 * @module @mockpilot/engine/contracts
 */

// Task kinds
export type { TaskKind } from "./TaskKind.js";
export { TASK_KINDS, DEFAULT_TASK_KIND, isTaskKind } from "./TaskKind.js";

// Mapping model
export type {
    PathMatchType,
    ParameterMatchType,
    BodyMatchType,
    EndpointType,
    DelayMode,
    PathPattern,
    ParameterPattern,
    BodyPattern,
    RequestMatcher,
    RequestIdResponse,
    ConditionalResponses,
    ResponseDefinition,
    ErrorResponse,
    DelayDefinition,
    Mapping,
} from "./Mapping.js";
export {
    PATH_MATCH_TYPES,
    PARAMETER_MATCH_TYPES,
    BODY_MATCH_TYPES,
    ENDPOINT_TYPES,
    DELAY_MODES,
    DEFAULT_MAPPING_PRIORITY,
    DEFAULT_RESPONSE_STATUS,
} from "./Mapping.js";

// Workspaces and users
export type { Workspace, UserAccount } from "./Workspace.js";
export { ADMIN_USER_ID, workspaceLabel, fullName } from "./Workspace.js";

// Requests and responses
export type { TurnRole, Turn, AssistantRequest, ResolvedRequest } from "./Request.js";
export type { ResponseAction, AssistantResponse } from "./Response.js";
export { failureResponse } from "./Response.js";

// Errors
export type { AssistantErrorKind } from "./errors.js";
export {
    AssistantError,
    OracleFailure,
    ParseFailure,
    TargetUnresolved,
    ValidationConflict,
    responseFromError,
} from "./errors.js";

// Collaborators
export type { MappingStore, WorkspaceStore, UserStore, EntityStore } from "./EntityStore.js";
export type { Oracle, OracleCallOptions } from "./Oracle.js";
export type { Logger } from "./Logger.js";
export { consoleLogger, silentLogger, errorMessage } from "./Logger.js";
export type { AssistantSettings } from "./Settings.js";
export { DEFAULT_SETTINGS, createSettings } from "./Settings.js";
export type { PasswordHasher } from "./PasswordHasher.js";

// Task handler contract
export type { TaskServices, TaskContext, TaskHandler } from "./TaskHandler.js";
export {
    DEFAULT_HANDLER_PRIORITY,
    handlerPriority,
    supportsKind,
    isTaskHandler,
} from "./TaskHandler.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    RegistryEventType,
    RequestEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
