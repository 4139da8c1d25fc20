/**
 * @fileoverview EventBus Contract
 *
 * Internal event flow of the assistant engine. Every request emits
 * lifecycle events that callers can subscribe to.
 *
 * Design decisions:
 * - Synchronous dispatch
 * - In-memory implementation, no external queue
 * - Ordering is preserved within a single event type
 *
 * @module @mockpilot/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 * All events must have a type and timestamp.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: EventType;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Trace ID for correlation */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Handler registry events.
 */
export type RegistryEventType =
    | "handler:registered"
    | "handler:unregistered";

/**
 * Event types emitted while a request moves through the pipeline.
 */
export type RequestEventType =
    | "request:received"
    | "request:classified"
    | "request:dispatched"
    | "request:handled"
    | "request:failed"
    | "request:confirmed";

/**
 * All known event types.
 */
export type EventType = RegistryEventType | RequestEventType;

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void | Promise<void>;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * Provides a simple pub/sub mechanism for internal events.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * // Subscribe to events
 * const sub = bus.subscribe("request:classified", (event) => {
 *     console.log("Classified as", event.data?.taskType);
 * });
 *
 * // Emit an event
 * bus.emit({
 *     type: "request:classified",
 *     timestamp: new Date().toISOString(),
 *     traceId: "tr_abc_123",
 *     data: { taskType: "LIST_MAPPINGS", source: "oracle" },
 * });
 *
 * // Unsubscribe when done
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     *
     * @param event - The event payload to emit
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     *
     * @param eventType - The event type to subscribe to
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for manual unsubscription if needed
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*" for all)
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param traceId - Optional trace ID
 * @returns Event payload with timestamp
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
