/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A synchronous, in-process event bus for engine lifecycle events.
 *
 * @module @mockpilot/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { Logger } from "../contracts/Logger.js";
import { consoleLogger, errorMessage } from "../contracts/Logger.js";

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - A failing or rejecting handler is logged and never reaches the emitter
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("request:handled", (event) => {
 *     console.log("Handled:", event.data);
 * });
 *
 * bus.emit(createEvent("request:handled", { success: true }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<EventType | "*", Set<EventHandler>> = new Map();

    constructor(private readonly logger: Logger = consoleLogger) {}

    /**
     * Emit an event to all subscribers.
     *
     * Handlers for the event's type run first, then "*" handlers.
     *
     * @param event - The event payload to emit
     */
    emit(event: EventPayload): void {
        for (const key of [event.type, "*"] as const) {
            const handlers = this.handlers.get(key);
            if (!handlers) {
                continue;
            }
            for (const handler of [...handlers]) {
                this.invoke(handler, event, key);
            }
        }
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            return handler(event);
        });
        return subscription;
    }

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*" for all, undefined clears everything)
     */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers for an event type.
     * Useful for testing.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private invoke(handler: EventHandler, event: EventPayload, key: EventType | "*"): void {
        const report = (error: unknown): void => {
            this.logger.error("EventBus handler error", {
                eventType   : event.type,
                subscription: key,
                error       : errorMessage(error),
            });
        };

        try {
            const result = handler(event);
            if (result instanceof Promise) {
                result.catch(report);
            }
        }
        catch (error) {
            report(error);
        }
    }
}
