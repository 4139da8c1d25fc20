/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @mockpilot/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export { InMemoryEntityStore, type InMemoryEntityStoreSeed } from "./InMemoryEntityStore.js";
