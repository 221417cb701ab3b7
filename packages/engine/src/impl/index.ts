/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @switchyard/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export { MemoryAdapter, type SentMessage } from "./MemoryAdapter.js";
export { PollingAdapter } from "./PollingAdapter.js";
