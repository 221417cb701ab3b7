/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces and types shared by the engine, adapters and plugins.
 *
 * @module @switchyard/engine/contracts
 */

// Events
export type {
    BotEvent,
    BotEventInit,
    EventKind,
    MessagePayload,
} from "./BotEvent.js";
export {
    createBotEvent,
    isMessagePayload,
    isMessageEvent,
    getPlainText,
    getUserId,
    getSessionId,
    getReplyTarget,
    isToMe,
} from "./BotEvent.js";

// Adapters
export type {
    AdapterLike,
    AdapterHandle,
    AdapterState,
    DeliveryResult,
    Outbound,
    OutboundPayload,
    SendTarget,
} from "./Adapter.js";
export { getOutboundText, isAdapterLike } from "./Adapter.js";

// Dependencies
export type {
    DependencyKind,
    DependencyMap,
    DependencyOptions,
    DependencyResolver,
    NoDependencies,
    NodeScope,
    ProviderScope,
    Provision,
    Resolved,
    ResolveFn,
    ResourceOptions,
    ScopeServices,
} from "./Dependency.js";
export {
    Dependency,
    defineDependency,
    defineResource,
    resolveNeeds,
} from "./Dependency.js";

// Predicates
export type { Predicate, PredicateOptions } from "./Predicate.js";
export { definePredicate, isPredicate } from "./Predicate.js";

// Nodes
export type {
    NodeControl,
    NodeDefinition,
    RegisteredNode,
} from "./Node.js";
export {
    DEFAULT_NODE_PRIORITY,
    compareNodes,
    defineNode,
    isNodeDefinition,
} from "./Node.js";

// Plugins
export type { PluginDefinition, PluginSource } from "./Plugin.js";
export { definePlugin, isPluginDefinition } from "./Plugin.js";

// EventBus
export type {
    AdapterEventType,
    BusEvent,
    BusEventType,
    BusHandler,
    DispatchEventType,
    EventBus,
    LifecycleEventType,
    RegistryEventType,
    Subscription,
} from "./EventBus.js";
export { createBusEvent } from "./EventBus.js";

// Logging
export type {
    ConsoleLoggerOptions,
    EngineLogger,
    LogLevel,
} from "./Logger.js";
export {
    LOG_LEVELS,
    createConsoleLogger,
    createScopedLogger,
    defaultLogger,
    isLogLevel,
} from "./Logger.js";
