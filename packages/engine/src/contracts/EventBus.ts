/**
 * @fileoverview EventBus Contract
 *
 * The engine's observability channel. Lifecycle transitions, dispatch
 * outcomes and every contained failure are published here so that an
 * embedding application can log, count or alert on them.
 *
 * Not to be confused with {@link BotEvent}: bus messages describe what the
 * engine did, bot events are the work it does.
 *
 * @module @switchyard/engine/contracts/EventBus
 */

/**
 * Bus message base interface.
 */
export interface BusEvent {
    /** Bus event type, e.g. "node:failed" */
    readonly type: string;

    /** ISO timestamp when the message was emitted */
    readonly timestamp: string;

    /** Trace ID of the dispatch cycle, when there is one */
    readonly traceId?: string;

    /** Type-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Bot lifecycle.
 */
export type LifecycleEventType =
    | "bot:starting"
    | "bot:started"
    | "bot:stopping"
    | "bot:stopped"
    | "bot:error";

/**
 * Dispatch cycle progress.
 */
export type DispatchEventType =
    | "event:received"
    | "event:consumed"
    | "event:dropped"
    | "event:dispatched"
    | "node:completed"
    | "node:skipped"
    | "node:failed"
    | "node:cancelled"
    | "hook:failed"
    | "dependency:teardownFailed";

/**
 * Adapter supervision.
 */
export type AdapterEventType =
    | "adapter:started"
    | "adapter:restarting"
    | "adapter:failed"
    | "adapter:stopped"
    | "adapter:sendFailed";

/**
 * Registry mutations.
 */
export type RegistryEventType =
    | "registry:swapped"
    | "registry:rejected";

/**
 * All known bus event types.
 */
export type BusEventType =
    | LifecycleEventType
    | DispatchEventType
    | AdapterEventType
    | RegistryEventType
    | (string & {});

/**
 * Handler signature. Returned promises are observed for rejection.
 */
export type BusHandler<T extends BusEvent = BusEvent> = (event: T) => void | Promise<void>;

/**
 * Subscription handle returned when subscribing.
 */
export interface Subscription {
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("node:failed", (event) => {
 *     console.log("Node failed:", event.data);
 * });
 *
 * bus.emit(createBusEvent("node:failed", { nodeId: "ping" }));
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit a message to all subscribers of its type and to wildcard
     * subscribers.
     */
    emit(event: BusEvent): void;

    /**
     * Subscribe to one type, or to everything with "*".
     */
    subscribe(eventType: BusEventType | "*", handler: BusHandler): Subscription;

    /**
     * Subscribe for the next message of a type only.
     */
    once(eventType: BusEventType, handler: BusHandler): Subscription;

    /**
     * Remove subscriptions for one type, or all of them.
     */
    clear(eventType?: BusEventType | "*"): void;
}

/**
 * Create a bus message stamped with the current time.
 *
 * @param type - Bus event type
 * @param data - Optional data
 * @param traceId - Optional trace ID of the dispatch cycle
 */
export function createBusEvent(
    type: BusEventType,
    data?: Record<string, unknown>,
    traceId?: string
): BusEvent {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
