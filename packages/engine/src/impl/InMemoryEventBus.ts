/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous in-process bus used as the default observability channel.
 *
 * @module @switchyard/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    BusEvent,
    BusHandler,
    BusEventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { defaultLogger } from "../contracts/Logger.js";
import { describeError } from "../errors/EngineErrors.js";

/**
 * In-memory EventBus implementation.
 *
 * - Handlers run synchronously in subscription order, typed handlers
 *   before wildcard ("*") handlers
 * - A throwing or rejecting handler is logged and never reaches the emitter
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("adapter:failed", (event) => {
 *     console.log("Adapter down:", event.data);
 * });
 *
 * bus.emit(createBusEvent("adapter:failed", { adapterId: "console" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<BusHandler>> = new Map();

    constructor(private readonly logger: EngineLogger = defaultLogger) {}

    emit(event: BusEvent): void {
        this.deliver(event, this.handlers.get(event.type));
        this.deliver(event, this.handlers.get("*"));
    }

    subscribe(eventType: BusEventType | "*", handler: BusHandler): Subscription {
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

    once(eventType: BusEventType, handler: BusHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            return handler(event);
        });
        return subscription;
    }

    clear(eventType?: BusEventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers subscribed to a type. Useful for testing.
     */
    handlerCount(eventType: BusEventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private deliver(event: BusEvent, handlers: Set<BusHandler> | undefined): void {
        if (!handlers) {
            return;
        }

        // Copy so that once() handlers can unsubscribe while we iterate
        for (const handler of [...handlers]) {
            try {
                const result = handler(event);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => this.report(event, error));
                }
            }
            catch (error) {
                this.report(event, error);
            }
        }
    }

    private report(event: BusEvent, error: unknown): void {
        this.logger.error("EventBus handler error", {
            type : event.type,
            error: describeError(error),
        });
    }
}
