/**
 * @fileoverview In-memory adapter
 *
 * An adapter fed by method calls instead of a network connection. Used by
 * tests and by embedders that produce events themselves.
 *
 * @module @switchyard/engine/impl/MemoryAdapter
 */

import type {
    AdapterLike,
    DeliveryResult,
    OutboundPayload,
    SendTarget,
} from "../contracts/Adapter.js";
import type { BotEvent, EventKind, MessagePayload } from "../contracts/BotEvent.js";
import { createBotEvent } from "../contracts/BotEvent.js";

/**
 * A payload recorded by {@link MemoryAdapter.send}.
 */
export interface SentMessage {
    readonly target: SendTarget;
    readonly payload: OutboundPayload;
}

type QueueItem =
    | { readonly kind: "event"; readonly event: BotEvent }
    | { readonly kind: "error"; readonly error: Error }
    | { readonly kind: "end" };

/**
 * MemoryAdapter - push events in, read replies out.
 *
 * Every call to `receive` starts a fresh stream; items pushed while no
 * stream is open wait in the queue.
 *
 * @example
 * ```typescript
 * const adapter = new MemoryAdapter("test");
 * bot.addAdapter(adapter);
 * await bot.start();
 *
 * adapter.message({ text: "/ping", userId: "alice", sessionId: "room" });
 * // ...later
 * expect(adapter.sent).toEqual([{ target: "room", payload: "pong" }]);
 * ```
 */
export class MemoryAdapter implements AdapterLike {
    readonly name = "Memory";

    /** Everything passed to `send`, in order */
    readonly sent: SentMessage[] = [];

    /** Number of `start` calls */
    starts = 0;

    /** Number of `stop` calls */
    stops = 0;

    private readonly queue: QueueItem[] = [];
    private wake: (() => void) | null = null;

    constructor(readonly id: string = "memory") {}

    async start(): Promise<void> {
        this.starts += 1;
    }

    async stop(): Promise<void> {
        this.stops += 1;
    }

    /**
     * Queue an event of any kind.
     */
    emit(type: EventKind, payload: object, name?: string): BotEvent {
        const event = createBotEvent({ type, name, adapterId: this.id, payload });
        this.push({ kind: "event", event });
        return event;
    }

    /**
     * Queue a message event.
     */
    message(payload: MessagePayload): BotEvent<MessagePayload> {
        const event = createBotEvent({ type: "message", adapterId: this.id, payload });
        this.push({ kind: "event", event });
        return event;
    }

    /**
     * Make the open stream throw, as a dropped connection would.
     */
    fail(error: Error): void {
        this.push({ kind: "error", error });
    }

    /**
     * Make the open stream end.
     */
    end(): void {
        this.push({ kind: "end" });
    }

    async send(target: SendTarget, payload: OutboundPayload): Promise<DeliveryResult> {
        this.sent.push({ target, payload });
        return { ok: true, messageId: String(this.sent.length) };
    }

    async *receive(signal: AbortSignal): AsyncGenerator<BotEvent> {
        const onAbort = (): void => this.notify();
        signal.addEventListener("abort", onAbort, { once: true });

        try {
            while (!signal.aborted) {
                const item = this.queue.shift();
                if (!item) {
                    await new Promise<void>((resolve) => {
                        this.wake = resolve;
                    });
                    continue;
                }

                if (item.kind === "error") {
                    throw item.error;
                }
                if (item.kind === "end") {
                    return;
                }
                yield item.event;
            }
        }
        finally {
            signal.removeEventListener("abort", onAbort);
        }
    }

    private push(item: QueueItem): void {
        this.queue.push(item);
        this.notify();
    }

    private notify(): void {
        const wake = this.wake;
        this.wake = null;
        wake?.();
    }
}
