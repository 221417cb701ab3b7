/**
 * @fileoverview BotEvent Contract
 *
 * The normalized, immutable unit of work produced by adapters and consumed
 * by the dispatcher.
 *
 * Design decisions:
 * - Payloads are opaque to the engine; accessors read the well-known
 *   {@link MessagePayload} shape when it is present
 * - Events are frozen at creation and never mutated afterwards
 * - Sequence numbers are process-wide and strictly increasing
 *
 * @module @switchyard/engine/contracts/BotEvent
 */

/**
 * Event discriminator. The four well-known kinds are listed for editor
 * completion; adapters may introduce their own.
 */
export type EventKind = "message" | "notice" | "request" | "meta" | (string & {});

/**
 * Normalized event.
 *
 * @template TPayload - Adapter-specific payload shape
 */
export interface BotEvent<TPayload extends object = object> {
    /** Event kind, e.g. "message" */
    readonly type: EventKind;

    /** Optional sub-kind, e.g. "private" or "heartbeat" */
    readonly name?: string;

    /** Id of the adapter that produced the event */
    readonly adapterId: string;

    /** Opaque adapter payload */
    readonly payload: TPayload;

    /** Monotonic sequence id, unique within the process */
    readonly sequence: number;

    /** ISO timestamp of creation */
    readonly timestamp: string;
}

/**
 * Fields accepted by {@link createBotEvent}.
 */
export interface BotEventInit<TPayload extends object> {
    readonly type: EventKind;
    readonly name?: string;
    readonly adapterId: string;
    readonly payload: TPayload;
    readonly timestamp?: Date;
}

/**
 * Payload shape for chat messages. Adapters that produce message events
 * should use (or extend) it so that built-in rules and accessors work.
 */
export interface MessagePayload {
    /** Plain text of the message */
    readonly text: string;

    /** Sender identifier */
    readonly userId: string;

    /** Conversation identifier replies are sent to */
    readonly sessionId: string;

    /** Whether the message addresses the bot directly */
    readonly toMe?: boolean;
}

let lastSequence = 0;

/**
 * Create a frozen event with the next sequence number.
 *
 * @example
 * ```typescript
 * const event = createBotEvent({
 *     type     : "message",
 *     adapterId: "console",
 *     payload  : { text: "/ping", userId: "alice", sessionId: "console" },
 * });
 * ```
 */
export function createBotEvent<TPayload extends object>(init: BotEventInit<TPayload>): BotEvent<TPayload> {
    lastSequence += 1;

    return Object.freeze({
        type     : init.type,
        name     : init.name,
        adapterId: init.adapterId,
        payload  : Object.freeze({ ...init.payload }),
        sequence : lastSequence,
        timestamp: (init.timestamp ?? new Date()).toISOString(),
    });
}

/**
 * Type guard for the {@link MessagePayload} shape.
 */
export function isMessagePayload(value: unknown): value is MessagePayload {
    return (
        typeof value === "object" &&
        value !== null &&
        "text" in value &&
        typeof value.text === "string" &&
        "userId" in value &&
        typeof value.userId === "string" &&
        "sessionId" in value &&
        typeof value.sessionId === "string"
    );
}

/**
 * Type guard for message events carrying a {@link MessagePayload}.
 */
export function isMessageEvent(event: BotEvent): event is BotEvent<MessagePayload> {
    return event.type === "message" && isMessagePayload(event.payload);
}

/**
 * Plain text of a message event, or an empty string for anything else.
 */
export function getPlainText(event: BotEvent): string {
    return isMessagePayload(event.payload) ? event.payload.text : "";
}

/**
 * Sender of the event, when the payload carries one.
 */
export function getUserId(event: BotEvent): string | undefined {
    return isMessagePayload(event.payload) ? event.payload.userId : undefined;
}

/**
 * Conversation the event belongs to, when the payload carries one.
 */
export function getSessionId(event: BotEvent): string | undefined {
    return isMessagePayload(event.payload) ? event.payload.sessionId : undefined;
}

/**
 * Whether a message addresses the bot directly.
 */
export function isToMe(event: BotEvent): boolean {
    return isMessagePayload(event.payload) && event.payload.toMe === true;
}

/**
 * Where replies to the event go: its session, else its sender, else "".
 */
export function getReplyTarget(event: BotEvent): string {
    return getSessionId(event) ?? getUserId(event) ?? "";
}
