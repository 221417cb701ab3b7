/**
 * @fileoverview Adapter Contract
 *
 * An adapter connects the engine to one external protocol. It is a thin I/O
 * shim: the engine starts it, consumes its stream of normalized events and
 * calls `send` on behalf of nodes. Connection handling, parsing and
 * authentication all live behind this interface.
 *
 * @module @switchyard/engine/contracts/Adapter
 */

import type { BotEvent } from "./BotEvent.js";

/**
 * Where an outbound payload goes. Adapters decide what the string means
 * (a session, a channel, a user).
 */
export type SendTarget = string;

/**
 * Outbound content. Plain strings are text; objects are adapter-specific,
 * conventionally carrying a `text` field.
 */
export type OutboundPayload = string | Readonly<Record<string, unknown>>;

/**
 * Result of a send call.
 */
export interface DeliveryResult {
    /** Whether the adapter accepted the payload */
    readonly ok: boolean;

    /** Adapter-assigned id of the delivered message */
    readonly messageId?: string;

    /** Failure description when `ok` is false */
    readonly error?: string;
}

/**
 * Adapter interface implemented by protocol modules.
 *
 * @example
 * ```typescript
 * class LoopbackAdapter implements AdapterLike {
 *     readonly id = "loopback";
 *
 *     async *receive(signal: AbortSignal) {
 *         // yield createBotEvent(...) for each inbound message
 *     }
 *
 *     async send(target: SendTarget, payload: OutboundPayload) {
 *         return { ok: true };
 *     }
 * }
 * ```
 */
export interface AdapterLike {
    /** Unique identifier, referenced by `BotEvent.adapterId` */
    readonly id: string;

    /** Human-readable name */
    readonly name?: string;

    /**
     * Prepare connections. Called before every receive attempt, the first
     * one and each restart; a rejection counts as a failed attempt and is
     * retried.
     */
    start?(): Promise<void>;

    /**
     * Stream inbound events until `signal` aborts. Ending or throwing while
     * the signal is still live is treated as a crash.
     */
    receive(signal: AbortSignal): AsyncIterable<BotEvent>;

    /**
     * Deliver an outbound payload.
     */
    send(target: SendTarget, payload: OutboundPayload): Promise<DeliveryResult>;

    /**
     * Release connections. Called once for every `start()`: after an
     * attempt crashes, when the adapter fails for good and when the
     * supervisor stops.
     */
    stop?(): Promise<void>;
}

/**
 * Something that can route an outbound payload to an adapter by id.
 * Implemented by the adapter supervisor.
 */
export interface Outbound {
    send(adapterId: string, target: SendTarget, payload: OutboundPayload): Promise<DeliveryResult>;
}

/**
 * Supervision state of an adapter.
 */
export type AdapterState = "starting" | "running" | "backoff" | "failed" | "stopped";

/**
 * Read-only view of one supervised adapter.
 */
export interface AdapterHandle {
    readonly id: string;
    readonly state: AdapterState;

    /** Restarts performed after crashes */
    readonly restarts: number;

    /** Message of the most recent failure */
    readonly lastError?: string;

    /** ISO timestamp of the most recent successful `start()` */
    readonly startedAt?: string;
}

/**
 * Text carried by an outbound payload.
 */
export function getOutboundText(payload: OutboundPayload): string {
    if (typeof payload === "string") {
        return payload;
    }
    const text = payload.text;
    return typeof text === "string" ? text : JSON.stringify(payload);
}

/**
 * Type guard for adapter objects.
 */
export function isAdapterLike(obj: unknown): obj is AdapterLike {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "receive" in obj &&
        typeof obj.receive === "function" &&
        "send" in obj &&
        typeof obj.send === "function"
    );
}
