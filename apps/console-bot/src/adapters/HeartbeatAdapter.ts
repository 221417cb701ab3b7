/**
 * @fileoverview Heartbeat adapter
 *
 * Emits a `meta`/`heartbeat` event every interval. Nodes use it for
 * periodic work and the core plugin reports the last beat in /status.
 *
 * @module adapters/HeartbeatAdapter
 */

import {
    PollingAdapter,
    createBotEvent,
    type BotEvent,
    type DeliveryResult,
} from "@switchyard/engine";

/**
 * Payload of a heartbeat event.
 */
export interface HeartbeatPayload {
    /** Beats since the adapter was created, starting at 1 */
    readonly beat: number;

    /** Milliseconds since the adapter was created */
    readonly uptimeMs: number;
}

export interface HeartbeatAdapterOptions {
    readonly id?: string;

    /** Delay between beats (default: 60000) */
    readonly intervalMs?: number;

    /** Clock (default: Date.now) */
    readonly now?: () => number;
}

/**
 * Type guard for heartbeat payloads.
 */
export function isHeartbeatPayload(value: unknown): value is HeartbeatPayload {
    return (
        typeof value === "object" &&
        value !== null &&
        "beat" in value &&
        typeof value.beat === "number" &&
        "uptimeMs" in value &&
        typeof value.uptimeMs === "number"
    );
}

export class HeartbeatAdapter extends PollingAdapter {
    readonly id: string;
    protected readonly pollingInterval: number;

    private readonly now: () => number;
    private readonly createdAt: number;
    private beats = 0;

    constructor(options: HeartbeatAdapterOptions = {}) {
        super();
        this.id = options.id ?? "heartbeat";
        this.pollingInterval = options.intervalMs ?? 60000;
        this.now = options.now ?? Date.now;
        this.createdAt = this.now();
    }

    protected async poll(): Promise<readonly BotEvent[]> {
        this.beats += 1;

        return [createBotEvent<HeartbeatPayload>({
            type     : "meta",
            name     : "heartbeat",
            adapterId: this.id,
            payload  : {
                beat    : this.beats,
                uptimeMs: this.now() - this.createdAt,
            },
        })];
    }

    async send(): Promise<DeliveryResult> {
        return { ok: false, error: "heartbeat adapter cannot send" };
    }
}
