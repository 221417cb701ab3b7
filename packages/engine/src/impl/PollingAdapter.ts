/**
 * @fileoverview Polling adapter base
 *
 * Base class for adapters whose source has no push channel: a database
 * table, a REST endpoint, a mailbox. Subclasses implement `poll`; the base
 * turns it into an event stream, polling once immediately and then every
 * `pollingInterval` milliseconds.
 *
 * An error thrown by `poll` ends the stream with that error, so the
 * supervisor restarts the adapter with backoff.
 *
 * @module @switchyard/engine/impl/PollingAdapter
 */

import type {
    AdapterLike,
    DeliveryResult,
    OutboundPayload,
    SendTarget,
} from "../contracts/Adapter.js";
import type { BotEvent } from "../contracts/BotEvent.js";
import { sleep } from "../utils/timing.js";

/**
 * PollingAdapter - pull-based adapter.
 *
 * @example
 * ```typescript
 * class InboxAdapter extends PollingAdapter {
 *     readonly id = "inbox";
 *     protected readonly pollingInterval = 30000;
 *
 *     protected async poll(): Promise<BotEvent[]> {
 *         const rows = await this.db.unread({ limit: 10 });
 *         return rows.map((row) => createBotEvent({ ... }));
 *     }
 *
 *     async send() {
 *         return { ok: false, error: "inbox is read-only" };
 *     }
 * }
 * ```
 */
export abstract class PollingAdapter implements AdapterLike {
    abstract readonly id: string;

    /** Delay between polls in milliseconds */
    protected abstract readonly pollingInterval: number;

    /**
     * Fetch whatever arrived since the previous poll.
     */
    protected abstract poll(signal: AbortSignal): Promise<readonly BotEvent[]>;

    abstract send(target: SendTarget, payload: OutboundPayload): Promise<DeliveryResult>;

    async *receive(signal: AbortSignal): AsyncGenerator<BotEvent> {
        while (!signal.aborted) {
            const events = await this.poll(signal);

            for (const event of events) {
                if (signal.aborted) {
                    return;
                }
                yield event;
            }

            await sleep(this.pollingInterval, signal);
        }
    }
}
