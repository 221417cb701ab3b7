/**
 * @fileoverview Console adapter
 *
 * Reads lines from an input stream (stdin by default) and turns each
 * non-empty line into a message event. Replies are written to an output
 * stream prefixed with the bot name.
 *
 * A line starting with "@<botName>" addresses the bot: the mention is
 * stripped and the event is marked `toMe`.
 *
 * @module adapters/ConsoleAdapter
 */

import { createInterface } from "readline";
import type { Readable, Writable } from "stream";
import {
    createBotEvent,
    getOutboundText,
    type AdapterLike,
    type BotEvent,
    type DeliveryResult,
    type MessagePayload,
    type OutboundPayload,
    type SendTarget,
} from "@switchyard/engine";

/**
 * Console adapter configuration.
 */
export interface ConsoleAdapterOptions {
    /** Adapter id (default: "console") */
    readonly id?: string;

    /** Name users mention to address the bot (default: "switchyard") */
    readonly botName?: string;

    /** Sender id given to every line (default: "console") */
    readonly userId?: string;

    /** Session id given to every line (default: "console") */
    readonly sessionId?: string;

    readonly input?: Readable;
    readonly output?: Writable;
}

/**
 * Split a leading "@botName" mention off a line.
 *
 * @returns The remaining text and whether the mention was present
 */
export function stripMention(line: string, botName: string): { text: string; toMe: boolean } {
    const mention = `@${botName}`;
    const trimmed = line.trim();

    if (trimmed === mention || trimmed.startsWith(`${mention} `)) {
        return { text: trimmed.slice(mention.length).trim(), toMe: true };
    }

    return { text: trimmed, toMe: false };
}

/**
 * ConsoleAdapter - one terminal user chatting with the bot.
 */
export class ConsoleAdapter implements AdapterLike {
    readonly id: string;

    private readonly botName: string;
    private readonly userId: string;
    private readonly sessionId: string;
    private readonly input: Readable;
    private readonly output: Writable;
    private sentCount = 0;

    constructor(options: ConsoleAdapterOptions = {}) {
        this.id = options.id ?? "console";
        this.botName = options.botName ?? "switchyard";
        this.userId = options.userId ?? "console";
        this.sessionId = options.sessionId ?? "console";
        this.input = options.input ?? process.stdin;
        this.output = options.output ?? process.stdout;
    }

    /**
     * Build the event for one input line, or null for a blank line.
     */
    toEvent(line: string): BotEvent<MessagePayload> | null {
        const { text, toMe } = stripMention(line, this.botName);
        if (text === "" && !toMe) {
            return null;
        }

        return createBotEvent({
            type     : "message",
            name     : "private",
            adapterId: this.id,
            payload  : {
                text,
                userId   : this.userId,
                sessionId: this.sessionId,
                toMe,
            },
        });
    }

    async *receive(signal: AbortSignal): AsyncGenerator<BotEvent> {
        const lines = createInterface({ input: this.input, crlfDelay: Infinity, terminal: false });
        const close = (): void => lines.close();
        signal.addEventListener("abort", close, { once: true });

        try {
            for await (const line of lines) {
                if (signal.aborted) {
                    return;
                }

                const event = this.toEvent(line);
                if (event) {
                    yield event;
                }
            }
        }
        finally {
            signal.removeEventListener("abort", close);
            lines.close();
        }
    }

    async send(target: SendTarget, payload: OutboundPayload): Promise<DeliveryResult> {
        const text = getOutboundText(payload);
        const prefix = target === this.sessionId ? `[${this.botName}]` : `[${this.botName} -> ${target}]`;

        this.output.write(`${prefix} ${text}\n`);
        this.sentCount += 1;

        return { ok: true, messageId: String(this.sentCount) };
    }
}
