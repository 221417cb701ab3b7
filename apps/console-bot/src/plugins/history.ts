/**
 * @fileoverview History plugin
 *
 * Records every message into the {@link HistoryStore} before any other
 * node runs, and answers /history and /history.clear for the current
 * session.
 *
 * @module plugins/history
 */

import {
    CurrentEvent,
    Reply,
    command,
    defineNode,
    definePlugin,
    getSessionId,
    isMessageEvent,
    type BotEvent,
    type PluginDefinition,
} from "@switchyard/engine";
import type { HistoryStore } from "../services/HistoryStore.js";

export interface HistoryPluginOptions {
    readonly store: HistoryStore;

    /** Entries shown by /history without a count (default: 10) */
    readonly limit?: number;
}

/** Largest count /history accepts */
export const MAX_HISTORY_LIMIT = 50;

/**
 * Session key history is stored under.
 */
export function historySession(event: BotEvent): string {
    return getSessionId(event) ?? event.adapterId;
}

const showCommand = command("history");

/**
 * Create the history plugin.
 */
export function createHistoryPlugin(options: HistoryPluginOptions): PluginDefinition {
    const { store } = options;
    const defaultLimit = options.limit ?? 10;

    const record = defineNode({
        id        : "history.record",
        priority  : 0,
        eventTypes: ["message"],
        needs     : { event: CurrentEvent },
        handle({ event }) {
            if (!isMessageEvent(event) || event.payload.text === "") {
                return;
            }

            store.append({
                sequence : event.sequence,
                adapterId: event.adapterId,
                sessionId: historySession(event),
                userId   : event.payload.userId,
                text     : event.payload.text,
                createdAt: new Date(event.timestamp),
            });
        },
    });

    const show = defineNode({
        id         : "history.show",
        description: "/history [count] - show recent messages of this conversation",
        priority   : 10,
        block      : true,
        rule       : showCommand,
        needs      : { event: CurrentEvent, match: showCommand.match, reply: Reply },
        async handle({ event, match, reply }) {
            const args = match?.args ?? "";
            const limit = args === "" ? defaultLimit : Number(args);

            if (!Number.isInteger(limit) || limit < 1 || limit > MAX_HISTORY_LIMIT) {
                await reply(`Usage: /history [1-${MAX_HISTORY_LIMIT}]`);
                return;
            }

            const entries = store.recent({
                sessionId     : historySession(event),
                limit,
                beforeSequence: event.sequence,
            });

            await reply(entries.length === 0
                ? "No history yet."
                : entries.map((entry) => `${entry.userId}: ${entry.text}`).join("\n"));
        },
    });

    const clear = defineNode({
        id         : "history.clear",
        description: "/history.clear - forget this conversation",
        priority   : 10,
        block      : true,
        rule       : command("history.clear"),
        needs      : { event: CurrentEvent, reply: Reply },
        async handle({ event, reply }) {
            const removed = store.clear(historySession(event));
            await reply(`Forgot ${removed} messages.`);
        },
    });

    return definePlugin({
        id         : "history",
        name       : "History",
        description: "Message history per conversation",
        nodes      : [record, show, clear],
    });
}
