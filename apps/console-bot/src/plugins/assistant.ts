/**
 * @fileoverview Assistant plugin
 *
 * Answers messages addressed to the bot that no command handled, using a
 * {@link ChatModel}. Recent history of the conversation is sent along as
 * context and the answer is stored back into it.
 *
 * Runs late (priority 90) so that commands and user plugins win.
 *
 * @module plugins/assistant
 */

import {
    CurrentEvent,
    EventSignal,
    PlainText,
    Reply,
    defineNode,
    definePlugin,
    describeError,
    not,
    rule,
    startsWith,
    toMe,
    type PluginDefinition,
} from "@switchyard/engine";
import type { HistoryStore } from "../services/HistoryStore.js";
import type { ChatMessage, ChatModel } from "../services/OpenAIChatModel.js";
import { historySession } from "./history.js";

export interface AssistantPluginOptions {
    readonly model: ChatModel;

    /** Conversation context source; answers are appended to it */
    readonly history?: HistoryStore;

    /** User id the bot's answers are stored under */
    readonly botName: string;

    readonly systemPrompt: string;

    /** History entries sent as context (default: 10) */
    readonly contextMessages?: number;
}

/** Reply sent when the model fails */
export const ASSISTANT_UNAVAILABLE = "Sorry, I cannot answer right now.";

/**
 * Create the assistant plugin.
 */
export function createAssistantPlugin(options: AssistantPluginOptions): PluginDefinition {
    const { model, history, botName } = options;
    const contextMessages = options.contextMessages ?? 10;

    const chat = defineNode({
        id         : "assistant.chat",
        description: `@${botName} <question> - ask the assistant`,
        priority   : 90,
        block      : true,
        eventTypes : ["message"],
        rule       : rule(toMe(), not(startsWith("/"))),
        needs      : { event: CurrentEvent, text: PlainText, signal: EventSignal, reply: Reply },
        async handle({ event, text, signal, reply }, control) {
            if (text === "") {
                await reply("Yes?");
                return;
            }

            const sessionId = historySession(event);
            const context = history && contextMessages > 0
                ? history.recent({ sessionId, limit: contextMessages, beforeSequence: event.sequence })
                : [];

            const messages: ChatMessage[] = [
                { role: "system", content: options.systemPrompt },
                ...context.map((entry): ChatMessage => ({
                    role   : entry.fromBot ? "assistant" : "user",
                    content: entry.text,
                })),
                { role: "user", content: text },
            ];

            let answer: string;
            try {
                answer = await model.complete(messages, { signal });
            }
            catch (error) {
                if (signal.aborted) {
                    throw error;
                }
                control.logger.warn("Chat completion failed", {
                    model: model.id,
                    error: describeError(error),
                });
                await reply(ASSISTANT_UNAVAILABLE);
                return;
            }

            await reply(answer);
            history?.append({
                sequence : event.sequence,
                adapterId: event.adapterId,
                sessionId,
                userId   : botName,
                text     : answer,
                fromBot  : true,
            });
        },
    });

    return definePlugin({
        id         : "assistant",
        name       : "Assistant",
        description: `Chat completions through ${model.id}`,
        nodes      : [chat],
    });
}
