/**
 * OpenAI chat model
 *
 * Answers conversations through the OpenAI chat completions API. The
 * assistant plugin depends on the {@link ChatModel} interface only, so
 * tests and other providers can stand in for it.
 */

import OpenAI from "openai";

export type ChatRole = "system" | "user" | "assistant";

/**
 * One turn of a conversation
 */
export interface ChatMessage {
    readonly role: ChatRole;
    readonly content: string;
}

/**
 * Options for a single completion
 */
export interface CompleteOptions {
    /** Aborts the request */
    signal?: AbortSignal;
}

/**
 * Something that continues a conversation
 */
export interface ChatModel {
    /** Identifier used in logs */
    readonly id: string;

    /**
     * Produce the next assistant message.
     *
     * @throws Error when no answer could be produced
     */
    complete(messages: readonly ChatMessage[], options?: CompleteOptions): Promise<string>;
}

/**
 * Configuration options for the OpenAI chat model
 */
export interface OpenAIChatModelConfig {
    /** OpenAI API key (defaults to OPENAI_API_KEY env var) */
    apiKey?: string;

    /** Model to use (default: gpt-4o-mini) */
    model?: string;

    /** Temperature for responses (default: 0.7) */
    temperature?: number;

    /** Maximum tokens for response (default: 512) */
    maxTokens?: number;
}

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
    switch (message.role) {
        case "system":
            return { role: "system", content: message.content };
        case "user":
            return { role: "user", content: message.content };
        case "assistant":
            return { role: "assistant", content: message.content };
    }
}

/**
 * OpenAI-backed chat model implementation
 */
export class OpenAIChatModel implements ChatModel {
    readonly id: string;

    private client: OpenAI;
    private config: Required<Omit<OpenAIChatModelConfig, "apiKey">>;

    constructor(id: string = "openai", config: OpenAIChatModelConfig = {}) {
        this.id = id;

        this.client = new OpenAI({
            apiKey: config.apiKey ?? process.env.OPENAI_API_KEY,
        });

        this.config = {
            model      : config.model ?? "gpt-4o-mini",
            temperature: config.temperature ?? 0.7,
            maxTokens  : config.maxTokens ?? 512,
        };
    }

    /**
     * Complete a conversation
     */
    async complete(messages: readonly ChatMessage[], options: CompleteOptions = {}): Promise<string> {
        const response = await this.client.chat.completions.create(
            {
                model      : this.config.model,
                temperature: this.config.temperature,
                max_tokens : this.config.maxTokens,
                messages   : messages.map(toMessageParam),
            },
            { signal: options.signal }
        );

        const content = response.choices[0]?.message?.content?.trim();

        if (!content) {
            throw new Error("No response from OpenAI");
        }

        return content;
    }
}
