/**
 * @fileoverview Shared test helpers for the console bot
 *
 * @module __tests__/helpers
 */

import { vi, type Mock } from "vitest";
import {
    Dispatcher,
    NodeRegistry,
    createBotEvent,
    type BotEvent,
    type DeliveryResult,
    type DispatchReport,
    type EngineLogger,
    type MessagePayload,
    type Outbound,
    type OutboundPayload,
    type PluginSource,
} from "@switchyard/engine";

export type MockLogger = { [K in keyof EngineLogger]: Mock };

/**
 * Create a mock logger whose calls can be asserted.
 */
export function createMockLogger(): MockLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

/**
 * Outbound stand-in recording every send.
 */
export class RecordingOutbound implements Outbound {
    readonly sent: Array<{ adapterId: string; target: string; payload: OutboundPayload }> = [];

    async send(adapterId: string, target: string, payload: OutboundPayload): Promise<DeliveryResult> {
        this.sent.push({ adapterId, target, payload });
        return { ok: true };
    }

    /** Payloads sent so far, as text */
    texts(): string[] {
        return this.sent.map((message) => (typeof message.payload === "string" ? message.payload : JSON.stringify(message.payload)));
    }
}

/**
 * Create a message event from the "console" adapter.
 */
export function messageEvent(text: string, overrides: Partial<MessagePayload> = {}): BotEvent<MessagePayload> {
    return createBotEvent({
        type     : "message",
        name     : "private",
        adapterId: "console",
        payload  : {
            text,
            userId   : "alice",
            sessionId: "console",
            ...overrides,
        },
    });
}

/**
 * Registry, dispatcher and recording outbound wired together.
 */
export interface Harness {
    readonly registry: NodeRegistry;
    readonly dispatcher: Dispatcher;
    readonly outbound: RecordingOutbound;
    readonly logger: MockLogger;
    readonly globalState: Map<string, unknown>;

    /** Dispatch a message and wait for the cycle to finish */
    say(text: string, overrides?: Partial<MessagePayload>): Promise<DispatchReport>;
}

/**
 * Load plugins into a fresh registry and return a harness around it.
 * Plugins that need the registry are given as a function of it.
 */
export async function createHarness(
    plugins: readonly PluginSource[] | ((registry: NodeRegistry) => readonly PluginSource[]),
    options: { superusers?: string[] } = {}
): Promise<Harness> {
    const logger = createMockLogger();
    const registry = new NodeRegistry({ logger });
    const outbound = new RecordingOutbound();
    const globalState = new Map<string, unknown>();
    const dispatcher = new Dispatcher({
        registry,
        outbound,
        logger,
        globalState,
        superusers: options.superusers ?? ["root"],
    });

    for (const plugin of typeof plugins === "function" ? plugins(registry) : plugins) {
        await registry.load(plugin);
    }

    return {
        registry,
        dispatcher,
        outbound,
        logger,
        globalState,
        say: (text, overrides) => dispatcher.submit(messageEvent(text, overrides)),
    };
}
