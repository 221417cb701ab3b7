/**
 * @fileoverview Core plugin
 *
 * Built-in commands every bot instance answers:
 * - /ping    replies "pong"
 * - /echo    repeats its arguments
 * - /help    lists the loaded nodes that carry a description
 * - /status  snapshot version, adapter states and the last heartbeat
 *
 * It also records the time of the latest heartbeat event in global state.
 *
 * @module plugins/core
 */

import {
    CurrentEvent,
    GlobalState,
    Reply,
    command,
    defineNode,
    definePlugin,
    definePredicate,
    type AdapterHandle,
    type PluginDefinition,
    type SnapshotSource,
} from "@switchyard/engine";

/** Global state key holding the ISO timestamp of the latest heartbeat */
export const LAST_HEARTBEAT_KEY = "core:lastHeartbeat";

export interface CorePluginOptions {
    /** Snapshot source listed by /help and /status */
    readonly registry: SnapshotSource;

    /** Adapter states reported by /status */
    readonly adapters?: () => readonly AdapterHandle[];
}

const isHeartbeat = definePredicate({
    name : "heartbeat",
    needs: { event: CurrentEvent },
    test : ({ event }) => event.type === "meta" && event.name === "heartbeat",
});

const echoCommand = command("echo");

/**
 * Create the core plugin.
 */
export function createCorePlugin(options: CorePluginOptions): PluginDefinition {
    const ping = defineNode({
        id         : "core.ping",
        description: "/ping - check that the bot is alive",
        priority   : 10,
        block      : true,
        rule       : command("ping"),
        needs      : { reply: Reply },
        async handle({ reply }) {
            await reply("pong");
        },
    });

    const echo = defineNode({
        id         : "core.echo",
        description: "/echo <text> - repeat the text",
        priority   : 10,
        block      : true,
        rule       : echoCommand,
        needs      : { match: echoCommand.match, reply: Reply },
        async handle({ match, reply }) {
            const text = match?.args ?? "";
            await reply(text === "" ? "Usage: /echo <text>" : text);
        },
    });

    const help = defineNode({
        id         : "core.help",
        description: "/help - list what the bot can do",
        priority   : 10,
        block      : true,
        rule       : command("help"),
        needs      : { reply: Reply },
        async handle({ reply }) {
            const lines = options.registry.current().nodes
                .map((node) => node.definition.description)
                .filter((description): description is string => description !== undefined && description !== "");

            await reply(lines.length === 0 ? "Nothing to list." : ["Available:", ...lines.map((line) => `  ${line}`)].join("\n"));
        },
    });

    const status = defineNode({
        id         : "core.status",
        description: "/status - show plugins, adapters and the last heartbeat",
        priority   : 10,
        block      : true,
        rule       : command("status"),
        needs      : { reply: Reply, state: GlobalState },
        async handle({ reply, state }) {
            const snapshot = options.registry.current();
            const adapters = options.adapters?.() ?? [];
            const lastBeat = state.get(LAST_HEARTBEAT_KEY);

            await reply([
                `Snapshot v${snapshot.version}: ${snapshot.plugins.length} plugins, ${snapshot.nodes.length} nodes`,
                `Adapters: ${adapters.length === 0 ? "none" : adapters.map((handle) => `${handle.id}=${handle.state}`).join(", ")}`,
                `Last heartbeat: ${typeof lastBeat === "string" ? lastBeat : "never"}`,
            ].join("\n"));
        },
    });

    const heartbeat = defineNode({
        id        : "core.heartbeat",
        priority  : 0,
        eventTypes: ["meta"],
        rule      : isHeartbeat,
        needs     : { event: CurrentEvent, state: GlobalState },
        handle({ event, state }) {
            state.set(LAST_HEARTBEAT_KEY, event.timestamp);
        },
    });

    return definePlugin({
        id         : "core",
        name       : "Core",
        description: "Built-in commands",
        nodes      : [heartbeat, ping, echo, help, status],
    });
}
