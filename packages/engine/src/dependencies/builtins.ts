/**
 * @fileoverview Built-in dependencies
 *
 * Providers every node can declare without defining its own.
 *
 * @module @switchyard/engine/dependencies/builtins
 */

import type { BotEvent } from "../contracts/BotEvent.js";
import { getPlainText, getReplyTarget } from "../contracts/BotEvent.js";
import type { DeliveryResult, OutboundPayload } from "../contracts/Adapter.js";
import { defineDependency } from "../contracts/Dependency.js";

/**
 * Sends a payload back to where the current event came from.
 */
export type ReplyFn = (payload: OutboundPayload) => Promise<DeliveryResult>;

/**
 * The event being dispatched.
 */
export const CurrentEvent = defineDependency<BotEvent>({
    name   : "event",
    provide: (_deps, scope) => scope.event,
});

/**
 * Abort signal of the dispatch cycle. Long-running handlers should pass it
 * to their I/O so that a forced stop can interrupt them.
 */
export const EventSignal = defineDependency<AbortSignal>({
    name   : "signal",
    provide: (_deps, scope) => scope.signal,
});

/**
 * Plain text of a message event ("" for other kinds).
 */
export const PlainText = defineDependency({
    name   : "plainText",
    needs  : { event: CurrentEvent },
    provide: ({ event }) => getPlainText(event),
});

/**
 * Reply function bound to the originating adapter. The target is the
 * event's session, falling back to its sender.
 */
export const Reply = defineDependency<ReplyFn>({
    name   : "reply",
    provide: (_deps, scope) => {
        const { event, services } = scope;
        const target = getReplyTarget(event);
        return (payload) => services.outbound.send(event.adapterId, target, payload);
    },
});

/**
 * State shared across events for the lifetime of the bot.
 */
export const GlobalState = defineDependency<Map<string, unknown>>({
    name   : "globalState",
    provide: (_deps, scope) => scope.services.globalState,
});

/**
 * State kept for the requesting node across events, keyed by node id. Only
 * nodes (their predicates, hooks and handler) can resolve it.
 *
 * @example
 * ```typescript
 * const counter = defineNode({
 *     id   : "counter",
 *     needs: { state: NodeState, reply: Reply },
 *     async handle({ state, reply }) {
 *         const seen = Number(state.get("seen") ?? 0) + 1;
 *         state.set("seen", seen);
 *         await reply(`Message number ${seen}`);
 *     },
 * });
 * ```
 */
export const NodeState = defineDependency<Map<string, unknown>>({
    name    : "nodeState",
    useCache: false,
    provide : (_deps, scope) => {
        if (!scope.node) {
            throw new Error("NodeState can only be resolved for a node");
        }
        return scope.node.state();
    },
});

/**
 * Configured superuser ids.
 */
export const Superusers = defineDependency<ReadonlySet<string>>({
    name   : "superusers",
    provide: (_deps, scope) => scope.services.superusers,
});
