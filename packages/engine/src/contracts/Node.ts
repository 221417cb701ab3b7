/**
 * @fileoverview Node Contract
 *
 * A node is one unit of plugin logic: a predicate deciding whether it
 * applies to an event, a priority, a block flag, the dependencies it needs
 * and the handler that runs with them.
 *
 * Execution order:
 * - lower priority values run first
 * - equal priorities form a tier, ordered by registration
 * - a node that runs with `block` set (or calls `control.block()`) stops
 *   every later tier for that event
 * - `control.jumpTo()` and `control.prune()` narrow what later tiers run
 *
 * @module @switchyard/engine/contracts/Node
 */

import type { BotEvent, EventKind } from "./BotEvent.js";
import type { DeliveryResult, OutboundPayload } from "./Adapter.js";
import type {
    DependencyMap,
    NoDependencies,
    Resolved,
} from "./Dependency.js";
import type { EngineLogger } from "./Logger.js";
import type { Predicate } from "./Predicate.js";

/**
 * Priority given to nodes that declare none.
 */
export const DEFAULT_NODE_PRIORITY = 50;

/**
 * Handle passed to a running node.
 */
export interface NodeControl {
    /** The event being handled */
    readonly event: BotEvent;

    /** Aborts when the dispatch cycle is cancelled */
    readonly signal: AbortSignal;

    /** Logger tagged with the plugin and node id */
    readonly logger: EngineLogger;

    /** Stop lower-priority tiers from running for this event */
    block(): void;

    /** Abandon this node; it is recorded as skipped and never blocks */
    skip(): never;

    /**
     * Abandon this node and resume the cycle at `nodeId`. The target must
     * sit in a later tier; every node ordered between the two sits the
     * event out. An unknown or earlier target degrades to `skip()`.
     */
    jumpTo(nodeId: string): never;

    /**
     * Abandon this node and keep the rest of its plugin's nodes out of
     * this event. Other plugins carry on.
     */
    prune(): never;

    /** Send a payload to the event's adapter and session */
    reply(payload: OutboundPayload): Promise<DeliveryResult>;
}

/**
 * Node definition written by plugin authors.
 *
 * @template N - Dependency map resolved before `handle` runs
 */
export interface NodeDefinition<N extends DependencyMap = DependencyMap> {
    /** Unique id across all loaded plugins */
    readonly id: string;

    /** Human-readable description */
    readonly description?: string;

    /** Lower runs first (default: {@link DEFAULT_NODE_PRIORITY}) */
    readonly priority?: number;

    /** Stop lower-priority tiers after running (default: false) */
    readonly block?: boolean;

    /** Event kinds this node considers (default: all) */
    readonly eventTypes?: readonly EventKind[];

    /** What the event must look like */
    readonly rule?: Predicate;

    /** Who may trigger the node */
    readonly permission?: Predicate;

    /** Dependencies resolved for `handle` */
    readonly needs?: N;

    /** Handler timeout in milliseconds (default: the dispatcher's) */
    readonly timeoutMs?: number;

    handle(deps: Resolved<N>, control: NodeControl): void | Promise<void>;
}

/**
 * A node as published in a registry snapshot.
 */
export interface RegisteredNode {
    readonly id: string;
    readonly pluginId: string;
    readonly priority: number;
    readonly block: boolean;

    /** Global registration sequence; breaks priority ties */
    readonly registrationOrder: number;

    readonly eventTypes?: readonly EventKind[];
    readonly rule?: Predicate;
    readonly permission?: Predicate;
    readonly needs: DependencyMap;
    readonly timeoutMs?: number;

    /** The definition this node was registered from */
    readonly definition: NodeDefinition;
}

/**
 * Identity helper that infers the dependency map type for `handle`.
 *
 * @example
 * ```typescript
 * export const ping = defineNode({
 *     id   : "ping",
 *     block: true,
 *     rule : command("ping"),
 *     needs: { reply: Reply },
 *     async handle({ reply }) {
 *         await reply("pong");
 *     },
 * });
 * ```
 */
export function defineNode<N extends DependencyMap = NoDependencies>(
    definition: NodeDefinition<N>
): NodeDefinition<N> {
    return definition;
}

/**
 * Type guard for node definitions.
 */
export function isNodeDefinition(obj: unknown): obj is NodeDefinition {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "handle" in obj &&
        typeof obj.handle === "function"
    );
}

/**
 * Compare two registered nodes by execution order.
 */
export function compareNodes(a: RegisteredNode, b: RegisteredNode): number {
    return a.priority - b.priority || a.registrationOrder - b.registrationOrder;
}
