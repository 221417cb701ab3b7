/**
 * @fileoverview Dispatcher
 *
 * Runs one dispatch cycle per submitted event.
 *
 * Cycle:
 * 1. Capture the registry snapshot (used for the whole cycle)
 * 2. Run event preprocessors; one returning false drops the event
 * 3. Offer the event to pending `waitFor` callers; an accepted event is
 *    consumed and runs no nodes
 * 4. Walk priority tiers in ascending order; within a tier, match each node
 *    (event type, permission, rule), run node preprocessors, resolve its
 *    dependencies, run it, run node postprocessors
 * 5. Stop after a tier in which a node blocked
 * 6. Run event postprocessors
 * 7. Tear down the resolution context in reverse acquisition order
 * 8. Emit "event:dispatched" and resolve the report
 *
 * Hooks resolve dependencies through the cycle's context, so a value they
 * produce is the one the nodes see.
 *
 * Failures never leave a node: predicate, dependency and handler errors are
 * recorded on that node's outcome and the cycle moves on. Hook failures are
 * logged and reported on the bus; they never stop the cycle.
 *
 * @module @switchyard/engine/engine/Dispatcher
 */

import type { BotEvent } from "../contracts/BotEvent.js";
import { getReplyTarget } from "../contracts/BotEvent.js";
import type { DeliveryResult, Outbound, OutboundPayload } from "../contracts/Adapter.js";
import type {
    DependencyMap,
    DependencyResolver,
    Resolved,
    ScopeServices,
} from "../contracts/Dependency.js";
import type { EventBus } from "../contracts/EventBus.js";
import type { BusEventType } from "../contracts/EventBus.js";
import { createBusEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createScopedLogger, defaultLogger } from "../contracts/Logger.js";
import type { NodeControl, RegisteredNode } from "../contracts/Node.js";
import type { Predicate } from "../contracts/Predicate.js";
import { ResolutionContext } from "../dependencies/ResolutionContext.js";
import type { TeardownFailure } from "../dependencies/ResolutionContext.js";
import {
    CancellationError,
    DependencyResolutionError,
    DispatcherClosedError,
    HandlerExecutionError,
    JumpToSignal,
    PredicateEvaluationError,
    PruneSignal,
    SkipNodeSignal,
    WaitTimeoutError,
    describeError,
} from "../errors/EngineErrors.js";
import type { SwitchyardError } from "../errors/EngineErrors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import {
    abortable,
    generateTraceId,
    settleWithin,
    withTimeout,
} from "../utils/timing.js";
import type { SnapshotSource } from "./NodeRegistry.js";

/**
 * How nodes of one priority tier run relative to each other.
 */
export type TierMode = "concurrent" | "sequential";

/**
 * What happened to one node during a cycle.
 */
export type NodeStatus = "completed" | "unmatched" | "skipped" | "failed" | "cancelled";

/**
 * Per-node record in a {@link DispatchReport}.
 */
export interface NodeOutcome {
    readonly nodeId: string;
    readonly pluginId: string;
    readonly priority: number;
    readonly status: NodeStatus;
    readonly error?: SwitchyardError;
}

/**
 * How a cycle ended.
 */
export type DispatchStatus = "completed" | "blocked" | "cancelled" | "consumed" | "dropped";

/**
 * Result of one dispatch cycle.
 */
export interface DispatchReport {
    readonly traceId: string;
    readonly eventSequence: number;

    /** Version of the snapshot the cycle ran against */
    readonly snapshotVersion: number;

    readonly status: DispatchStatus;

    /** Outcomes of every node the cycle reached, in tier order */
    readonly outcomes: readonly NodeOutcome[];

    /** Node that stopped propagation, when status is "blocked" */
    readonly blockedBy?: string;

    readonly teardownErrors: readonly TeardownFailure[];
    readonly durationMs: number;
}

/**
 * Result of {@link Dispatcher.stop}.
 */
export interface DispatcherStopReport {
    /** Cycles that finished within the grace period */
    readonly drained: number;

    /** Cycles cancelled after it */
    readonly cancelled: number;
}

/**
 * Filter for {@link Dispatcher.waitFor}.
 */
export type EventFilter = (event: BotEvent) => boolean | Promise<boolean>;

/**
 * Options for {@link Dispatcher.waitFor}.
 */
export interface WaitOptions {
    /** Give up after this many milliseconds */
    readonly timeoutMs?: number;

    /** Give up after this many events were offered and rejected */
    readonly maxEvents?: number;
}

/**
 * Runs before anything else sees an event. Returning false drops it.
 */
export type EventPreprocessor = (
    event: BotEvent,
    resolver: DependencyResolver
) => boolean | void | Promise<boolean | void>;

/**
 * Runs once the event has been handled, before teardown.
 */
export type EventPostprocessor = (
    event: BotEvent,
    resolver: DependencyResolver,
    status: DispatchStatus
) => void | Promise<void>;

/**
 * Runs after a node matched, before its dependencies are resolved.
 * Returning false skips the node.
 */
export type NodePreprocessor = (
    node: RegisteredNode,
    resolver: DependencyResolver
) => boolean | void | Promise<boolean | void>;

/**
 * Runs after a node that got past the preprocessors has finished, with the
 * error it failed with, if any. Not run for cancelled nodes.
 */
export type NodePostprocessor = (
    node: RegisteredNode,
    resolver: DependencyResolver,
    error: SwitchyardError | undefined
) => void | Promise<void>;

type HookStage = "eventPreprocess" | "eventPostprocess" | "nodePreprocess" | "nodePostprocess";

/**
 * Dispatcher configuration.
 */
export interface DispatcherConfig {
    /** Where snapshots come from */
    readonly registry: SnapshotSource;

    /** Routes replies to adapters */
    readonly outbound: Outbound;

    readonly eventBus?: EventBus;
    readonly logger?: EngineLogger;

    /** Tier execution mode (default: "concurrent") */
    readonly tierMode?: TierMode;

    /** Default handler timeout in milliseconds (default: none) */
    readonly nodeTimeoutMs?: number;

    /** How long cancelled cycles get to finish teardown (default: 1000) */
    readonly forceTimeoutMs?: number;

    /** Bot-wide state exposed through `GlobalState` */
    readonly globalState?: Map<string, unknown>;

    /** User ids exposed through `Superusers` */
    readonly superusers?: Iterable<string>;
}

/**
 * Per-event propagation flags. Lives for one cycle only.
 */
class PropagationState {
    blocked = false;
    blockedBy: string | undefined;
    readonly ran = new Set<string>();

    /** Plugins that pruned themselves out of the event */
    readonly pruned = new Set<string>();

    /** Snapshot position below which nodes sit the event out */
    private resumeAt = 0;
    private pendingJump: number | undefined;

    block(nodeId: string): void {
        if (!this.blocked) {
            this.blocked = true;
            this.blockedBy = nodeId;
        }
    }

    /**
     * Record a jump to the node at `position`. When several nodes of a tier
     * jump, the nearest target wins.
     */
    jump(position: number): void {
        if (this.pendingJump === undefined || position < this.pendingJump) {
            this.pendingJump = position;
        }
    }

    admits(node: RegisteredNode, position: number): boolean {
        return position >= this.resumeAt && !this.pruned.has(node.pluginId);
    }

    /** Apply the jumps of the tier that just ran */
    endTier(): void {
        if (this.pendingJump !== undefined) {
            this.resumeAt = Math.max(this.resumeAt, this.pendingJump);
            this.pendingJump = undefined;
        }
    }
}

interface CycleState {
    readonly traceId: string;
    readonly event: BotEvent;
    readonly signal: AbortSignal;
    readonly context: ResolutionContext;
    readonly propagation: PropagationState;

    /** The snapshot's nodes, in execution order */
    readonly nodes: readonly RegisteredNode[];

    /** Node id to position in `nodes` */
    readonly positions: ReadonlyMap<string, number>;
}

interface InFlightCycle {
    readonly controller: AbortController;
    readonly done: Promise<DispatchReport>;
}

interface Waiter {
    readonly filter: EventFilter;
    readonly maxEvents?: number;
    offered: number;
    timer?: NodeJS.Timeout;
    readonly resolve: (event: BotEvent) => void;
    readonly reject: (error: Error) => void;
}

/**
 * NodeControl handed to each running node.
 */
class ExecutionControl implements NodeControl {
    blockRequested = false;

    constructor(
        readonly event: BotEvent,
        readonly signal: AbortSignal,
        readonly logger: EngineLogger,
        private readonly nodeId: string,
        private readonly outbound: Outbound
    ) {}

    block(): void {
        this.blockRequested = true;
    }

    skip(): never {
        throw new SkipNodeSignal(this.nodeId);
    }

    jumpTo(nodeId: string): never {
        throw new JumpToSignal(this.nodeId, nodeId);
    }

    prune(): never {
        throw new PruneSignal(this.nodeId);
    }

    reply(payload: OutboundPayload): Promise<DeliveryResult> {
        return this.outbound.send(this.event.adapterId, getReplyTarget(this.event), payload);
    }
}

/**
 * Split an ordered node list into runs of equal priority.
 */
export function groupTiers(nodes: readonly RegisteredNode[]): RegisteredNode[][] {
    const tiers: RegisteredNode[][] = [];
    for (const node of nodes) {
        const last = tiers[tiers.length - 1];
        if (last && last[0].priority === node.priority) {
            last.push(node);
        }
        else {
            tiers.push([node]);
        }
    }
    return tiers;
}

/**
 * Dispatcher - matches and executes nodes for submitted events.
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher({ registry, outbound: supervisor });
 *
 * const report = await dispatcher.submit(event);
 * console.log(report.status, report.outcomes);
 *
 * await dispatcher.stop(5000);
 * ```
 */
export class Dispatcher {
    private readonly registry: SnapshotSource;
    private readonly outbound: Outbound;
    private readonly eventBus: EventBus;
    private readonly logger: EngineLogger;
    private readonly tierMode: TierMode;
    private readonly nodeTimeoutMs: number | undefined;
    private readonly forceTimeoutMs: number;
    private readonly services: ScopeServices;

    private readonly inFlight: Set<InFlightCycle> = new Set();
    private readonly waiters: Waiter[] = [];
    private readonly nodeStates: Map<string, Map<string, unknown>> = new Map();
    private readonly eventPreprocessors: EventPreprocessor[] = [];
    private readonly eventPostprocessors: EventPostprocessor[] = [];
    private readonly nodePreprocessors: NodePreprocessor[] = [];
    private readonly nodePostprocessors: NodePostprocessor[] = [];
    private closed = false;

    constructor(config: DispatcherConfig) {
        this.registry = config.registry;
        this.outbound = config.outbound;
        this.logger = config.logger ?? defaultLogger;
        this.eventBus = config.eventBus ?? new InMemoryEventBus(this.logger);
        this.tierMode = config.tierMode ?? "concurrent";
        this.nodeTimeoutMs = config.nodeTimeoutMs;
        this.forceTimeoutMs = config.forceTimeoutMs ?? 1000;
        this.services = {
            outbound   : config.outbound,
            globalState: config.globalState ?? new Map(),
            superusers : new Set(config.superusers ?? []),
        };
    }

    /**
     * Number of cycles currently running.
     */
    get pending(): number {
        return this.inFlight.size;
    }

    /**
     * Whether new submissions are accepted.
     */
    get isAccepting(): boolean {
        return !this.closed;
    }

    /**
     * Run `hook` on every event before nodes or waiters see it.
     */
    onEventPreprocess(hook: EventPreprocessor): this {
        this.eventPreprocessors.push(hook);
        return this;
    }

    /**
     * Run `hook` on every event the preprocessors let through, after it has
     * been handled.
     */
    onEventPostprocess(hook: EventPostprocessor): this {
        this.eventPostprocessors.push(hook);
        return this;
    }

    /**
     * Run `hook` for every matched node before it runs.
     */
    onNodePreprocess(hook: NodePreprocessor): this {
        this.nodePreprocessors.push(hook);
        return this;
    }

    /**
     * Run `hook` for every node after it ran.
     */
    onNodePostprocess(hook: NodePostprocessor): this {
        this.nodePostprocessors.push(hook);
        return this;
    }

    /**
     * State kept for `nodeId` across events; what `NodeState` resolves to.
     */
    nodeState(nodeId: string): Map<string, unknown> {
        let state = this.nodeStates.get(nodeId);
        if (!state) {
            state = new Map();
            this.nodeStates.set(nodeId, state);
        }
        return state;
    }

    /**
     * Dispatch an event.
     *
     * The returned promise resolves when the cycle, teardown included, has
     * finished; it only rejects (with DispatcherClosedError) when the
     * dispatcher is stopped. Callers may ignore it.
     */
    submit(event: BotEvent): Promise<DispatchReport> {
        if (this.closed) {
            return Promise.reject(new DispatcherClosedError());
        }

        const controller = new AbortController();
        const done = this.runCycle(event, controller.signal).finally(() => {
            this.inFlight.delete(cycle);
        });
        const cycle: InFlightCycle = { controller, done };
        this.inFlight.add(cycle);

        return done;
    }

    /**
     * Resolve with the next submitted event that `filter` accepts. That
     * event is consumed: no nodes run for it.
     *
     * @throws WaitTimeoutError after `timeoutMs`, or after `maxEvents`
     *         rejected events
     *
     * @example
     * ```typescript
     * await control.reply("What is your name?");
     * const answer = await dispatcher.waitFor(
     *     (event) => getSessionId(event) === getSessionId(control.event),
     *     { timeoutMs: 30000 }
     * );
     * ```
     */
    waitFor(filter: EventFilter, options: WaitOptions = {}): Promise<BotEvent> {
        if (this.closed) {
            return Promise.reject(new DispatcherClosedError());
        }

        return new Promise<BotEvent>((resolve, reject) => {
            const waiter: Waiter = {
                filter,
                maxEvents: options.maxEvents,
                offered  : 0,
                resolve,
                reject,
            };

            if (options.timeoutMs !== undefined) {
                waiter.timer = setTimeout(() => {
                    this.removeWaiter(waiter);
                    reject(new WaitTimeoutError(`timed out after ${options.timeoutMs}ms`));
                }, options.timeoutMs);
            }

            this.waiters.push(waiter);
        });
    }

    /**
     * Stop accepting events, wait up to `graceMs` for admitted cycles, then
     * cancel the rest. Cancelled cycles still run their teardown, bounded
     * by `forceTimeoutMs`.
     */
    async stop(graceMs: number): Promise<DispatcherStopReport> {
        this.closed = true;

        for (const waiter of this.waiters.splice(0)) {
            clearTimeout(waiter.timer);
            waiter.reject(new DispatcherClosedError());
        }

        const admitted = [...this.inFlight];
        if (await settleWithin(admitted.map((cycle) => cycle.done), graceMs)) {
            return { drained: admitted.length, cancelled: 0 };
        }

        const stragglers = [...this.inFlight];
        this.logger.warn("Grace period elapsed, cancelling dispatch cycles", {
            graceMs,
            cycles: stragglers.length,
        });

        for (const cycle of stragglers) {
            cycle.controller.abort();
        }

        if (!(await settleWithin(stragglers.map((cycle) => cycle.done), this.forceTimeoutMs))) {
            this.logger.error("Cancelled dispatch cycles did not finish teardown", {
                forceTimeoutMs: this.forceTimeoutMs,
                cycles        : this.inFlight.size,
            });
        }

        return {
            drained  : admitted.length - stragglers.length,
            cancelled: stragglers.length,
        };
    }

    private async runCycle(event: BotEvent, signal: AbortSignal): Promise<DispatchReport> {
        const startTime = Date.now();
        const traceId = generateTraceId();
        const snapshot = this.registry.current();

        this.emit("event:received", {
            sequence       : event.sequence,
            type           : event.type,
            adapterId      : event.adapterId,
            snapshotVersion: snapshot.version,
        }, traceId);

        const cycle: CycleState = {
            traceId,
            event,
            signal,
            context: new ResolutionContext({
                event,
                signal,
                logger  : this.logger,
                services: this.services,
            }),
            propagation: new PropagationState(),
            nodes      : snapshot.nodes,
            positions  : new Map(snapshot.nodes.map((node, position) => [node.id, position])),
        };

        const outcomes: NodeOutcome[] = [];
        let status: DispatchStatus;

        if (!(await this.preprocess(cycle))) {
            status = "dropped";
            this.emit("event:dropped", { sequence: event.sequence }, traceId);
        }
        else {
            if (this.waiters.length > 0 && await this.offerToWaiters(event)) {
                status = "consumed";
                this.emit("event:consumed", { sequence: event.sequence }, traceId);
            }
            else {
                status = await this.walkTiers(cycle, outcomes);
            }
            await this.postprocess(cycle, status);
        }

        const teardownErrors = await cycle.context.teardown();
        for (const failure of teardownErrors) {
            this.emit("dependency:teardownFailed", {
                sequence  : event.sequence,
                dependency: failure.dependency,
                error     : describeError(failure.error),
            }, traceId);
        }

        const report: DispatchReport = {
            traceId,
            eventSequence  : event.sequence,
            snapshotVersion: snapshot.version,
            status,
            outcomes,
            blockedBy      : cycle.propagation.blockedBy,
            teardownErrors,
            durationMs     : Date.now() - startTime,
        };

        if (status !== "dropped" && status !== "consumed") {
            this.emit("event:dispatched", {
                sequence: event.sequence,
                status,
                ran     : [...cycle.propagation.ran],
                duration: report.durationMs,
            }, traceId);
        }

        this.logger.debug("Event dispatched", {
            sequence: event.sequence,
            status,
            ran     : cycle.propagation.ran.size,
            traceId,
        });

        return report;
    }

    private async walkTiers(cycle: CycleState, outcomes: NodeOutcome[]): Promise<DispatchStatus> {
        const { signal, propagation, positions } = cycle;

        for (const tier of groupTiers(cycle.nodes)) {
            if (signal.aborted) {
                break;
            }

            const admitted = tier.filter((node) => propagation.admits(node, positions.get(node.id) ?? 0));
            if (admitted.length > 0) {
                outcomes.push(...await this.runTier(admitted, cycle));
            }
            propagation.endTier();

            if (propagation.blocked) {
                return signal.aborted ? "cancelled" : "blocked";
            }
        }

        return signal.aborted ? "cancelled" : "completed";
    }

    private async runTier(tier: readonly RegisteredNode[], cycle: CycleState): Promise<NodeOutcome[]> {
        if (this.tierMode === "concurrent") {
            return Promise.all(tier.map((node) => this.runNode(node, cycle)));
        }

        const outcomes: NodeOutcome[] = [];
        for (const node of tier) {
            outcomes.push(await this.runNode(node, cycle));
        }
        return outcomes;
    }

    private async runNode(node: RegisteredNode, cycle: CycleState): Promise<NodeOutcome> {
        const { signal, traceId } = cycle;

        if (signal.aborted) {
            return this.cancelled(node, traceId);
        }

        const resolver = cycle.context.forNode({
            id   : node.id,
            state: () => this.nodeState(node.id),
        });

        let matched: boolean;
        try {
            matched = await abortable(this.matches(node, resolver), signal);
        }
        catch (error) {
            if (error instanceof CancellationError) {
                return this.cancelled(node, traceId);
            }
            return this.fail(node, error instanceof PredicateEvaluationError
                ? error
                : new PredicateEvaluationError(node.id, "match", error), traceId);
        }

        if (!matched) {
            return this.outcome(node, "unmatched");
        }

        let admitted = true;
        try {
            for (const hook of this.nodePreprocessors) {
                if (await abortable(Promise.resolve().then(() => hook(node, resolver)), signal) === false) {
                    admitted = false;
                    break;
                }
            }
        }
        catch (error) {
            if (error instanceof CancellationError) {
                return this.cancelled(node, traceId);
            }
            this.hookFailed("nodePreprocess", error, traceId, node.id);
            return this.fail(node, new HandlerExecutionError(node.id, error), traceId);
        }

        if (!admitted) {
            this.emit("node:skipped", { nodeId: node.id, pluginId: node.pluginId, reason: "preprocessor" }, traceId);
            return this.outcome(node, "skipped");
        }

        const outcome = await this.execute(node, resolver, cycle);

        if (outcome.status !== "cancelled") {
            for (const hook of this.nodePostprocessors) {
                try {
                    await hook(node, resolver, outcome.error);
                }
                catch (error) {
                    this.hookFailed("nodePostprocess", error, traceId, node.id);
                }
            }
        }

        return outcome;
    }

    private async execute(node: RegisteredNode, resolver: DependencyResolver, cycle: CycleState): Promise<NodeOutcome> {
        const { signal, propagation, traceId } = cycle;

        let deps: Resolved<DependencyMap>;
        try {
            deps = await abortable(resolver.resolveAll(node.needs), signal);
        }
        catch (error) {
            if (error instanceof CancellationError) {
                return this.cancelled(node, traceId);
            }
            return this.fail(node, error instanceof DependencyResolutionError
                ? error
                : new DependencyResolutionError([node.id], describeError(error), error), traceId);
        }

        const control = new ExecutionControl(
            cycle.event,
            signal,
            this.createPluginLogger(node, traceId),
            node.id,
            this.outbound
        );

        propagation.ran.add(node.id);

        try {
            const execution = Promise.resolve().then(() => node.definition.handle(deps, control));
            await abortable(
                withTimeout(
                    execution,
                    node.timeoutMs ?? this.nodeTimeoutMs,
                    () => new HandlerExecutionError(node.id, undefined, true)
                ),
                signal
            );
        }
        catch (error) {
            if (error instanceof SkipNodeSignal) {
                propagation.ran.delete(node.id);
                return this.skipped(node, error, cycle);
            }
            if (error instanceof CancellationError) {
                return this.cancelled(node, traceId);
            }

            this.applyBlock(node, control, propagation);
            return this.fail(node, error instanceof HandlerExecutionError && error.nodeId === node.id
                ? error
                : new HandlerExecutionError(node.id, error), traceId);
        }

        this.applyBlock(node, control, propagation);
        this.emit("node:completed", { nodeId: node.id, pluginId: node.pluginId }, traceId);
        return this.outcome(node, "completed");
    }

    /**
     * Record a node that skipped itself, applying a jump or prune it asked for.
     */
    private skipped(node: RegisteredNode, signal: SkipNodeSignal, cycle: CycleState): NodeOutcome {
        const { propagation, traceId } = cycle;
        const data: Record<string, unknown> = { nodeId: node.id, pluginId: node.pluginId, reason: "skip" };

        if (signal instanceof JumpToSignal) {
            const position = cycle.positions.get(signal.targetId);
            const target = position === undefined ? undefined : cycle.nodes[position];

            if (position !== undefined && target && target.priority > node.priority) {
                propagation.jump(position);
                data.reason = "jump";
                data.jumpTo = signal.targetId;
            }
            else {
                this.logger.warn("Jump target ignored", {
                    nodeId  : node.id,
                    targetId: signal.targetId,
                    reason  : target ? "not in a later tier" : "unknown node",
                    traceId,
                });
            }
        }
        else if (signal instanceof PruneSignal) {
            propagation.pruned.add(node.pluginId);
            data.reason = "prune";
        }

        this.emit("node:skipped", data, traceId);
        return this.outcome(node, "skipped");
    }

    private async preprocess(cycle: CycleState): Promise<boolean> {
        for (const hook of this.eventPreprocessors) {
            try {
                const verdict = await abortable(
                    Promise.resolve().then(() => hook(cycle.event, cycle.context)),
                    cycle.signal
                );
                if (verdict === false) {
                    this.logger.debug("Event dropped by preprocessor", {
                        sequence: cycle.event.sequence,
                        traceId : cycle.traceId,
                    });
                    return false;
                }
            }
            catch (error) {
                if (error instanceof CancellationError) {
                    return true;
                }
                this.hookFailed("eventPreprocess", error, cycle.traceId);
            }
        }
        return true;
    }

    private async postprocess(cycle: CycleState, status: DispatchStatus): Promise<void> {
        for (const hook of this.eventPostprocessors) {
            try {
                await hook(cycle.event, cycle.context, status);
            }
            catch (error) {
                this.hookFailed("eventPostprocess", error, cycle.traceId);
            }
        }
    }

    private hookFailed(stage: HookStage, error: unknown, traceId: string, nodeId?: string): void {
        const data: Record<string, unknown> = nodeId === undefined
            ? { stage, error: describeError(error) }
            : { stage, nodeId, error: describeError(error) };

        this.logger.error("Dispatch hook failed", { ...data, traceId });
        this.emit("hook:failed", data, traceId);
    }

    private async matches(node: RegisteredNode, resolver: DependencyResolver): Promise<boolean> {
        if (node.eventTypes && !node.eventTypes.includes(resolver.scope.event.type)) {
            return false;
        }
        if (node.permission && !(await this.evaluate(node, node.permission, resolver))) {
            return false;
        }
        if (node.rule && !(await this.evaluate(node, node.rule, resolver))) {
            return false;
        }
        return true;
    }

    private async evaluate(node: RegisteredNode, predicate: Predicate, resolver: DependencyResolver): Promise<boolean> {
        try {
            return await predicate.evaluate(resolver);
        }
        catch (error) {
            throw new PredicateEvaluationError(node.id, predicate.name, error);
        }
    }

    private applyBlock(node: RegisteredNode, control: ExecutionControl, propagation: PropagationState): void {
        if (node.block || control.blockRequested) {
            propagation.block(node.id);
        }
    }

    private async offerToWaiters(event: BotEvent): Promise<boolean> {
        for (const waiter of [...this.waiters]) {
            if (!this.waiters.includes(waiter)) {
                continue;
            }

            let accepted: boolean;
            try {
                accepted = await waiter.filter(event);
            }
            catch (error) {
                this.removeWaiter(waiter);
                waiter.reject(error instanceof Error ? error : new Error(String(error)));
                continue;
            }

            // Another cycle may have settled this waiter while we awaited
            if (!this.waiters.includes(waiter)) {
                continue;
            }

            if (accepted) {
                this.removeWaiter(waiter);
                waiter.resolve(event);
                return true;
            }

            waiter.offered += 1;
            if (waiter.maxEvents !== undefined && waiter.offered >= waiter.maxEvents) {
                this.removeWaiter(waiter);
                waiter.reject(new WaitTimeoutError(`${waiter.offered} events did not match`));
            }
        }
        return false;
    }

    private removeWaiter(waiter: Waiter): void {
        clearTimeout(waiter.timer);
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
            this.waiters.splice(index, 1);
        }
    }

    private outcome(node: RegisteredNode, status: NodeStatus, error?: SwitchyardError): NodeOutcome {
        return {
            nodeId  : node.id,
            pluginId: node.pluginId,
            priority: node.priority,
            status,
            error,
        };
    }

    private cancelled(node: RegisteredNode, traceId: string): NodeOutcome {
        this.emit("node:cancelled", { nodeId: node.id, pluginId: node.pluginId }, traceId);
        return this.outcome(node, "cancelled");
    }

    private fail(node: RegisteredNode, error: SwitchyardError, traceId: string): NodeOutcome {
        this.logger.error("Node failed", {
            nodeId  : node.id,
            pluginId: node.pluginId,
            code    : error.code,
            error   : error.message,
            traceId,
        });

        this.emit("node:failed", {
            nodeId  : node.id,
            pluginId: node.pluginId,
            code    : error.code,
            error   : error.message,
        }, traceId);

        return this.outcome(node, "failed", error);
    }

    private emit(type: BusEventType, data: Record<string, unknown>, traceId: string): void {
        this.eventBus.emit(createBusEvent(type, data, traceId));
    }

    /**
     * Logger handed to a node, tagged with its plugin and node id.
     */
    private createPluginLogger(node: RegisteredNode, traceId: string): EngineLogger {
        return createScopedLogger(this.logger, `${node.pluginId}:${node.id}`, { traceId });
    }
}
