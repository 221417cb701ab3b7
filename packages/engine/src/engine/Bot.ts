/**
 * @fileoverview Bot
 *
 * Top-level orchestrator. Wires the registry, dispatcher and adapter
 * supervisor together and owns the bot lifecycle.
 *
 * Lifecycle:
 * 1. `start()`: run startup hooks, then launch every adapter's receive loop
 * 2. Events flow adapter → supervisor → dispatcher, one cycle per event
 * 3. `stop(graceMs)`: stop adapters and drain the dispatcher under one
 *    grace deadline, then run shutdown hooks
 *
 * A bot is started at most once; build a new instance to start again.
 *
 * @module @switchyard/engine/engine/Bot
 */

import type {
    AdapterHandle,
    AdapterLike,
    DeliveryResult,
    OutboundPayload,
    SendTarget,
} from "../contracts/Adapter.js";
import { isAdapterLike } from "../contracts/Adapter.js";
import type { BotEvent } from "../contracts/BotEvent.js";
import type { BusEventType, EventBus } from "../contracts/EventBus.js";
import { createBusEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { defaultLogger } from "../contracts/Logger.js";
import type { RegisteredNode } from "../contracts/Node.js";
import type { PluginSource } from "../contracts/Plugin.js";
import { describeError } from "../errors/EngineErrors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { AdapterHook, RetryOptions } from "./AdapterSupervisor.js";
import { AdapterSupervisor } from "./AdapterSupervisor.js";
import type {
    DispatchReport,
    EventFilter,
    EventPostprocessor,
    EventPreprocessor,
    NodePostprocessor,
    NodePreprocessor,
    TierMode,
    WaitOptions,
} from "./Dispatcher.js";
import { Dispatcher } from "./Dispatcher.js";
import { NodeRegistry } from "./NodeRegistry.js";

/**
 * Lifecycle hook.
 */
export type LifecycleHook = () => void | Promise<void>;

/**
 * Bot configuration options.
 */
export interface BotOptions {
    /** Logger for the bot and everything it creates */
    readonly logger?: EngineLogger;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Tier execution mode (default: "concurrent") */
    readonly tierMode?: TierMode;

    /** Default handler timeout in milliseconds (default: none) */
    readonly nodeTimeoutMs?: number;

    /** Time cancelled cycles get for teardown after the grace period (default: 1000) */
    readonly forceTimeoutMs?: number;

    /** Grace period used when `stop()` is called without one (default: 5000) */
    readonly stopGraceMs?: number;

    /** User ids with superuser permission */
    readonly superusers?: Iterable<string>;

    /** Adapter restart policy */
    readonly adapters?: RetryOptions;
}

/**
 * Result of {@link Bot.stop}.
 */
export interface BotStopReport {
    /** Dispatch cycles finished within the grace period */
    readonly drained: number;

    /** Dispatch cycles cancelled after it */
    readonly cancelled: number;

    /** Adapters still running when the grace period ran out */
    readonly forcedAdapters: readonly string[];
}

type BotPhase = "idle" | "starting" | "running" | "stopping" | "stopped";

/**
 * Bot - the framework entry point.
 *
 * @example
 * ```typescript
 * const bot = new Bot({ superusers: ["alice"] });
 *
 * bot.addAdapter(new ConsoleAdapter());
 * await bot.load(corePlugin);
 *
 * bot.eventBus.subscribe("node:failed", (event) => {
 *     console.log("Node failed:", event.data);
 * });
 *
 * process.once("SIGINT", () => void bot.stop());
 * await bot.run();
 * ```
 */
export class Bot {
    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    public readonly registry: NodeRegistry;
    public readonly dispatcher: Dispatcher;
    public readonly supervisor: AdapterSupervisor;

    /** State shared by every event for the lifetime of the bot */
    public readonly globalState: Map<string, unknown> = new Map();

    private readonly logger: EngineLogger;
    private readonly stopGraceMs: number;
    private readonly adapters: AdapterLike[] = [];
    private readonly startupHooks: LifecycleHook[] = [];
    private readonly shutdownHooks: LifecycleHook[] = [];

    private phase: BotPhase = "idle";
    private stopResult: Promise<BotStopReport> | null = null;
    private resolveStopped: (() => void) | null = null;
    private readonly stopped: Promise<void>;

    constructor(options: BotOptions = {}) {
        this.logger = options.logger ?? defaultLogger;
        this.eventBus = options.eventBus ?? new InMemoryEventBus(this.logger);
        this.stopGraceMs = options.stopGraceMs ?? 5000;

        this.registry = new NodeRegistry({
            eventBus: this.eventBus,
            logger  : this.logger,
        });

        this.supervisor = new AdapterSupervisor({
            ...options.adapters,
            eventBus: this.eventBus,
            logger  : this.logger,
        });

        this.dispatcher = new Dispatcher({
            registry      : this.registry,
            outbound      : this.supervisor,
            eventBus      : this.eventBus,
            logger        : this.logger,
            tierMode      : options.tierMode,
            nodeTimeoutMs : options.nodeTimeoutMs,
            forceTimeoutMs: options.forceTimeoutMs,
            globalState   : this.globalState,
            superusers    : options.superusers,
        });

        this.stopped = new Promise((resolve) => {
            this.resolveStopped = resolve;
        });
    }

    /**
     * Check if the bot is running.
     */
    get isRunning(): boolean {
        return this.phase === "running";
    }

    /**
     * Register an adapter. Must be called before `start()`.
     *
     * @throws Error if the bot already started, the object is not an
     *         adapter or the id is taken
     */
    addAdapter(adapter: AdapterLike): this {
        if (this.phase !== "idle") {
            throw new Error("Adapters must be added before the bot starts");
        }
        // Adapters also arrive from untyped configuration and plugin code
        if (!isAdapterLike(adapter)) {
            throw new TypeError("Not an adapter: expected an id, receive() and send()");
        }
        if (this.adapters.some((existing) => existing.id === adapter.id)) {
            throw new Error(`Adapter already registered: ${adapter.id}`);
        }

        this.adapters.push(adapter);
        this.logger.info("Adapter registered", { adapterId: adapter.id, name: adapter.name });
        return this;
    }

    /**
     * Ids of the registered adapters, in registration order.
     */
    adapterIds(): string[] {
        return this.adapters.map((adapter) => adapter.id);
    }

    /**
     * Supervision state of every adapter. Empty until the bot starts.
     */
    adapterHandles(): AdapterHandle[] {
        return this.supervisor.handles();
    }

    /**
     * Load a plugin. Allowed at any time; takes effect for the next event.
     */
    load(source: PluginSource): Promise<readonly RegisteredNode[]> {
        return this.registry.load(source);
    }

    /**
     * Replace a loaded plugin. In-flight events finish on the old nodes.
     */
    reload(pluginId: string, source?: PluginSource): Promise<readonly RegisteredNode[]> {
        return this.registry.reload(pluginId, source);
    }

    /**
     * Remove a plugin.
     */
    unload(pluginId: string): Promise<boolean> {
        return this.registry.unload(pluginId);
    }

    /**
     * Run `hook` during `start()`, before adapters come up. A failing hook
     * aborts the start.
     */
    onStartup(hook: LifecycleHook): this {
        this.startupHooks.push(hook);
        return this;
    }

    /**
     * Run `hook` during `stop()`, after adapters and dispatch have stopped.
     * Failures are logged.
     */
    onShutdown(hook: LifecycleHook): this {
        this.shutdownHooks.push(hook);
        return this;
    }

    /**
     * Run `hook` for each adapter before its first `start()`.
     */
    onAdapterStartup(hook: AdapterHook): this {
        this.supervisor.onAdapterStartup(hook);
        return this;
    }

    /**
     * Run `hook` for each adapter before its final `stop()`.
     */
    onAdapterShutdown(hook: AdapterHook): this {
        this.supervisor.onAdapterShutdown(hook);
        return this;
    }

    /**
     * Run `hook` on every event before nodes see it; returning false drops
     * the event. See {@link Dispatcher.onEventPreprocess}.
     */
    onEventPreprocess(hook: EventPreprocessor): this {
        this.dispatcher.onEventPreprocess(hook);
        return this;
    }

    /**
     * Run `hook` on every event after it has been handled.
     */
    onEventPostprocess(hook: EventPostprocessor): this {
        this.dispatcher.onEventPostprocess(hook);
        return this;
    }

    /**
     * Run `hook` before every matched node; returning false skips the node.
     */
    onNodePreprocess(hook: NodePreprocessor): this {
        this.dispatcher.onNodePreprocess(hook);
        return this;
    }

    /**
     * Run `hook` after every node, with the error it failed with.
     */
    onNodePostprocess(hook: NodePostprocessor): this {
        this.dispatcher.onNodePostprocess(hook);
        return this;
    }

    /**
     * Start the bot.
     *
     * @throws Error if the bot was started before, or a startup hook failed
     */
    async start(): Promise<void> {
        if (this.phase !== "idle") {
            throw new Error(`Bot cannot start from state "${this.phase}"`);
        }

        this.phase = "starting";
        this.emit("bot:starting", { adapters: this.adapterIds() });
        this.logger.info("Bot starting...");

        try {
            for (const hook of this.startupHooks) {
                await hook();
            }
            await this.supervisor.start(this.adapters, (event) => this.accept(event));
        }
        catch (error) {
            this.logger.error("Bot startup failed", { error: describeError(error) });
            this.emit("bot:error", { stage: "startup", error: describeError(error) });
            await this.stop(0);
            throw error;
        }

        this.phase = "running";

        this.emit("bot:started", {
            adapters: this.adapterIds(),
            plugins : this.registry.plugins(),
        });

        this.logger.info("Bot started", {
            adapters: this.adapters.length,
            plugins : this.registry.plugins().length,
        });
    }

    /**
     * Start the bot and resolve once it has stopped.
     */
    async run(): Promise<void> {
        await this.start();
        await this.stopped;
    }

    /**
     * Stop the bot.
     *
     * Adapters stop receiving and in-flight events get until the grace
     * deadline; events still running after it are cancelled (their
     * teardown still runs). Calling stop again returns the same result.
     */
    stop(graceMs: number = this.stopGraceMs): Promise<BotStopReport> {
        if (!this.stopResult) {
            this.stopResult = this.shutdown(graceMs);
        }
        return this.stopResult;
    }

    /**
     * Dispatch an event directly, bypassing adapters.
     */
    submit(event: BotEvent): Promise<DispatchReport> {
        return this.dispatcher.submit(event);
    }

    /**
     * Send a payload through an adapter.
     */
    send(adapterId: string, target: SendTarget, payload: OutboundPayload): Promise<DeliveryResult> {
        return this.supervisor.send(adapterId, target, payload);
    }

    /**
     * Resolve with the next event `filter` accepts. See {@link Dispatcher.waitFor}.
     */
    waitFor(filter: EventFilter, options?: WaitOptions): Promise<BotEvent> {
        return this.dispatcher.waitFor(filter, options);
    }

    private async shutdown(graceMs: number): Promise<BotStopReport> {
        this.phase = "stopping";
        this.emit("bot:stopping", { graceMs });
        this.logger.info("Bot stopping...", { graceMs });

        const [adapters, dispatch] = await Promise.all([
            this.supervisor.stop(graceMs),
            this.dispatcher.stop(graceMs),
        ]);

        for (const hook of this.shutdownHooks) {
            try {
                await hook();
            }
            catch (error) {
                this.logger.error("Shutdown hook failed", { error: describeError(error) });
                this.emit("bot:error", { stage: "shutdown", error: describeError(error) });
            }
        }

        const report: BotStopReport = {
            drained       : dispatch.drained,
            cancelled     : dispatch.cancelled,
            forcedAdapters: adapters.forced,
        };

        this.phase = "stopped";
        this.emit("bot:stopped", { ...report });
        this.logger.info("Bot stopped", { ...report });

        this.resolveStopped?.();
        return report;
    }

    /**
     * Sink for adapter events. Dispatch runs detached from the adapter loop.
     */
    private accept(event: BotEvent): void {
        this.dispatcher.submit(event).catch((error: unknown) => {
            this.logger.warn("Event dropped", {
                sequence : event.sequence,
                adapterId: event.adapterId,
                error    : describeError(error),
            });
        });
    }

    private emit(type: BusEventType, data?: Record<string, unknown>): void {
        this.eventBus.emit(createBusEvent(type, data));
    }
}
