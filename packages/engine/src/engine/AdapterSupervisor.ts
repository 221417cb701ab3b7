/**
 * @fileoverview AdapterSupervisor
 *
 * Runs one receive loop per adapter and keeps adapters independent of each
 * other: a crashing adapter is restarted with exponential backoff and, once
 * its retry budget is spent, marked failed while every other adapter keeps
 * delivering events.
 *
 * Loop per adapter:
 * 1. `start()` (first attempt and after every crash)
 * 2. Iterate `receive(signal)`, handing each event to the sink
 * 3. On error, or when the stream ends while the signal is live: `stop()`,
 *    count a failure, back off, go to 1
 * 4. When failures exceed `maxRetries`: mark failed and stop the loop
 *
 * Every `start()` is paired with exactly one `stop()`, whether the attempt
 * crashed, the adapter failed for good or the supervisor shut down. Startup
 * hooks run once before the first `start()`; shutdown hooks once before the
 * final `stop()`.
 *
 * The failure counter resets once a restarted loop delivers an event, so the
 * budget bounds consecutive crashes rather than lifetime crashes.
 *
 * @module @switchyard/engine/engine/AdapterSupervisor
 */

import type {
    AdapterHandle,
    AdapterLike,
    AdapterState,
    DeliveryResult,
    Outbound,
    OutboundPayload,
    SendTarget,
} from "../contracts/Adapter.js";
import type { BotEvent } from "../contracts/BotEvent.js";
import type { BusEventType, EventBus } from "../contracts/EventBus.js";
import { createBusEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { defaultLogger } from "../contracts/Logger.js";
import { AdapterFailure, describeError } from "../errors/EngineErrors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { BackoffPolicy } from "../utils/timing.js";
import { computeBackoff, settleWithin, sleep } from "../utils/timing.js";

/**
 * Receives every event an adapter yields. Must not throw.
 */
export type EventSink = (event: BotEvent) => void;

/**
 * Called with an adapter when it is first brought up or finally shut down.
 */
export type AdapterHook = (adapter: AdapterLike) => void | Promise<void>;

/**
 * Retry settings.
 */
export interface RetryOptions {
    /** Consecutive crashes tolerated before an adapter is failed (default: 3) */
    readonly maxRetries?: number;

    /** Delay before the first restart (default: 500) */
    readonly initialBackoffMs?: number;

    /** Upper bound on the delay (default: 10000) */
    readonly maxBackoffMs?: number;

    /** Delay multiplier per consecutive crash (default: 2) */
    readonly backoffFactor?: number;
}

/**
 * Supervisor configuration.
 */
export interface AdapterSupervisorConfig extends RetryOptions {
    readonly eventBus?: EventBus;
    readonly logger?: EngineLogger;
}

/**
 * Result of {@link AdapterSupervisor.stop}.
 */
export interface SupervisorStopReport {
    /** Adapters whose loops ended within the grace period */
    readonly stopped: readonly string[];

    /** Adapters still running when the grace period ran out */
    readonly forced: readonly string[];
}

interface SupervisedAdapter {
    readonly adapter: AdapterLike;
    readonly controller: AbortController;
    state: AdapterState;
    restarts: number;
    failures: number;
    lastError?: string;
    startedAt?: string;
    loop?: Promise<void>;

    /** `start()` was called and its `stop()` is still owed */
    open: boolean;

    /** Shutdown already ran */
    finished: boolean;
}

/**
 * AdapterSupervisor - starts, restarts and routes to adapters.
 *
 * @example
 * ```typescript
 * const supervisor = new AdapterSupervisor({ maxRetries: 5 });
 *
 * await supervisor.start([consoleAdapter, heartbeat], (event) => {
 *     void dispatcher.submit(event);
 * });
 *
 * await supervisor.send("console", "console", "hello");
 * await supervisor.stop(5000);
 * ```
 */
export class AdapterSupervisor implements Outbound {
    private readonly eventBus: EventBus;
    private readonly logger: EngineLogger;
    private readonly maxRetries: number;
    private readonly backoff: BackoffPolicy;

    private readonly adapters: Map<string, SupervisedAdapter> = new Map();
    private readonly startupHooks: AdapterHook[] = [];
    private readonly shutdownHooks: AdapterHook[] = [];
    private stopping = false;

    constructor(config: AdapterSupervisorConfig = {}) {
        this.logger = config.logger ?? defaultLogger;
        this.eventBus = config.eventBus ?? new InMemoryEventBus(this.logger);
        this.maxRetries = config.maxRetries ?? 3;
        this.backoff = {
            initialMs: config.initialBackoffMs ?? 500,
            factor   : config.backoffFactor ?? 2,
            maxMs    : config.maxBackoffMs ?? 10000,
        };
    }

    /**
     * Run `hook` before an adapter's first `start()`. Failures are logged
     * and do not keep the adapter from starting.
     */
    onAdapterStartup(hook: AdapterHook): this {
        this.startupHooks.push(hook);
        return this;
    }

    /**
     * Run `hook` before an adapter's final `stop()`, at shutdown or once it
     * has failed for good. Failures are logged.
     */
    onAdapterShutdown(hook: AdapterHook): this {
        this.shutdownHooks.push(hook);
        return this;
    }

    /**
     * Begin supervising `adapters`. Resolves once every loop has been
     * launched; it does not wait for the adapters to come up.
     *
     * @throws Error if an adapter id is already supervised
     */
    async start(adapters: readonly AdapterLike[], sink: EventSink): Promise<void> {
        if (this.stopping) {
            throw new Error("Adapter supervisor is stopped");
        }

        const seen = new Set<string>();
        for (const adapter of adapters) {
            if (this.adapters.has(adapter.id) || seen.has(adapter.id)) {
                throw new Error(`Adapter already registered: ${adapter.id}`);
            }
            seen.add(adapter.id);
        }

        for (const adapter of adapters) {
            const entry: SupervisedAdapter = {
                adapter,
                controller: new AbortController(),
                state     : "starting",
                restarts  : 0,
                failures  : 0,
                open      : false,
                finished  : false,
            };
            this.adapters.set(adapter.id, entry);
            entry.loop = this.supervise(entry, sink);
        }
    }

    /**
     * Deliver a payload through the adapter with id `adapterId`.
     *
     * Never throws: an unknown adapter, a failed adapter or a send error is
     * reported through the result and an "adapter:sendFailed" bus event.
     */
    async send(adapterId: string, target: SendTarget, payload: OutboundPayload): Promise<DeliveryResult> {
        const entry = this.adapters.get(adapterId);
        if (!entry) {
            return this.sendFailed(adapterId, target, `Unknown adapter: ${adapterId}`);
        }
        if (entry.state === "failed" || entry.state === "stopped") {
            return this.sendFailed(adapterId, target, `Adapter "${adapterId}" is ${entry.state}`);
        }

        try {
            return await entry.adapter.send(target, payload);
        }
        catch (error) {
            const failure = new AdapterFailure(adapterId, "send", error);
            return this.sendFailed(adapterId, target, failure.message);
        }
    }

    /**
     * Snapshot of every supervised adapter.
     */
    handles(): AdapterHandle[] {
        return [...this.adapters.values()].map((entry) => this.toHandle(entry));
    }

    /**
     * State of one adapter, if supervised.
     */
    handle(adapterId: string): AdapterHandle | undefined {
        const entry = this.adapters.get(adapterId);
        return entry ? this.toHandle(entry) : undefined;
    }

    /**
     * Abort every receive loop, call each adapter's `stop`, and wait up to
     * `graceMs` for the loops to end. Adapters whose loop is still running
     * after that are stopped without waiting for it.
     */
    async stop(graceMs: number): Promise<SupervisorStopReport> {
        this.stopping = true;

        const entries = [...this.adapters.values()];
        for (const entry of entries) {
            entry.controller.abort();
        }

        const pending = entries.map(async (entry) => {
            await entry.loop;
            await this.stopAdapter(entry);
        });

        await settleWithin(pending, graceMs);

        const stopped: string[] = [];
        const forced: SupervisedAdapter[] = [];
        for (const entry of entries) {
            if (entry.finished) {
                stopped.push(entry.adapter.id);
            }
            else {
                forced.push(entry);
            }
        }

        if (forced.length === 0) {
            return { stopped, forced: [] };
        }

        const forcedIds = forced.map((entry) => entry.adapter.id);
        this.logger.warn("Adapters did not stop within grace period", { graceMs, forced: forcedIds });

        // The loops may never return; stop the adapters underneath them
        await settleWithin(forced.map((entry) => this.stopAdapter(entry)), graceMs);

        return { stopped, forced: forcedIds };
    }

    private async supervise(entry: SupervisedAdapter, sink: EventSink): Promise<void> {
        const { adapter, controller } = entry;
        const signal = controller.signal;

        if (!signal.aborted) {
            await this.runHooks(this.startupHooks, adapter, "startup");
        }

        while (!signal.aborted) {
            entry.state = "starting";
            let started = false;

            try {
                entry.open = true;
                if (adapter.start) {
                    await adapter.start();
                }
                if (signal.aborted) {
                    break;
                }

                started = true;
                entry.state = "running";
                entry.startedAt = new Date().toISOString();
                this.emit("adapter:started", { adapterId: adapter.id, restarts: entry.restarts });
                this.logger.info("Adapter started", { adapterId: adapter.id, restarts: entry.restarts });

                for await (const event of adapter.receive(signal)) {
                    entry.failures = 0;
                    sink(event);
                    if (signal.aborted) {
                        break;
                    }
                }

                if (signal.aborted) {
                    break;
                }
                throw new Error("event stream ended unexpectedly");
            }
            catch (error) {
                if (signal.aborted) {
                    break;
                }

                const failure = error instanceof AdapterFailure
                    ? error
                    : new AdapterFailure(adapter.id, started ? "receive" : "start", error);

                entry.failures += 1;
                entry.lastError = failure.message;

                if (entry.failures > this.maxRetries) {
                    await this.runHooks(this.shutdownHooks, adapter, "shutdown");
                    await this.release(entry);
                    entry.state = "failed";
                    entry.finished = true;
                    this.emit("adapter:failed", {
                        adapterId: adapter.id,
                        failures : entry.failures,
                        error    : failure.message,
                    });
                    this.logger.error("Adapter failed permanently", {
                        adapterId: adapter.id,
                        failures : entry.failures,
                        error    : failure.message,
                    });
                    return;
                }

                await this.release(entry);

                const delay = computeBackoff(entry.failures, this.backoff);
                entry.state = "backoff";
                entry.restarts += 1;

                this.emit("adapter:restarting", {
                    adapterId: adapter.id,
                    attempt  : entry.failures,
                    delayMs  : delay,
                    error    : failure.message,
                });
                this.logger.warn("Adapter crashed, restarting", {
                    adapterId: adapter.id,
                    attempt  : entry.failures,
                    delayMs  : delay,
                    error    : failure.message,
                });

                await sleep(delay, signal);
            }
        }
    }

    /**
     * Final shutdown of one adapter. Runs once; an adapter that already
     * failed for good was shut down when it failed.
     */
    private async stopAdapter(entry: SupervisedAdapter): Promise<void> {
        if (entry.finished) {
            return;
        }
        entry.finished = true;

        const { adapter } = entry;
        await this.runHooks(this.shutdownHooks, adapter, "shutdown");
        await this.release(entry);

        entry.state = "stopped";
        this.emit("adapter:stopped", { adapterId: adapter.id, state: entry.state });
    }

    /**
     * Call `stop()` for the last `start()`, if it is still owed.
     */
    private async release(entry: SupervisedAdapter): Promise<void> {
        if (!entry.open) {
            return;
        }
        entry.open = false;

        const { adapter } = entry;
        try {
            if (adapter.stop) {
                await adapter.stop();
            }
        }
        catch (error) {
            const failure = new AdapterFailure(adapter.id, "stop", error);
            entry.lastError = failure.message;
            this.logger.error("Adapter stop failed", {
                adapterId: adapter.id,
                error    : describeError(error),
            });
        }
    }

    private async runHooks(hooks: readonly AdapterHook[], adapter: AdapterLike, stage: string): Promise<void> {
        for (const hook of hooks) {
            try {
                await hook(adapter);
            }
            catch (error) {
                this.logger.error("Adapter hook failed", {
                    adapterId: adapter.id,
                    stage,
                    error    : describeError(error),
                });
            }
        }
    }

    private sendFailed(adapterId: string, target: SendTarget, error: string): DeliveryResult {
        this.emit("adapter:sendFailed", { adapterId, target, error });
        this.logger.warn("Send failed", { adapterId, target, error });
        return { ok: false, error };
    }

    private toHandle(entry: SupervisedAdapter): AdapterHandle {
        return Object.freeze({
            id       : entry.adapter.id,
            state    : entry.state,
            restarts : entry.restarts,
            lastError: entry.lastError,
            startedAt: entry.startedAt,
        });
    }

    private emit(type: BusEventType, data: Record<string, unknown>): void {
        this.eventBus.emit(createBusEvent(type, data));
    }
}
