/**
 * @fileoverview Unit tests for AdapterSupervisor
 *
 * Tests cover:
 * - Crash isolation: one adapter failing permanently while others deliver
 * - Restart with backoff and failure counter reset
 * - Start failures and streams ending unexpectedly
 * - Outbound routing and send failures
 * - Every start paired with a stop, across crashes and final failure
 * - Adapter startup and shutdown hooks
 * - Stop, including adapters that ignore their abort signal
 *
 * @module @switchyard/engine/__tests__/AdapterSupervisor
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { AdapterSupervisor } from "../engine/AdapterSupervisor.js";
import type { AdapterLike, DeliveryResult } from "../contracts/Adapter.js";
import type { BotEvent } from "../contracts/BotEvent.js";
import type { BusEvent } from "../contracts/EventBus.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { MemoryAdapter } from "../impl/MemoryAdapter.js";
import { createMockLogger, type MockLogger } from "./testUtils.js";

/**
 * Adapter whose stream breaks as soon as it is opened.
 */
class CrashingAdapter implements AdapterLike {
    attempts = 0;

    constructor(readonly id: string) {}

    async *receive(): AsyncGenerator<BotEvent> {
        this.attempts += 1;
        throw new Error("socket closed");
    }

    async send(): Promise<DeliveryResult> {
        return { ok: true };
    }
}

/**
 * Adapter that records its lifecycle calls and whose stream always breaks.
 */
class FlakyAdapter implements AdapterLike {
    readonly calls: string[] = [];

    constructor(readonly id: string) {}

    async start(): Promise<void> {
        this.calls.push("start");
    }

    async stop(): Promise<void> {
        this.calls.push("stop");
    }

    async *receive(): AsyncGenerator<BotEvent> {
        throw new Error("handshake rejected");
    }

    async send(): Promise<DeliveryResult> {
        return { ok: true };
    }
}

/**
 * Adapter whose stream never ends, whatever the signal says.
 */
class DeafAdapter implements AdapterLike {
    stops = 0;

    constructor(readonly id: string) {}

    async stop(): Promise<void> {
        this.stops += 1;
    }

    async *receive(): AsyncGenerator<BotEvent> {
        await new Promise<void>(() => undefined);
    }

    async send(): Promise<DeliveryResult> {
        return { ok: true };
    }
}

function message(adapter: MemoryAdapter, text: string): BotEvent {
    return adapter.message({ text, userId: "alice", sessionId: "room-1" });
}

describe("AdapterSupervisor", () => {
    let logger: MockLogger;
    let bus: InMemoryEventBus;
    let busEvents: BusEvent[];
    let received: BotEvent[];

    const sink = (event: BotEvent): void => {
        received.push(event);
    };

    function createSupervisor(maxRetries: number = 2): AdapterSupervisor {
        return new AdapterSupervisor({
            eventBus        : bus,
            logger,
            maxRetries,
            initialBackoffMs: 1,
            maxBackoffMs    : 5,
            backoffFactor   : 2,
        });
    }

    beforeEach(() => {
        logger = createMockLogger();
        bus = new InMemoryEventBus(logger);
        busEvents = [];
        bus.subscribe("*", (event) => {
            busEvents.push(event);
        });
        received = [];
    });

    describe("crash isolation", () => {
        // Scenario: Three adapters, one crashes until it is failed
        it("should fail a crashing adapter while the others keep delivering", async () => {
            const supervisor = createSupervisor(2);
            const alpha = new MemoryAdapter("alpha");
            const beta = new MemoryAdapter("beta");
            const broken = new CrashingAdapter("broken");
            const failed = new Promise<BusEvent>((resolve) => {
                bus.once("adapter:failed", resolve);
            });

            await supervisor.start([alpha, beta, broken], sink);
            const before = message(alpha, "before");
            await failed;
            const afterAlpha = message(alpha, "after");
            const afterBeta = message(beta, "after");

            await vi.waitFor(() => expect(received).toHaveLength(3));
            expect(received).toEqual(expect.arrayContaining([before, afterAlpha, afterBeta]));
            expect(broken.attempts).toBe(3);
            expect(supervisor.handle("broken")).toEqual({
                id       : "broken",
                state    : "failed",
                restarts : 2,
                lastError: 'Adapter "broken" receive failed: socket closed',
                startedAt: expect.any(String),
            });
            expect(supervisor.handle("alpha")?.state).toBe("running");
            expect(supervisor.handle("beta")?.state).toBe("running");
            expect(busEvents.filter((e) => e.type === "adapter:restarting").map((e) => e.data?.delayMs)).toEqual([1, 2]);
            expect(logger.error).toHaveBeenCalledWith("Adapter failed permanently", {
                adapterId: "broken",
                failures : 3,
                error    : 'Adapter "broken" receive failed: socket closed',
            });

            await supervisor.stop(100);
        });
    });

    describe("restarts", () => {
        // Scenario: Dropped stream is reopened
        it("should restart an adapter whose stream throws", async () => {
            const supervisor = createSupervisor();
            const adapter = new MemoryAdapter("m");

            await supervisor.start([adapter], sink);
            adapter.fail(new Error("connection reset"));
            await vi.waitFor(() => expect(adapter.starts).toBe(2));
            const event = message(adapter, "back");

            await vi.waitFor(() => expect(received).toEqual([event]));
            expect(supervisor.handle("m")).toMatchObject({
                state    : "running",
                restarts : 1,
                lastError: 'Adapter "m" receive failed: connection reset',
            });

            await supervisor.stop(100);
        });

        // Scenario: Delivering an event resets the failure budget
        it("should only count consecutive crashes", async () => {
            const supervisor = createSupervisor(1);
            const adapter = new MemoryAdapter("m");

            adapter.fail(new Error("first"));
            message(adapter, "between");
            adapter.fail(new Error("second"));
            await supervisor.start([adapter], sink);

            await vi.waitFor(() => expect(supervisor.handle("m")).toMatchObject({ state: "running", restarts: 2 }));
            expect(received).toHaveLength(1);

            await supervisor.stop(100);
        });

        // Scenario: start() rejects
        it("should report start failures as such", async () => {
            const supervisor = createSupervisor(0);
            const adapter = new MemoryAdapter("m");
            adapter.start = async (): Promise<void> => {
                throw new Error("no token");
            };

            await supervisor.start([adapter], sink);

            await vi.waitFor(() => expect(supervisor.handle("m")?.state).toBe("failed"));
            expect(supervisor.handle("m")?.lastError).toBe('Adapter "m" start failed: no token');
        });

        // Scenario: Stream ends while the supervisor is running
        it("should treat an ended stream as a crash", async () => {
            const supervisor = createSupervisor();
            const adapter = new MemoryAdapter("m");

            adapter.end();
            await supervisor.start([adapter], sink);

            await vi.waitFor(() => expect(adapter.starts).toBe(2));
            expect(supervisor.handle("m")?.lastError).toBe('Adapter "m" receive failed: event stream ended unexpectedly');

            await supervisor.stop(100);
        });
    });

    describe("start and stop pairing", () => {
        // Scenario: Every attempt crashes until the adapter fails
        it("should stop the adapter after every crashed attempt", async () => {
            const supervisor = createSupervisor(2);
            const adapter = new FlakyAdapter("flaky");

            await supervisor.start([adapter], sink);

            await vi.waitFor(() => expect(supervisor.handle("flaky")?.state).toBe("failed"));
            expect(adapter.calls).toEqual(["start", "stop", "start", "stop", "start", "stop"]);

            await supervisor.stop(100);
            expect(adapter.calls).toHaveLength(6);
        });

        // Scenario: stop() itself throws after a crash
        it("should log stop failures and keep restarting", async () => {
            const supervisor = createSupervisor(1);
            const adapter = new FlakyAdapter("flaky");
            adapter.stop = async (): Promise<void> => {
                throw new Error("already closed");
            };

            await supervisor.start([adapter], sink);

            await vi.waitFor(() => expect(supervisor.handle("flaky")?.state).toBe("failed"));
            expect(adapter.calls).toEqual(["start", "start"]);
            expect(supervisor.handle("flaky")?.lastError).toBe('Adapter "flaky" stop failed: already closed');
            expect(logger.error).toHaveBeenCalledWith("Adapter stop failed", {
                adapterId: "flaky",
                error    : "already closed",
            });
        });
    });

    describe("hooks", () => {
        // Scenario: Hooks run once per adapter, around the first start and the final stop
        it("should run startup and shutdown hooks once per adapter", async () => {
            const supervisor = createSupervisor();
            const adapter = new MemoryAdapter("m");
            const seen: string[] = [];
            supervisor
                .onAdapterStartup((target) => {
                    seen.push(`startup:${target.id}:${adapter.starts}`);
                })
                .onAdapterShutdown((target) => {
                    seen.push(`shutdown:${target.id}:${adapter.stops}`);
                });

            await supervisor.start([adapter], sink);
            adapter.fail(new Error("connection reset"));
            await vi.waitFor(() => expect(adapter.starts).toBe(2));
            await supervisor.stop(100);

            expect(seen).toEqual(["startup:m:0", "shutdown:m:1"]);
            expect(adapter.stops).toBe(2);
        });

        // Scenario: A hook throws
        it("should log hook failures and start the adapter anyway", async () => {
            const supervisor = createSupervisor();
            const adapter = new MemoryAdapter("m");
            supervisor.onAdapterStartup(() => {
                throw new Error("metrics offline");
            });

            await supervisor.start([adapter], sink);

            await vi.waitFor(() => expect(supervisor.handle("m")?.state).toBe("running"));
            expect(logger.error).toHaveBeenCalledWith("Adapter hook failed", {
                adapterId: "m",
                stage    : "startup",
                error    : "metrics offline",
            });

            await supervisor.stop(100);
        });
    });

    describe("start", () => {
        // Scenario: Same id twice
        it("should reject duplicate adapter ids", async () => {
            const supervisor = createSupervisor();

            await expect(supervisor.start([new MemoryAdapter("a"), new MemoryAdapter("a")], sink)).rejects.toThrow(
                "Adapter already registered: a"
            );
            expect(supervisor.handles()).toEqual([]);
        });
    });

    describe("send", () => {
        // Scenario: Routed by adapter id
        it("should deliver through the named adapter", async () => {
            const supervisor = createSupervisor();
            const adapter = new MemoryAdapter("m");
            await supervisor.start([adapter], sink);

            const result = await supervisor.send("m", "room-1", "hello");

            expect(result).toEqual({ ok: true, messageId: "1" });
            expect(adapter.sent).toEqual([{ target: "room-1", payload: "hello" }]);

            await supervisor.stop(100);
        });

        // Scenario: Unknown adapter and throwing adapter
        it("should report send failures without throwing", async () => {
            const supervisor = createSupervisor();
            const adapter = new MemoryAdapter("m");
            adapter.send = async (): Promise<DeliveryResult> => {
                throw new Error("offline");
            };
            await supervisor.start([adapter], sink);

            expect(await supervisor.send("nope", "x", "hi")).toEqual({ ok: false, error: "Unknown adapter: nope" });
            expect(await supervisor.send("m", "room-1", "hi")).toEqual({
                ok   : false,
                error: 'Adapter "m" send failed: offline',
            });
            expect(busEvents.filter((e) => e.type === "adapter:sendFailed").map((e) => e.data)).toEqual([
                { adapterId: "nope", target: "x", error: "Unknown adapter: nope" },
                { adapterId: "m", target: "room-1", error: 'Adapter "m" send failed: offline' },
            ]);

            await supervisor.stop(100);
        });
    });

    describe("stop", () => {
        // Scenario: Every loop ends and adapters are stopped
        it("should stop every adapter", async () => {
            const supervisor = createSupervisor();
            const a = new MemoryAdapter("a");
            const b = new MemoryAdapter("b");
            await supervisor.start([a, b], sink);
            await vi.waitFor(() => expect(a.starts + b.starts).toBe(2));

            const report = await supervisor.stop(100);

            expect(report).toEqual({ stopped: ["a", "b"], forced: [] });
            expect([a.stops, b.stops]).toEqual([1, 1]);
            expect(supervisor.handles().map((h) => h.state)).toEqual(["stopped", "stopped"]);
            expect(await supervisor.send("a", "room-1", "late")).toEqual({ ok: false, error: 'Adapter "a" is stopped' });
            await expect(supervisor.start([new MemoryAdapter("c")], sink)).rejects.toThrow("Adapter supervisor is stopped");
        });

        // Scenario: A loop ignores its abort signal
        it("should report and stop adapters that outlive the grace period", async () => {
            const supervisor = createSupervisor();
            const deaf = new DeafAdapter("deaf");
            await supervisor.start([deaf], sink);
            await vi.waitFor(() => expect(supervisor.handle("deaf")?.state).toBe("running"));

            const report = await supervisor.stop(20);

            expect(report).toEqual({ stopped: [], forced: ["deaf"] });
            expect(logger.warn).toHaveBeenCalledWith("Adapters did not stop within grace period", {
                graceMs: 20,
                forced : ["deaf"],
            });
            expect(deaf.stops).toBe(1);
            expect(supervisor.handle("deaf")?.state).toBe("stopped");
            expect(busEvents.filter((e) => e.type === "adapter:stopped").map((e) => e.data)).toEqual([
                { adapterId: "deaf", state: "stopped" },
            ]);
        });
    });
});
