/**
 * @fileoverview Unit tests for Dispatcher
 *
 * Tests cover:
 * - Priority ordering and tier grouping
 * - Concurrent and sequential tiers
 * - Blocking (flag, control.block(), failing blockers) and skip()
 * - jumpTo() and prune()
 * - Event and node hooks, sharing the cycle's dependencies
 * - NodeState kept per node across events
 * - Matching: event types, permission before rule
 * - Dependency sharing across predicates and nodes of one event
 * - Teardown once, in reverse order, when a node fails
 * - Failure isolation for predicates, dependencies and handlers
 * - Snapshot isolation while plugins reload under load
 * - waitFor
 * - Graceful stop and cancellation
 *
 * @module @switchyard/engine/__tests__/Dispatcher
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { DispatchReport, DispatcherConfig } from "../engine/Dispatcher.js";
import { Dispatcher, groupTiers } from "../engine/Dispatcher.js";
import { NodeRegistry } from "../engine/NodeRegistry.js";
import { createBotEvent, getPlainText } from "../contracts/BotEvent.js";
import { NodeState } from "../dependencies/builtins.js";
import { defineDependency, defineResource } from "../contracts/Dependency.js";
import type { BusEvent } from "../contracts/EventBus.js";
import type { NodeDefinition } from "../contracts/Node.js";
import { defineNode } from "../contracts/Node.js";
import { definePlugin } from "../contracts/Plugin.js";
import { definePredicate } from "../contracts/Predicate.js";
import { superuser } from "../predicates/permissions.js";
import {
    DependencyResolutionError,
    DispatcherClosedError,
    HandlerExecutionError,
    PredicateEvaluationError,
} from "../errors/EngineErrors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { sleep } from "../utils/timing.js";
import {
    RecordingOutbound,
    createMockLogger,
    deferred,
    messageEvent,
    type MockLogger,
} from "./testUtils.js";

describe("Dispatcher", () => {
    let logger: MockLogger;
    let bus: InMemoryEventBus;
    let busEvents: BusEvent[];
    let registry: NodeRegistry;
    let outbound: RecordingOutbound;

    function createDispatcher(overrides: Partial<DispatcherConfig> = {}): Dispatcher {
        return new Dispatcher({
            registry,
            outbound,
            eventBus  : bus,
            logger,
            superusers: ["root"],
            ...overrides,
        });
    }

    async function load(...nodes: NodeDefinition[]): Promise<void> {
        await registry.load(definePlugin({ id: "demo", nodes }));
    }

    beforeEach(() => {
        logger = createMockLogger();
        bus = new InMemoryEventBus(logger);
        busEvents = [];
        bus.subscribe("*", (event) => {
            busEvents.push(event);
        });
        registry = new NodeRegistry({ logger: createMockLogger() });
        outbound = new RecordingOutbound();
    });

    describe("groupTiers", () => {
        // Scenario: Adjacent equal priorities form one tier
        it("should group runs of equal priority", async () => {
            await load(
                defineNode({ id: "a", priority: 5, handle: () => undefined }),
                defineNode({ id: "b", priority: 1, handle: () => undefined }),
                defineNode({ id: "c", priority: 5, handle: () => undefined })
            );

            const tiers = groupTiers(registry.current().nodes);

            expect(tiers.map((tier) => tier.map((n) => n.id))).toEqual([["b"], ["a", "c"]]);
        });
    });

    describe("ordering", () => {
        // Scenario: Lower priority first, registration order within a tier
        it("should run nodes by priority then registration order", async () => {
            const order: string[] = [];
            const record = (id: string, priority: number): NodeDefinition => defineNode({
                id,
                priority,
                handle: () => {
                    order.push(id);
                },
            });
            await load(record("a", 30), record("b", 10), record("c", 20), record("d", 10));

            const report = await createDispatcher({ tierMode: "sequential" }).submit(messageEvent("hi"));

            expect(order).toEqual(["b", "d", "c", "a"]);
            expect(report.outcomes.map((o) => [o.nodeId, o.status])).toEqual([
                ["b", "completed"],
                ["d", "completed"],
                ["c", "completed"],
                ["a", "completed"],
            ]);
            expect(report.status).toBe("completed");
        });

        // Scenario: Nodes of one tier overlap, the next tier waits
        it("should run a tier concurrently and wait for it before the next", async () => {
            const gate = deferred();
            const log: string[] = [];
            await load(
                defineNode({ id: "waiter", priority: 1, handle: async () => {
                    log.push("waiter:start");
                    await gate.promise;
                    log.push("waiter:end");
                } }),
                defineNode({ id: "opener", priority: 1, handle: () => {
                    log.push("opener");
                    gate.resolve();
                } }),
                defineNode({ id: "after", priority: 2, handle: () => {
                    log.push("after");
                } })
            );

            await createDispatcher().submit(messageEvent("hi"));

            expect(log.indexOf("opener")).toBeLessThan(log.indexOf("waiter:end"));
            expect(log[log.length - 1]).toBe("after");
        });
    });

    describe("blocking", () => {
        // Scenario: Blocking node stops lower tiers, not its own
        it("should finish the blocking tier and skip later tiers", async () => {
            const later = vi.fn();
            await load(
                defineNode({ id: "blocker", priority: 1, block: true, handle: () => undefined }),
                defineNode({ id: "peer", priority: 1, handle: () => undefined }),
                defineNode({ id: "later", priority: 2, handle: later })
            );

            const report = await createDispatcher().submit(messageEvent("hi"));

            expect(report.status).toBe("blocked");
            expect(report.blockedBy).toBe("blocker");
            expect(report.outcomes.map((o) => o.nodeId)).toEqual(["blocker", "peer"]);
            expect(later).not.toHaveBeenCalled();
        });

        // Scenario: Node decides to block at runtime
        it("should honour control.block()", async () => {
            const later = vi.fn();
            await load(
                defineNode({ id: "dynamic", priority: 1, handle: (_deps, control) => {
                    control.block();
                } }),
                defineNode({ id: "later", priority: 2, handle: later })
            );

            const report = await createDispatcher().submit(messageEvent("hi"));

            expect(report.blockedBy).toBe("dynamic");
            expect(later).not.toHaveBeenCalled();
        });

        // Scenario: An unmatched blocking node does not block
        it("should not block when the blocking node did not match", async () => {
            const later = vi.fn();
            await load(
                defineNode({ id: "blocker", priority: 1, block: true, eventTypes: ["notice"], handle: () => undefined }),
                defineNode({ id: "later", priority: 2, handle: later })
            );

            const report = await createDispatcher().submit(messageEvent("hi"));

            expect(report.status).toBe("completed");
            expect(later).toHaveBeenCalledTimes(1);
        });

        // Scenario: A blocking node that throws still blocks
        it("should block when a blocking handler fails", async () => {
            const later = vi.fn();
            await load(
                defineNode({ id: "blocker", priority: 1, block: true, handle: () => {
                    throw new Error("boom");
                } }),
                defineNode({ id: "later", priority: 2, handle: later })
            );

            const report = await createDispatcher().submit(messageEvent("hi"));

            expect(report.status).toBe("blocked");
            expect(report.outcomes[0].status).toBe("failed");
            expect(later).not.toHaveBeenCalled();
        });

        // Scenario: skip() abandons the node without blocking
        it("should record skip() as skipped and keep propagating", async () => {
            const later = vi.fn();
            await load(
                defineNode({ id: "shy", priority: 1, block: true, handle: (_deps, control) => control.skip() }),
                defineNode({ id: "later", priority: 2, handle: later })
            );

            const report = await createDispatcher().submit(messageEvent("hi"));

            expect(report.outcomes.map((o) => [o.nodeId, o.status])).toEqual([
                ["shy", "skipped"],
                ["later", "completed"],
            ]);
            expect(later).toHaveBeenCalledTimes(1);
            const dispatched = busEvents.find((e) => e.type === "event:dispatched");
            expect(dispatched?.data?.ran).toEqual(["later"]);
        });
    });

    describe("matching", () => {
        // Scenario: Event type filter and permission gate
        it("should leave nodes unmatched by type or permission", async () => {
            const ruleTest = vi.fn(() => true);
            await load(
                defineNode({ id: "notices", eventTypes: ["notice"], handle: () => undefined }),
                defineNode({
                    id        : "admin",
                    permission: superuser(),
                    rule      : definePredicate({ name: "counted", test: ruleTest }),
                    handle    : () => undefined,
                })
            );

            const report = await createDispatcher().submit(messageEvent("hi", { userId: "alice" }));

            expect(report.outcomes.map((o) => o.status)).toEqual(["unmatched", "unmatched"]);
            expect(ruleTest).not.toHaveBeenCalled();
        });

        // Scenario: Superuser passes the permission
        it("should run a permission-gated node for a superuser", async () => {
            await load(defineNode({ id: "admin", permission: superuser(), handle: () => undefined }));

            const report = await createDispatcher().submit(messageEvent("hi", { userId: "root" }));

            expect(report.outcomes[0].status).toBe("completed");
        });
    });

    describe("dependencies", () => {
        // Scenario: One production per event across predicates and nodes
        it("should share a dependency between a rule and several nodes", async () => {
            const provide = vi.fn(async () => ({ name: "Alice" }));
            const Profile = defineDependency({ name: "profile", provide });
            const seen: object[] = [];
            const known = definePredicate({
                name : "known",
                needs: { profile: Profile },
                test : ({ profile }) => {
                    seen.push(profile);
                    return true;
                },
            });
            const observe = (id: string, priority: number): NodeDefinition => defineNode({
                id,
                priority,
                rule  : known,
                needs : { profile: Profile },
                handle: ({ profile }) => {
                    seen.push(profile);
                },
            });
            await load(observe("first", 1), observe("second", 1), observe("third", 2));
            const dispatcher = createDispatcher();

            await dispatcher.submit(messageEvent("hi"));

            expect(provide).toHaveBeenCalledTimes(1);
            expect(seen).toHaveLength(6);
            expect(seen.every((profile) => profile === seen[0])).toBe(true);

            await dispatcher.submit(messageEvent("again"));

            expect(provide).toHaveBeenCalledTimes(2);
            expect(seen[6]).not.toBe(seen[0]);
        });

        // Scenario: Teardown after a failing node
        it("should tear down once in reverse order when a node throws", async () => {
            const released: string[] = [];
            const lease = (name: string) => defineResource({
                name,
                acquire: () => name,
                release: (value) => {
                    released.push(value);
                },
            });
            const First = lease("first");
            const Second = lease("second");
            await load(
                defineNode({ id: "opens", priority: 1, needs: { first: First }, handle: () => undefined }),
                defineNode({ id: "throws", priority: 2, needs: { second: Second }, handle: () => {
                    throw new Error("boom");
                } })
            );

            const report = await createDispatcher().submit(messageEvent("hi"));

            expect(released).toEqual(["second", "first"]);
            expect(report.outcomes[1].status).toBe("failed");
            expect(report.outcomes[1].error).toBeInstanceOf(HandlerExecutionError);
            expect(report.outcomes[1].error?.message).toBe('Node "throws" failed: boom');
            expect(report.teardownErrors).toEqual([]);
        });

        // Scenario: Release failure is reported, not thrown
        it("should report teardown failures", async () => {
            const Broken = defineResource({
                name   : "broken",
                acquire: () => 1,
                release: () => {
                    throw new Error("release boom");
                },
            });
            await load(defineNode({ id: "user", needs: { broken: Broken }, handle: () => undefined }));
            const event = messageEvent("hi");

            const report = await createDispatcher().submit(event);

            expect(report.teardownErrors.map((f) => f.dependency)).toEqual(["broken"]);
            const failure = busEvents.find((e) => e.type === "dependency:teardownFailed");
            expect(failure?.data).toEqual({ sequence: event.sequence, dependency: "broken", error: "release boom" });
        });
    });

    describe("failure isolation", () => {
        // Scenario: Predicate, dependency and handler failures stay with their node
        it("should record each failure on its node and run the siblings", async () => {
            const Broken = defineDependency<number>({
                name   : "broken",
                provide: () => {
                    throw new Error("nope");
                },
            });
            await load(
                defineNode({
                    id  : "picky",
                    rule: definePredicate({
                        name: "explode",
                        test: () => {
                            throw new Error("kaboom");
                        },
                    }),
                    handle: () => undefined,
                }),
                defineNode({ id: "needy", needs: { broken: Broken }, handle: () => undefined }),
                defineNode({ id: "fine", handle: () => undefined })
            );

            const report = await createDispatcher().submit(messageEvent("hi"));

            expect(report.status).toBe("completed");
            expect(report.outcomes.map((o) => o.status)).toEqual(["failed", "failed", "completed"]);
            expect(report.outcomes[0].error).toBeInstanceOf(PredicateEvaluationError);
            expect(report.outcomes[0].error?.message).toBe('Predicate "explode" failed for node "picky": kaboom');
            expect(report.outcomes[1].error).toBeInstanceOf(DependencyResolutionError);
            expect(report.outcomes[1].error?.message).toBe("Cannot resolve broken: nope");
            expect(logger.error).toHaveBeenCalledWith("Node failed", {
                nodeId  : "picky",
                pluginId: "demo",
                code    : "PREDICATE_EVALUATION",
                error   : 'Predicate "explode" failed for node "picky": kaboom',
                traceId : report.traceId,
            });
        });

        // Scenario: Handler exceeds its timeout
        it("should fail a node that exceeds its timeout", async () => {
            await load(defineNode({ id: "slow", timeoutMs: 20, handle: () => sleep(500) }));

            const report = await createDispatcher().submit(messageEvent("hi"));

            expect(report.outcomes[0].status).toBe("failed");
            expect(report.outcomes[0].error).toMatchObject({ timedOut: true, message: 'Node "slow" timed out' });
        });
    });

    describe("node control", () => {
        // Scenario: reply() and the scoped logger
        it("should reply to the event's session and tag log lines", async () => {
            await load(defineNode({ id: "talk", handle: async (_deps, control) => {
                control.logger.info("answering", { n: 1 });
                await control.reply("pong");
            } }));

            const report = await createDispatcher().submit(messageEvent("ping"));

            expect(outbound.sent).toEqual([{ adapterId: "test", target: "room-1", payload: "pong" }]);
            expect(logger.info).toHaveBeenCalledWith("[demo:talk] answering", { n: 1, traceId: report.traceId });
        });

        // Scenario: Bus trail of a cycle
        it("should emit received, completed and dispatched", async () => {
            await load(defineNode({ id: "talk", handle: () => undefined }));
            const event = messageEvent("hi");

            const report = await createDispatcher().submit(event);

            expect(busEvents.map((e) => e.type)).toEqual(["event:received", "node:completed", "event:dispatched"]);
            expect(busEvents.every((e) => e.traceId === report.traceId)).toBe(true);
            expect(busEvents[0].data).toEqual({
                sequence       : event.sequence,
                type           : "message",
                adapterId      : "test",
                snapshotVersion: 1,
            });
            expect(busEvents[2].data).toMatchObject({ sequence: event.sequence, status: "completed", ran: ["talk"] });
        });
    });

    describe("snapshots", () => {
        // Scenario: Reload while 100 cycles are in flight
        it("should give every cycle one consistent snapshot across a reload", async () => {
            const gate = deferred();
            const version = (tag: string): NodeDefinition[] => [
                defineNode({ id: `head-${tag}`, priority: 1, handle: () => gate.promise }),
                defineNode({ id: `tail-${tag}`, priority: 2, handle: () => undefined }),
            ];
            await registry.load(definePlugin({ id: "hot", nodes: version("v1") }));
            const dispatcher = createDispatcher();

            const cycles: Promise<DispatchReport>[] = [];
            for (let i = 0; i < 100; i++) {
                if (i === 50) {
                    await registry.reload("hot", definePlugin({ id: "hot", nodes: version("v2") }));
                }
                cycles.push(dispatcher.submit(messageEvent(`event ${i}`)));
            }
            expect(dispatcher.pending).toBe(100);
            gate.resolve();
            const reports = await Promise.all(cycles);

            reports.forEach((report, i) => {
                const tag = i < 50 ? "v1" : "v2";
                expect(report.snapshotVersion).toBe(i < 50 ? 1 : 2);
                expect(report.outcomes.map((o) => [o.nodeId, o.status])).toEqual([
                    [`head-${tag}`, "completed"],
                    [`tail-${tag}`, "completed"],
                ]);
            });
            expect(dispatcher.pending).toBe(0);
        });
    });

    describe("jumpTo and prune", () => {
        // Scenario: A router jumps past a tier and part of the next
        it("should resume the cycle at the jump target", async () => {
            const ran: string[] = [];
            const track = (id: string, priority: number): NodeDefinition => defineNode({
                id,
                priority,
                handle: () => {
                    ran.push(id);
                },
            });
            await load(
                defineNode({ id: "router", priority: 1, handle: (_deps, control) => control.jumpTo("target") }),
                track("sibling", 1),
                track("between", 2),
                track("before", 3),
                track("target", 3),
                track("after", 4)
            );

            const report = await createDispatcher({ tierMode: "sequential" }).submit(messageEvent("hi"));

            expect(ran).toEqual(["sibling", "target", "after"]);
            expect(report.outcomes.map((o) => [o.nodeId, o.status])).toEqual([
                ["router", "skipped"],
                ["sibling", "completed"],
                ["target", "completed"],
                ["after", "completed"],
            ]);
            expect(busEvents.find((e) => e.type === "node:skipped")?.data).toEqual({
                nodeId  : "router",
                pluginId: "demo",
                reason  : "jump",
                jumpTo  : "target",
            });
        });

        // Scenario: Jumps backwards, sideways or nowhere
        it("should treat a jump to an earlier or unknown node as a skip", async () => {
            const last = vi.fn();
            await load(
                defineNode({ id: "first", priority: 1, handle: () => undefined }),
                defineNode({ id: "loop", priority: 2, handle: (_deps, control) => control.jumpTo("first") }),
                defineNode({ id: "lost", priority: 2, handle: (_deps, control) => control.jumpTo("nowhere") }),
                defineNode({ id: "last", priority: 3, handle: last })
            );

            const report = await createDispatcher().submit(messageEvent("hi"));

            expect(report.outcomes.map((o) => [o.nodeId, o.status])).toEqual([
                ["first", "completed"],
                ["loop", "skipped"],
                ["lost", "skipped"],
                ["last", "completed"],
            ]);
            expect(last).toHaveBeenCalledTimes(1);
            expect(logger.warn).toHaveBeenCalledWith("Jump target ignored", {
                nodeId  : "loop",
                targetId: "first",
                reason  : "not in a later tier",
                traceId : report.traceId,
            });
            expect(logger.warn).toHaveBeenCalledWith("Jump target ignored", {
                nodeId  : "lost",
                targetId: "nowhere",
                reason  : "unknown node",
                traceId : report.traceId,
            });
        });

        // Scenario: A plugin opts out of an event after its first node
        it("should keep a pruned plugin out of later tiers only", async () => {
            const play = vi.fn();
            const chat = vi.fn();
            await registry.load(definePlugin({ id: "games", nodes: [
                defineNode({ id: "games.gate", priority: 1, handle: (_deps, control) => control.prune() }),
                defineNode({ id: "games.play", priority: 2, handle: play }),
            ] }));
            await registry.load(definePlugin({ id: "chat", nodes: [
                defineNode({ id: "chat.reply", priority: 2, handle: chat }),
            ] }));

            const report = await createDispatcher().submit(messageEvent("hi"));

            expect(report.outcomes.map((o) => [o.nodeId, o.status])).toEqual([
                ["games.gate", "skipped"],
                ["chat.reply", "completed"],
            ]);
            expect(play).not.toHaveBeenCalled();
            expect(chat).toHaveBeenCalledTimes(1);
            expect(report.status).toBe("completed");
        });
    });

    describe("hooks", () => {
        // Scenario: Preprocessor filters spam before any node
        it("should drop an event a preprocessor rejects", async () => {
            const handle = vi.fn();
            await load(defineNode({ id: "echo", handle }));
            const dispatcher = createDispatcher().onEventPreprocess((event) => getPlainText(event) !== "spam");
            const spam = messageEvent("spam");

            const dropped = await dispatcher.submit(spam);
            const kept = await dispatcher.submit(messageEvent("ham"));

            expect(dropped).toMatchObject({ status: "dropped", outcomes: [] });
            expect(kept.status).toBe("completed");
            expect(handle).toHaveBeenCalledTimes(1);
            expect(busEvents.filter((e) => e.type === "event:dropped").map((e) => e.data)).toEqual([
                { sequence: spam.sequence },
            ]);
        });

        // Scenario: Hooks and nodes resolve the same per-event value
        it("should share the cycle's dependencies with event hooks", async () => {
            const provide = vi.fn(() => ({ id: "session-7" }));
            const Session = defineDependency({ name: "session", provide });
            const seen: unknown[] = [];
            await load(defineNode({
                id    : "use",
                needs : { session: Session },
                handle: ({ session }) => {
                    seen.push(session);
                },
            }));
            const dispatcher = createDispatcher()
                .onEventPreprocess(async (_event, resolver) => {
                    seen.push(await resolver.resolve(Session));
                })
                .onEventPostprocess(async (_event, resolver, status) => {
                    seen.push(await resolver.resolve(Session), status);
                });

            await dispatcher.submit(messageEvent("hi"));

            expect(provide).toHaveBeenCalledTimes(1);
            expect(seen).toEqual([{ id: "session-7" }, { id: "session-7" }, { id: "session-7" }, "completed"]);
            expect(seen[1]).toBe(seen[0]);
            expect(seen[2]).toBe(seen[0]);
        });

        // Scenario: Node hooks gate nodes and see their errors
        it("should run node hooks around each matched node", async () => {
            const calls: string[] = [];
            await load(
                defineNode({ id: "muted", handle: () => {
                    calls.push("muted ran");
                } }),
                defineNode({ id: "broken", handle: () => {
                    throw new Error("boom");
                } }),
                defineNode({ id: "fine", handle: () => undefined })
            );
            const dispatcher = createDispatcher({ tierMode: "sequential" })
                .onNodePreprocess((node) => node.id !== "muted")
                .onNodePostprocess((node, _resolver, error) => {
                    calls.push(`${node.id}: ${error?.message ?? "ok"}`);
                });

            const report = await dispatcher.submit(messageEvent("hi"));

            expect(report.outcomes.map((o) => [o.nodeId, o.status])).toEqual([
                ["muted", "skipped"],
                ["broken", "failed"],
                ["fine", "completed"],
            ]);
            expect(calls).toEqual(['broken: Node "broken" failed: boom', "fine: ok"]);
            expect(busEvents.find((e) => e.type === "node:skipped")?.data).toEqual({
                nodeId  : "muted",
                pluginId: "demo",
                reason  : "preprocessor",
            });
        });

        // Scenario: A node preprocessor throws
        it("should fail the node when its preprocessor throws", async () => {
            const handle = vi.fn();
            await load(defineNode({ id: "echo", handle }));
            const dispatcher = createDispatcher().onNodePreprocess(() => {
                throw new Error("gate down");
            });

            const report = await dispatcher.submit(messageEvent("hi"));

            expect(report.outcomes[0].status).toBe("failed");
            expect(report.outcomes[0].error?.message).toBe('Node "echo" failed: gate down');
            expect(handle).not.toHaveBeenCalled();
        });

        // Scenario: Event preprocessor and node postprocessor throw
        it("should log hook failures and finish the cycle", async () => {
            await load(defineNode({ id: "echo", handle: () => undefined }));
            const dispatcher = createDispatcher()
                .onEventPreprocess(() => {
                    throw new Error("pre down");
                })
                .onNodePostprocess(() => {
                    throw new Error("post down");
                });

            const report = await dispatcher.submit(messageEvent("hi"));

            expect(report.status).toBe("completed");
            expect(report.outcomes.map((o) => o.status)).toEqual(["completed"]);
            expect(logger.error).toHaveBeenCalledWith("Dispatch hook failed", {
                stage  : "eventPreprocess",
                error  : "pre down",
                traceId: report.traceId,
            });
            expect(busEvents.filter((e) => e.type === "hook:failed").map((e) => e.data)).toEqual([
                { stage: "eventPreprocess", error: "pre down" },
                { stage: "nodePostprocess", nodeId: "echo", error: "post down" },
            ]);
        });
    });

    describe("node state", () => {
        // Scenario: Two counters over two events
        it("should keep state per node across events", async () => {
            const counter = (id: string, step: number): NodeDefinition => defineNode({
                id,
                needs : { state: NodeState },
                handle: ({ state }) => {
                    state.set("count", Number(state.get("count") ?? 0) + step);
                },
            });
            await load(counter("ones", 1), counter("tens", 10));
            const dispatcher = createDispatcher();

            await dispatcher.submit(messageEvent("first"));
            await dispatcher.submit(messageEvent("second"));

            expect(dispatcher.nodeState("ones").get("count")).toBe(2);
            expect(dispatcher.nodeState("tens").get("count")).toBe(20);
        });
    });

    describe("waitFor", () => {
        // Scenario: Matching event is consumed
        it("should hand a matching event to the waiter instead of the nodes", async () => {
            const handle = vi.fn();
            await load(defineNode({ id: "echo", handle }));
            const dispatcher = createDispatcher();
            const answer = messageEvent("yes");

            const waiting = dispatcher.waitFor((event) => getPlainText(event) === "yes");
            const other = await dispatcher.submit(messageEvent("no"));
            const consumed = await dispatcher.submit(answer);

            expect(other.status).toBe("completed");
            expect(consumed).toMatchObject({ status: "consumed", outcomes: [] });
            await expect(waiting).resolves.toBe(answer);
            expect(handle).toHaveBeenCalledTimes(1);
        });

        // Scenario: Too many non-matching events
        it("should give up after maxEvents rejected events", async () => {
            const dispatcher = createDispatcher();
            const waiting = expect(dispatcher.waitFor(() => false, { maxEvents: 2 })).rejects.toThrow(
                "No matching event: 2 events did not match"
            );

            await dispatcher.submit(messageEvent("one"));
            await dispatcher.submit(messageEvent("two"));

            await waiting;
        });

        // Scenario: Nothing arrives in time
        it("should give up after timeoutMs", async () => {
            await expect(createDispatcher().waitFor(() => true, { timeoutMs: 10 })).rejects.toThrow(
                "No matching event: timed out after 10ms"
            );
        });

        // Scenario: Filter throws
        it("should reject the waiter whose filter throws and dispatch normally", async () => {
            const handle = vi.fn();
            await load(defineNode({ id: "echo", handle }));
            const dispatcher = createDispatcher();
            const waiting = expect(dispatcher.waitFor(() => {
                throw new Error("bad filter");
            })).rejects.toThrow("bad filter");

            const report = await dispatcher.submit(messageEvent("hi"));

            await waiting;
            expect(report.status).toBe("completed");
            expect(handle).toHaveBeenCalledTimes(1);
        });

        // Scenario: Stop rejects pending waiters
        it("should reject waiters when the dispatcher stops", async () => {
            const dispatcher = createDispatcher();
            const waiting = expect(dispatcher.waitFor(() => true)).rejects.toBeInstanceOf(DispatcherClosedError);

            await dispatcher.stop(0);

            await waiting;
        });
    });

    describe("stop", () => {
        // Scenario: Work finishing inside the grace period completes
        it("should drain cycles that finish within the grace period", async () => {
            let finished = false;
            await load(defineNode({ id: "brief", handle: async () => {
                await sleep(20);
                finished = true;
            } }));
            const dispatcher = createDispatcher();

            const cycle = dispatcher.submit(messageEvent("hi"));
            const result = await dispatcher.stop(1000);

            expect(result).toEqual({ drained: 1, cancelled: 0 });
            expect(finished).toBe(true);
            expect((await cycle).status).toBe("completed");
            expect(dispatcher.isAccepting).toBe(false);
            await expect(dispatcher.submit(messageEvent("late"))).rejects.toBeInstanceOf(DispatcherClosedError);
        });

        // Scenario: Work beyond the grace period is cancelled and torn down
        it("should cancel cycles past the grace period and still tear them down", async () => {
            const release = vi.fn();
            const Lease = defineResource({ name: "lease", acquire: () => "lease", release });
            const later = vi.fn();
            await load(
                defineNode({ id: "quick", eventTypes: ["notice"], handle: () => sleep(10) }),
                defineNode({
                    id        : "stuck",
                    priority  : 1,
                    eventTypes: ["message"],
                    needs     : { lease: Lease },
                    handle    : () => new Promise<void>(() => undefined),
                }),
                defineNode({ id: "later", priority: 99, handle: later })
            );
            const dispatcher = createDispatcher();

            const quick = dispatcher.submit(createBotEvent({ type: "notice", adapterId: "test", payload: {} }));
            const stuck = dispatcher.submit(messageEvent("hi"));
            const result = await dispatcher.stop(50);

            expect(result).toEqual({ drained: 1, cancelled: 1 });
            expect((await quick).status).toBe("completed");
            const report = await stuck;
            expect(report.status).toBe("cancelled");
            expect(report.outcomes.map((o) => [o.nodeId, o.status])).toEqual([["stuck", "cancelled"]]);
            expect(release).toHaveBeenCalledTimes(1);
            expect(release).toHaveBeenCalledWith("lease");
            expect(later).toHaveBeenCalledTimes(1);
            expect(logger.warn).toHaveBeenCalledWith("Grace period elapsed, cancelling dispatch cycles", {
                graceMs: 50,
                cycles : 1,
            });
            expect(busEvents.filter((e) => e.type === "node:cancelled").map((e) => e.data?.nodeId)).toEqual(["stuck"]);
        });
    });
});
