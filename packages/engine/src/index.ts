/**
 * @fileoverview Switchyard Engine
 *
 * Event-driven bot framework core.
 *
 * The engine provides:
 * - Adapters normalizing external protocols into immutable events
 * - Priority-tiered node dispatch with blocking and per-node failure isolation
 * - Per-event dependency resolution with scoped resources and ordered teardown
 * - Composable rule and permission predicates
 * - Plugin hot-reload through atomically swapped registry snapshots
 *
 * @module @switchyard/engine
 * @example
 * ```typescript
 * import {
 *     Bot,
 *     MemoryAdapter,
 *     Reply,
 *     command,
 *     defineNode,
 *     definePlugin,
 * } from "@switchyard/engine";
 *
 * const ping = defineNode({
 *     id   : "ping",
 *     rule : command("ping"),
 *     needs: { reply: Reply },
 *     handle: ({ reply }) => reply("pong").then(() => undefined),
 * });
 *
 * const bot = new Bot();
 * bot.addAdapter(new MemoryAdapter());
 * await bot.load(definePlugin({ id: "core", nodes: [ping] }));
 * await bot.run();
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Error exports
// ============================================================================

export * from "./errors/index.js";

// ============================================================================
// Dependency exports
// ============================================================================

export * from "./dependencies/index.js";

// ============================================================================
// Predicate exports
// ============================================================================

export * from "./predicates/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export * from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export * from "./engine/index.js";

// ============================================================================
// Plugin loading
// ============================================================================

export * from "./plugins/index.js";

// ============================================================================
// Utilities
// ============================================================================

export {
    abortable,
    computeBackoff,
    generateTraceId,
    settleWithin,
    sleep,
    withTimeout,
    type BackoffPolicy,
} from "./utils/timing.js";
