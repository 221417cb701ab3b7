/**
 * @fileoverview NodeRegistry
 *
 * Owns the authoritative set of loaded plugins and publishes it to the
 * dispatcher as immutable snapshots.
 *
 * Swap protocol for every load, reload and unload:
 * 1. Build the candidate plugin set (never touching the live one)
 * 2. Validate it: unique node ids, integer priorities, acyclic
 *    dependency graphs
 * 3. Run the incoming plugin's setup hook
 * 4. Publish a new frozen snapshot with one reference assignment
 * 5. Dispose the plugin instance that was replaced or removed
 *
 * A failure in steps 1-3 rejects the mutation and leaves the previous
 * snapshot active. Mutations are serialized, so two reloads racing each
 * other apply one after the other instead of losing an update.
 *
 * @module @switchyard/engine/engine/NodeRegistry
 */

import type { Dependency } from "../contracts/Dependency.js";
import type { EventBus } from "../contracts/EventBus.js";
import { createBusEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { defaultLogger } from "../contracts/Logger.js";
import type { NodeDefinition, RegisteredNode } from "../contracts/Node.js";
import { DEFAULT_NODE_PRIORITY, compareNodes } from "../contracts/Node.js";
import type { PluginDefinition, PluginSource } from "../contracts/Plugin.js";
import { analyzeDependencies } from "../dependencies/DependencyGraph.js";
import {
    RegistryValidationError,
    describeError,
} from "../errors/EngineErrors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";

/**
 * Plugin summary carried by a snapshot.
 */
export interface PluginSummary {
    readonly id: string;
    readonly name?: string;
    readonly nodeIds: readonly string[];
}

/**
 * Immutable view of the active node set.
 */
export interface RegistrySnapshot {
    /** Increments with every published swap; the empty registry is 0 */
    readonly version: number;

    /** Nodes in execution order: priority, then registration order */
    readonly nodes: readonly RegisteredNode[];

    readonly plugins: readonly PluginSummary[];
}

/**
 * Anything that can hand out the current snapshot.
 */
export interface SnapshotSource {
    current(): RegistrySnapshot;
}

/**
 * Registry configuration.
 */
export interface NodeRegistryConfig {
    readonly eventBus?: EventBus;
    readonly logger?: EngineLogger;
}

type RegistryOperation = "load" | "reload" | "unload";

interface LoadedPlugin {
    readonly definition: PluginDefinition;
    readonly source: PluginSource;
    readonly nodes: readonly RegisteredNode[];
}

const EMPTY_SNAPSHOT: RegistrySnapshot = Object.freeze({
    version: 0,
    nodes  : Object.freeze([]),
    plugins: Object.freeze([]),
});

/**
 * NodeRegistry - plugin set with atomic snapshot publication.
 *
 * @example
 * ```typescript
 * const registry = new NodeRegistry();
 *
 * await registry.load(corePlugin);
 * await registry.load(() => loader.loadYamlFile("./plugins/replies.yml"));
 *
 * // Later, after the file changed
 * await registry.reload("replies");
 * ```
 */
export class NodeRegistry implements SnapshotSource {
    private readonly eventBus: EventBus;
    private readonly logger: EngineLogger;

    private snapshot: RegistrySnapshot = EMPTY_SNAPSHOT;
    private loaded: ReadonlyMap<string, LoadedPlugin> = new Map();
    private registrationSequence = 0;
    private queue: Promise<void> = Promise.resolve();

    constructor(config: NodeRegistryConfig = {}) {
        this.logger = config.logger ?? defaultLogger;
        this.eventBus = config.eventBus ?? new InMemoryEventBus(this.logger);
    }

    /**
     * The snapshot new dispatch cycles should use.
     */
    current(): RegistrySnapshot {
        return this.snapshot;
    }

    /**
     * Whether a plugin with this id is loaded.
     */
    has(pluginId: string): boolean {
        return this.loaded.has(pluginId);
    }

    /**
     * Ids of the loaded plugins.
     */
    plugins(): readonly string[] {
        return [...this.loaded.keys()];
    }

    /**
     * Load a new plugin.
     *
     * @returns The registered nodes
     * @throws RegistryValidationError if the id is taken or validation fails
     */
    load(source: PluginSource): Promise<readonly RegisteredNode[]> {
        return this.enqueue(async () => {
            const definition = await this.materialize(source, "load");

            if (this.loaded.has(definition.id)) {
                throw this.reject("load", definition.id, new RegistryValidationError(
                    `Plugin "${definition.id}" is already loaded; use reload`
                ));
            }

            return this.swap("load", definition, source);
        });
    }

    /**
     * Replace a loaded plugin with a fresh instance.
     *
     * Without `source` the plugin's last source is used again, so a
     * factory source re-reads its file. With `source`, it becomes the
     * plugin's source from now on. Reloading an id that is not loaded
     * requires a source and behaves like a load.
     *
     * @throws RegistryValidationError on validation failure; nothing changes
     */
    reload(pluginId: string, source?: PluginSource): Promise<readonly RegisteredNode[]> {
        return this.enqueue(async () => {
            const effective = source ?? this.loaded.get(pluginId)?.source;
            if (effective === undefined) {
                throw this.reject("reload", pluginId, new RegistryValidationError(
                    `Plugin "${pluginId}" is not loaded`
                ));
            }

            const definition = await this.materialize(effective, "reload");
            if (definition.id !== pluginId) {
                throw this.reject("reload", pluginId, new RegistryValidationError(
                    `Reload of "${pluginId}" produced plugin "${definition.id}"`
                ));
            }

            return this.swap("reload", definition, effective);
        });
    }

    /**
     * Remove a plugin and its nodes.
     *
     * @returns false if no such plugin was loaded
     */
    unload(pluginId: string): Promise<boolean> {
        return this.enqueue(async () => {
            const existing = this.loaded.get(pluginId);
            if (!existing) {
                return false;
            }

            const next = new Map(this.loaded);
            next.delete(pluginId);
            this.publish(next, "unload", pluginId);
            await this.dispose(existing);
            return true;
        });
    }

    private async swap(
        operation: RegistryOperation,
        definition: PluginDefinition,
        source: PluginSource
    ): Promise<readonly RegisteredNode[]> {
        const nodes = Object.freeze(definition.nodes.map((node) => this.register(definition.id, node)));
        const previous = this.loaded.get(definition.id);

        const next = new Map(this.loaded);
        next.set(definition.id, { definition, source, nodes });

        const issues = this.validate(next);
        if (issues.length > 0) {
            throw this.reject(operation, definition.id, new RegistryValidationError(
                `Plugin "${definition.id}" rejected`,
                issues
            ));
        }

        if (definition.setup) {
            try {
                await definition.setup();
            }
            catch (error) {
                throw this.reject(operation, definition.id, new RegistryValidationError(
                    `Plugin "${definition.id}" setup failed`,
                    [describeError(error)],
                    error
                ));
            }
        }

        this.publish(next, operation, definition.id);

        if (previous) {
            await this.dispose(previous);
        }

        return nodes;
    }

    private register(pluginId: string, node: NodeDefinition): RegisteredNode {
        this.registrationSequence += 1;

        return Object.freeze({
            id               : node.id,
            pluginId,
            priority         : node.priority ?? DEFAULT_NODE_PRIORITY,
            block            : node.block ?? false,
            registrationOrder: this.registrationSequence,
            eventTypes       : node.eventTypes,
            rule             : node.rule,
            permission       : node.permission,
            needs            : node.needs ?? {},
            timeoutMs        : node.timeoutMs,
            definition       : node,
        });
    }

    private validate(plugins: ReadonlyMap<string, LoadedPlugin>): string[] {
        const issues: string[] = [];
        const owners = new Map<string, string>();

        for (const [pluginId, plugin] of plugins) {
            if (pluginId.trim() === "") {
                issues.push("Plugin id must not be empty");
            }

            for (const node of plugin.nodes) {
                const owner = owners.get(node.id);
                if (owner !== undefined) {
                    issues.push(`Duplicate node id "${node.id}" (plugins "${owner}" and "${pluginId}")`);
                }
                else {
                    owners.set(node.id, pluginId);
                }

                if (!Number.isInteger(node.priority)) {
                    issues.push(`Node "${node.id}" has non-integer priority ${node.priority}`);
                }

                const analysis = analyzeDependencies(this.rootsOf(node));
                if (analysis.cycle) {
                    issues.push(`Node "${node.id}" has a dependency cycle: ${analysis.cycle.join(" -> ")}`);
                }
                for (const error of analysis.errors) {
                    issues.push(`Node "${node.id}": ${error}`);
                }
            }
        }

        return issues;
    }

    private rootsOf(node: RegisteredNode): Dependency<unknown>[] {
        return [
            ...Object.values(node.needs),
            ...(node.rule?.dependencies() ?? []),
            ...(node.permission?.dependencies() ?? []),
        ];
    }

    private publish(
        plugins: ReadonlyMap<string, LoadedPlugin>,
        operation: RegistryOperation,
        pluginId: string
    ): void {
        const nodes = [...plugins.values()].flatMap((plugin) => plugin.nodes).sort(compareNodes);
        const summaries = [...plugins.values()].map((plugin) => Object.freeze({
            id     : plugin.definition.id,
            name   : plugin.definition.name,
            nodeIds: Object.freeze(plugin.nodes.map((node) => node.id)),
        }));

        const snapshot: RegistrySnapshot = Object.freeze({
            version: this.snapshot.version + 1,
            nodes  : Object.freeze(nodes),
            plugins: Object.freeze(summaries),
        });

        this.loaded = plugins;
        this.snapshot = snapshot;

        this.eventBus.emit(createBusEvent("registry:swapped", {
            operation,
            pluginId,
            version: snapshot.version,
            nodes  : nodes.length,
        }));

        this.logger.info("Registry snapshot published", {
            operation,
            pluginId,
            version: snapshot.version,
            nodes  : nodes.length,
        });
    }

    private async materialize(source: PluginSource, operation: RegistryOperation): Promise<PluginDefinition> {
        if (typeof source !== "function") {
            return source;
        }

        try {
            return await source();
        }
        catch (error) {
            throw this.reject(operation, "(unknown)", new RegistryValidationError(
                "Plugin source failed",
                [describeError(error)],
                error
            ));
        }
    }

    private async dispose(plugin: LoadedPlugin): Promise<void> {
        if (!plugin.definition.dispose) {
            return;
        }

        try {
            await plugin.definition.dispose();
        }
        catch (error) {
            this.logger.error("Plugin dispose failed", {
                pluginId: plugin.definition.id,
                error   : describeError(error),
            });
        }
    }

    private reject(
        operation: RegistryOperation,
        pluginId: string,
        error: RegistryValidationError
    ): RegistryValidationError {
        this.eventBus.emit(createBusEvent("registry:rejected", {
            operation,
            pluginId,
            issues: error.issues,
            error : error.message,
        }));

        this.logger.warn("Registry mutation rejected", {
            operation,
            pluginId,
            error: error.message,
        });

        return error;
    }

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task);
        this.queue = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }
}
