/**
 * @fileoverview Plugin Contract
 *
 * A plugin groups nodes that are loaded, reloaded and unloaded together.
 *
 * @module @switchyard/engine/contracts/Plugin
 */

import type { NodeDefinition } from "./Node.js";
import { isNodeDefinition } from "./Node.js";

/**
 * Plugin definition.
 */
export interface PluginDefinition {
    /** Unique identifier; reload and unload address plugins by it */
    readonly id: string;

    /** Human-readable name */
    readonly name?: string;

    /** Description of what the plugin does */
    readonly description?: string;

    /** Nodes registered by this plugin */
    readonly nodes: readonly NodeDefinition[];

    /**
     * Called before the plugin's nodes are published. A rejection aborts the
     * load or reload and keeps the previous snapshot.
     */
    setup?(): void | Promise<void>;

    /**
     * Called after the plugin's nodes were replaced or removed.
     */
    dispose?(): void | Promise<void>;
}

/**
 * A plugin definition, or a factory producing one. Factories are called
 * again on every reload, which is how file-backed plugins pick up changes.
 */
export type PluginSource =
    | PluginDefinition
    | (() => PluginDefinition | Promise<PluginDefinition>);

/**
 * Identity helper for plugin modules.
 *
 * @example
 * ```typescript
 * export default definePlugin({
 *     id   : "greetings",
 *     nodes: [hello, goodbye],
 * });
 * ```
 */
export function definePlugin(definition: PluginDefinition): PluginDefinition {
    return definition;
}

/**
 * Type guard for plugin definitions.
 */
export function isPluginDefinition(obj: unknown): obj is PluginDefinition {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "nodes" in obj &&
        Array.isArray(obj.nodes) &&
        obj.nodes.every((node: unknown) => isNodeDefinition(node))
    );
}
