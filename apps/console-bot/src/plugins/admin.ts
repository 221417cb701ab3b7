/**
 * @fileoverview Admin plugin
 *
 * Superuser commands for managing plugins at runtime:
 * - /reload            re-sync the user plugin directory
 * - /reload <plugin>   reload one plugin from its source
 * - /plugins           list loaded plugins
 *
 * @module plugins/admin
 */

import {
    Reply,
    command,
    defineNode,
    definePlugin,
    describeError,
    superuser,
    type PluginDefinition,
} from "@switchyard/engine";
import { formatSyncReport, type SyncOptions, type SyncReport } from "./PluginDirectory.js";

/**
 * Registry operations the admin commands use.
 */
export interface PluginAdministration {
    plugins(): readonly string[];
    reload(pluginId: string): Promise<unknown>;
}

export interface AdminPluginOptions {
    readonly registry: PluginAdministration;

    /** Directory re-synced by a bare /reload */
    readonly directory?: { sync(options?: SyncOptions): Promise<SyncReport> };
}

const reloadCommand = command("reload");

/**
 * Create the admin plugin.
 */
export function createAdminPlugin(options: AdminPluginOptions): PluginDefinition {
    const { registry, directory } = options;

    const reload = defineNode({
        id         : "admin.reload",
        description: "/reload [plugin] - reload plugins (superusers)",
        priority   : 5,
        block      : true,
        rule       : reloadCommand,
        permission : superuser(),
        needs      : { match: reloadCommand.match, reply: Reply },
        async handle({ match, reply }, control) {
            const pluginId = match?.args ?? "";

            if (pluginId === "") {
                if (!directory) {
                    await reply("Usage: /reload <plugin>");
                    return;
                }
                const report = await directory.sync({ force: true });
                await reply(formatSyncReport(report));
                return;
            }

            try {
                await registry.reload(pluginId);
            }
            catch (error) {
                control.logger.warn("Reload failed", { pluginId, error: describeError(error) });
                await reply(`Reload of ${pluginId} failed: ${describeError(error)}`);
                return;
            }

            await reply(`Reloaded ${pluginId}`);
        },
    });

    const list = defineNode({
        id         : "admin.plugins",
        description: "/plugins - list loaded plugins (superusers)",
        priority   : 5,
        block      : true,
        rule       : command("plugins"),
        permission : superuser(),
        needs      : { reply: Reply },
        async handle({ reply }) {
            const ids = registry.plugins();
            await reply(ids.length === 0 ? "No plugins loaded." : `Plugins: ${ids.join(", ")}`);
        },
    });

    return definePlugin({
        id         : "admin",
        name       : "Admin",
        description: "Runtime plugin management",
        nodes      : [reload, list],
    });
}
