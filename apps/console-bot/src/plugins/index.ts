/**
 * @fileoverview Plugin barrel exports
 *
 * @module plugins
 */

export { createAdminPlugin, type AdminPluginOptions, type PluginAdministration } from "./admin.js";
export { createAssistantPlugin, ASSISTANT_UNAVAILABLE, type AssistantPluginOptions } from "./assistant.js";
export { createCorePlugin, LAST_HEARTBEAT_KEY, type CorePluginOptions } from "./core.js";
export {
    createHistoryPlugin,
    historySession,
    MAX_HISTORY_LIMIT,
    type HistoryPluginOptions,
} from "./history.js";
export {
    PluginDirectory,
    formatSyncReport,
    type PluginDirectoryOptions,
    type PluginHost,
    type SyncFailure,
    type SyncOptions,
    type SyncReport,
} from "./PluginDirectory.js";
