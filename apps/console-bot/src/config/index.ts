/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    applyEnvOverrides,
    getDefaultConfig,
    loadConfig,
    loadConfigWithFallback,
    parseConfig,
    type AdapterRetryConfig,
    type AssistantConfig,
    type BotConfig,
    type ConfigEnv,
    type ConsoleConfig,
    type DispatchConfig,
    type HeartbeatConfig,
    type HistoryConfig,
    type PluginDirectoryConfig,
} from "./loadConfig.js";
