/**
 * @fileoverview Engine barrel exports
 *
 * @module @switchyard/engine/engine
 */

export {
    Bot,
    type BotOptions,
    type BotStopReport,
    type LifecycleHook,
} from "./Bot.js";
export {
    Dispatcher,
    groupTiers,
    type DispatchReport,
    type DispatchStatus,
    type DispatcherConfig,
    type DispatcherStopReport,
    type EventFilter,
    type EventPostprocessor,
    type EventPreprocessor,
    type NodePostprocessor,
    type NodePreprocessor,
    type NodeOutcome,
    type NodeStatus,
    type TierMode,
    type WaitOptions,
} from "./Dispatcher.js";
export {
    AdapterSupervisor,
    type AdapterHook,
    type AdapterSupervisorConfig,
    type EventSink,
    type RetryOptions,
    type SupervisorStopReport,
} from "./AdapterSupervisor.js";
export {
    NodeRegistry,
    type NodeRegistryConfig,
    type PluginSummary,
    type RegistrySnapshot,
    type SnapshotSource,
} from "./NodeRegistry.js";
