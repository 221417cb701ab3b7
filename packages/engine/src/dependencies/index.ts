/**
 * @fileoverview Dependency resolver barrel exports
 *
 * @module @switchyard/engine/dependencies
 */

export {
    ResolutionContext,
    type TeardownFailure,
} from "./ResolutionContext.js";
export {
    analyzeDependencies,
    findDependencyCycle,
    type GraphAnalysis,
} from "./DependencyGraph.js";
export {
    CurrentEvent,
    EventSignal,
    PlainText,
    Reply,
    GlobalState,
    NodeState,
    Superusers,
    type ReplyFn,
} from "./builtins.js";
