/**
 * @fileoverview Error barrel exports
 *
 * @module @switchyard/engine/errors
 */

export {
    SwitchyardError,
    PredicateEvaluationError,
    DependencyResolutionError,
    HandlerExecutionError,
    AdapterFailure,
    RegistryValidationError,
    DispatcherClosedError,
    WaitTimeoutError,
    CancellationError,
    SkipNodeSignal,
    JumpToSignal,
    PruneSignal,
    describeError,
    type EngineErrorCode,
    type AdapterOperation,
} from "./EngineErrors.js";
