/**
 * @fileoverview Engine error taxonomy
 *
 * Every failure the engine contains is represented by one of these classes.
 * Each is scoped to the smallest unit it can affect:
 *
 * | Error                       | Scope          | Effect                                  |
 * |-----------------------------|----------------|-----------------------------------------|
 * | PredicateEvaluationError    | one node       | node skipped                            |
 * | DependencyResolutionError   | one node       | node skipped                            |
 * | HandlerExecutionError       | one node       | recorded, siblings and event continue   |
 * | AdapterFailure              | one adapter    | retried, then the adapter is failed     |
 * | RegistryValidationError     | one mutation   | rejected, previous snapshot stays       |
 *
 * @module @switchyard/engine/errors/EngineErrors
 */

/**
 * Stable machine-readable codes carried by every engine error.
 */
export type EngineErrorCode =
    | "PREDICATE_EVALUATION"
    | "DEPENDENCY_RESOLUTION"
    | "HANDLER_EXECUTION"
    | "ADAPTER_FAILURE"
    | "REGISTRY_VALIDATION"
    | "DISPATCHER_CLOSED"
    | "WAIT_TIMEOUT"
    | "CANCELLED";

/**
 * Render any thrown value as a log-friendly message.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Base class for all engine errors.
 */
export class SwitchyardError extends Error {
    readonly code: EngineErrorCode;

    constructor(code: EngineErrorCode, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * A rule or permission threw while being evaluated for a node.
 */
export class PredicateEvaluationError extends SwitchyardError {
    constructor(
        readonly nodeId: string,
        readonly predicate: string,
        cause: unknown
    ) {
        super(
            "PREDICATE_EVALUATION",
            `Predicate "${predicate}" failed for node "${nodeId}": ${describeError(cause)}`,
            cause
        );
    }
}

/**
 * A provider failed, or a dependency graph turned out to be cyclic at
 * resolution time.
 *
 * `path` lists dependency names from the outermost request to the failing one.
 */
export class DependencyResolutionError extends SwitchyardError {
    constructor(
        readonly path: readonly string[],
        reason: string,
        cause?: unknown
    ) {
        super("DEPENDENCY_RESOLUTION", `Cannot resolve ${path.join(" -> ")}: ${reason}`, cause);
    }
}

/**
 * A node's handler threw, or exceeded its timeout.
 */
export class HandlerExecutionError extends SwitchyardError {
    constructor(
        readonly nodeId: string,
        cause: unknown,
        readonly timedOut: boolean = false
    ) {
        super(
            "HANDLER_EXECUTION",
            timedOut
                ? `Node "${nodeId}" timed out`
                : `Node "${nodeId}" failed: ${describeError(cause)}`,
            cause
        );
    }
}

/**
 * Adapter operation that failed.
 */
export type AdapterOperation = "start" | "receive" | "send" | "stop";

/**
 * An adapter's start, receive loop, send or stop call failed.
 */
export class AdapterFailure extends SwitchyardError {
    constructor(
        readonly adapterId: string,
        readonly operation: AdapterOperation,
        cause: unknown
    ) {
        super(
            "ADAPTER_FAILURE",
            `Adapter "${adapterId}" ${operation} failed: ${describeError(cause)}`,
            cause
        );
    }
}

/**
 * A registry mutation was rejected. The previous snapshot remains active.
 */
export class RegistryValidationError extends SwitchyardError {
    constructor(
        message: string,
        readonly issues: readonly string[] = [],
        cause?: unknown
    ) {
        super(
            "REGISTRY_VALIDATION",
            issues.length > 0 ? `${message}: ${issues.join("; ")}` : message,
            cause
        );
    }
}

/**
 * The dispatcher no longer accepts submissions or waiters.
 */
export class DispatcherClosedError extends SwitchyardError {
    constructor() {
        super("DISPATCHER_CLOSED", "Dispatcher is stopped and no longer accepts events");
    }
}

/**
 * `waitFor` gave up before a matching event arrived.
 */
export class WaitTimeoutError extends SwitchyardError {
    constructor(reason: string) {
        super("WAIT_TIMEOUT", `No matching event: ${reason}`);
    }
}

/**
 * Work abandoned because its abort signal fired.
 */
export class CancellationError extends SwitchyardError {
    constructor(reason: string = "operation cancelled") {
        super("CANCELLED", reason);
    }
}

/**
 * Thrown by `NodeControl.skip()`. Not a failure: the node is recorded as
 * skipped and does not count as having run.
 */
export class SkipNodeSignal extends Error {
    constructor(readonly nodeId: string) {
        super(`Node "${nodeId}" skipped itself`);
        this.name = "SkipNodeSignal";
    }
}

/**
 * Thrown by `NodeControl.jumpTo()`. The node is recorded as skipped and the
 * cycle resumes at `targetId`.
 */
export class JumpToSignal extends SkipNodeSignal {
    constructor(nodeId: string, readonly targetId: string) {
        super(nodeId);
        this.name = "JumpToSignal";
        this.message = `Node "${nodeId}" jumped to "${targetId}"`;
    }
}

/**
 * Thrown by `NodeControl.prune()`. The node is recorded as skipped and the
 * rest of its plugin sits out the event.
 */
export class PruneSignal extends SkipNodeSignal {
    constructor(nodeId: string) {
        super(nodeId);
        this.name = "PruneSignal";
        this.message = `Node "${nodeId}" pruned its plugin`;
    }
}
