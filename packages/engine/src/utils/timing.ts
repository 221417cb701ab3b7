/**
 * @fileoverview Timing helpers
 *
 * Abortable sleeps, timeouts and backoff shared by the dispatcher and the
 * adapter supervisor.
 *
 * @module @switchyard/engine/utils/timing
 */

import { CancellationError } from "../errors/EngineErrors.js";

/**
 * Exponential backoff policy.
 */
export interface BackoffPolicy {
    readonly initialMs: number;
    readonly factor: number;
    readonly maxMs: number;
}

/**
 * Delay before retry number `attempt` (1-based).
 *
 * @example
 * ```typescript
 * computeBackoff(3, { initialMs: 500, factor: 2, maxMs: 10000 }); // 2000
 * ```
 */
export function computeBackoff(attempt: number, policy: BackoffPolicy): number {
    const delay = policy.initialMs * Math.pow(policy.factor, Math.max(0, attempt - 1));
    return Math.min(delay, policy.maxMs);
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }

        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);

        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

/**
 * Settle with `promise`, or reject with `onTimeout()` after `ms`.
 * A non-positive or missing `ms` disables the timeout.
 */
export function withTimeout<T>(
    promise: Promise<T>,
    ms: number | undefined,
    onTimeout: () => Error
): Promise<T> {
    if (ms === undefined || ms <= 0) {
        return promise;
    }

    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => reject(onTimeout()), ms);
        promise.then(
            (value) => {
                clearTimeout(timer);
                resolve(value);
            },
            (error: unknown) => {
                clearTimeout(timer);
                reject(error);
            }
        );
    });
}

/**
 * Settle with `promise`, or reject with a {@link CancellationError} as soon
 * as `signal` aborts. The underlying work keeps running; its result is
 * ignored.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal, reason?: string): Promise<T> {
    if (signal.aborted) {
        // Observe the abandoned promise so a late rejection is not unhandled
        promise.catch(() => undefined);
        return Promise.reject(new CancellationError(reason));
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => reject(new CancellationError(reason));
        signal.addEventListener("abort", onAbort, { once: true });

        promise.then(
            (value) => {
                signal.removeEventListener("abort", onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener("abort", onAbort);
                reject(error);
            }
        );
    });
}

/**
 * Wait for every promise to settle, for at most `ms`.
 *
 * @returns true when all settled in time
 */
export function settleWithin(promises: readonly Promise<unknown>[], ms: number): Promise<boolean> {
    if (promises.length === 0) {
        return Promise.resolve(true);
    }

    return new Promise((resolve) => {
        const timer = setTimeout(() => resolve(false), Math.max(0, ms));
        void Promise.allSettled(promises).then(() => {
            clearTimeout(timer);
            resolve(true);
        });
    });
}

/**
 * Generate a trace ID for one dispatch cycle.
 */
export function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}
