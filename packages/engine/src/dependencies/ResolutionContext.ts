/**
 * @fileoverview Resolution Context
 *
 * Per-event dependency scope. Holds the memo entries produced while one
 * event is dispatched and the release actions of every resource acquired
 * for it.
 *
 * Lifetime is exactly one dispatch cycle: the dispatcher creates it when the
 * cycle starts and calls {@link ResolutionContext.teardown} when the cycle
 * ends, whatever the outcome of the nodes.
 *
 * {@link ResolutionContext.forNode} gives each node a view that adds the
 * node to the provider scope. Views share the memo table and the release
 * list; a provider that reads `scope.node` must therefore set
 * `useCache: false`, or it would hand the first node's value to the rest.
 *
 * @module @switchyard/engine/dependencies/ResolutionContext
 */

import type {
    Dependency,
    DependencyMap,
    DependencyResolver,
    NodeScope,
    ProviderScope,
    Provision,
    Resolved,
} from "../contracts/Dependency.js";
import { resolveNeeds } from "../contracts/Dependency.js";
import {
    DependencyResolutionError,
    describeError,
} from "../errors/EngineErrors.js";

/**
 * A release action that failed during teardown.
 */
export interface TeardownFailure {
    readonly dependency: string;
    readonly error: unknown;
}

interface ReleaseEntry {
    readonly dependency: string;
    readonly release: () => void | Promise<void>;
}

/**
 * Resolution context for one event.
 *
 * @example
 * ```typescript
 * const context = new ResolutionContext(scope);
 * const { event, connection } = await context.resolveAll({
 *     event     : CurrentEvent,
 *     connection: Connection,
 * });
 * // ...
 * const failures = await context.teardown();
 * ```
 */
export class ResolutionContext implements DependencyResolver {
    private readonly releases: ReleaseEntry[] = [];
    private readonly acquired: string[] = [];
    private teardownResult: Promise<readonly TeardownFailure[]> | null = null;

    constructor(readonly scope: ProviderScope) {}

    /**
     * Resolve one dependency, reusing the value already produced for this
     * context when the dependency is cached.
     */
    resolve<T>(dependency: Dependency<T>): Promise<T> {
        return this.resolveWithin(dependency, [], this.scope);
    }

    /**
     * Resolve every entry of a dependency map, in key order.
     */
    resolveAll<N extends DependencyMap>(needs: N): Promise<Resolved<N>> {
        return resolveNeeds(needs, (dependency) => this.resolve(dependency));
    }

    /**
     * Resolver for one node of this cycle.
     */
    forNode(node: NodeScope): DependencyResolver {
        const scope: ProviderScope = { ...this.scope, node };
        const resolve = <T>(dependency: Dependency<T>): Promise<T> => this.resolveWithin(dependency, [], scope);

        return {
            scope,
            resolve,
            resolveAll: <N extends DependencyMap>(needs: N) => resolveNeeds(needs, resolve),
        };
    }

    /**
     * Names of the dependencies produced so far, in completion order.
     */
    get resolutionOrder(): readonly string[] {
        return this.acquired;
    }

    get isClosed(): boolean {
        return this.teardownResult !== null;
    }

    /**
     * Run every registered release action in reverse acquisition order.
     *
     * Runs once; later calls return the first call's result. A failing
     * release does not stop the ones after it.
     */
    teardown(): Promise<readonly TeardownFailure[]> {
        if (!this.teardownResult) {
            this.teardownResult = this.releaseAll();
        }
        return this.teardownResult;
    }

    private resolveWithin<T>(
        dependency: Dependency<T>,
        path: readonly Dependency<unknown>[],
        scope: ProviderScope
    ): Promise<T> {
        if (path.includes(dependency)) {
            const names = [...path, dependency].map((entry) => entry.name);
            return Promise.reject(new DependencyResolutionError(names, "dependency cycle"));
        }

        if (dependency.useCache) {
            const memoized = dependency.memoized(this);
            if (memoized) {
                return memoized;
            }
        }

        const pending = this.produce(dependency, [...path, dependency], scope);
        if (dependency.useCache) {
            dependency.remember(this, pending);
        }
        return pending;
    }

    private async produce<T>(
        dependency: Dependency<T>,
        path: readonly Dependency<unknown>[],
        scope: ProviderScope
    ): Promise<T> {
        const names = path.map((entry) => entry.name);

        if (this.isClosed) {
            throw new DependencyResolutionError(names, "resolution context already torn down");
        }

        let provision: Provision<T>;
        try {
            provision = await dependency.produce(
                (sub) => this.resolveWithin(sub, path, scope),
                scope
            );
        }
        catch (error) {
            if (error instanceof DependencyResolutionError) {
                throw error;
            }
            throw new DependencyResolutionError(names, describeError(error), error);
        }

        if (provision.release) {
            if (this.isClosed) {
                // Acquired after teardown started (a cancelled node finishing late)
                await this.releaseLate(dependency.name, provision.release);
                throw new DependencyResolutionError(names, "resolution context already torn down");
            }
            this.releases.push({ dependency: dependency.name, release: provision.release });
        }

        this.acquired.push(dependency.name);
        return provision.value;
    }

    private async releaseAll(): Promise<readonly TeardownFailure[]> {
        const failures: TeardownFailure[] = [];

        for (const entry of [...this.releases].reverse()) {
            try {
                await entry.release();
            }
            catch (error) {
                failures.push({ dependency: entry.dependency, error });
                this.scope.logger.error("Dependency release failed", {
                    dependency: entry.dependency,
                    error     : describeError(error),
                });
            }
        }

        this.releases.length = 0;
        return failures;
    }

    private async releaseLate(dependency: string, release: () => void | Promise<void>): Promise<void> {
        try {
            await release();
        }
        catch (error) {
            this.scope.logger.error("Late dependency release failed", {
                dependency,
                error: describeError(error),
            });
        }
    }
}
