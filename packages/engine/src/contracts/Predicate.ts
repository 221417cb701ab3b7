/**
 * @fileoverview Predicate Contract
 *
 * Rules and permissions are boolean predicates over an event. A predicate
 * may declare dependencies; they are resolved through the same per-event
 * context as node dependencies and share its memoization.
 *
 * @module @switchyard/engine/contracts/Predicate
 */

import type { BotEvent } from "./BotEvent.js";
import type {
    Dependency,
    DependencyMap,
    DependencyResolver,
    NoDependencies,
    Resolved,
} from "./Dependency.js";
import { resolveNeeds } from "./Dependency.js";

/**
 * Predicate interface.
 */
export interface Predicate {
    /** Name used in logs and errors */
    readonly name: string;

    /** Dependencies evaluated by this predicate, for static graph checks */
    dependencies(): readonly Dependency<unknown>[];

    /** Evaluate against the event behind `resolver` */
    evaluate(resolver: DependencyResolver): Promise<boolean>;
}

/**
 * Options for {@link definePredicate}.
 */
export interface PredicateOptions<N extends DependencyMap> {
    readonly name: string;
    readonly needs?: N;
    test(deps: Resolved<N>, event: BotEvent): boolean | Promise<boolean>;
}

/**
 * Define a leaf predicate.
 *
 * @example
 * ```typescript
 * const fromAdmin = definePredicate({
 *     name : "fromAdmin",
 *     needs: { profile: SenderProfile },
 *     test : ({ profile }) => profile.roles.includes("admin"),
 * });
 * ```
 */
export function definePredicate<N extends DependencyMap = NoDependencies>(
    options: PredicateOptions<N>
): Predicate {
    const needs = options.needs;

    return Object.freeze({
        name        : options.name,
        dependencies: () => (needs ? Object.values(needs) : []),
        evaluate    : async (resolver: DependencyResolver) => {
            const deps = await resolveNeeds(needs, (dependency) => resolver.resolve(dependency));
            return options.test(deps, resolver.scope.event);
        },
    });
}

/**
 * Type guard for predicates.
 */
export function isPredicate(obj: unknown): obj is Predicate {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "name" in obj &&
        typeof obj.name === "string" &&
        "evaluate" in obj &&
        typeof obj.evaluate === "function" &&
        "dependencies" in obj &&
        typeof obj.dependencies === "function"
    );
}
