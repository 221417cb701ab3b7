/**
 * @fileoverview Predicate combinators
 *
 * All combinators evaluate their operands left to right and stop as soon as
 * the result is known, so later operands (and their dependencies) are never
 * evaluated needlessly.
 *
 * @module @switchyard/engine/predicates/combinators
 */

import type { Dependency, DependencyResolver } from "../contracts/Dependency.js";
import type { Predicate } from "../contracts/Predicate.js";

function collect(predicates: readonly Predicate[]): () => readonly Dependency<unknown>[] {
    return () => predicates.flatMap((predicate) => predicate.dependencies());
}

/**
 * Predicate that always passes.
 */
export const always: Predicate = Object.freeze({
    name        : "always",
    dependencies: () => [],
    evaluate    : async () => true,
});

/**
 * Predicate that never passes.
 */
export const never: Predicate = Object.freeze({
    name        : "never",
    dependencies: () => [],
    evaluate    : async () => false,
});

/**
 * Passes when every operand passes. Stops at the first false.
 * `and()` with no operands passes.
 */
export function and(...predicates: Predicate[]): Predicate {
    return Object.freeze({
        name        : `and(${predicates.map((p) => p.name).join(", ")})`,
        dependencies: collect(predicates),
        evaluate    : async (resolver: DependencyResolver) => {
            for (const predicate of predicates) {
                if (!(await predicate.evaluate(resolver))) {
                    return false;
                }
            }
            return true;
        },
    });
}

/**
 * Passes when any operand passes. Stops at the first true.
 * `or()` with no operands fails.
 */
export function or(...predicates: Predicate[]): Predicate {
    return Object.freeze({
        name        : `or(${predicates.map((p) => p.name).join(", ")})`,
        dependencies: collect(predicates),
        evaluate    : async (resolver: DependencyResolver) => {
            for (const predicate of predicates) {
                if (await predicate.evaluate(resolver)) {
                    return true;
                }
            }
            return false;
        },
    });
}

/**
 * Inverts a predicate.
 */
export function not(predicate: Predicate): Predicate {
    return Object.freeze({
        name        : `not(${predicate.name})`,
        dependencies: () => predicate.dependencies(),
        evaluate    : async (resolver: DependencyResolver) => !(await predicate.evaluate(resolver)),
    });
}

/**
 * A rule: every checker must pass. An empty rule matches everything.
 */
export function rule(...checkers: Predicate[]): Predicate {
    return checkers.length === 1 ? checkers[0] : and(...checkers);
}

/**
 * A permission: any checker may grant access. An empty permission grants
 * everyone.
 */
export function permission(...checkers: Predicate[]): Predicate {
    if (checkers.length === 0) {
        return always;
    }
    return checkers.length === 1 ? checkers[0] : or(...checkers);
}
