/**
 * @fileoverview Static dependency graph analysis
 *
 * Walks declared `needs` without running any provider. The registry uses it
 * to reject cyclic declarations when a plugin is loaded, so a cycle never
 * reaches a dispatch cycle.
 *
 * @module @switchyard/engine/dependencies/DependencyGraph
 */

import type { Dependency } from "../contracts/Dependency.js";
import { describeError } from "../errors/EngineErrors.js";

type VisitState = "visiting" | "done";

/**
 * Result of a graph walk.
 */
export interface GraphAnalysis {
    /** Names along the first cycle found, first name repeated at the end */
    readonly cycle: readonly string[] | null;

    /** Dependencies whose `needs` could not be read */
    readonly errors: readonly string[];
}

/**
 * Depth-first search for a cycle reachable from `roots`.
 *
 * @example
 * ```typescript
 * const { cycle } = analyzeDependencies([A]);
 * // A -> B -> A  gives  ["a", "b", "a"]
 * ```
 */
export function analyzeDependencies(roots: Iterable<Dependency<unknown>>): GraphAnalysis {
    const states = new Map<Dependency<unknown>, VisitState>();
    const errors: string[] = [];
    const stack: Dependency<unknown>[] = [];

    const visit = (dependency: Dependency<unknown>): readonly string[] | null => {
        const state = states.get(dependency);
        if (state === "done") {
            return null;
        }
        if (state === "visiting") {
            const start = stack.indexOf(dependency);
            return [...stack.slice(start), dependency].map((entry) => entry.name);
        }

        states.set(dependency, "visiting");
        stack.push(dependency);

        let children: Dependency<unknown>[] = [];
        try {
            children = Object.values(dependency.needs());
        }
        catch (error) {
            errors.push(`"${dependency.name}" needs could not be read: ${describeError(error)}`);
        }

        for (const child of children) {
            const cycle = visit(child);
            if (cycle) {
                return cycle;
            }
        }

        stack.pop();
        states.set(dependency, "done");
        return null;
    };

    for (const root of roots) {
        const cycle = visit(root);
        if (cycle) {
            return { cycle, errors };
        }
    }

    return { cycle: null, errors };
}

/**
 * First cycle reachable from `roots`, or null.
 */
export function findDependencyCycle(roots: Iterable<Dependency<unknown>>): readonly string[] | null {
    return analyzeDependencies(roots).cycle;
}
