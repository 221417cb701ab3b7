/**
 * @fileoverview Dependency Contract
 *
 * Nodes and predicates declare what they need as a map of named
 * {@link Dependency} objects. The dispatcher resolves the map once per event
 * through a resolution context, so a dependency requested by several nodes
 * (or several times within one node's graph) is produced exactly once per
 * event and shared.
 *
 * Two kinds exist:
 * - value providers: a function of the event scope and other dependencies
 * - resources: acquired on first use and released when the event's
 *   dispatch cycle tears down, in reverse acquisition order
 *
 * Identity is object identity: two `defineDependency` calls with the same
 * options are two different dependencies.
 *
 * @module @switchyard/engine/contracts/Dependency
 */

import type { BotEvent } from "./BotEvent.js";
import type { EngineLogger } from "./Logger.js";
import type { Outbound } from "./Adapter.js";

/**
 * Provider kind.
 */
export type DependencyKind = "value" | "resource";

/**
 * Process-wide services reachable from every provider.
 */
export interface ScopeServices {
    /** Routes replies to adapters */
    readonly outbound: Outbound;

    /** State shared by all events for the lifetime of the bot */
    readonly globalState: Map<string, unknown>;

    /** User ids allowed through `superuser()` permissions */
    readonly superusers: ReadonlySet<string>;
}

/**
 * The node a resolution is made for.
 */
export interface NodeScope {
    readonly id: string;

    /** State kept for this node across events, created on first use */
    state(): Map<string, unknown>;
}

/**
 * Per-event scope handed to providers.
 */
export interface ProviderScope {
    /** Event being dispatched */
    readonly event: BotEvent;

    /** Aborts when the dispatch cycle is cancelled */
    readonly signal: AbortSignal;

    readonly logger: EngineLogger;

    readonly services: ScopeServices;

    /** Set while resolving for one node: its predicates, hooks and handler */
    readonly node?: NodeScope;
}

/**
 * Named dependencies a node, predicate or provider needs.
 */
export type DependencyMap = { readonly [key: string]: Dependency<unknown> };

/**
 * Map type for providers without sub-dependencies.
 */
export type NoDependencies = Record<string, never>;

/**
 * Values produced for a {@link DependencyMap}, key for key.
 */
export type Resolved<N extends DependencyMap> = {
    readonly [K in keyof N]: N[K] extends Dependency<infer T> ? T : never;
};

/**
 * Resolves one dependency within the current scope.
 */
export type ResolveFn = <U>(dependency: Dependency<U>) => Promise<U>;

/**
 * What the dispatcher hands to predicates: a resolver bound to one event.
 */
export interface DependencyResolver {
    readonly scope: ProviderScope;
    resolve<T>(dependency: Dependency<T>): Promise<T>;
    resolveAll<N extends DependencyMap>(needs: N): Promise<Resolved<N>>;
}

/**
 * A produced value plus its optional release action.
 */
export interface Provision<T> {
    readonly value: T;
    readonly release?: () => void | Promise<void>;
}

type Producer<T> = (resolve: ResolveFn, scope: ProviderScope) => Promise<Provision<T>>;

/**
 * A registered provider.
 *
 * Created through {@link defineDependency} or {@link defineResource}; the
 * memo table lives on the dependency and is keyed by resolution context, so
 * values never outlive the event they were produced for.
 */
export class Dependency<T> {
    private readonly memo = new WeakMap<object, Promise<T>>();

    constructor(
        readonly name: string,
        readonly kind: DependencyKind,
        private readonly readNeeds: () => DependencyMap,
        private readonly producer: Producer<T>,
        readonly useCache: boolean = true
    ) {}

    /**
     * Direct sub-dependencies. Read lazily, so a dependency can name one
     * declared after it (and a cycle can be expressed and then rejected).
     */
    needs(): DependencyMap {
        return this.readNeeds();
    }

    /**
     * Run the provider. Sub-dependencies are requested through `resolve`.
     */
    produce(resolve: ResolveFn, scope: ProviderScope): Promise<Provision<T>> {
        return this.producer(resolve, scope);
    }

    /**
     * Value already requested within `owner`, if any.
     */
    memoized(owner: object): Promise<T> | undefined {
        return this.memo.get(owner);
    }

    /**
     * Record the pending value for `owner`.
     */
    remember(owner: object, value: Promise<T>): void {
        this.memo.set(owner, value);
    }
}

/**
 * Options for {@link defineDependency}.
 */
export interface DependencyOptions<T, N extends DependencyMap> {
    readonly name: string;

    /** Sub-dependencies, or a function returning them for forward references */
    readonly needs?: N | (() => N);

    /** Set false to run the provider on every request (default: true) */
    readonly useCache?: boolean;

    provide(deps: Resolved<N>, scope: ProviderScope): T | Promise<T>;
}

/**
 * Options for {@link defineResource}.
 */
export interface ResourceOptions<T, N extends DependencyMap> {
    readonly name: string;
    readonly needs?: N | (() => N);
    readonly useCache?: boolean;

    /** Acquire the resource for this event */
    acquire(deps: Resolved<N>, scope: ProviderScope): T | Promise<T>;

    /** Release it when the dispatch cycle ends */
    release(value: T): void | Promise<void>;
}

function isNeedsThunk<N extends DependencyMap>(source: N | (() => N)): source is () => N {
    return typeof source === "function";
}

function needsReader<N extends DependencyMap>(source: N | (() => N) | undefined): () => N | undefined {
    return () => {
        if (source === undefined) {
            return undefined;
        }
        return isNeedsThunk(source) ? source() : source;
    };
}

/**
 * Resolve a dependency map key by key, in declaration order.
 */
export async function resolveNeeds<N extends DependencyMap>(
    needs: N | undefined,
    resolve: ResolveFn
): Promise<Resolved<N>> {
    const values: Record<string, unknown> = {};
    if (needs !== undefined) {
        for (const [key, dependency] of Object.entries(needs)) {
            values[key] = await resolve(dependency);
        }
    }
    // Keys mirror `needs` one to one
    return values as Resolved<N>;
}

/**
 * Define a value provider.
 *
 * @example
 * ```typescript
 * const Sender = defineDependency({
 *     name   : "sender",
 *     needs  : { event: CurrentEvent },
 *     provide: ({ event }) => getUserId(event) ?? "anonymous",
 * });
 * ```
 */
export function defineDependency<T, N extends DependencyMap = NoDependencies>(
    options: DependencyOptions<T, N>
): Dependency<T> {
    const read = needsReader(options.needs);

    return new Dependency<T>(
        options.name,
        "value",
        () => read() ?? {},
        async (resolve, scope) => {
            const deps = await resolveNeeds(read(), resolve);
            return { value: await options.provide(deps, scope) };
        },
        options.useCache ?? true
    );
}

/**
 * Define a scoped resource. `release` runs during the teardown of every
 * dispatch cycle that acquired it.
 *
 * @example
 * ```typescript
 * const Connection = defineResource({
 *     name   : "connection",
 *     acquire: () => pool.connect(),
 *     release: (connection) => connection.release(),
 * });
 * ```
 */
export function defineResource<T, N extends DependencyMap = NoDependencies>(
    options: ResourceOptions<T, N>
): Dependency<T> {
    const read = needsReader(options.needs);

    return new Dependency<T>(
        options.name,
        "resource",
        () => read() ?? {},
        async (resolve, scope) => {
            const deps = await resolveNeeds(read(), resolve);
            const value = await options.acquire(deps, scope);
            return { value, release: () => options.release(value) };
        },
        options.useCache ?? true
    );
}
