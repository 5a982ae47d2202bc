/**
 * Workflow graph — static topology of steps and the edges between them.
 *
 * Built once with GraphBuilder, validated by `compile()`, then shared
 * read-only by every run. A conditional edge names its router and the
 * closed set of destinations the router may return; `next()` rejects
 * anything else with a GraphError.
 *
 * Dependency direction: graph.ts → core/errors
 * Used by: engine, flow
 */

import { GraphError } from '../errors.js';

/** Marker destination that ends a run. */
export const TERMINAL = '__end__';

/** Per-run values a step may read. Never part of the state. */
export interface StepContext<C> {
    readonly runId: string;
    readonly signal: AbortSignal;
    readonly config: C;
}

/**
 * A named unit of work.
 *
 * `apply` receives a working copy of the state, owned by the step until it
 * returns. Throwing leaves the committed state untouched.
 */
export interface Step<S, C> {
    readonly name: string;
    apply(state: S, ctx: StepContext<C>): Promise<S>;
}

/** Pure routing function evaluated at a conditional edge. */
export type Router<S> = (state: Readonly<S>) => string;

/**
 * Marks a conditional edge as a bounded feedback cycle. Taking `retryTo`
 * counts as one retry; once the budget is spent the engine sends the run
 * to `exhaustedTo` instead.
 */
export interface RetryPolicy {
    readonly retryTo: string;
    readonly exhaustedTo: string;
}

export type Edge<S> =
    | { readonly kind: 'fixed'; readonly to: string }
    | {
          readonly kind: 'conditional';
          readonly router: Router<S>;
          readonly destinations: ReadonlySet<string>;
          readonly retry?: RetryPolicy;
      };

export class Graph<S, C> {
    readonly entry: string;
    private readonly steps: ReadonlyMap<string, Step<S, C>>;
    private readonly edges: ReadonlyMap<string, Edge<S>>;

    /** Use GraphBuilder.compile(). */
    constructor(entry: string, steps: ReadonlyMap<string, Step<S, C>>, edges: ReadonlyMap<string, Edge<S>>) {
        this.entry = entry;
        this.steps = steps;
        this.edges = edges;
        Object.freeze(this);
    }

    /** Number of steps in the graph. */
    get size(): number {
        return this.steps.size;
    }

    /** Names of all steps, in insertion order. */
    get stepNames(): string[] {
        return [...this.steps.keys()];
    }

    hasStep(name: string): boolean {
        return this.steps.has(name);
    }

    /** @throws {GraphError} for an undeclared step. */
    getStep(name: string): Step<S, C> {
        const step = this.steps.get(name);
        if (!step) {
            throw new GraphError(`Unknown step: "${name}"`, { step: name });
        }
        return step;
    }

    /** The retry policy on a step's outgoing edge, if it is a bounded cycle. */
    retryPolicyOf(from: string): RetryPolicy | undefined {
        const edge = this.edges.get(from);
        return edge?.kind === 'conditional' ? edge.retry : undefined;
    }

    /**
     * Resolve the step that follows `current`.
     * @throws {GraphError} if `current` has no outgoing edge or the router leaves its declared set.
     */
    next(current: string, state: Readonly<S>): string {
        const edge = this.edges.get(current);
        if (!edge) {
            throw new GraphError(`Step "${current}" has no outgoing edge`, { step: current });
        }

        if (edge.kind === 'fixed') return edge.to;

        const destination = edge.router(state);
        if (!edge.destinations.has(destination)) {
            throw new GraphError(
                `Router at "${current}" returned "${destination}", expected one of: ${[...edge.destinations].join(', ')}`,
                { step: current, destination, allowed: [...edge.destinations] },
            );
        }
        return destination;
    }
}

/** Incrementally declares a graph, then validates it into an immutable Graph. */
export class GraphBuilder<S, C> {
    private entry: string | undefined;
    private readonly steps = new Map<string, Step<S, C>>();
    private readonly edges = new Map<string, Edge<S>>();

    addStep(step: Step<S, C>): this {
        if (step.name === TERMINAL) {
            throw new GraphError(`"${TERMINAL}" is reserved and cannot be a step name`);
        }
        if (this.steps.has(step.name)) {
            throw new GraphError(`Duplicate step: "${step.name}"`, { step: step.name });
        }
        this.steps.set(step.name, step);
        return this;
    }

    setEntryPoint(name: string): this {
        this.entry = name;
        return this;
    }

    addEdge(from: string, to: string): this {
        this.assertNoEdge(from);
        this.edges.set(from, { kind: 'fixed', to });
        return this;
    }

    addConditionalEdges(
        from: string,
        router: Router<S>,
        destinations: readonly string[],
        options: { retry?: RetryPolicy } = {},
    ): this {
        this.assertNoEdge(from);
        if (destinations.length === 0) {
            throw new GraphError(`Conditional edge from "${from}" needs at least one destination`, { step: from });
        }
        this.edges.set(from, {
            kind: 'conditional',
            router,
            destinations: new Set(destinations),
            retry: options.retry,
        });
        return this;
    }

    /**
     * Validate and freeze the graph.
     * @throws {GraphError} on a missing entry point, dangling edge, or step without an outgoing edge.
     */
    compile(): Graph<S, C> {
        if (!this.entry) {
            throw new GraphError('Graph has no entry point');
        }
        if (!this.steps.has(this.entry)) {
            throw new GraphError(`Entry point "${this.entry}" is not a declared step`, { step: this.entry });
        }

        for (const [from, edge] of this.edges) {
            if (!this.steps.has(from)) {
                throw new GraphError(`Edge source "${from}" is not a declared step`, { step: from });
            }
            const targets = edge.kind === 'fixed' ? [edge.to] : [...edge.destinations];
            for (const to of targets) {
                if (to !== TERMINAL && !this.steps.has(to)) {
                    throw new GraphError(`Edge "${from}" → "${to}" targets an undeclared step`, { from, to });
                }
            }
            if (edge.kind === 'conditional' && edge.retry) {
                const { retryTo, exhaustedTo } = edge.retry;
                if (!edge.destinations.has(retryTo) || !edge.destinations.has(exhaustedTo)) {
                    throw new GraphError(`Retry policy on "${from}" must use declared destinations`, {
                        step: from,
                        retryTo,
                        exhaustedTo,
                    });
                }
            }
        }

        for (const name of this.steps.keys()) {
            if (!this.edges.has(name)) {
                throw new GraphError(`Step "${name}" has no outgoing edge`, { step: name });
            }
        }

        return new Graph(this.entry, new Map(this.steps), new Map(this.edges));
    }

    private assertNoEdge(from: string): void {
        if (this.edges.has(from)) {
            throw new GraphError(`Step "${from}" already has an outgoing edge`, { step: from });
        }
    }
}
