// ============================================================================
// FOILGEN — Static Dependency Graph for Derived Values
// ============================================================================
//
// Each derived node declares, once, the parameters and other derived nodes it
// reads. A write names the keys it changed; the graph answers which nodes go
// stale and evaluates them in dependency order, upstream nodes first.
// ============================================================================

/** node → the source parameters and derived nodes it depends on. */
export type DependencyTable<S extends string, N extends string> = Readonly<
  Record<N, readonly (S | N)[]>
>;

/**
 * Evaluators for each node. Each returns the slice of derived state it owns
 * and may read anything upstream of it from `derived`.
 */
export type NodeComputers<N extends string, P, D> = Readonly<
  Record<N, (params: P, derived: D) => Partial<D>>
>;

export class RecomputeGraph<S extends string, N extends string> {
  readonly table: DependencyTable<S, N>;
  /** Derived nodes, each after everything it depends on. */
  readonly order: readonly N[];

  constructor(table: DependencyTable<S, N>) {
    this.table = table;
    this.order = topologicalOrder(table);
  }

  isNode(key: string): key is N {
    return Object.hasOwn(this.table, key);
  }

  dependenciesOf(node: N): readonly (S | N)[] {
    return this.table[node];
  }

  /** Nodes made stale by `changed`, transitively, in evaluation order. */
  affected(changed: Iterable<S | N>): N[] {
    const stale = new Set<S | N>(changed);
    const result: N[] = [];
    for (const node of this.order) {
      if (this.table[node].some((dep) => stale.has(dep))) {
        stale.add(node);
        result.push(node);
      }
    }
    return result;
  }

  /**
   * Re-evaluate every stale node and return the new derived state. The input
   * is never modified; on a throw nothing has been published.
   */
  propagate<P, D extends object>(
    params: P,
    derived: D,
    changed: readonly (S | N)[],
    computers: NodeComputers<N, P, D>,
  ): D {
    let next: D = derived;
    for (const node of this.affected(changed)) {
      next = { ...next, ...computers[node](params, next) };
    }
    return next;
  }
}

/**
 * Depth-first topological sort of the derived nodes.
 *
 * @throws Error when the table contains a cycle.
 */
export function topologicalOrder<S extends string, N extends string>(table: DependencyTable<S, N>): N[] {
  const isNode = (key: string): key is N => Object.hasOwn(table, key);
  const done = new Set<N>();
  const visiting = new Set<N>();
  const order: N[] = [];

  const visit = (node: N, path: readonly N[]): void => {
    if (done.has(node)) return;
    if (visiting.has(node)) {
      throw new Error(`Dependency cycle: ${[...path, node].join(' -> ')}`);
    }
    visiting.add(node);
    for (const dep of table[node]) {
      if (isNode(dep)) visit(dep, [...path, node]);
    }
    visiting.delete(node);
    done.add(node);
    order.push(node);
  };

  for (const key of Object.keys(table)) {
    if (isNode(key)) visit(key, []);
  }
  return order;
}
