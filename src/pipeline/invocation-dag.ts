/**
 * Dependency graph over the invocations of one pipeline.
 *
 * Each node lists the invocations it waits for. Ordering uses Kahn's
 * algorithm over nodes in the order they were given, so the same pipeline
 * always yields the same execution order. Nodes left over when no further
 * node becomes free form (or wait on) a cycle.
 */

export interface InvocationNode {
  id: string;
  upstream: Iterable<string>;
}

export type InvocationOrder =
  | { hasCycle: false; topologicalOrder: string[] }
  | { hasCycle: true; cycle: string[] };

export class InvocationDAG {
  /** Node → invocations it waits for, in node order */
  private readonly upstream = new Map<string, ReadonlySet<string>>();
  /** Node → invocations waiting for it */
  private readonly downstream = new Map<string, string[]>();

  /** Upstream IDs that name no node are ignored. */
  constructor(nodes: Iterable<InvocationNode>) {
    const list = [...nodes];
    for (const node of list) {
      this.downstream.set(node.id, []);
    }
    for (const node of list) {
      const waitsFor = new Set([...node.upstream].filter((id) => this.downstream.has(id)));
      this.upstream.set(node.id, waitsFor);
      for (const upstreamId of waitsFor) {
        this.downstream.get(upstreamId)?.push(node.id);
      }
    }
  }

  static fromUpstream(nodes: Iterable<InvocationNode>): InvocationDAG {
    return new InvocationDAG(nodes);
  }

  /**
   * Execution order, or the nodes that cannot be ordered because of a cycle.
   */
  detectCycles(): InvocationOrder {
    const waiting = new Map<string, number>();
    const free: string[] = [];
    for (const [id, waitsFor] of this.upstream) {
      waiting.set(id, waitsFor.size);
      if (waitsFor.size === 0) free.push(id);
    }

    const order: string[] = [];
    for (let index = 0; index < free.length; index++) {
      const id = free[index];
      if (id === undefined) break;
      order.push(id);
      for (const next of this.downstream.get(id) ?? []) {
        const remaining = (waiting.get(next) ?? 0) - 1;
        waiting.set(next, remaining);
        if (remaining === 0) free.push(next);
      }
    }

    if (order.length === this.upstream.size) {
      return { hasCycle: false, topologicalOrder: order };
    }
    const ordered = new Set(order);
    return { hasCycle: true, cycle: [...this.upstream.keys()].filter((id) => !ordered.has(id)) };
  }

  /**
   * Invocations not in `completed` whose upstream invocations all are.
   */
  getReadySteps(completed: ReadonlySet<string>): string[] {
    return [...this.upstream]
      .filter(([id, waitsFor]) => !completed.has(id) && [...waitsFor].every((up) => completed.has(up)))
      .map(([id]) => id);
  }
}
