/**
 * Dependency Graph
 *
 * Directed graph with dense vertex ids. Forward and reverse adjacency are
 * maintained together so successors and predecessors are both O(1) to
 * reach; `reversed()` returns a view over the same storage with edge
 * directions swapped.
 */

import { GraphCycleError } from './errors';
import type { VertexId } from './types';

export interface EdgeOptions {
  /**
   * Marks a consume edge `resource -> pass` whose pass also writes the
   * resource. For ordering it is replaced by constraints that keep the
   * resource's writers in declaration order, so the read-modify-write loop
   * is not a cycle.
   */
  readWrite?: boolean;
}

export interface Edge {
  readonly from: VertexId;
  readonly to: VertexId;
  readonly readWrite: boolean;
}

export interface GraphStorage<V> {
  vertices: V[];
  forward: Edge[][];
  reverse: Edge[][];
  edges: Edge[];
}

export class DependencyGraph<V> {
  private readonly storage: GraphStorage<V>;

  constructor(
    storage?: GraphStorage<V>,
    readonly isReversed = false
  ) {
    this.storage = storage ?? { vertices: [], forward: [], reverse: [], edges: [] };
  }

  get vertexCount(): number {
    return this.storage.vertices.length;
  }

  get edgeCount(): number {
    return this.storage.edges.length;
  }

  addVertex(vertex: V): VertexId {
    const id = this.storage.vertices.length;
    this.storage.vertices.push(vertex);
    this.storage.forward.push([]);
    this.storage.reverse.push([]);
    return id;
  }

  /**
   * Add an edge in this view's orientation.
   */
  addEdge(from: VertexId, to: VertexId, options: EdgeOptions = {}): void {
    this.assertVertex(from);
    this.assertVertex(to);
    const [source, target] = this.isReversed ? [to, from] : [from, to];
    const edge: Edge = { from: source, to: target, readWrite: options.readWrite ?? false };
    this.storage.forward[source].push(edge);
    this.storage.reverse[target].push(edge);
    this.storage.edges.push(edge);
  }

  hasVertex(id: VertexId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.storage.vertices.length;
  }

  vertex(id: VertexId): V | undefined {
    return this.storage.vertices[id];
  }

  vertices(): readonly V[] {
    return this.storage.vertices;
  }

  successors(id: VertexId): VertexId[] {
    return this.isReversed
      ? this.storage.reverse[id].map((e) => e.from)
      : this.storage.forward[id].map((e) => e.to);
  }

  predecessors(id: VertexId): VertexId[] {
    return this.isReversed
      ? this.storage.forward[id].map((e) => e.to)
      : this.storage.reverse[id].map((e) => e.from);
  }

  /** Edges in insertion order, oriented for this view */
  edges(): Edge[] {
    if (!this.isReversed) return [...this.storage.edges];
    return this.storage.edges.map((e) => ({ from: e.to, to: e.from, readWrite: e.readWrite }));
  }

  reversed(): DependencyGraph<V> {
    return new DependencyGraph(this.storage, !this.isReversed);
  }

  /**
   * Kahn's algorithm. Ready vertices are processed first-in first-out,
   * seeded in vertex id order, so the result is stable for a given
   * insertion order. Throws `GraphCycleError` when a cycle remains.
   */
  topologicalSort(): VertexId[] {
    const count = this.storage.vertices.length;
    const adjacency = this.orderingConstraints();
    const inDegree = new Array<number>(count).fill(0);

    for (const targets of adjacency) {
      for (const target of targets) inDegree[target]++;
    }

    const queue: VertexId[] = [];
    for (let id = 0; id < count; id++) {
      if (inDegree[id] === 0) queue.push(id);
    }

    const order: VertexId[] = [];
    for (let head = 0; head < queue.length; head++) {
      const id = queue[head];
      order.push(id);
      for (const next of adjacency[id]) {
        inDegree[next]--;
        if (inDegree[next] === 0) queue.push(next);
      }
    }

    if (order.length !== count) {
      const unordered: VertexId[] = [];
      for (let id = 0; id < count; id++) {
        if (inDegree[id] > 0) unordered.push(id);
      }
      throw new GraphCycleError(unordered);
    }

    return order;
  }

  // Constraint lists per vertex, in this view's orientation.
  private orderingConstraints(): VertexId[][] {
    const adjacency: VertexId[][] = this.storage.vertices.map(() => []);
    const add = (before: VertexId, after: VertexId) => {
      if (this.isReversed) adjacency[after].push(before);
      else adjacency[before].push(after);
    };

    for (const edge of this.storage.edges) {
      if (!edge.readWrite) {
        add(edge.from, edge.to);
        continue;
      }
      // Writers declared before the pass run first, writers declared after it run later
      const producers = this.storage.reverse[edge.from];
      const own = producers.findIndex((producerEdge) => producerEdge.from === edge.to);
      const position = own === -1 ? producers.length : own;
      producers.forEach((producerEdge, index) => {
        if (producerEdge.from === edge.to) return;
        if (index < position) add(producerEdge.from, edge.to);
        else if (index > position) add(edge.to, producerEdge.from);
      });
    }

    return adjacency;
  }

  private assertVertex(id: VertexId): void {
    if (!this.hasVertex(id)) {
      throw new RangeError(`Vertex ${id} does not exist`);
    }
  }
}
