/**
 * Graph Builder
 *
 * Accumulates verified matches into an undirected weighted graph.
 *
 * INVARIANTS:
 * - At most one edge per unordered pair; a new result replaces the stored
 *   one when its weight is greater than or equal to it
 * - Every edge endpoint is a node (created at the edge's depth when the
 *   caller has not added it first)
 * - Nothing is removed during a run
 * - Self-edges are rejected
 *
 * One builder belongs to exactly one traversal.
 */

import type { Edge, EdgeAttributes, Graph, GraphNode, ImageId } from '../core/types.js';

export type AddEdgeOutcome = 'inserted' | 'upgraded' | 'kept' | 'rejected';

interface MutableNode {
  readonly id: ImageId;
  isQuery: boolean;
  depth: number;
}

/**
 * Canonical key for an unordered pair
 */
export function pairKey(a: ImageId, b: ImageId): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

/**
 * Order two endpoints lexicographically
 */
export function normalizePair(a: ImageId, b: ImageId): readonly [ImageId, ImageId] {
  return a < b ? [a, b] : [b, a];
}

export class GraphBuilder {
  private readonly nodes = new Map<ImageId, MutableNode>();
  private readonly edges = new Map<string, Edge>();

  /**
   * Add or upgrade the edge between `a` and `b`
   */
  addEdge(a: ImageId, b: ImageId, weight: number, attrs: EdgeAttributes): AddEdgeOutcome {
    if (a === b || !Number.isFinite(weight) || weight < 0 || weight > 1) {
      return 'rejected';
    }

    const key = pairKey(a, b);
    const existing = this.edges.get(key);
    if (existing && weight < existing.weight) {
      return 'kept';
    }

    const [lo, hi] = normalizePair(a, b);
    this.ensureNode(a, attrs.depth);
    this.ensureNode(b, attrs.depth);
    this.edges.set(key, {
      a: lo,
      b: hi,
      weight,
      sharedArea: attrs.sharedArea,
      keypointCount: attrs.keypointCount,
      isFlipped: attrs.isFlipped,
      variant: attrs.variant,
      depth: attrs.depth,
    });

    return existing ? 'upgraded' : 'inserted';
  }

  /**
   * Ensure a node exists; keeps the smallest depth seen
   */
  addNode(imageId: ImageId, depth: number): void {
    const node = this.nodes.get(imageId);
    if (!node) {
      this.nodes.set(imageId, { id: imageId, isQuery: false, depth });
    } else if (depth < node.depth) {
      node.depth = depth;
    }
  }

  /**
   * Flag a seed node (created at depth 0 if absent)
   */
  markQuery(imageId: ImageId): void {
    this.addNode(imageId, 0);
    const node = this.nodes.get(imageId);
    if (node) {
      node.isQuery = true;
      node.depth = 0;
    }
  }

  private ensureNode(imageId: ImageId, depth: number): void {
    if (!this.nodes.has(imageId)) {
      this.nodes.set(imageId, { id: imageId, isQuery: false, depth });
    }
  }

  hasNode(imageId: ImageId): boolean {
    return this.nodes.has(imageId);
  }

  hasEdge(a: ImageId, b: ImageId): boolean {
    return this.edges.has(pairKey(a, b));
  }

  getEdge(a: ImageId, b: ImageId): Edge | null {
    return this.edges.get(pairKey(a, b)) ?? null;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  /**
   * Immutable view with nodes sorted by id and edges by (a, b)
   */
  snapshot(): Graph {
    const nodes: GraphNode[] = [...this.nodes.values()]
      .map((node) => Object.freeze({ id: node.id, isQuery: node.isQuery, depth: node.depth }))
      .sort((x, y) => compareIds(x.id, y.id));

    const edges: Edge[] = [...this.edges.values()]
      .map((edge) => Object.freeze({ ...edge }))
      .sort(compareEdgePairs);

    return Object.freeze({ nodes: Object.freeze(nodes), edges: Object.freeze(edges) });
  }
}

export function compareIds(x: ImageId, y: ImageId): number {
  return x < y ? -1 : x > y ? 1 : 0;
}

export function compareEdgePairs(x: Edge, y: Edge): number {
  return compareIds(x.a, y.a) || compareIds(x.b, y.b);
}
