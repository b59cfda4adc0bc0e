/**
 * Graph Summarizer
 *
 * Reduces an accumulated provenance graph to:
 * - a maximum-weight spanning forest (Kruskal, descending weight)
 * - its connected components
 *
 * Both are deterministic: equal-weight edges are considered in lexicographic
 * (a, b) order, component members are sorted, and components are ordered by
 * their smallest member. Nodes without edges are singleton components.
 */

import type { Edge, Graph, GraphSummary, ImageId } from '../core/types.js';
import { DisjointSet } from './disjoint-set.js';
import { compareEdgePairs, compareIds } from './graph-builder.js';

/**
 * Descending weight, then (a, b) ascending
 */
export function compareForKruskal(x: Edge, y: Edge): number {
  if (x.weight !== y.weight) {
    return y.weight - x.weight;
  }
  return compareEdgePairs(x, y);
}

/**
 * Compute spanning forest and component partition
 */
export function summarize(graph: Graph): GraphSummary {
  const sets = new DisjointSet<ImageId>();
  for (const node of graph.nodes) {
    sets.add(node.id);
  }

  const ordered = [...graph.edges].sort(compareForKruskal);
  const spanningForest: Edge[] = [];
  for (const edge of ordered) {
    if (sets.union(edge.a, edge.b)) {
      spanningForest.push(edge);
    }
  }

  return {
    spanningForest,
    components: groupComponents(graph, sets),
  };
}

/**
 * Connected components only (no forest)
 */
export function connectedComponents(graph: Graph): readonly (readonly ImageId[])[] {
  const sets = new DisjointSet<ImageId>();
  for (const node of graph.nodes) {
    sets.add(node.id);
  }
  for (const edge of graph.edges) {
    sets.union(edge.a, edge.b);
  }
  return groupComponents(graph, sets);
}

function groupComponents(graph: Graph, sets: DisjointSet<ImageId>): ImageId[][] {
  const groups = new Map<ImageId, ImageId[]>();
  const members = new Set<ImageId>(graph.nodes.map((node) => node.id));
  for (const edge of graph.edges) {
    members.add(edge.a);
    members.add(edge.b);
  }

  for (const id of members) {
    const root = sets.find(id);
    const group = groups.get(root);
    if (group) {
      group.push(id);
    } else {
      groups.set(root, [id]);
    }
  }

  const components = [...groups.values()].map((group) => group.sort(compareIds));
  components.sort((x, y) => compareIds(x[0] ?? '', y[0] ?? ''));
  return components;
}
