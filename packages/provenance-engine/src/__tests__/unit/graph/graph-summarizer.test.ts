/**
 * Graph Summarizer Tests
 *
 * Maximum-weight spanning forest and component partition, including the
 * deterministic tie-breaking rules.
 */

import { describe, it, expect } from 'vitest';
import { GraphBuilder } from '../../../graph/graph-builder.js';
import { compareForKruskal, connectedComponents, summarize } from '../../../graph/graph-summarizer.js';
import type { Edge, Graph } from '../../../core/types.js';

function graphOf(edges: ReadonlyArray<readonly [string, string, number]>, isolated: readonly string[] = []): Graph {
  const builder = new GraphBuilder();
  for (const id of isolated) {
    builder.addNode(id, 0);
  }
  for (const [a, b, weight] of edges) {
    builder.addEdge(a, b, weight, {
      sharedArea: weight,
      keypointCount: 20,
      isFlipped: false,
      variant: 'cv_rsift',
      depth: 0,
    });
  }
  return builder.snapshot();
}

const pairs = (edges: readonly Edge[]) => edges.map((edge) => `${edge.a}-${edge.b}`);

describe('summarize', () => {
  it('keeps the heaviest edges of a triangle', () => {
    const summary = summarize(
      graphOf([
        ['A', 'B', 0.8],
        ['A', 'C', 0.8],
        ['B', 'C', 0.5],
      ])
    );

    expect(pairs(summary.spanningForest)).toEqual(['A-B', 'A-C']);
    expect(summary.components).toEqual([['A', 'B', 'C']]);
  });

  it('drops the lightest edge of a cycle', () => {
    const summary = summarize(
      graphOf([
        ['A', 'B', 0.3],
        ['B', 'C', 0.9],
        ['C', 'D', 0.6],
        ['A', 'D', 0.7],
      ])
    );

    expect(pairs(summary.spanningForest)).toEqual(['B-C', 'A-D', 'C-D']);
  });

  it('breaks equal weights by (a, b) order', () => {
    const summary = summarize(
      graphOf([
        ['C', 'D', 0.5],
        ['B', 'C', 0.5],
        ['B', 'D', 0.5],
      ])
    );

    expect(pairs(summary.spanningForest)).toEqual(['B-C', 'B-D']);
  });

  it('yields a forest with one tree per component', () => {
    const summary = summarize(
      graphOf([
        ['A', 'B', 0.4],
        ['X', 'Y', 0.9],
        ['Y', 'Z', 0.2],
      ])
    );

    expect(summary.components).toEqual([
      ['A', 'B'],
      ['X', 'Y', 'Z'],
    ]);
    expect(summary.spanningForest).toHaveLength(3);
  });

  it('reports isolated nodes as singleton components', () => {
    const summary = summarize(graphOf([['B', 'C', 0.6]], ['A', 'D']));

    expect(summary.components).toEqual([['A'], ['B', 'C'], ['D']]);
    expect(pairs(summary.spanningForest)).toEqual(['B-C']);
  });

  it('handles an empty graph', () => {
    expect(summarize({ nodes: [], edges: [] })).toEqual({ spanningForest: [], components: [] });
  });

  it('gives the same answer regardless of insertion order', () => {
    const edges: Array<readonly [string, string, number]> = [
      ['A', 'B', 0.5],
      ['B', 'C', 0.5],
      ['C', 'A', 0.5],
      ['C', 'D', 0.9],
    ];

    const forward = summarize(graphOf(edges));
    const backward = summarize(graphOf([...edges].reverse()));

    expect(pairs(backward.spanningForest)).toEqual(pairs(forward.spanningForest));
    expect(backward.components).toEqual(forward.components);
  });
});

describe('compareForKruskal', () => {
  it('orders by descending weight first', () => {
    const [light, heavy] = graphOf([
      ['A', 'B', 0.2],
      ['C', 'D', 0.9],
    ]).edges;
    if (!light || !heavy) throw new Error('fixture');

    expect(compareForKruskal(heavy, light)).toBeLessThan(0);
    expect(compareForKruskal(light, heavy)).toBeGreaterThan(0);
  });
});

describe('connectedComponents', () => {
  it('matches the summarizer partition', () => {
    const graph = graphOf(
      [
        ['A', 'B', 0.1],
        ['C', 'D', 0.1],
      ],
      ['E']
    );

    expect(connectedComponents(graph)).toEqual(summarize(graph).components);
    expect(connectedComponents(graph)).toEqual([['A', 'B'], ['C', 'D'], ['E']]);
  });
});
