/**
 * Graph Builder Tests
 *
 * Edge normalization, best-result retention, node depth bookkeeping and
 * frozen snapshots.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { GraphBuilder, normalizePair, pairKey } from '../../../graph/graph-builder.js';
import type { EdgeAttributes } from '../../../core/types.js';

function attrs(overrides: Partial<EdgeAttributes> = {}): EdgeAttributes {
  return {
    sharedArea: 0.5,
    keypointCount: 40,
    isFlipped: false,
    variant: 'cv_rsift',
    depth: 0,
    ...overrides,
  };
}

describe('pairKey', () => {
  it('is independent of argument order', () => {
    expect(pairKey('b', 'a')).toBe(pairKey('a', 'b'));
  });

  it('does not collide for ids that share a prefix', () => {
    expect(pairKey('ab', 'c')).not.toBe(pairKey('a', 'bc'));
  });

  it('normalizePair orders endpoints lexicographically', () => {
    expect(normalizePair('z', 'a')).toEqual(['a', 'z']);
    expect(normalizePair('a', 'z')).toEqual(['a', 'z']);
  });
});

describe('GraphBuilder', () => {
  let builder: GraphBuilder;

  beforeEach(() => {
    builder = new GraphBuilder();
  });

  describe('addEdge', () => {
    it('stores endpoints with a < b', () => {
      expect(builder.addEdge('B', 'A', 0.7, attrs())).toBe('inserted');

      const edge = builder.getEdge('A', 'B');
      expect(edge?.a).toBe('A');
      expect(edge?.b).toBe('B');
      expect(edge?.weight).toBe(0.7);
    });

    it('keeps one edge per unordered pair', () => {
      builder.addEdge('A', 'B', 0.4, attrs());
      builder.addEdge('B', 'A', 0.6, attrs());

      expect(builder.edgeCount).toBe(1);
      expect(builder.getEdge('A', 'B')?.weight).toBe(0.6);
    });

    it('keeps the stored edge when the new weight is lower', () => {
      builder.addEdge('A', 'B', 0.8, attrs({ keypointCount: 80 }));

      expect(builder.addEdge('A', 'B', 0.3, attrs({ keypointCount: 12 }))).toBe('kept');
      expect(builder.getEdge('A', 'B')?.keypointCount).toBe(80);
    });

    it('replaces the stored edge on an equal weight', () => {
      builder.addEdge('A', 'B', 0.5, attrs({ isFlipped: false }));

      expect(builder.addEdge('A', 'B', 0.5, attrs({ isFlipped: true }))).toBe('upgraded');
      expect(builder.getEdge('A', 'B')?.isFlipped).toBe(true);
    });

    it('rejects self-edges', () => {
      expect(builder.addEdge('A', 'A', 0.9, attrs())).toBe('rejected');
      expect(builder.edgeCount).toBe(0);
      expect(builder.nodeCount).toBe(0);
    });

    it('rejects weights outside [0, 1]', () => {
      expect(builder.addEdge('A', 'B', 1.2, attrs())).toBe('rejected');
      expect(builder.addEdge('A', 'B', -0.1, attrs())).toBe('rejected');
      expect(builder.addEdge('A', 'B', Number.NaN, attrs())).toBe('rejected');
      expect(builder.edgeCount).toBe(0);
    });

    it('creates missing endpoints at the edge depth', () => {
      builder.addEdge('A', 'B', 0.5, attrs({ depth: 2 }));

      expect(builder.hasNode('A')).toBe(true);
      expect(builder.hasNode('B')).toBe(true);
      expect(builder.snapshot().nodes.map((node) => node.depth)).toEqual([2, 2]);
    });

    it('does not move an existing node when an edge is added', () => {
      builder.addNode('A', 0);
      builder.addEdge('A', 'B', 0.5, attrs({ depth: 3 }));

      const nodes = builder.snapshot().nodes;
      expect(nodes.find((node) => node.id === 'A')?.depth).toBe(0);
    });
  });

  describe('nodes', () => {
    it('keeps the smallest depth seen', () => {
      builder.addNode('A', 3);
      builder.addNode('A', 1);
      builder.addNode('A', 2);

      expect(builder.snapshot().nodes).toEqual([{ id: 'A', isQuery: false, depth: 1 }]);
    });

    it('markQuery flags the node and pins it at depth 0', () => {
      builder.addNode('S', 2);
      builder.markQuery('S');

      expect(builder.snapshot().nodes).toEqual([{ id: 'S', isQuery: true, depth: 0 }]);
    });
  });

  describe('snapshot', () => {
    it('sorts nodes by id and edges by (a, b)', () => {
      builder.addEdge('C', 'D', 0.2, attrs());
      builder.addEdge('A', 'C', 0.9, attrs());
      builder.addEdge('B', 'A', 0.4, attrs());

      const graph = builder.snapshot();
      expect(graph.nodes.map((node) => node.id)).toEqual(['A', 'B', 'C', 'D']);
      expect(graph.edges.map((edge) => `${edge.a}${edge.b}`)).toEqual(['AB', 'AC', 'CD']);
    });

    it('is frozen and unaffected by later additions', () => {
      builder.addEdge('A', 'B', 0.5, attrs());
      const graph = builder.snapshot();

      builder.addEdge('B', 'C', 0.5, attrs());

      expect(Object.isFrozen(graph)).toBe(true);
      expect(Object.isFrozen(graph.edges)).toBe(true);
      expect(graph.edges).toHaveLength(1);
      expect(graph.nodes).toHaveLength(2);
    });

    it('carries edge attributes through', () => {
      builder.addEdge('A', 'B', 0.5, attrs({ sharedArea: 0.5, keypointCount: 33, isFlipped: true, depth: 1 }));

      expect(builder.snapshot().edges[0]).toEqual({
        a: 'A',
        b: 'B',
        weight: 0.5,
        sharedArea: 0.5,
        keypointCount: 33,
        isFlipped: true,
        variant: 'cv_rsift',
        depth: 1,
      });
    });
  });
});
