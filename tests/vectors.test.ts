import { describe, it, expect } from 'vitest';
import { InMemoryVectorIndex } from '../src/pipeline/vectors';

const entry = (index: number, vector: number[]) => ({ vector, chunk: { index, text: `chunk ${index}` } });

describe('InMemoryVectorIndex', () => {
  const index = InMemoryVectorIndex.build([entry(0, [1, 0]), entry(1, [0, 1]), entry(2, [1, 1]), entry(3, [2, 0])]);

  it('reports its shape', () => {
    expect(index.dimension).toBe(2);
    expect(index.size).toBe(4);
  });

  it('ranks by cosine similarity and keeps document order on ties', () => {
    const hits = index.search([5, 0], 4);

    expect(hits.map((h) => h.index)).toEqual([0, 3, 2, 1]);
    expect(hits[0].score).toBeCloseTo(1);
    expect(hits[2].score).toBeCloseTo(Math.SQRT1_2);
    expect(hits[3].score).toBeCloseTo(0);
    expect(hits[0].text).toBe('chunk 0');
  });

  it('returns at most k results', () => {
    expect(index.search([0, 1], 2).map((h) => h.index)).toEqual([1, 2]);
    expect(index.search([0, 1], 10)).toHaveLength(4);
    expect(index.search([0, 1], 0)).toEqual([]);
  });

  it('rejects a query of the wrong dimension', () => {
    expect(() => index.search([1, 0, 0], 1)).toThrow('Query dimension 3 does not match index dimension 2');
  });

  it('refuses to build from bad input', () => {
    expect(() => InMemoryVectorIndex.build([])).toThrow('Cannot build an index without entries');
    expect(() => InMemoryVectorIndex.build([entry(0, [1, 0]), entry(1, [1])])).toThrow(
      'Dimension mismatch at chunk 1: 1 vs 2'
    );
    expect(() => InMemoryVectorIndex.build([entry(0, [0, 0])])).toThrow(
      'Cannot index a zero or non-finite vector'
    );
  });
});
