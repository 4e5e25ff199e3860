import type { Chunk, ScoredChunk } from './types';

export interface IndexEntry {
    vector: number[];
    chunk: Chunk;
}

interface NormalizedEntry {
    unit: Float64Array;
    chunk: Chunk;
}

function norm(vec: ArrayLike<number>): number {
    let sum = 0;
    for (let i = 0; i < vec.length; i++) sum += vec[i] * vec[i];
    return Math.sqrt(sum);
}

function toUnit(vec: number[]): Float64Array {
    const n = norm(vec);
    if (!Number.isFinite(n) || n === 0) {
        throw new Error('Cannot index a zero or non-finite vector');
    }
    return Float64Array.from(vec, (v) => v / n);
}

/**
 * Exact nearest-neighbour search by cosine similarity. Vectors are normalized
 * once at build time, so a query costs one dot product per chunk.
 * The index is immutable after build.
 */
export class InMemoryVectorIndex {
    readonly dimension: number;
    private readonly entries: NormalizedEntry[];

    private constructor(dimension: number, entries: NormalizedEntry[]) {
        this.dimension = dimension;
        this.entries = entries;
    }

    static build(entries: IndexEntry[]): InMemoryVectorIndex {
        if (entries.length === 0) throw new Error('Cannot build an index without entries');
        const dimension = entries[0].vector.length;
        const normalized = entries.map(({ vector, chunk }) => {
            if (vector.length !== dimension) {
                throw new Error(`Dimension mismatch at chunk ${chunk.index}: ${vector.length} vs ${dimension}`);
            }
            return { unit: toUnit(vector), chunk };
        });
        return new InMemoryVectorIndex(dimension, normalized);
    }

    get size(): number {
        return this.entries.length;
    }

    search(query: number[], k: number): ScoredChunk[] {
        if (query.length !== this.dimension) {
            throw new Error(`Query dimension ${query.length} does not match index dimension ${this.dimension}`);
        }
        const q = toUnit(query);
        const scored = this.entries.map(({ unit, chunk }) => {
            let dot = 0;
            for (let i = 0; i < unit.length; i++) dot += unit[i] * q[i];
            return { ...chunk, score: dot };
        });
        // Ties keep document order
        scored.sort((a, b) => b.score - a.score || a.index - b.index);
        return scored.slice(0, Math.max(0, k));
    }
}
