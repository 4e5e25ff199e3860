import { chunkTranscript, type ChunkOptions } from './chunk';
import { IndexingFailedError } from './errors';
import { startStep } from './log';
import type { Chunk, Embedder } from './types';
import { InMemoryVectorIndex } from './vectors';

export interface IndexerOptions extends ChunkOptions {
    batchSize: number;
}

export class Indexer {
    private readonly embedder: Embedder;
    private readonly opts: IndexerOptions;

    constructor(embedder: Embedder, opts: IndexerOptions) {
        this.embedder = embedder;
        this.opts = opts;
    }

    /**
     * Chunks the transcript, embeds every chunk and builds the search index.
     * Any failure aborts the whole build.
     */
    async buildIndex(text: string): Promise<InMemoryVectorIndex> {
        try {
            const chunks = await chunkTranscript(text, this.opts);
            if (chunks.length === 0) throw new Error('Transcript produced no chunks');

            const step = startStep('index.embed', { chunks: chunks.length });
            const vectors = await this.embedAll(chunks, step.eta);
            step.end();

            return InMemoryVectorIndex.build(chunks.map((chunk, i) => ({ chunk, vector: vectors[i] })));
        } catch (e) {
            throw new IndexingFailedError(e);
        }
    }

    private async embedAll(chunks: Chunk[], progress: (done: number, total: number) => void): Promise<number[][]> {
        const size = Math.max(1, this.opts.batchSize);
        const vectors: number[][] = [];
        for (let start = 0; start < chunks.length; start += size) {
            const batch = chunks.slice(start, start + size).map((c) => c.text);
            const got = await this.embedder.embedDocuments(batch);
            if (got.length !== batch.length) {
                throw new Error(`Embedder returned ${got.length} vectors for ${batch.length} chunks`);
            }
            vectors.push(...got);
            progress(vectors.length, chunks.length);
        }
        return vectors;
    }
}
