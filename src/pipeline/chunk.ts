import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import type { Chunk } from './types';
import { debug } from './log';

export interface ChunkOptions {
    chunkSize: number;
    chunkOverlap: number;
}

// Paragraph, line, sentence, word, then a hard character cut as the last resort
export const SPLIT_SEPARATORS = ['\n\n', '\n', '. ', '? ', '! ', ' ', ''];

export async function chunkTranscript(text: string, opts: ChunkOptions): Promise<Chunk[]> {
    if (opts.chunkOverlap >= opts.chunkSize) {
        throw new Error(
            `Chunk overlap (${opts.chunkOverlap}) must be smaller than chunk size (${opts.chunkSize}).`
        );
    }
    const splitter = new RecursiveCharacterTextSplitter({
        chunkSize: opts.chunkSize,
        chunkOverlap: opts.chunkOverlap,
        separators: SPLIT_SEPARATORS,
        keepSeparator: false,
    });
    const pieces = await splitter.splitText(text);
    debug('chunk.split', { chars: text.length, chunks: pieces.length, ...opts });
    return pieces.map((piece, index) => ({ index, text: piece }));
}
