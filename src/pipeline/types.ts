export type ISO8601 = string;

export type CaptionKind = 'manual' | 'auto';

export interface CaptionTrack {
  language: string;
  kind: CaptionKind;
  name?: string;
  /** Identifier the provider downloads by, when it differs from `language` (e.g. "en-orig") */
  code?: string;
}

export interface CaptionFragment {
  text: string;
  startMs: number;
  durationMs: number;
}

/**
 * Source of caption listings and caption text for a video.
 * Only tracks in the video's own languages are listed; `fetchTrack` takes one of them.
 */
export interface CaptionProvider {
  listTracks(videoId: string): Promise<CaptionTrack[]>;
  fetchTrack(videoId: string, track: CaptionTrack): Promise<CaptionFragment[]>;
}

export interface AttemptFailure {
  language: string;
  message: string;
}

export interface Transcript {
  videoId: string;
  /** Language of the track the text came from */
  language: string;
  text: string;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface TextGenerator {
  generate(messages: ChatMessage[], opts?: GenerateOptions): Promise<string>;
}

export interface Embedder {
  embedDocuments(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

export interface Chunk {
  index: number;
  text: string;
}

export interface ScoredChunk extends Chunk {
  score: number;
}

export interface Turn {
  question: string;
  answer: string;
  at: ISO8601;
}

export interface SummaryResult {
  summary: string;
  truncated: boolean;
  sourceLength: number;
}

export interface Answer {
  answer: string;
  sources: ScoredChunk[];
}
