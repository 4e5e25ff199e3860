/**
 * Type definitions for the TubeChat API
 */

/**
 * Whether an error was caused by the request or by a backing provider
 */
export type ErrorCategory = 'input' | 'service';

/**
 * Request to summarize a video and open a chat session
 */
export interface SummarizeRequest {
  /** YouTube watch, embed or youtu.be URL */
  video_url: string;
}

export interface SummarizeResponse {
  /** Generated summary, with a note appended for long videos */
  summary: string;
  /** Handle for follow-up questions */
  session_id: string;
  /** Resolved YouTube video ID */
  video_id: string;
  /** Transcript length in characters */
  transcript_length: number;
}

export interface ChatRequest {
  session_id: string;
  question: string;
}

export interface ChatResponse {
  answer: string;
  session_id: string;
}

export interface HistoryTurn {
  question: string;
  answer: string;
}

export interface HistoryResponse {
  session_id: string;
  video_id: string;
  /** Turns in the order they were asked */
  turns: HistoryTurn[];
}

export interface MessageResponse {
  message: string;
}

export interface HealthResponse {
  status: string;
  active_sessions: number;
}

/**
 * API error response
 */
export interface ErrorResponse {
  /** Error code */
  error: string;
  /** Human-readable message */
  message: string;
  category?: ErrorCategory;
  /** Additional error details */
  details?: Record<string, unknown>;
}

/**
 * Client configuration options
 */
export interface ClientOptions {
  /** Base URL of the API, including its prefix */
  baseUrl?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Custom fetch implementation */
  fetch?: typeof globalThis.fetch;
}
