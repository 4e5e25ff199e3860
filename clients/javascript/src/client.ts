/**
 * TubeChat API Client
 */

import ky, { type KyInstance, type Options as KyOptions } from 'ky';
import type {
  ChatRequest,
  ChatResponse,
  ClientOptions,
  HealthResponse,
  HistoryResponse,
  MessageResponse,
  SummarizeRequest,
  SummarizeResponse,
} from './types';
import { handleErrorResponse, NetworkError, parseErrorResponse, TimeoutError } from './errors';

/**
 * Convert transport failures into our error types
 */
function toTransportError(error: unknown): unknown {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return new TimeoutError(`Request timeout: ${error.message}`);
  }
  if (error instanceof TypeError) {
    return new NetworkError(`Network error: ${error.message}`);
  }
  return error;
}

/**
 * TubeChat API Client
 */
export class TubeChatClient {
  private client: KyInstance;

  constructor(options: ClientOptions = {}) {
    const { baseUrl = 'http://localhost:8000/api', timeout = 120000, fetch } = options;

    // Summaries and answers can take a while; retries would open duplicate sessions
    const kyOptions: KyOptions = {
      prefixUrl: baseUrl,
      timeout,
      retry: 0,
      throwHttpErrors: false,
    };
    if (fetch) {
      kyOptions.fetch = fetch;
    }

    this.client = ky.create(kyOptions);
  }

  /**
   * Make HTTP request and map error responses
   */
  private async request<T>(path: string, options?: KyOptions): Promise<T> {
    const response = await this.client(path, options).catch((error: unknown) => {
      throw toTransportError(error);
    });

    if (!response.ok) {
      let errorData: unknown;
      try {
        errorData = await response.json();
      } catch {
        errorData = undefined; // Response might not be JSON
      }
      handleErrorResponse(response, parseErrorResponse(errorData));
    }

    return response.json<T>();
  }

  /**
   * Summarize a video and open a chat session for it
   */
  async summarize(videoUrl: string): Promise<SummarizeResponse> {
    const body: SummarizeRequest = { video_url: videoUrl };
    return this.request<SummarizeResponse>('summarize', { method: 'POST', json: body });
  }

  /**
   * Ask a follow-up question in an existing session
   */
  async chat(sessionId: string, question: string): Promise<ChatResponse> {
    const body: ChatRequest = { session_id: sessionId, question };
    return this.request<ChatResponse>('chat', { method: 'POST', json: body });
  }

  /**
   * Get the questions and answers so far
   */
  async getHistory(sessionId: string): Promise<HistoryResponse> {
    return this.request<HistoryResponse>(`session/${encodeURIComponent(sessionId)}/history`);
  }

  /**
   * Drop a session on the server
   */
  async deleteSession(sessionId: string): Promise<MessageResponse> {
    return this.request<MessageResponse>(`session/${encodeURIComponent(sessionId)}`, { method: 'DELETE' });
  }

  async health(): Promise<HealthResponse> {
    return this.request<HealthResponse>('health');
  }
}
