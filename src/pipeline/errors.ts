/**
 * Error taxonomy for the summarize / chat pipeline.
 *
 * `category` separates problems with what the caller sent ("input") from
 * failures of the generation, embedding or indexing providers ("service").
 */

export type ErrorCategory = 'input' | 'service';

export type ErrorCode =
  | 'invalid_reference'
  | 'no_caption_metadata'
  | 'no_transcript_available'
  | 'empty_transcript'
  | 'content_too_long'
  | 'summarization_failed'
  | 'indexing_failed'
  | 'session_not_found'
  | 'answer_generation_failed'
  | 'invalid_payload'
  | 'invalid_json';

/**
 * Base class for all pipeline errors
 */
export class TubeChatError extends Error {
  code: ErrorCode;
  statusCode: number;
  category: ErrorCategory;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    category: ErrorCategory,
    options: { cause?: unknown; details?: Record<string, unknown> } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TubeChatError';
    this.code = code;
    this.statusCode = statusCode;
    this.category = category;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [this.message, `(status: ${this.statusCode})`, `(code: ${this.code})`];
    if (this.cause !== undefined) {
      parts.push(`(cause: ${describeCause(this.cause)})`);
    }
    return parts.join(' ');
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class InvalidReferenceError extends TubeChatError {
  constructor(reference: string) {
    super('Invalid YouTube URL', 'invalid_reference', 400, 'input', { details: { reference } });
    this.name = 'InvalidReferenceError';
  }
}

export class NoCaptionMetadataError extends TubeChatError {
  constructor(videoId: string, cause: unknown) {
    super(
      'Could not retrieve transcript information for this video. The video may not have captions, ' +
        `or it might be private/age-restricted. Error: ${describeCause(cause)}`,
      'no_caption_metadata',
      400,
      'input',
      { cause, details: { videoId } }
    );
    this.name = 'NoCaptionMetadataError';
  }
}

export class NoTranscriptAvailableError extends TubeChatError {
  constructor(videoId: string, details: Record<string, unknown>, cause?: unknown) {
    super(
      'Could not retrieve any transcript for this video. Please try a different video with captions enabled.',
      'no_transcript_available',
      400,
      'input',
      { cause, details: { videoId, ...details } }
    );
    this.name = 'NoTranscriptAvailableError';
  }
}

export class EmptyTranscriptError extends TubeChatError {
  constructor(videoId: string) {
    super(
      'Transcript is empty. The video may not have valid captions.',
      'empty_transcript',
      400,
      'input',
      { details: { videoId } }
    );
    this.name = 'EmptyTranscriptError';
  }
}

export class ContentTooLongError extends TubeChatError {
  constructor(cause: unknown) {
    super(
      'Video is too long to summarize. Please try a shorter video (under 30 minutes).',
      'content_too_long',
      400,
      'input',
      { cause }
    );
    this.name = 'ContentTooLongError';
  }
}

export class SummarizationFailedError extends TubeChatError {
  constructor(cause: unknown) {
    super(`Summarization failed: ${describeCause(cause)}`, 'summarization_failed', 500, 'service', { cause });
    this.name = 'SummarizationFailedError';
  }
}

export class IndexingFailedError extends TubeChatError {
  constructor(cause: unknown) {
    super(`Vector store creation failed: ${describeCause(cause)}`, 'indexing_failed', 500, 'service', { cause });
    this.name = 'IndexingFailedError';
  }
}

export class SessionNotFoundError extends TubeChatError {
  constructor(sessionId: string) {
    super('Session not found. Please summarize a video first.', 'session_not_found', 404, 'input', {
      details: { sessionId },
    });
    this.name = 'SessionNotFoundError';
  }
}

export class AnswerGenerationFailedError extends TubeChatError {
  constructor(cause: unknown) {
    super(`Error answering question: ${describeCause(cause)}`, 'answer_generation_failed', 500, 'service', {
      cause,
    });
    this.name = 'AnswerGenerationFailedError';
  }
}

/**
 * Request body could not be parsed or did not match the expected shape
 */
export class RequestValidationError extends TubeChatError {
  constructor(message: string, code: 'invalid_payload' | 'invalid_json' = 'invalid_payload', details?: Record<string, unknown>) {
    super(message, code, 400, 'input', { details });
    this.name = 'RequestValidationError';
  }
}
