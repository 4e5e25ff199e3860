import { z } from 'zod';
import { describeCause, type ErrorCategory, RequestValidationError, TubeChatError } from '../pipeline/errors';
import { error as logError, errorMeta, info } from '../pipeline/log';
import { askQuestion, type Services, summarizeVideo } from '../pipeline/run';

export interface ApiRequest {
  method: string;
  /** Path plus optional query string, as received */
  url: string;
  rawBody?: string;
}

export interface ApiResponse {
  status: number;
  body?: Record<string, unknown>;
}

export interface ErrorBody extends Record<string, unknown> {
  error: string;
  message: string;
  category: ErrorCategory;
  details?: Record<string, unknown>;
}

export interface RouteOptions {
  apiPrefix: string;
}

const SummarizeBody = z.object({
  video_url: z.string().trim().min(1, 'video_url is required'),
});

const ChatBody = z.object({
  session_id: z.string().trim().min(1, 'session_id is required'),
  question: z.string().trim().min(1, 'question is required'),
});

const SESSION_PATH = /^\/session\/([^/]+)(\/history)?$/;

export const ok = (body: Record<string, unknown>, status = 200): ApiResponse => ({ status, body });

export const fail = (
  status: number,
  code: string,
  message: string,
  category: ErrorCategory,
  details?: Record<string, unknown>
): ApiResponse => {
  const body: ErrorBody = { error: code, message, category };
  if (details !== undefined) body.details = details;
  return { status, body };
};

export function parseJsonBody<TSchema extends z.ZodTypeAny>(
  rawBody: string | undefined,
  schema: TSchema
): z.infer<TSchema> {
  let body: unknown;
  try {
    body = JSON.parse(rawBody || '');
  } catch {
    throw new RequestValidationError('Invalid JSON body.', 'invalid_json');
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new RequestValidationError('Invalid request payload.', 'invalid_payload', {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}

export function toErrorResponse(e: unknown): ApiResponse {
  if (e instanceof TubeChatError) {
    return fail(e.statusCode, e.code, e.message, e.category, e.details);
  }
  return fail(500, 'internal_error', `Error processing request: ${describeCause(e)}`, 'service');
}

function stripPrefix(pathname: string, prefix: string): string | null {
  if (!prefix || prefix === '/') return pathname;
  if (pathname === prefix) return '/';
  return pathname.startsWith(`${prefix}/`) ? pathname.slice(prefix.length) : null;
}

async function dispatch(services: Services, req: ApiRequest, opts: RouteOptions): Promise<ApiResponse> {
  const method = req.method.toUpperCase();
  const pathname = new URL(req.url, 'http://localhost').pathname.replace(/\/+$/, '') || '/';

  if (method === 'OPTIONS') return { status: 204 };
  if (method === 'GET' && pathname === '/') {
    return ok({ message: 'YouTube Video Summarizer API', status: 'active' });
  }

  const route = stripPrefix(pathname, opts.apiPrefix);

  if (method === 'POST' && route === '/summarize') {
    const { video_url } = parseJsonBody(req.rawBody, SummarizeBody);
    const result = await summarizeVideo(services, video_url);
    return ok({
      summary: result.summary,
      session_id: result.sessionId,
      video_id: result.videoId,
      transcript_length: result.transcriptLength,
    });
  }

  if (method === 'POST' && route === '/chat') {
    const { session_id, question } = parseJsonBody(req.rawBody, ChatBody);
    const { answer } = await askQuestion(services, session_id, question);
    return ok({ answer, session_id });
  }

  if (method === 'GET' && route === '/health') {
    return ok({ status: 'healthy', active_sessions: services.store.size });
  }

  const sessionMatch = route ? SESSION_PATH.exec(route) : null;
  if (sessionMatch) {
    const sessionId = decodeURIComponent(sessionMatch[1]);
    const wantsHistory = Boolean(sessionMatch[2]);
    if (method === 'GET' && wantsHistory) {
      const session = services.store.get(sessionId);
      return ok({
        session_id: session.id,
        video_id: session.videoId,
        turns: session.memory.map((t) => ({ question: t.question, answer: t.answer })),
      });
    }
    if (method === 'DELETE' && !wantsHistory) {
      services.store.delete(sessionId);
      return ok({ message: 'Session cleared successfully' });
    }
  }

  return fail(404, 'not_found', `No route for ${method} ${pathname}`, 'input');
}

/**
 * Maps one HTTP-shaped request onto the pipeline. Never throws: every failure
 * becomes an error response.
 */
export async function handleRequest(
  services: Services,
  req: ApiRequest,
  opts: RouteOptions
): Promise<ApiResponse> {
  const startTs = Date.now();
  let res: ApiResponse;
  try {
    res = await dispatch(services, req, opts);
  } catch (e) {
    res = toErrorResponse(e);
    if (res.status >= 500) {
      logError('api.request.fail', { method: req.method, url: req.url, status: res.status, ...errorMeta(e) });
    }
  }
  info('api.request', { method: req.method, url: req.url, status: res.status, ms: Date.now() - startTs });
  return res;
}
