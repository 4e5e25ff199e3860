import http from 'http';
import { info, warn } from '../pipeline/log';
import type { Services } from '../pipeline/run';
import { type ApiResponse, handleRequest, type RouteOptions } from './routes';

export interface ServerOptions extends RouteOptions {
  port: number;
  host: string;
  corsOrigin: string;
  /** Requests with larger bodies are rejected with 413 */
  maxBodyBytes?: number;
}

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

class BodyTooLargeError extends Error {}

function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflowed = false;
    // The rest of an oversized body is drained so the 413 can still be written
    req.on('data', (chunk: Buffer) => {
      if (overflowed) return;
      size += chunk.length;
      if (size > limit) {
        overflowed = true;
        chunks.length = 0;
        reject(new BodyTooLargeError(`Request body exceeds ${limit} bytes`));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!overflowed) resolve(Buffer.concat(chunks).toString('utf8'));
    });
    req.on('error', reject);
  });
}

function send(res: http.ServerResponse, out: ApiResponse, corsOrigin: string) {
  res.setHeader('Access-Control-Allow-Origin', corsOrigin);
  res.setHeader('Access-Control-Allow-Methods', 'GET,POST,DELETE,OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type,Authorization');
  if (out.body === undefined) {
    res.writeHead(out.status);
    res.end();
    return;
  }
  const payload = JSON.stringify(out.body);
  res.writeHead(out.status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

export function createServer(services: Services, opts: ServerOptions): http.Server {
  const limit = opts.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  return http.createServer((req, res) => {
    const method = req.method || 'GET';
    const url = req.url || '/';
    readBody(req, limit)
      .then((rawBody) => handleRequest(services, { method, url, rawBody }, opts))
      .catch((e: unknown): ApiResponse => {
        const tooLarge = e instanceof BodyTooLargeError;
        warn('api.body.fail', { method, url, error: e instanceof Error ? e.message : String(e) });
        return {
          status: tooLarge ? 413 : 400,
          body: {
            error: tooLarge ? 'payload_too_large' : 'invalid_body',
            message: e instanceof Error ? e.message : 'Could not read request body',
            category: 'input',
          },
        };
      })
      .then((out) => send(res, out, opts.corsOrigin))
      .catch((e: unknown) => warn('api.respond.fail', { method, url, error: String(e) }));
  });
}

export function startServer(services: Services, opts: ServerOptions): Promise<http.Server> {
  const server = createServer(services, opts);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(opts.port, opts.host, () => {
      server.off('error', reject);
      info('api.listen', { host: opts.host, port: opts.port, prefix: opts.apiPrefix });
      resolve(server);
    });
  });
}
