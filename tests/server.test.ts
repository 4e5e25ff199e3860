import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import { startServer } from '../src/api/server';
import { createServices } from '../src/pipeline/run';
import { FakeCaptionProvider, HashEmbedder, ScriptedGenerator, testEnv } from './helpers/fakes';

describe('HTTP server', () => {
  let server: Server;
  let base: string;

  beforeAll(async () => {
    const services = createServices(testEnv(), {
      captions: new FakeCaptionProvider([], {}),
      generator: new ScriptedGenerator('unused'),
      embedder: new HashEmbedder(),
    });
    server = await startServer(services, {
      port: 0,
      host: '127.0.0.1',
      apiPrefix: '/api',
      corsOrigin: 'http://localhost:3000',
      maxBodyBytes: 64,
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
  });

  it('serves JSON with CORS headers', async () => {
    const res = await fetch(`${base}/api/health`);

    expect(res.status).toBe(200);
    expect(res.headers.get('access-control-allow-origin')).toBe('http://localhost:3000');
    expect(res.headers.get('content-type')).toBe('application/json; charset=utf-8');
    expect(await res.json()).toEqual({ status: 'healthy', active_sessions: 0 });
  });

  it('answers preflight requests without a body', async () => {
    const res = await fetch(`${base}/api/chat`, { method: 'OPTIONS' });

    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-methods')).toBe('GET,POST,DELETE,OPTIONS');
  });

  it('rejects oversized bodies', async () => {
    const res = await fetch(`${base}/api/summarize`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ video_url: `https://youtu.be/${'x'.repeat(100)}` }),
    });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      error: 'payload_too_large',
      message: 'Request body exceeds 64 bytes',
      category: 'input',
    });
  });
});
