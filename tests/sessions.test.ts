import { describe, it, expect } from 'vitest';
import { SessionStore, type IndexBuilder } from '../src/pipeline/sessions';
import { SessionNotFoundError } from '../src/pipeline/errors';
import { InMemoryVectorIndex } from '../src/pipeline/vectors';

const stubIndexer: IndexBuilder = {
  buildIndex: async (text) => InMemoryVectorIndex.build([{ vector: [1, 0], chunk: { index: 0, text } }]),
};

describe('SessionStore', () => {
  it('creates sessions with unique ids derived from the video id', async () => {
    const store = new SessionStore(stubIndexer, { maxSessions: 0, ttlMs: 0 });
    const a = await store.create('abc123', 'first transcript');
    const b = await store.create('abc123', 'second transcript');

    expect(a.id).toMatch(/^session_abc123_1_[0-9a-f]{8}$/);
    expect(b.id).toMatch(/^session_abc123_2_[0-9a-f]{8}$/);
    expect(a.memory).toEqual([]);
    expect(a.index.size).toBe(1);
    expect(store.get(a.id)).toBe(a);
    expect(store.size).toBe(2);
  });

  it('deletes once and then reports the session as missing', async () => {
    const store = new SessionStore(stubIndexer, { maxSessions: 0, ttlMs: 0 });
    const s = await store.create('vid', 'text');

    store.delete(s.id);
    expect(() => store.delete(s.id)).toThrow(SessionNotFoundError);
    expect(() => store.get(s.id)).toThrow('Session not found. Please summarize a video first.');

    const again = await store.create('vid', 'text');
    expect(again.id).not.toBe(s.id);
  });

  it('does not register a session when indexing fails', async () => {
    const store = new SessionStore(
      { buildIndex: async () => Promise.reject(new Error('embedder down')) },
      { maxSessions: 0, ttlMs: 0 }
    );

    await expect(store.create('vid', 'text')).rejects.toThrow('embedder down');
    expect(store.size).toBe(0);
  });

  it('evicts the least recently used session beyond the limit', async () => {
    const store = new SessionStore(stubIndexer, { maxSessions: 2, ttlMs: 0 });
    const a = await store.create('a', 'text');
    const b = await store.create('b', 'text');
    store.get(a.id);
    const c = await store.create('c', 'text');

    expect(store.size).toBe(2);
    expect(store.get(a.id)).toBe(a);
    expect(store.get(c.id)).toBe(c);
    expect(() => store.get(b.id)).toThrow(SessionNotFoundError);
  });

  it('expires sessions idle longer than the ttl', async () => {
    let clock = 0;
    const store = new SessionStore(stubIndexer, { maxSessions: 0, ttlMs: 1000, now: () => clock });
    const a = await store.create('a', 'text');
    clock = 500;
    const b = await store.create('b', 'text');

    clock = 1200;
    expect(() => store.get(a.id)).toThrow(SessionNotFoundError);
    expect(store.get(b.id).lastAccessedAt).toBe(1200);

    clock = 2100;
    expect(store.size).toBe(1);
    clock = 2200;
    expect(store.size).toBe(0);
  });

  it('runs locked work for one session in arrival order', async () => {
    const store = new SessionStore(stubIndexer, { maxSessions: 0, ttlMs: 0 });
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });

    const first = store.withSessionLock('s', async () => {
      await gate;
      order.push('first');
      throw new Error('first failed');
    });
    const second = store.withSessionLock('s', async () => {
      order.push('second');
      return 2;
    });
    const other = store.withSessionLock('t', async () => {
      order.push('other');
    });

    await other;
    expect(order).toEqual(['other']);
    release();

    await expect(first).rejects.toThrow('first failed');
    await expect(second).resolves.toBe(2);
    expect(order).toEqual(['other', 'first', 'second']);
  });
});
