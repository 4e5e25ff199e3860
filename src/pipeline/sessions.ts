import { randomUUID } from 'crypto';
import { SessionNotFoundError } from './errors';
import { debug, info } from './log';
import type { ISO8601, Turn } from './types';
import type { InMemoryVectorIndex } from './vectors';

export interface Session {
    readonly id: string;
    readonly videoId: string;
    readonly transcript: string;
    readonly index: InMemoryVectorIndex;
    /** Append-only conversation history, written by the retriever */
    readonly memory: Turn[];
    readonly createdAt: ISO8601;
    lastAccessedAt: number;
}

export interface IndexBuilder {
    buildIndex(text: string): Promise<InMemoryVectorIndex>;
}

export interface SessionStoreOptions {
    /** Least recently used sessions are evicted beyond this count */
    maxSessions: number;
    /** Idle time after which a session is dropped. 0 disables expiry. */
    ttlMs: number;
    now?: () => number;
}

/**
 * Process-wide registry of chat sessions, bounded by count and idle time.
 * Map insertion order doubles as recency order: every access re-inserts.
 */
export class SessionStore {
    private readonly sessions = new Map<string, Session>();
    private readonly locks = new Map<string, Promise<void>>();
    private readonly indexer: IndexBuilder;
    private readonly opts: SessionStoreOptions;
    private readonly now: () => number;
    private counter = 0;

    constructor(indexer: IndexBuilder, opts: SessionStoreOptions) {
        this.indexer = indexer;
        this.opts = opts;
        this.now = opts.now ?? Date.now;
    }

    async create(videoId: string, transcript: string): Promise<Session> {
        const index = await this.indexer.buildIndex(transcript);
        const session: Session = {
            id: this.nextId(videoId),
            videoId,
            transcript,
            index,
            memory: [],
            createdAt: new Date(this.now()).toISOString(),
            lastAccessedAt: this.now(),
        };
        this.sweepExpired();
        this.sessions.set(session.id, session);
        this.evictOverflow();
        info('session.create', { sessionId: session.id, videoId, chunks: index.size, active: this.sessions.size });
        return session;
    }

    get(id: string): Session {
        this.sweepExpired();
        const session = this.sessions.get(id);
        if (!session) throw new SessionNotFoundError(id);
        session.lastAccessedAt = this.now();
        this.sessions.delete(id);
        this.sessions.set(id, session);
        return session;
    }

    delete(id: string): void {
        if (!this.sessions.delete(id)) throw new SessionNotFoundError(id);
        info('session.delete', { sessionId: id, active: this.sessions.size });
    }

    get size(): number {
        this.sweepExpired();
        return this.sessions.size;
    }

    /**
     * Runs `fn` after every earlier call for the same session has settled,
     * so turns on one session are applied in arrival order.
     */
    async withSessionLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
        const prev = this.locks.get(id) ?? Promise.resolve();
        const run = prev.then(fn);
        const tail = run.then(
            () => undefined,
            () => undefined
        );
        this.locks.set(id, tail);
        try {
            return await run;
        } finally {
            if (this.locks.get(id) === tail) this.locks.delete(id);
        }
    }

    private nextId(videoId: string): string {
        this.counter += 1;
        return `session_${videoId}_${this.counter}_${randomUUID().slice(0, 8)}`;
    }

    private sweepExpired() {
        if (this.opts.ttlMs <= 0) return;
        const cutoff = this.now() - this.opts.ttlMs;
        for (const [id, session] of this.sessions) {
            if (session.lastAccessedAt > cutoff) break;
            this.sessions.delete(id);
            debug('session.expire', { sessionId: id });
        }
    }

    private evictOverflow() {
        if (this.opts.maxSessions <= 0) return;
        while (this.sessions.size > this.opts.maxSessions) {
            const oldest = this.sessions.keys().next();
            if (oldest.done) break;
            this.sessions.delete(oldest.value);
            info('session.evict', { sessionId: oldest.value, max: this.opts.maxSessions });
        }
    }
}
