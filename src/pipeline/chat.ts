import { AnswerGenerationFailedError, describeCause } from './errors';
import { info, startStep, warn } from './log';
import type { Session } from './sessions';
import type { Answer, ChatMessage, Embedder, ScoredChunk, TextGenerator, Turn } from './types';

export interface RetrieverOptions {
    k: number;
    temperature: number;
    maxTokens: number;
    /** How many past turns go back into the prompt. 0 sends all of them. */
    historyTurns: number;
    /** Rewrite follow-ups into standalone questions before retrieval */
    condenseQuestion: boolean;
}

export interface SessionLock {
    withSessionLock<T>(id: string, fn: () => Promise<T>): Promise<T>;
}

const QA_SYSTEM_PROMPT =
    "Use the following pieces of context from a video transcript to answer the user's question. " +
    "If you don't know the answer, just say that you don't know, don't try to make up an answer.";

export function formatContext(chunks: ScoredChunk[]): string {
    return chunks.map((c) => c.text).join('\n\n');
}

export function historyMessages(turns: Turn[]): ChatMessage[] {
    return turns.flatMap((t): ChatMessage[] => [
        { role: 'user', content: t.question },
        { role: 'assistant', content: t.answer },
    ]);
}

export function answerMessages(question: string, sources: ScoredChunk[], history: Turn[]): ChatMessage[] {
    return [
        { role: 'system', content: `${QA_SYSTEM_PROMPT}\n\n${formatContext(sources)}` },
        ...historyMessages(history),
        { role: 'user', content: question },
    ];
}

export function condenseMessages(question: string, history: Turn[]): ChatMessage[] {
    const transcript = history.map((t) => `Human: ${t.question}\nAssistant: ${t.answer}`).join('\n');
    return [
        {
            role: 'user',
            content:
                'Given the following conversation and a follow up question, rephrase the follow up question ' +
                'to be a standalone question, in its original language.\n\n' +
                `Chat History:\n${transcript}\nFollow Up Input: ${question}\nStandalone question:`,
        },
    ];
}

/**
 * Answers questions about one session's transcript: retrieve the closest
 * chunks, then generate with the conversation so far. Every question goes
 * through retrieval.
 */
export class ConversationalRetriever {
    private readonly lock: SessionLock;
    private readonly embedder: Embedder;
    private readonly generator: TextGenerator;
    private readonly opts: RetrieverOptions;

    constructor(lock: SessionLock, embedder: Embedder, generator: TextGenerator, opts: RetrieverOptions) {
        this.lock = lock;
        this.embedder = embedder;
        this.generator = generator;
        this.opts = opts;
    }

    ask(session: Session, question: string): Promise<Answer> {
        return this.lock.withSessionLock(session.id, () => this.answer(session, question));
    }

    private async answer(session: Session, question: string): Promise<Answer> {
        const step = startStep('chat.answer', { sessionId: session.id, turn: session.memory.length + 1 });
        const history =
            this.opts.historyTurns > 0 ? session.memory.slice(-this.opts.historyTurns) : [...session.memory];

        let answer: string;
        let sources: ScoredChunk[];
        try {
            const query = await this.standaloneQuestion(question, history);
            const queryVector = await this.embedder.embedQuery(query);
            sources = session.index.search(queryVector, this.opts.k);
            answer = await this.generator.generate(answerMessages(question, sources, history), {
                temperature: this.opts.temperature,
                maxTokens: this.opts.maxTokens,
            });
            if (!answer.trim()) throw new Error('empty completion');
        } catch (e) {
            warn('chat.answer.fail', { sessionId: session.id, error: describeCause(e) });
            throw new AnswerGenerationFailedError(e);
        }

        session.memory.push({ question, answer, at: new Date().toISOString() });
        step.end({ sources: sources.length });
        info('chat.turn', { sessionId: session.id, turns: session.memory.length });
        return { answer, sources };
    }

    private async standaloneQuestion(question: string, history: Turn[]): Promise<string> {
        if (!this.opts.condenseQuestion || history.length === 0) return question;
        const rewritten = await this.generator.generate(condenseMessages(question, history), { temperature: 0 });
        return rewritten.trim() || question;
    }
}
