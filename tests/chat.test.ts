import { describe, it, expect } from 'vitest';
import { answerMessages, ConversationalRetriever, type SessionLock } from '../src/pipeline/chat';
import { AnswerGenerationFailedError } from '../src/pipeline/errors';
import type { Session } from '../src/pipeline/sessions';
import { InMemoryVectorIndex } from '../src/pipeline/vectors';
import { HashEmbedder, ScriptedGenerator } from './helpers/fakes';

const CHUNKS = ['cats purr softly', 'dogs bark loudly', 'birds sing songs'];
const OPTS = { k: 2, temperature: 0.3, maxTokens: 600, historyTurns: 0, condenseQuestion: false };

const inline: SessionLock = { withSessionLock: (_id, fn) => fn() };

function makeSession(embedder: HashEmbedder): Session {
  const index = InMemoryVectorIndex.build(
    CHUNKS.map((text, index) => ({ vector: embedder.vector(text), chunk: { index, text } }))
  );
  return {
    id: 'session_v_1_abcd1234',
    videoId: 'v',
    transcript: CHUNKS.join(' '),
    index,
    memory: [],
    createdAt: '2026-01-01T00:00:00.000Z',
    lastAccessedAt: 0,
  };
}

describe('ConversationalRetriever', () => {
  it('answers from the closest chunks and records the turn', async () => {
    const embedder = new HashEmbedder();
    const generator = new ScriptedGenerator('Because they are dogs.');
    const session = makeSession(embedder);
    const retriever = new ConversationalRetriever(inline, embedder, generator, OPTS);

    const res = await retriever.ask(session, 'why dogs bark');

    expect(res.answer).toBe('Because they are dogs.');
    expect(res.sources).toHaveLength(2);
    expect(res.sources[0].text).toBe('dogs bark loudly');
    expect(embedder.queryCalls).toEqual(['why dogs bark']);
    expect(generator.calls[0].opts).toEqual({ temperature: 0.3, maxTokens: 600 });

    const [system, user] = generator.calls[0].messages;
    expect(system.role).toBe('system');
    expect(system.content).toContain("Use the following pieces of context from a video transcript");
    expect(system.content).toContain('dogs bark loudly');
    expect(user).toEqual({ role: 'user', content: 'why dogs bark' });

    expect(session.memory).toHaveLength(1);
    expect(session.memory[0]).toMatchObject({ question: 'why dogs bark', answer: 'Because they are dogs.' });
  });

  it('carries earlier turns into the next prompt', async () => {
    const embedder = new HashEmbedder();
    const generator = new ScriptedGenerator('Answer one', 'Answer two');
    const session = makeSession(embedder);
    const retriever = new ConversationalRetriever(inline, embedder, generator, OPTS);

    await retriever.ask(session, 'what do cats do');
    await retriever.ask(session, 'and birds');

    expect(session.memory.map((t) => [t.question, t.answer])).toEqual([
      ['what do cats do', 'Answer one'],
      ['and birds', 'Answer two'],
    ]);
    expect(generator.calls[1].messages.slice(1)).toEqual([
      { role: 'user', content: 'what do cats do' },
      { role: 'assistant', content: 'Answer one' },
      { role: 'user', content: 'and birds' },
    ]);
  });

  it('limits the history sent back to the model', async () => {
    const embedder = new HashEmbedder();
    const generator = new ScriptedGenerator('ok');
    const session = makeSession(embedder);
    const retriever = new ConversationalRetriever(inline, embedder, generator, { ...OPTS, historyTurns: 1 });

    await retriever.ask(session, 'q1');
    await retriever.ask(session, 'q2');
    await retriever.ask(session, 'q3');

    expect(session.memory).toHaveLength(3);
    expect(generator.calls[2].messages.slice(1)).toEqual([
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'ok' },
      { role: 'user', content: 'q3' },
    ]);
  });

  it('leaves memory untouched when generation fails', async () => {
    const embedder = new HashEmbedder();
    const session = makeSession(embedder);
    const retriever = new ConversationalRetriever(inline, embedder, new ScriptedGenerator(new Error('timeout')), OPTS);

    const err = await retriever.ask(session, 'why dogs bark').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AnswerGenerationFailedError);
    expect(err).toMatchObject({ message: 'Error answering question: timeout', statusCode: 500 });
    expect(session.memory).toEqual([]);
  });

  it('leaves memory untouched when embedding the question fails', async () => {
    const embedder = new HashEmbedder();
    const session = makeSession(embedder);
    embedder.failWith = new Error('embeddings offline');
    const retriever = new ConversationalRetriever(inline, embedder, new ScriptedGenerator('never'), OPTS);

    await expect(retriever.ask(session, 'q')).rejects.toThrow('Error answering question: embeddings offline');
    expect(session.memory).toEqual([]);
  });

  it('rewrites follow-ups into standalone questions for retrieval when enabled', async () => {
    const embedder = new HashEmbedder();
    const generator = new ScriptedGenerator('A1', 'why dogs bark loudly', 'A2');
    const session = makeSession(embedder);
    const retriever = new ConversationalRetriever(inline, embedder, generator, { ...OPTS, condenseQuestion: true });

    await retriever.ask(session, 'tell me about dogs');
    const res = await retriever.ask(session, 'why do they do that');

    expect(generator.calls).toHaveLength(3);
    expect(generator.calls[1].opts).toEqual({ temperature: 0 });
    expect(generator.calls[1].messages[0].content).toContain('Human: tell me about dogs\nAssistant: A1');
    expect(embedder.queryCalls).toEqual(['tell me about dogs', 'why dogs bark loudly']);
    expect(generator.calls[2].messages[generator.calls[2].messages.length - 1]).toEqual({
      role: 'user',
      content: 'why do they do that',
    });
    expect(res.answer).toBe('A2');
  });
});

describe('answerMessages', () => {
  it('puts retrieved context after the instructions', () => {
    const messages = answerMessages(
      'q',
      [
        { index: 0, text: 'first', score: 0.9 },
        { index: 1, text: 'second', score: 0.5 },
      ],
      []
    );

    expect(messages).toHaveLength(2);
    expect(messages[0].content.endsWith('\n\nfirst\n\nsecond')).toBe(true);
  });
});
