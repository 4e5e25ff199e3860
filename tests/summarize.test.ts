import { describe, it, expect } from 'vitest';
import {
  OMISSION_MARKER,
  reduceForSummary,
  Summarizer,
  truncationNote,
} from '../src/pipeline/summarize';
import { ContentTooLongError, SummarizationFailedError } from '../src/pipeline/errors';
import { ScriptedGenerator, words } from './helpers/fakes';

const OPTS = { maxChars: 12000, maxTokens: 800, temperature: 0.7 };

describe('reduceForSummary', () => {
  it('returns text within budget untouched', () => {
    const text = 'a'.repeat(12000);
    expect(reduceForSummary(text, 12000)).toEqual({ text, truncated: false });
  });

  it('keeps beginning, middle and end windows that fit the budget', () => {
    const text = words(8334).slice(0, 50000);
    const reduced = reduceForSummary(text, 12000);

    expect(reduced.truncated).toBe(true);
    expect(reduced.text.length).toBe(12000);
    expect(reduced.text.split(OMISSION_MARKER)).toEqual([
      text.slice(0, 3982),
      text.slice(23009, 26991),
      text.slice(46018),
    ]);
  });

  it('never exceeds the budget for lengths just over it', () => {
    for (const length of [12001, 12002, 12003, 20000, 100000]) {
      const reduced = reduceForSummary('z'.repeat(length), 12000);
      expect(reduced.text.length).toBeLessThanOrEqual(12000);
    }
  });
});

describe('truncationNote', () => {
  it('formats the source length with thousands separators', () => {
    expect(truncationNote(50000)).toBe(
      '\n\nNote: This is a long video (50,000 characters). Summary based on key sections.'
    );
  });
});

describe('Summarizer', () => {
  it('sends short transcripts whole and adds no note', async () => {
    const text = 'b'.repeat(500);
    const generator = new ScriptedGenerator('A short summary.');
    const res = await new Summarizer(generator, OPTS).summarize(text);

    expect(res).toEqual({ summary: 'A short summary.', truncated: false, sourceLength: 500 });
    expect(generator.calls).toHaveLength(1);
    expect(generator.calls[0].messages[0].role).toBe('system');
    expect(generator.calls[0].messages[1]).toEqual({
      role: 'user',
      content: `Please summarize the following video transcript:\n\n${text}`,
    });
    expect(generator.calls[0].opts).toEqual({ maxTokens: 800, temperature: 0.7 });
  });

  it('appends the long-video note when the transcript was reduced', async () => {
    const generator = new ScriptedGenerator('Key points.');
    const res = await new Summarizer(generator, OPTS).summarize('c'.repeat(50000));

    expect(res.truncated).toBe(true);
    expect(res.sourceLength).toBe(50000);
    expect(res.summary).toBe(`Key points.${truncationNote(50000)}`);
    expect(res.summary).toContain('50,000');
    const prompt = generator.calls[0].messages[1].content;
    expect(prompt.length).toBeLessThanOrEqual(12000 + 'Please summarize the following video transcript:\n\n'.length);
    expect(prompt).toContain(OMISSION_MARKER);
  });

  it('maps a context length error code to ContentTooLongError', async () => {
    const overflow = Object.assign(new Error('too many tokens'), { code: 'context_length_exceeded' });
    const summarizer = new Summarizer(new ScriptedGenerator(overflow), OPTS);

    await expect(summarizer.summarize('hello')).rejects.toBeInstanceOf(ContentTooLongError);
  });

  it('recognizes context length errors by message', async () => {
    const overflow = new Error("This model's maximum context length is 4097 tokens");
    const summarizer = new Summarizer(new ScriptedGenerator(overflow), OPTS);

    const err = await summarizer.summarize('hello').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ContentTooLongError);
    expect(err).toMatchObject({ statusCode: 400, category: 'input' });
  });

  it('wraps other generation failures', async () => {
    const summarizer = new Summarizer(new ScriptedGenerator(new Error('rate limited')), OPTS);

    const err = await summarizer.summarize('hello').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SummarizationFailedError);
    expect(err).toMatchObject({ message: 'Summarization failed: rate limited', statusCode: 500 });
  });

  it('rejects a blank completion', async () => {
    const summarizer = new Summarizer(new ScriptedGenerator('  '), OPTS);

    await expect(summarizer.summarize('hello')).rejects.toThrow('Summarization failed: empty completion');
  });
});
