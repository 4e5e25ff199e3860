import { ContentTooLongError, describeCause, SummarizationFailedError } from './errors';
import { info, startStep } from './log';
import type { ChatMessage, SummaryResult, TextGenerator } from './types';

export const OMISSION_MARKER = '\n\n[...content omitted...]\n\n';

const SYSTEM_PROMPT =
    'You are a helpful assistant that summarizes YouTube video transcripts. ' +
    'Provide a clear, comprehensive summary with key points and main takeaways.';

export interface SummarizeOptions {
    /** Input budget in characters; longer text is sampled down to this size */
    maxChars: number;
    maxTokens: number;
    temperature: number;
}

export interface ReducedText {
    text: string;
    truncated: boolean;
}

/**
 * Fits `text` into `maxChars` by keeping the beginning, the middle and the end
 * in three equal windows separated by omission markers. Text already within
 * budget is returned as is.
 */
export function reduceForSummary(text: string, maxChars: number): ReducedText {
    if (text.length <= maxChars) return { text, truncated: false };

    const windowSize = Math.max(0, Math.floor((maxChars - 2 * OMISSION_MARKER.length) / 3));
    const beginning = text.slice(0, windowSize);
    const middleStart = Math.floor((text.length - windowSize) / 2);
    const middle = text.slice(middleStart, middleStart + windowSize);
    const end = text.slice(text.length - windowSize);

    return { text: [beginning, middle, end].join(OMISSION_MARKER), truncated: true };
}

export function truncationNote(sourceLength: number): string {
    return `\n\nNote: This is a long video (${sourceLength.toLocaleString('en-US')} characters). Summary based on key sections.`;
}

export function isContextLengthError(e: unknown): boolean {
    if (typeof e !== 'object' || e === null) return false;
    if ('code' in e && e.code === 'context_length_exceeded') return true;
    return describeCause(e).toLowerCase().includes('maximum context length');
}

export function summaryMessages(text: string): ChatMessage[] {
    return [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: `Please summarize the following video transcript:\n\n${text}` },
    ];
}

export class Summarizer {
    private readonly generator: TextGenerator;
    private readonly opts: SummarizeOptions;

    constructor(generator: TextGenerator, opts: SummarizeOptions) {
        this.generator = generator;
        this.opts = opts;
    }

    async summarize(text: string): Promise<SummaryResult> {
        const reduced = reduceForSummary(text, this.opts.maxChars);
        const step = startStep('summarize', { chars: text.length, truncated: reduced.truncated });

        let summary: string;
        try {
            summary = await this.generator.generate(summaryMessages(reduced.text), {
                maxTokens: this.opts.maxTokens,
                temperature: this.opts.temperature,
            });
        } catch (e) {
            if (isContextLengthError(e)) throw new ContentTooLongError(e);
            throw new SummarizationFailedError(e);
        }
        if (!summary.trim()) {
            throw new SummarizationFailedError(new Error('empty completion'));
        }

        step.end();
        if (reduced.truncated) {
            info('summarize.truncated', { sourceChars: text.length, sentChars: reduced.text.length });
            summary += truncationNote(text.length);
        }
        return { summary, truncated: reduced.truncated, sourceLength: text.length };
    }
}
