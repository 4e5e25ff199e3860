import OpenAI from 'openai';
import { warn } from './log';
import type { ChatMessage, Embedder, GenerateOptions, TextGenerator } from './types';

export interface OpenAIOptions {
    apiKey: string;
    baseUrl?: string;
    chatModel: string;
    embeddingModel: string;
    timeoutMs: number;
}

export function createOpenAIClient(opts: OpenAIOptions): OpenAI {
    if (!opts.apiKey) {
        warn('llm.apiKey.missing', { hint: 'OPENAI_API_KEY is not set; summarization and chat will fail.' });
    }
    return new OpenAI({
        apiKey: opts.apiKey || 'missing',
        baseURL: opts.baseUrl || undefined,
        timeout: opts.timeoutMs,
        // Transcript fallback is the only retry in the pipeline
        maxRetries: 0,
    });
}

export class OpenAITextGenerator implements TextGenerator {
    private readonly client: OpenAI;
    private readonly model: string;

    constructor(client: OpenAI, model: string) {
        this.client = client;
        this.model = model;
    }

    async generate(messages: ChatMessage[], opts: GenerateOptions = {}): Promise<string> {
        const response = await this.client.chat.completions.create({
            model: this.model,
            messages,
            max_tokens: opts.maxTokens,
            temperature: opts.temperature,
        });
        return response.choices[0]?.message?.content ?? '';
    }
}

export class OpenAIEmbedder implements Embedder {
    private readonly client: OpenAI;
    private readonly model: string;

    constructor(client: OpenAI, model: string) {
        this.client = client;
        this.model = model;
    }

    async embedDocuments(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];
        const response = await this.client.embeddings.create({ model: this.model, input: texts });
        // Results carry their input position; do not rely on array order
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        return ordered.map((d) => d.embedding);
    }

    async embedQuery(text: string): Promise<number[]> {
        const [vector] = await this.embedDocuments([text]);
        if (!vector) throw new Error('Embedding response was empty');
        return vector;
    }
}
