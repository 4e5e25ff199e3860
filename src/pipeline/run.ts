import { YtDlpCaptionProvider } from "./captions";
import { ConversationalRetriever } from "./chat";
import { Indexer } from "./embed";
import type { Env } from "./env";
import { resolveVideoId } from "./ids";
import { createOpenAIClient, OpenAIEmbedder, OpenAITextGenerator } from "./llm";
import { info, isLogLevel, setLogFile, setLogFormat, setLogLevel } from "./log";
import { SessionStore } from "./sessions";
import { Summarizer } from "./summarize";
import { TranscriptAcquirer } from "./transcript";
import type { CaptionProvider, Embedder, TextGenerator } from "./types";

export interface Services {
  acquirer: TranscriptAcquirer;
  summarizer: Summarizer;
  store: SessionStore;
  retriever: ConversationalRetriever;
}

export interface Providers {
  captions: CaptionProvider;
  generator: TextGenerator;
  embedder: Embedder;
}

export interface SummarizeVideoResult {
  summary: string;
  sessionId: string;
  videoId: string;
  transcriptLength: number;
}

export function applyLogConfig(env: Env) {
  if (isLogLevel(env.logLevel)) setLogLevel(env.logLevel);
  setLogFormat(env.logFormat === "pretty" ? "pretty" : "json");
  if (env.logFile) setLogFile(env.logFile);
}

export function createProviders(env: Env): Providers {
  const client = createOpenAIClient({
    apiKey: env.openaiApiKey,
    baseUrl: env.openaiBaseUrl,
    chatModel: env.chatModel,
    embeddingModel: env.embeddingModel,
    timeoutMs: env.llmTimeoutMs,
  });
  return {
    captions: new YtDlpCaptionProvider({
      artifactsRoot: env.artifactsRoot,
      bin: env.ytdlpBin,
      pythonBin: env.ytdlpPythonBin,
      cookiesFile: env.ytdlpCookiesFile,
      userAgent: env.ytdlpUserAgent,
      extraArgs: env.ytdlpExtraArgs,
      timeoutMs: env.transcriptTimeoutMs,
    }),
    generator: new OpenAITextGenerator(client, env.chatModel),
    embedder: new OpenAIEmbedder(client, env.embeddingModel),
  };
}

export function createServices(env: Env, providers: Providers = createProviders(env)): Services {
  const indexer = new Indexer(providers.embedder, {
    chunkSize: env.chunkSize,
    chunkOverlap: env.chunkOverlap,
    batchSize: env.embedBatchSize,
  });
  const store = new SessionStore(indexer, {
    maxSessions: env.maxSessions,
    ttlMs: env.sessionTtlMs,
  });
  return {
    acquirer: new TranscriptAcquirer(providers.captions, { languages: env.transcriptLanguages }),
    summarizer: new Summarizer(providers.generator, {
      maxChars: env.summaryMaxChars,
      maxTokens: env.summaryMaxTokens,
      temperature: env.summaryTemperature,
    }),
    store,
    retriever: new ConversationalRetriever(store, providers.embedder, providers.generator, {
      k: env.retrievalK,
      temperature: env.chatTemperature,
      maxTokens: env.chatMaxTokens,
      historyTurns: env.chatHistoryTurns,
      condenseQuestion: env.condenseQuestion,
    }),
  };
}

/**
 * Resolve -> fetch captions -> summarize -> index into a new chat session.
 */
export async function summarizeVideo(
  services: Services,
  videoUrl: string
): Promise<SummarizeVideoResult> {
  const videoId = resolveVideoId(videoUrl);
  const startTs = Date.now();
  const transcript = await services.acquirer.acquire(videoId);
  const { summary } = await services.summarizer.summarize(transcript.text);
  const session = await services.store.create(videoId, transcript.text);
  info("run.complete", { videoId, sessionId: session.id, durationMs: Date.now() - startTs });
  return {
    summary,
    sessionId: session.id,
    videoId,
    transcriptLength: transcript.text.length,
  };
}

export async function askQuestion(services: Services, sessionId: string, question: string) {
  const session = services.store.get(sessionId);
  return services.retriever.ask(session, question);
}
