import * as dotenv from 'dotenv';
dotenv.config();

function num(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function bool(name: string, fallback: boolean): boolean {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    return raw.trim().toLowerCase() === 'true';
}

function list(name: string, fallback: string[]): string[] {
    const raw = process.env[name];
    if (!raw) return fallback;
    const items = raw
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean);
    return items.length ? items : fallback;
}

export const DEFAULT_LANGUAGES = ['en', 'en-US', 'en-GB', 'hi', 'es', 'fr', 'de', 'pt', 'ja', 'ko', 'zh', 'ar'];

export const ENV = {
    port: num('PORT', 8000),
    host: process.env.HOST || '0.0.0.0',
    apiPrefix: process.env.API_PREFIX ?? '/api',
    corsOrigin: process.env.CORS_ORIGIN || '*',
    // Scratch space for caption files written by yt-dlp
    artifactsRoot: process.env.ARTIFACTS_ROOT || 'artifacts',
    // Optional: override yt-dlp binary name/path
    ytdlpBin: process.env.YTDLP_BIN || 'yt-dlp',
    // Optional: explicit python interpreter with yt_dlp installed for fallback (e.g. .venv/bin/python)
    ytdlpPythonBin: process.env.YTDLP_PYTHON_BIN || '.venv/bin/python',
    ytdlpCookiesFile: process.env.YTDLP_COOKIES_FILE || '',
    ytdlpUserAgent: process.env.YTDLP_USER_AGENT || '',
    ytdlpExtraArgs: process.env.YTDLP_EXTRA_ARGS || '',
    // Comma-separated caption languages, tried in order before "any available"
    transcriptLanguages: list('TRANSCRIPT_LANGUAGES', DEFAULT_LANGUAGES),
    transcriptTimeoutMs: num('TRANSCRIPT_TIMEOUT_MS', 60000),
    openaiApiKey: process.env.OPENAI_API_KEY || '',
    openaiBaseUrl: process.env.OPENAI_BASE_URL || '',
    chatModel: process.env.CHAT_MODEL || 'gpt-3.5-turbo',
    embeddingModel: process.env.EMBEDDING_MODEL || 'text-embedding-3-small',
    llmTimeoutMs: num('LLM_TIMEOUT_MS', 60000),
    summaryMaxChars: num('SUMMARY_MAX_CHARS', 12000),
    summaryMaxTokens: num('SUMMARY_MAX_TOKENS', 800),
    summaryTemperature: num('SUMMARY_TEMPERATURE', 0.7),
    chatTemperature: num('CHAT_TEMPERATURE', 0.3),
    chatMaxTokens: num('CHAT_MAX_TOKENS', 600),
    chunkSize: num('CHUNK_SIZE', 1000),
    chunkOverlap: num('CHUNK_OVERLAP', 200),
    embedBatchSize: num('EMBED_BATCH_SIZE', 64),
    retrievalK: num('RETRIEVAL_K', 5),
    // 0 sends the whole conversation back with every question
    chatHistoryTurns: num('CHAT_HISTORY_TURNS', 0),
    condenseQuestion: bool('CONDENSE_QUESTION', false),
    maxSessions: num('MAX_SESSIONS', 100),
    // Idle sessions older than this are dropped on the next store access. 0 disables.
    sessionTtlMs: num('SESSION_TTL_MS', 0),
    logLevel: process.env.LOG_LEVEL || 'info',
    logFormat: process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
    logFile: process.env.LOG_FILE || '',
};

export type Env = typeof ENV;
