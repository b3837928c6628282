// src/config/config.ts

import dotenv from "dotenv";
dotenv.config();

export interface Config {
    port: number;

    // Hosted language model + transcription (OpenAI-compatible endpoint)
    groqApiKeys: string[];
    groqBaseUrl: string;
    groqModels: string[];
    sttModel: string;

    // Speech synthesis
    elevenLabsApiKey: string;
    elevenLabsVoiceId: string;
    elevenLabsModelId: string;
    elevenLabsOutputFormat: string;

    // Media room signaling (optional)
    livekitApiKey?: string;
    livekitApiSecret?: string;

    // Files
    knowledgeDir: string;
    logsDir: string;

    // Retrieval
    chunkSize: number;
    chunkOverlap: number;
    jsonChunkSize: number;
    maxContextChars: number;
    retrievalTopK: number;
    retrievalMinScore: number;

    // Audio pipeline timings (milliseconds)
    synthesisTimeoutMs: number;
    audioCacheTtlMs: number;
    duplicateFetchWaitMs: number;
    pendingTokenTtlMs: number;
    tokenSweepIntervalMs: number;

    historyTurns: number;
    maxUploadMb: number;
}

const splitList = (raw: string | undefined): string[] =>
    (raw ?? "")
        .replace(/\n/g, ",")
        .split(",")
        .map((value) => value.trim())
        .filter(Boolean);

const readNumber = (raw: string | undefined, fallback: number): number => {
    const trimmed = raw?.trim();
    if (!trimmed) return fallback;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const resolveGroqKeys = (): string[] => {
    const keys = splitList(process.env.GROQ_API_KEYS);
    if (keys.length) return keys;
    const single = process.env.GROQ_API_KEY?.trim();
    return single ? [single] : [];
};

const models = splitList(process.env.GROQ_MODELS);

const config: Config = {
    port: Number(process.env.PORT) || 5000,

    groqApiKeys: resolveGroqKeys(),
    groqBaseUrl: process.env.GROQ_BASE_URL || "https://api.groq.com/openai/v1",
    groqModels: models.length ? models : ["llama-3.1-8b-instant", "llama-3.3-70b-versatile"],
    sttModel: process.env.STT_MODEL || "whisper-large-v3",

    elevenLabsApiKey: process.env.ELEVENLABS_API_KEY || "",
    elevenLabsVoiceId: process.env.ELEVENLABS_VOICE_ID || "21m00Tcm4TlvDq8ikWAM",
    elevenLabsModelId: process.env.ELEVENLABS_MODEL_ID || "eleven_multilingual_v2",
    elevenLabsOutputFormat: process.env.ELEVENLABS_OUTPUT_FORMAT || "mp3_44100_128",

    livekitApiKey: process.env.LIVEKIT_API_KEY,
    livekitApiSecret: process.env.LIVEKIT_API_SECRET,

    knowledgeDir: process.env.KNOWLEDGE_DIR || "data",
    logsDir: process.env.LOGS_DIR || "logs",

    chunkSize: readNumber(process.env.CHUNK_SIZE, 800),
    chunkOverlap: readNumber(process.env.CHUNK_OVERLAP, 100),
    jsonChunkSize: readNumber(process.env.JSON_CHUNK_SIZE, 1200),
    // ~4 chars/token; leaves room for prompt, query and reply in a 6k TPM budget
    maxContextChars: readNumber(process.env.MAX_CONTEXT_CHARS, 14000),
    retrievalTopK: readNumber(process.env.RETRIEVAL_TOP_K, 6),
    retrievalMinScore: readNumber(process.env.RETRIEVAL_MIN_SCORE, 0.03),

    synthesisTimeoutMs: readNumber(process.env.SYNTHESIS_TIMEOUT_MS, 28000),
    audioCacheTtlMs: readNumber(process.env.AUDIO_CACHE_TTL_MS, 120000),
    duplicateFetchWaitMs: readNumber(process.env.DUPLICATE_FETCH_WAIT_MS, 30000),
    pendingTokenTtlMs: readNumber(process.env.PENDING_TOKEN_TTL_MS, 600000),
    tokenSweepIntervalMs: readNumber(process.env.TOKEN_SWEEP_INTERVAL_MS, 30000),

    historyTurns: readNumber(process.env.HISTORY_TURNS, 5),
    maxUploadMb: readNumber(process.env.MAX_UPLOAD_MB, 10),
};

// Validate critical values
if (!config.groqApiKeys.length) throw new Error("❌ Missing GROQ_API_KEY or GROQ_API_KEYS in .env");
if (!config.elevenLabsApiKey) throw new Error("❌ Missing ELEVENLABS_API_KEY in .env");
if (config.chunkOverlap >= config.chunkSize) throw new Error("❌ CHUNK_OVERLAP must be smaller than CHUNK_SIZE");

export default config;
