import dotenv from 'dotenv';

export interface AppConfig {
  geminiApiKey: string;
  geminiModel: string;
  embeddingModel: string;
  chunkSize: number;
  chunkOverlap: number;
  maxResults: number;
  maxHistory: number;
  maxToolRounds: number;
  courseMatchThreshold: number;
  temperature: number;
  maxOutputTokens: number;
  modelTimeoutMs: number;
  chromaPath: string;
  docsPath: string;
  port: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

const positiveNumber = (raw: string | undefined, fallback: number): number => {
  const parsed = Number(raw);
  return raw !== undefined && raw.trim() !== '' && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const nonNegativeNumber = (raw: string | undefined, fallback: number): number => {
  const parsed = Number(raw);
  return raw !== undefined && raw.trim() !== '' && Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const text = (raw: string | undefined, fallback: string): string => {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : fallback;
};

/** Build the config from an env map. Defaults apply to anything missing or invalid. */
export function readConfig(env: Env = process.env): AppConfig {
  const chunkSize = positiveNumber(env.CHUNK_SIZE, 800);
  let chunkOverlap = nonNegativeNumber(env.CHUNK_OVERLAP, 100);
  if (chunkOverlap >= chunkSize) {
    console.warn(`[Config] CHUNK_OVERLAP=${chunkOverlap} must be below CHUNK_SIZE=${chunkSize}, disabling overlap`);
    chunkOverlap = 0;
  }

  return {
    geminiApiKey: text(env.GEMINI_API_KEY, text(env.GOOGLE_API_KEY, '')),
    geminiModel: text(env.GEMINI_MODEL, 'gemini-2.5-flash'),
    embeddingModel: text(env.EMBEDDING_MODEL, 'text-embedding-004'),
    chunkSize,
    chunkOverlap,
    maxResults: positiveNumber(env.MAX_RESULTS, 5),
    maxHistory: positiveNumber(env.MAX_HISTORY, 2),
    maxToolRounds: positiveNumber(env.MAX_TOOL_ROUNDS, 2),
    courseMatchThreshold: Math.min(nonNegativeNumber(env.COURSE_MATCH_THRESHOLD, 0.5), 1),
    temperature: nonNegativeNumber(env.MODEL_TEMPERATURE, 0),
    maxOutputTokens: positiveNumber(env.MODEL_MAX_TOKENS, 800),
    modelTimeoutMs: positiveNumber(env.MODEL_TIMEOUT_MS, 30000),
    chromaPath: text(env.CHROMA_PATH, './data/vector-store'),
    docsPath: text(env.DOCS_PATH, './docs'),
    port: positiveNumber(env.PORT, 8000),
  };
}

/** Load `.env` (if present) into process.env, then read it. */
export function loadConfig(envPath?: string): AppConfig {
  dotenv.config(envPath ? { path: envPath } : undefined);
  const config = readConfig(process.env);
  // Log only presence, never values.
  console.log('[Config] Loaded', {
    geminiApiKey: !!config.geminiApiKey,
    geminiModel: config.geminiModel,
    embeddingModel: config.embeddingModel,
    chromaPath: config.chromaPath,
    docsPath: config.docsPath,
  });
  return config;
}
