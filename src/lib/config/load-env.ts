import { join } from "node:path";
import { config as loadDotEnv } from "dotenv";
import { z } from "zod";
import { DEFAULT_REFRESH_STATE_FILE } from "@/lib/pipeline/ingest/refresh-state";

let loaded = false;

export function ensureEnvLoaded(): void {
  if (loaded) {
    return;
  }

  loadDotEnv({ path: ".env.local" });
  loadDotEnv();
  loaded = true;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeNumber = (fallback: number) => z.coerce.number().nonnegative().default(fallback);

const envSchema = z.object({
  KB_DATA_DIR: z.string().min(1).default(".data"),
  KB_INDEX_DIR: z.string().min(1).optional(),
  KB_VIDEOS_DIR: z.string().min(1).optional(),
  KB_EMBEDDING_PROVIDER: z.enum(["hashing", "openai"]).default("hashing"),
  KB_ENTITY_MODE: z.enum(["vocabulary", "vocabulary+proper-nouns"]).default("vocabulary"),
  KB_ENTITY_VOCABULARY: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_EMBED_MODEL: z.string().min(1).default("text-embedding-3-small"),
  OPENAI_EMBED_DIMENSIONS: positiveInt(1536),
  OPENAI_CHAT_MODEL: z.string().min(1).default("gpt-4o-mini"),
  HASHING_DIMENSIONS: positiveInt(256),
  INGEST_CONCURRENCY: positiveInt(2),
  EMBED_BATCH_SIZE: positiveInt(32),
  EMBED_CONCURRENCY: positiveInt(2),
  EMBED_MAX_RETRIES: z.coerce.number().int().nonnegative().default(4),
  EMBED_RETRY_BASE_MS: nonNegativeNumber(250),
  CHUNK_MIN_TOKENS: z.coerce.number().int().nonnegative().default(400),
  CHUNK_MAX_TOKENS: positiveInt(800),
  CHUNK_GAP_TOLERANCE_SEC: nonNegativeNumber(10),
  QUERY_TOP_K: positiveInt(8),
  QUERY_MIN_SCORE: z.coerce.number().min(-1).max(1).default(0.25),
  QUERY_MAX_CONTEXT_TOKENS: positiveInt(3000),
});

export type AppConfig = {
  dataDir: string;
  indexDir: string;
  videosDir: string;
  refreshStatePath: string;
  embeddingProvider: "hashing" | "openai";
  entityMode: "vocabulary" | "vocabulary+proper-nouns";
  entityVocabularyPath?: string;
  openaiApiKey?: string;
  openaiEmbedModel: string;
  openaiEmbedDimensions: number;
  openaiChatModel: string;
  hashingDimensions: number;
  ingestConcurrency: number;
  embedBatchSize: number;
  embedConcurrency: number;
  embedMaxRetries: number;
  embedRetryBaseMs: number;
  chunkMinTokens: number;
  chunkMaxTokens: number;
  chunkGapToleranceSec: number;
  queryTopK: number;
  queryMinScore: number;
  queryMaxContextTokens: number;
};

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    ensureEnvLoaded();
  }

  // Blank assignments in .env files count as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const values = parsed.data;

  if (values.CHUNK_MIN_TOKENS > values.CHUNK_MAX_TOKENS) {
    throw new Error("Invalid environment configuration: CHUNK_MIN_TOKENS must not exceed CHUNK_MAX_TOKENS");
  }

  return {
    dataDir: values.KB_DATA_DIR,
    indexDir: values.KB_INDEX_DIR ?? join(values.KB_DATA_DIR, "index"),
    videosDir: values.KB_VIDEOS_DIR ?? join(values.KB_DATA_DIR, "videos"),
    refreshStatePath: join(values.KB_DATA_DIR, DEFAULT_REFRESH_STATE_FILE),
    embeddingProvider: values.KB_EMBEDDING_PROVIDER,
    entityMode: values.KB_ENTITY_MODE,
    entityVocabularyPath: values.KB_ENTITY_VOCABULARY,
    openaiApiKey: values.OPENAI_API_KEY,
    openaiEmbedModel: values.OPENAI_EMBED_MODEL,
    openaiEmbedDimensions: values.OPENAI_EMBED_DIMENSIONS,
    openaiChatModel: values.OPENAI_CHAT_MODEL,
    hashingDimensions: values.HASHING_DIMENSIONS,
    ingestConcurrency: values.INGEST_CONCURRENCY,
    embedBatchSize: values.EMBED_BATCH_SIZE,
    embedConcurrency: values.EMBED_CONCURRENCY,
    embedMaxRetries: values.EMBED_MAX_RETRIES,
    embedRetryBaseMs: values.EMBED_RETRY_BASE_MS,
    chunkMinTokens: values.CHUNK_MIN_TOKENS,
    chunkMaxTokens: values.CHUNK_MAX_TOKENS,
    chunkGapToleranceSec: values.CHUNK_GAP_TOLERANCE_SEC,
    queryTopK: values.QUERY_TOP_K,
    queryMinScore: values.QUERY_MIN_SCORE,
    queryMaxContextTokens: values.QUERY_MAX_CONTEXT_TOKENS,
  };
}
