import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  DATA_DIR: z.string().default(".data/embeddings"),
  COLLECTION_NAME: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, "COLLECTION_NAME may only contain letters, digits, _ and -")
    .default("knowledge"),
  KNOWLEDGE_DIR: z.string().default("data/knowledge"),
  VECTOR_BACKEND: z.enum(["file", "pgvector"]).default("file"),
  DATABASE_URL: z.string().optional(),
  VECTOR_DIMENSION: z.coerce.number().int().positive().optional(),
  EMBEDDING_PROVIDER: z.enum(["none", "openai", "ollama"]).optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(16),
  EMBEDDING_INIT_ATTEMPTS: z.coerce.number().int().positive().default(3),
  EMBEDDING_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(1000),
  EMBEDDING_RETRY_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(30_000),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  ENSURE_COMPLETE_SENTENCES: booleanFlag.default("true"),
  MAX_CHARS_PER_DOC: z.coerce.number().int().positive().default(1_000_000),
  INGEST_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),
  SEARCH_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(3600),
  DEFAULT_TOP_K: z.coerce.number().int().min(1).max(50).default(5),
  RETRIEVAL_PROFILE_PATH: z.string().default("config/retrieval-profile.json"),
});

export type EmbeddingProviderName = "none" | "openai" | "ollama";

// Widths of the default models: text-embedding-3-small and nomic-embed-text.
const DEFAULT_DIMENSIONS: Record<EmbeddingProviderName, number> = {
  none: 768,
  openai: 1536,
  ollama: 768,
};

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
  ensureCompleteSentences: boolean;
  maxCharsPerDoc: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  openaiApiKey: string | null;
  openaiModel: string;
  ollamaBaseUrl: string;
  ollamaModel: string;
  batchSize: number;
  initAttempts: number;
  retryBaseMs: number;
  retryCooldownMs: number;
}

export interface VectorStoreConfig {
  backend: "file" | "pgvector";
  dataDir: string;
  collectionName: string;
  databaseUrl: string | null;
  vectorDimension: number;
  searchCacheTtlSeconds: number;
}

export interface AppConfig {
  logLevel: string;
  knowledgeDir: string;
  ingestConcurrency: number;
  defaultTopK: number;
  retrievalProfilePath: string;
  chunking: ChunkingConfig;
  embedding: EmbeddingConfig;
  vectorStore: VectorStoreConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.VECTOR_BACKEND === "pgvector" && !parsed.DATABASE_URL) {
    throw new Error("VECTOR_BACKEND=pgvector requires DATABASE_URL.");
  }
  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  const provider =
    parsed.EMBEDDING_PROVIDER ?? (parsed.OPENAI_API_KEY ? "openai" : "none");

  return {
    logLevel: parsed.LOG_LEVEL,
    knowledgeDir: parsed.KNOWLEDGE_DIR,
    ingestConcurrency: parsed.INGEST_CONCURRENCY,
    defaultTopK: parsed.DEFAULT_TOP_K,
    retrievalProfilePath: parsed.RETRIEVAL_PROFILE_PATH,
    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
      ensureCompleteSentences: parsed.ENSURE_COMPLETE_SENTENCES,
      maxCharsPerDoc: parsed.MAX_CHARS_PER_DOC,
    },
    embedding: {
      provider,
      openaiApiKey: parsed.OPENAI_API_KEY ?? null,
      openaiModel: parsed.OPENAI_EMBEDDING_MODEL,
      ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
      ollamaModel: parsed.OLLAMA_EMBEDDING_MODEL,
      batchSize: parsed.EMBEDDING_BATCH_SIZE,
      initAttempts: parsed.EMBEDDING_INIT_ATTEMPTS,
      retryBaseMs: parsed.EMBEDDING_RETRY_BASE_MS,
      retryCooldownMs: parsed.EMBEDDING_RETRY_COOLDOWN_MS,
    },
    vectorStore: {
      backend: parsed.VECTOR_BACKEND,
      dataDir: parsed.DATA_DIR,
      collectionName: parsed.COLLECTION_NAME,
      databaseUrl: parsed.DATABASE_URL ?? null,
      vectorDimension: parsed.VECTOR_DIMENSION ?? DEFAULT_DIMENSIONS[provider],
      searchCacheTtlSeconds: parsed.SEARCH_CACHE_TTL_SECONDS,
    },
  };
}

export const DEFAULT_CHUNKING: ChunkingConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
  ensureCompleteSentences: true,
  maxCharsPerDoc: 1_000_000,
};
