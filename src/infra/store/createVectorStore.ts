import { VectorStoreConfig } from "../../config/env.js";
import { VectorStore } from "../../domain/vectorStore.js";
import { EmbeddingProvider } from "../ai/types.js";
import { createPostgresPool } from "../db/postgres.js";
import { FileVectorStore } from "./fileVectorStore.js";
import { PgVectorStore } from "./pgVectorStore.js";

export function createVectorStore(
  config: VectorStoreConfig,
  provider: EmbeddingProvider | null,
  keywordStopwords: readonly string[] = [],
): VectorStore {
  if (config.backend === "pgvector") {
    if (!config.databaseUrl) {
      throw new Error("DATABASE_URL is required when VECTOR_BACKEND=pgvector.");
    }
    return new PgVectorStore(createPostgresPool(config.databaseUrl), provider, {
      collectionName: config.collectionName,
      vectorDimension: config.vectorDimension,
      keywordStopwords,
    });
  }

  return new FileVectorStore(provider, {
    dataDir: config.dataDir,
    collectionName: config.collectionName,
    searchCacheTtlSeconds: config.searchCacheTtlSeconds,
    keywordStopwords,
  });
}
