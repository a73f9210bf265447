import { EmbeddingConfig } from "../../config/env.js";
import { createLogger } from "../../utils/logger.js";
import { LazyEmbeddingProvider } from "./embeddingProvider.js";
import { OllamaEmbeddingBackend } from "./ollamaClient.js";
import { OpenAiEmbeddingBackend } from "./openAiClient.js";
import { EmbeddingBackend, EmbeddingProvider } from "./types.js";

const log = createLogger("embedding");

export function createEmbeddingBackend(config: EmbeddingConfig): EmbeddingBackend | null {
  if (config.provider === "none") {
    return null;
  }

  if (config.provider === "openai") {
    const backend = new OpenAiEmbeddingBackend({
      apiKey: config.openaiApiKey,
      embeddingModel: config.openaiModel,
    });
    if (!backend.isConfigured()) {
      log.warn("EMBEDDING_PROVIDER=openai without OPENAI_API_KEY; running keyword-only");
      return null;
    }
    return backend;
  }

  return new OllamaEmbeddingBackend({
    baseUrl: config.ollamaBaseUrl,
    embeddingModel: config.ollamaModel,
  });
}

/** Null when embeddings are disabled; the vector store then runs keyword-only. */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider | null {
  const backend = createEmbeddingBackend(config);
  if (!backend) {
    return null;
  }
  return new LazyEmbeddingProvider(() => backend, {
    maxAttempts: config.initAttempts,
    baseDelayMs: config.retryBaseMs,
    retryCooldownMs: config.retryCooldownMs,
    batchSize: config.batchSize,
  });
}
