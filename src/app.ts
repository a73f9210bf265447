import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { AppConfig } from "./config/env.js";
import { loadRetrievalProfile } from "./config/retrievalProfile.js";
import { VectorStore } from "./domain/vectorStore.js";
import { createEmbeddingProvider } from "./infra/ai/createEmbeddingProvider.js";
import { EmbeddingProvider } from "./infra/ai/types.js";
import { createVectorStore } from "./infra/store/createVectorStore.js";
import { KnowledgeService } from "./services/knowledgeService.js";
import { RetrievalEngine } from "./services/retrievalEngine.js";
import { registerHealthCheckTool } from "./tools/healthCheck.js";
import { registerIndexDocumentsTool, registerIndexTextTool } from "./tools/indexDocuments.js";
import { registerListSourcesTool, registerResetCollectionTool } from "./tools/listSources.js";
import { registerQueryKnowledgeTool } from "./tools/queryKnowledge.js";
import { registerRefreshIndexTool } from "./tools/refreshIndex.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";
import { createLogger } from "./utils/logger.js";

export const SERVER_NAME = "knowledge-retrieval-mcp";
export const SERVER_VERSION = "0.1.0";

const log = createLogger("app");

export interface AppContext {
  service: KnowledgeService;
  store: VectorStore;
  close: () => Promise<void>;
}

export interface AppOverrides {
  provider?: EmbeddingProvider | null;
  store?: VectorStore;
}

/** Builds the provider, store, engine and service, then loads and warms the corpus. */
export async function createAppContext(
  config: AppConfig,
  overrides: AppOverrides = {},
): Promise<AppContext> {
  const profile = await loadRetrievalProfile(config.retrievalProfilePath);
  const provider =
    overrides.provider !== undefined ? overrides.provider : createEmbeddingProvider(config.embedding);
  const store = overrides.store ?? createVectorStore(config.vectorStore, provider, profile.stopwords);

  await store.initialize();
  await store.warmup();

  const engine = new RetrievalEngine(store, profile, { defaultTopK: config.defaultTopK });
  const service = new KnowledgeService(store, engine, {
    chunking: config.chunking,
    ingestConcurrency: config.ingestConcurrency,
    recoveryKeywords: profile.recoveryKeywords,
    embeddingEnabled: provider !== null,
  });

  const info = await store.getStorageInfo();
  log.info(
    { backend: info.backend, collection: info.collection, documents: info.document_count, mode: info.mode },
    "vector store ready",
  );

  return { service, store, close: () => store.close() };
}

export function createAppServer(service: KnowledgeService, config: AppConfig): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerHealthCheckTool(server, service);
  registerIndexDocumentsTool(server, service);
  registerIndexTextTool(server, service);
  registerRefreshIndexTool(server, service, config.knowledgeDir);
  registerSearchChunksTool(server, service);
  registerQueryKnowledgeTool(server, service);
  registerListSourcesTool(server, service);
  registerResetCollectionTool(server, service);

  return server;
}
