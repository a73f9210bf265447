import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { KnowledgeService } from "../services/knowledgeService.js";
import { jsonResult } from "./toolResult.js";

const SNIPPET_LENGTH = 240;

export function registerSearchChunksTool(server: McpServer, service: KnowledgeService) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description: "Returns the store's top matching chunks for a query, without re-ranking.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        top_k: z.number().int().min(1).max(50).optional().describe("Max hits"),
      },
    },
    async ({ query, top_k }) => {
      const hits = await service.searchChunks(query, top_k ?? 5);

      return jsonResult({
        query,
        retrieval_mode: service.embeddingEnabled ? "semantic" : "keyword",
        hits: hits.map((hit) => ({
          score: Number(hit.score.toFixed(4)),
          source: hit.chunk.metadata.source,
          file_path: hit.chunk.metadata.file_path,
          chunk_index: hit.chunk.metadata.chunk_index,
          section_type: hit.chunk.metadata.section_type,
          snippet: hit.chunk.content.slice(0, SNIPPET_LENGTH),
        })),
      });
    },
  );
}
