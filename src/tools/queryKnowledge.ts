import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { KnowledgeService } from "../services/knowledgeService.js";
import { jsonResult } from "./toolResult.js";

export function registerQueryKnowledgeTool(server: McpServer, service: KnowledgeService) {
  server.registerTool(
    "query_knowledge",
    {
      title: "Query Knowledge",
      description:
        "Runs multi-strategy retrieval and returns ranked context with source attributions and a confidence level.",
      inputSchema: {
        query: z.string().min(1).describe("User question"),
        top_k: z.number().int().min(1).max(50).optional().describe("Chunks to return"),
      },
    },
    async ({ query, top_k }) => {
      const startedAt = Date.now();
      const result = await service.query(query, top_k);

      return jsonResult({
        should_use_retrieval: service.shouldUseRetrieval(query),
        confidence_level: result.confidence_level,
        ranked_sources: result.ranked_sources,
        context_text: result.context_text,
        chunks: result.chunks.map((chunk) => ({
          relevance_score: Number(chunk.relevance_score.toFixed(4)),
          source: chunk.metadata.source,
          chunk_index: chunk.metadata.chunk_index,
          section_type: chunk.metadata.section_type,
          content: chunk.content,
        })),
        latency_ms: Date.now() - startedAt,
      });
    },
  );
}
