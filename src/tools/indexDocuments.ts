import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { KnowledgeService } from "../services/knowledgeService.js";
import { jsonResult } from "./toolResult.js";

export function registerIndexDocumentsTool(server: McpServer, service: KnowledgeService) {
  server.registerTool(
    "index_documents",
    {
      title: "Index Documents",
      description:
        "Extracts, chunks and embeds local files (.txt, .md, .csv, .pdf, .docx) into the collection.",
      inputSchema: {
        paths: z.array(z.string()).min(1).describe("File paths to index"),
      },
    },
    async ({ paths }) => {
      const startedAt = Date.now();
      const result = await service.indexDocuments(paths);

      return jsonResult({
        ...result,
        embedding_enabled: service.embeddingEnabled,
        latency_ms: Date.now() - startedAt,
      });
    },
  );
}

export function registerIndexTextTool(server: McpServer, service: KnowledgeService) {
  server.registerTool(
    "index_text",
    {
      title: "Index Text",
      description: "Chunks and embeds raw text documents supplied by the caller.",
      inputSchema: {
        documents: z
          .array(
            z.object({
              source: z.string().min(1).describe("Document name, e.g. handbook.md"),
              content: z.string().describe("Full document text"),
            }),
          )
          .min(1)
          .describe("Documents to index"),
      },
    },
    async ({ documents }) => {
      const result = await service.indexRawDocuments(documents);
      return jsonResult({ ...result, embedding_enabled: service.embeddingEnabled });
    },
  );
}
