import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { KnowledgeService } from "../services/knowledgeService.js";
import { jsonResult } from "./toolResult.js";

export function registerHealthCheckTool(server: McpServer, service: KnowledgeService) {
  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns server status and vector store details.",
      inputSchema: {},
    },
    async () => {
      const storage = await service.getStorageInfo();

      return jsonResult({
        status: "ok",
        embedding_enabled: service.embeddingEnabled,
        storage,
      });
    },
  );
}
