import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { KnowledgeService } from "../services/knowledgeService.js";
import { jsonResult } from "./toolResult.js";

export function registerListSourcesTool(server: McpServer, service: KnowledgeService) {
  server.registerTool(
    "list_sources",
    {
      title: "List Sources",
      description: "Lists indexed documents with their chunk counts.",
      inputSchema: {},
    },
    async () => {
      const sources = await service.listSources();
      return jsonResult({ sources });
    },
  );
}

export function registerResetCollectionTool(server: McpServer, service: KnowledgeService) {
  server.registerTool(
    "reset_collection",
    {
      title: "Reset Collection",
      description: "Removes every chunk and embedding from the collection, including persisted files.",
      inputSchema: {},
    },
    async () => {
      const result = await service.resetIndex();
      return jsonResult(result);
    },
  );
}
