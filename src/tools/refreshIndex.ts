import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { KnowledgeService } from "../services/knowledgeService.js";
import { jsonResult } from "./toolResult.js";

export function registerRefreshIndexTool(
  server: McpServer,
  service: KnowledgeService,
  defaultDirectory: string,
) {
  server.registerTool(
    "refresh_index",
    {
      title: "Refresh Index",
      description:
        "Indexes new files from the knowledge directory. With full=true the collection is cleared and rebuilt.",
      inputSchema: {
        directory: z.string().optional().describe("Directory to scan; defaults to KNOWLEDGE_DIR"),
        full: z.boolean().optional().describe("Clear the collection and re-ingest everything"),
      },
    },
    async ({ directory, full }) => {
      const dir = directory?.trim() || defaultDirectory;
      const result = full
        ? await service.reloadKnowledgeBase(dir)
        : await service.refreshIndex(dir);

      return jsonResult({
        directory: dir,
        mode: full ? "full" : "incremental",
        ...result,
      });
    },
  );
}
