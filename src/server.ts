#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createAppContext, createAppServer } from "./app.js";
import { loadConfig } from "./config/env.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("server");

async function main() {
  const config = loadConfig();
  const { service, close } = await createAppContext(config);

  const server = createAppServer(service, config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ knowledgeDir: config.knowledgeDir }, "MCP stdio server started");

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info({ signal }, "shutting down");
    try {
      await server.close();
      await close();
      process.exit(0);
    } catch (error) {
      log.error({ err: error }, "shutdown failed");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error) => {
  log.fatal({ err: error }, "failed to start MCP server");
  process.exit(1);
});
