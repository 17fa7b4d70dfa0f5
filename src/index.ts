#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createContext } from "./context.js";
import { createServer, SERVER_NAME } from "./server.js";
import { Logger } from "./utils/logger.js";

async function main() {
  const config = loadConfig();
  const logger = new Logger(config.logLevel);
  const context = createContext(config, { logger });
  const server = createServer(context);

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, closing bridges`);
    try {
      await context.registry.stopAll();
      await server.close();
    } catch (error) {
      logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(
    `${SERVER_NAME} running on stdio (${context.tools.size} tools, agent ${config.agentHost}:${config.agentPort}, artifacts ${config.artifactsDir})`,
  );
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
