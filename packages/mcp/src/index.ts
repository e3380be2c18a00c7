#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, loadSecrets, resolveRootPath } from "@docqa/core/config";
import { createLogger } from "@docqa/core/logger";
import { createCoreServices } from "@docqa/core/services";
import { createMcpServer } from "./server.js";

async function main(): Promise<void> {
  const rootPath = resolveRootPath(process.env.DOCQA_ROOT_PATH);
  const config = await loadConfig({ rootPath });

  // Logs go to stderr so stdout carries only protocol frames
  const logger = createLogger(config.logging, { fd: 2 });

  const secrets = loadSecrets();
  const services = await createCoreServices({ config, secrets, rootPath, logger });

  const mcpServer = createMcpServer({
    projects: services.projects,
    answering: services.answering,
    logger,
  });

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);
  logger.info("MCP server connected via stdio");

  process.on("SIGINT", () => {
    void mcpServer.close().finally(() => {
      services.close();
      process.exit(0);
    });
  });
}

main().catch((err: unknown) => {
  console.error("MCP server failed:", err);
  process.exit(1);
});
