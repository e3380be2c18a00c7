import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "./types.js";
import { registerProjectsResource } from "./resources/projects.js";
import { registerListProjectsTool } from "./tools/list-projects.js";
import { registerListDocumentsTool } from "./tools/list-documents.js";
import { registerAskProjectTool } from "./tools/ask-project.js";

export function createMcpServer(ctx: McpContext): McpServer {
  const server = new McpServer({
    name: "docqa",
    version: "0.1.0",
  });

  registerProjectsResource(server, ctx);

  registerListProjectsTool(server, ctx);
  registerListDocumentsTool(server, ctx);
  registerAskProjectTool(server, ctx);

  return server;
}

export type { McpContext } from "./types.js";
