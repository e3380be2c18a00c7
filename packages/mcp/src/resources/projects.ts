import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";

export const PROJECTS_RESOURCE_URI = "docqa://projects";

export function registerProjectsResource(
  server: McpServer,
  ctx: McpContext,
): void {
  server.registerResource(
    "projects",
    PROJECTS_RESOURCE_URI,
    {
      title: "Active projects",
      description: "Active projects that can be asked questions",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(ctx.projects.listProjects(true), null, 2),
        },
      ],
    }),
  );
}
