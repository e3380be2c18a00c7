import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";
import { jsonResult } from "./result.js";

export function registerListProjectsTool(
  server: McpServer,
  ctx: McpContext,
): void {
  server.registerTool(
    "list_projects",
    {
      title: "List Projects",
      description:
        "List projects with their ids, names and status, most recently updated first.",
      inputSchema: {
        includeArchived: z
          .boolean()
          .optional()
          .describe("Include archived projects (default false)"),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ includeArchived }) => {
      const projects = ctx.projects.listProjects(!(includeArchived ?? false));
      return jsonResult({
        projects: projects.map((p) => ({
          projectId: p.projectId,
          projectName: p.projectName,
          status: p.status,
          updatedAt: p.updatedAt,
        })),
      });
    },
  );
}
