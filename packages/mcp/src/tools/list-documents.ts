import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";
import { errorResult, jsonResult } from "./result.js";

export function registerListDocumentsTool(
  server: McpServer,
  ctx: McpContext,
): void {
  server.registerTool(
    "list_documents",
    {
      title: "List Documents",
      description: "List the documents recorded for a project, newest first.",
      inputSchema: {
        projectId: z.string().min(1).describe("Project id"),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ projectId }) => {
      try {
        const documents = ctx.projects.listDocuments(projectId);
        return jsonResult({
          documents: documents.map((d) => ({
            documentId: d.remoteDocumentId,
            filename: d.filename,
            addedAt: d.addedAt,
          })),
        });
      } catch (err) {
        return errorResult(err);
      }
    },
  );
}
