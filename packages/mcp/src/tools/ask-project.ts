import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";
import { errorResult, jsonResult } from "./result.js";

export function registerAskProjectTool(
  server: McpServer,
  ctx: McpContext,
): void {
  server.registerTool(
    "ask_project",
    {
      title: "Ask Project",
      description:
        "Answer a question strictly from one active project's documents. Replies that the documents do not provide the answer when nothing supports it.",
      inputSchema: {
        projectId: z.string().min(1).describe("Active project id"),
        question: z.string().min(1).describe("Natural-language question"),
      },
      annotations: { readOnlyHint: true, openWorldHint: true },
    },
    async ({ projectId, question }) => {
      try {
        const result = await ctx.answering.answer(projectId, question);
        return jsonResult({ answer: result.text, citations: result.citations });
      } catch (err) {
        ctx.logger.warn({ err, projectId }, "ask_project failed");
        return errorResult(err);
      }
    },
  );
}
