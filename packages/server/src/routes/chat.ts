import { Hono } from "hono";
import { z } from "zod";
import type { Logger } from "pino";
import type { AnsweringService } from "@docqa/core/answering";
import { createBodyLimit, DEFAULT_MAX_SIZE } from "../middleware/body-limit.js";
import { readJson } from "./request.js";

export interface ChatRouteDeps {
  answering: AnsweringService;
  logger: Logger;
}

export const ChatRequestSchema = z.object({
  project_id: z.string().min(1),
  user_id: z.string().min(1),
  message: z.string(),
});

export function chatRoute(deps: ChatRouteDeps): Hono {
  const app = new Hono();

  // POST /chat: grounded answer from one project's documents
  app.post("/chat", createBodyLimit(DEFAULT_MAX_SIZE), async (c) => {
    const body = await readJson(c, ChatRequestSchema);
    deps.logger.debug(
      { projectId: body.project_id, userId: body.user_id },
      "Chat request",
    );

    const { text, citations } = await deps.answering.answer(
      body.project_id,
      body.message,
    );
    return c.json({ answer: text, citations });
  });

  return app;
}
