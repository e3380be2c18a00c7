import { Hono } from "hono";
import { cors } from "hono/cors";
import type { Logger } from "pino";
import type { AnsweringService } from "@docqa/core/answering";
import type { ProjectsService } from "@docqa/core/projects";
import type { ReconcileEngine } from "@docqa/core/reconcile";
import type { VoiceServices } from "@docqa/core/services";
import type { VoiceConfig } from "@docqa/core/schemas";
import { healthRoute } from "./routes/health.js";
import { chatRoute } from "./routes/chat.js";
import { projectsRoutes } from "./routes/projects.js";
import { operationsRoutes } from "./routes/operations.js";
import { voiceRoutes } from "./routes/voice.js";
import { mcpRoute } from "./routes/mcp.js";
import { createErrorHandler, notFoundHandler } from "./middleware/error-handler.js";

export interface AppDeps {
  logger: Logger;
  version: string;
  startedAt: Date;
  model: string;
  catalogPath: string;
  uploadMaxBytes: number;
  projects: ProjectsService;
  reconcile: ReconcileEngine;
  answering: AnsweringService;
  /** Voice routes are mounted only when present. */
  voice?: VoiceServices & { defaults: VoiceConfig };
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // CORS: allow all origins for browser-based clients
  app.use(
    "*",
    cors({
      origin: "*",
      allowHeaders: ["Content-Type", "Authorization"],
      allowMethods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
      maxAge: 86400,
    }),
  );

  app.route(
    "/",
    healthRoute({
      version: deps.version,
      startedAt: deps.startedAt,
      model: deps.model,
      catalogPath: deps.catalogPath,
    }),
  );

  app.route("/", chatRoute({ answering: deps.answering, logger: deps.logger }));

  app.route(
    "/v1/projects",
    projectsRoutes({
      projects: deps.projects,
      reconcile: deps.reconcile,
      logger: deps.logger,
      uploadMaxBytes: deps.uploadMaxBytes,
    }),
  );

  app.route("/v1/operations", operationsRoutes({ projects: deps.projects }));

  if (deps.voice) {
    app.route(
      "/v1/voice",
      voiceRoutes({
        bridge: deps.voice.bridge,
        dedup: deps.voice.dedup,
        defaults: deps.voice.defaults,
        logger: deps.logger,
        uploadMaxBytes: deps.uploadMaxBytes,
      }),
    );
  }

  app.route(
    "/mcp",
    mcpRoute({
      mcpContext: {
        projects: deps.projects,
        answering: deps.answering,
        logger: deps.logger,
      },
    }),
  );

  app.onError(createErrorHandler(deps.logger));
  app.notFound(notFoundHandler);

  return app;
}
