import { mkdir } from "node:fs/promises";
import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };
import type { Hono } from "hono";
import type { ServerConfig } from "@docqa/core/schemas";
import {
  DEFAULT_ROOT_PATH,
  loadSecrets,
  resolveRootPath,
  type Secrets,
} from "@docqa/core/config";
import { createLogger, type Logger } from "@docqa/core/logger";
import type { IndexGateway } from "@docqa/core/gateway";
import {
  createCoreServices,
  createVoiceServices,
  type CoreServices,
  type VoiceServices,
} from "@docqa/core/services";
import { createApp } from "./app.js";

export interface ServerContext {
  app: Hono;
  logger: Logger;
  config: ServerConfig;
  startedAt: Date;
  rootPath: string;
  services: CoreServices;
  voice: VoiceServices;
  cleanup: () => void;
}

export interface CreateServerOptions {
  rootPath?: string;
  /** Defaults to the process environment. */
  secrets?: Secrets;
  /** Replaces the OpenAI-backed index gateway. */
  gateway?: IndexGateway;
  logger?: Logger;
}

/**
 * Builds the HTTP app and everything behind it. Throws ConfigurationError
 * when a required secret or provider is missing.
 */
export async function createServer(
  config: ServerConfig,
  options: CreateServerOptions = {},
): Promise<ServerContext> {
  const logger = options.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const rootPath = resolveRootPath(options.rootPath ?? DEFAULT_ROOT_PATH);
  await mkdir(rootPath, { recursive: true });

  const secrets = options.secrets ?? loadSecrets(process.env);

  const services = await createCoreServices({
    config,
    secrets,
    rootPath,
    logger,
    gateway: options.gateway,
  });

  let voice: VoiceServices;
  try {
    voice = createVoiceServices({
      config,
      secrets,
      openai: services.openai,
      logger,
    });
  } catch (err) {
    services.close();
    throw err;
  }

  const app = createApp({
    logger,
    version: pkg.version,
    startedAt,
    model: config.gateway.model,
    catalogPath: services.catalogPath,
    uploadMaxBytes: config.upload.maxBytes,
    projects: services.projects,
    reconcile: services.reconcile,
    answering: services.answering,
    voice: { ...voice, defaults: config.voice },
  });

  return {
    app,
    logger,
    config,
    startedAt,
    rootPath,
    services,
    voice,
    cleanup: () => services.close(),
  };
}
