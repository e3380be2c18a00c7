/**
 * Builds the shared collaborators once per process: catalog handle, OpenAI
 * client, index gateway and the services on top of them. Entry points pass
 * the result into their handlers.
 */

import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import OpenAI from "openai";
import type { Logger } from "pino";
import { createAnsweringService, type AnsweringService } from "../answering/service.js";
import { initializeCatalogDatabase } from "../catalog/schema.js";
import { createCatalogStore, type CatalogStore } from "../catalog/store.js";
import type { Secrets } from "../config/env.js";
import { resolveCatalogPath } from "../config/paths.js";
import { createOpenAiIndexGateway } from "../gateway/openai.js";
import type { IndexGateway } from "../gateway/types.js";
import { createProjectsService, type ProjectsService } from "../projects/service.js";
import { createReconcileEngine, type ReconcileEngine } from "../reconcile/engine.js";
import type { ServerConfig } from "../schemas/server-config.js";

export interface CoreServices {
  catalogPath: string;
  catalog: CatalogStore;
  openai: OpenAI;
  gateway: IndexGateway;
  projects: ProjectsService;
  reconcile: ReconcileEngine;
  answering: AnsweringService;
  close(): void;
}

export interface CreateCoreServicesOptions {
  config: ServerConfig;
  secrets: Secrets;
  rootPath: string;
  logger: Logger;
  /** Replaces the OpenAI-backed gateway (tests). */
  gateway?: IndexGateway;
}

export async function createCoreServices(
  options: CreateCoreServicesOptions,
): Promise<CoreServices> {
  const { config, secrets, rootPath, logger } = options;

  const catalogPath = resolveCatalogPath(config, rootPath);
  if (catalogPath !== ":memory:") {
    await mkdir(dirname(catalogPath), { recursive: true });
  }
  const catalog = createCatalogStore(initializeCatalogDatabase(catalogPath));

  const openai = new OpenAI({
    apiKey: secrets.openaiApiKey,
    ...(secrets.openaiBaseUrl !== undefined && { baseURL: secrets.openaiBaseUrl }),
    maxRetries: 0,
  });

  const gateway =
    options.gateway ??
    createOpenAiIndexGateway({
      client: openai,
      model: config.gateway.model,
      timeoutMs: config.gateway.timeoutMs,
      listCap: config.gateway.listCap,
      logger,
    });

  const projects = createProjectsService({ catalog, gateway, logger });
  const reconcile = createReconcileEngine({ catalog, gateway, logger });
  const answering = createAnsweringService({
    catalog,
    gateway,
    logger,
    grounding: {
      language: config.answering.language,
      notProvidedSignal: config.answering.notProvidedSignal,
    },
  });

  logger.info(
    { catalogPath, model: config.gateway.model },
    "Core services initialised",
  );

  return {
    catalogPath,
    catalog,
    openai,
    gateway,
    projects,
    reconcile,
    answering,
    close: () => catalog.close(),
  };
}

export {
  createVoiceServices,
  type VoiceServices,
  type CreateVoiceServicesOptions,
} from "./voice.js";
