import type { Logger } from "pino";
import type { CatalogStore } from "../catalog/store.js";
import type { CallOptions, IndexGateway } from "../gateway/types.js";
import { NotFoundError, ValidationError } from "../errors/catalog.js";
import { buildGroundingInstructions, type GroundingOptions } from "./instructions.js";

/** Source reference for a conclusion. Not extracted yet; answers carry none. */
export interface Citation {
  filename: string;
  page?: number;
  quote?: string;
}

export interface ChatAnswer {
  text: string;
  citations: Citation[];
}

export interface AnsweringServiceDeps {
  catalog: CatalogStore;
  gateway: IndexGateway;
  logger: Logger;
  grounding: GroundingOptions;
}

export interface AnsweringService {
  /** Stateless: nothing about the exchange is kept between calls. */
  answer(
    projectId: string,
    userMessage: string,
    options?: CallOptions,
  ): Promise<ChatAnswer>;
}

export function createAnsweringService(deps: AnsweringServiceDeps): AnsweringService {
  const { catalog, gateway, logger } = deps;
  const instructions = buildGroundingInstructions(deps.grounding);

  return {
    async answer(projectId, userMessage, options) {
      if (userMessage.trim().length === 0) {
        throw new ValidationError("message must not be empty", { field: "message" });
      }

      const remoteIndexId = catalog.findActiveIndexId(projectId);
      if (remoteIndexId === undefined) {
        throw new NotFoundError(`Active project not found: ${projectId}`, {
          projectId,
        });
      }

      const started = Date.now();
      const { text } = await gateway.answer(
        remoteIndexId,
        instructions,
        userMessage,
        options,
      );
      logger.info(
        { projectId, remoteIndexId, durationMs: Date.now() - started },
        "Answer generated",
      );

      // TODO: extract filename/page citations from the file_search annotations.
      return { text, citations: [] };
    },
  };
}
