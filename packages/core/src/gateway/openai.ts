/**
 * IndexGateway over the OpenAI platform: a vector store per project index,
 * uploaded files as documents, and the Responses API with a `file_search`
 * tool for grounded answers.
 */

import OpenAI, { toFile } from "openai";
import type { Logger } from "pino";
import { GatewayError } from "../errors/catalog.js";
import { withTimeout } from "./timeout.js";
import type {
  CallOptions,
  GroundedAnswer,
  IndexGateway,
  RemoteDocumentListing,
} from "./types.js";

/** Largest page the vector store file listing accepts. */
const MAX_PAGE_SIZE = 100;

export interface OpenAiIndexGatewayOptions {
  client: OpenAI;
  model: string;
  /** Default bound for every call (ms). */
  timeoutMs: number;
  /** Maximum number of documents a listing returns. */
  listCap: number;
  logger?: Logger;
}

/** Maps an SDK failure onto the gateway error taxonomy. */
export function classifyOpenAiError(
  err: unknown,
  operation: string,
): GatewayError {
  const detail = err instanceof Error ? err.message : String(err);
  const message = `${operation} failed: ${detail}`;

  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new GatewayError("timeout", message, { cause: err, details: { operation } });
  }
  if (err instanceof OpenAI.APIUserAbortError) {
    return new GatewayError("timeout", message, { cause: err, details: { operation } });
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new GatewayError("network", message, { cause: err, details: { operation } });
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    const details = { operation, status };
    if (status === 401 || status === 403) {
      return new GatewayError("auth", message, { cause: err, details });
    }
    if (status === 404) {
      return new GatewayError("not_found", message, { cause: err, details });
    }
    if (status === 429) {
      return new GatewayError("rate_limit", message, { cause: err, details });
    }
    return new GatewayError("provider", message, { cause: err, details });
  }
  return new GatewayError("provider", message, { cause: err, details: { operation } });
}

export function createOpenAiIndexGateway(
  options: OpenAiIndexGatewayOptions,
): IndexGateway {
  const { client, model, logger } = options;

  function budgetOf(callOptions: CallOptions | undefined): number {
    return callOptions?.timeoutMs ?? options.timeoutMs;
  }

  function run<T>(
    operation: string,
    callOptions: CallOptions | undefined,
    fn: (request: OpenAI.RequestOptions) => Promise<T>,
  ): Promise<T> {
    const timeoutMs = budgetOf(callOptions);
    return withTimeout(
      operation,
      timeoutMs,
      (signal) => fn({ signal, timeout: timeoutMs, maxRetries: 0 }),
      classifyOpenAiError,
    );
  }

  return {
    async createIndex(name, callOptions) {
      const store = await run("createIndex", callOptions, (request) =>
        client.vectorStores.create({ name }, request),
      );
      logger?.info({ remoteIndexId: store.id, name }, "Remote index created");
      return store.id;
    },

    async addDocument(remoteIndexId, bytes, filename, callOptions) {
      // Both phases share one deadline.
      const timeoutMs = budgetOf(callOptions);
      const deadline = Date.now() + timeoutMs;

      const uploaded = await run("addDocument.upload", { timeoutMs }, async (request) =>
        client.files.create(
          { file: await toFile(bytes, filename), purpose: "assistants" },
          request,
        ),
      );

      try {
        const remainingMs = deadline - Date.now();
        if (remainingMs <= 0) {
          throw new GatewayError("timeout", `addDocument timed out after ${timeoutMs}ms`, {
            details: { operation: "addDocument.register", timeoutMs },
          });
        }
        await run("addDocument.register", { timeoutMs: remainingMs }, (request) =>
          client.vectorStores.files.create(
            remoteIndexId,
            { file_id: uploaded.id },
            request,
          ),
        );
      } catch (err) {
        logger?.error(
          { err, remoteIndexId, orphanedDocumentId: uploaded.id, filename },
          "Upload succeeded but index registration failed; upload left orphaned",
        );
        if (err instanceof GatewayError) {
          throw new GatewayError(err.kind, err.message, {
            cause: err.cause ?? err,
            details: { ...err.details, orphanedDocumentId: uploaded.id },
          });
        }
        throw err;
      }

      return uploaded.id;
    },

    async removeDocument(remoteIndexId, remoteDocumentId, callOptions) {
      await run("removeDocument", callOptions, (request) =>
        client.vectorStores.files.delete(
          remoteDocumentId,
          { vector_store_id: remoteIndexId },
          request,
        ),
      );
    },

    async listDocuments(remoteIndexId, callOptions): Promise<RemoteDocumentListing> {
      const cap = options.listCap;
      return run("listDocuments", callOptions, async (request) => {
        const documentIds: string[] = [];
        let truncated = false;
        const pages = client.vectorStores.files.list(
          remoteIndexId,
          { limit: Math.min(MAX_PAGE_SIZE, cap) },
          request,
        );
        for await (const file of pages) {
          if (documentIds.length >= cap) {
            truncated = true;
            break;
          }
          documentIds.push(file.id);
        }
        return { documentIds, truncated };
      });
    },

    async answer(remoteIndexId, systemInstructions, userMessage, callOptions): Promise<GroundedAnswer> {
      const response = await run("answer", callOptions, (request) =>
        client.responses.create(
          {
            model,
            instructions: systemInstructions,
            input: userMessage,
            tools: [{ type: "file_search", vector_store_ids: [remoteIndexId] }],
          },
          request,
        ),
      );
      if (typeof response.output_text !== "string") {
        throw new GatewayError("malformed_response", "answer returned no output text", {
          details: { operation: "answer", responseId: response.id },
        });
      }
      return { text: response.output_text };
    },
  };
}
