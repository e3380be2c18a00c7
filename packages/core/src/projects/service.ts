/**
 * Project and document administration. Actions that touch both the remote
 * index and the catalog run as a tracked sequence: a pending marker is
 * written before the first remote call and cleared after the last catalog
 * write. A failure in between leaves the marker behind for reconciliation.
 */

import type { Logger } from "pino";
import type { CatalogStore } from "../catalog/store.js";
import type {
  PendingOperation,
  Project,
  ProjectDocument,
} from "../catalog/types.js";
import type { CallOptions, IndexGateway } from "../gateway/types.js";
import {
  GatewayError,
  NotFoundError,
  ValidationError,
} from "../errors/catalog.js";
import { fingerprint } from "../fingerprint/index.js";

export type UploadOutcome =
  | { status: "added"; document: ProjectDocument }
  | { status: "skipped"; reason: "duplicate"; fingerprint: string };

export interface UploadOptions extends CallOptions {
  /** Skip the upload when the project already holds identical bytes. Default true. */
  dedup?: boolean;
}

export interface ProjectsServiceDeps {
  catalog: CatalogStore;
  gateway: IndexGateway;
  logger: Logger;
}

export interface ProjectsService {
  createProject(name: string, options?: CallOptions): Promise<Project>;
  renameProject(projectId: string, newName: string): Project;
  archiveProject(projectId: string): Project;
  getProject(projectId: string): Project;
  listProjects(activeOnly: boolean): Project[];
  listDocuments(projectId: string): ProjectDocument[];
  uploadDocument(
    projectId: string,
    bytes: Uint8Array,
    filename: string,
    options?: UploadOptions,
  ): Promise<UploadOutcome>;
  removeDocument(
    projectId: string,
    remoteDocumentId: string,
    options?: CallOptions,
  ): Promise<void>;
  listPendingOperations(projectId?: string): PendingOperation[];
  /** Drops a marker once an operator has dealt with the interrupted action. */
  dismissPendingOperation(operationId: string): void;
}

function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${field} must not be empty`, { field });
  }
  return trimmed;
}

export function createProjectsService(deps: ProjectsServiceDeps): ProjectsService {
  const { catalog, gateway, logger } = deps;

  function getProject(projectId: string): Project {
    const project = catalog.getProject(projectId);
    if (!project) {
      throw new NotFoundError(`Project not found: ${projectId}`, { projectId });
    }
    return project;
  }

  function requireActiveIndex(projectId: string): string {
    const remoteIndexId = catalog.findActiveIndexId(projectId);
    if (remoteIndexId === undefined) {
      throw new NotFoundError(`Active project not found: ${projectId}`, {
        projectId,
      });
    }
    return remoteIndexId;
  }

  /** Runs the steps of a marked operation; the marker survives a failure. */
  async function tracked<T>(operationId: string, steps: () => Promise<T>): Promise<T> {
    try {
      const result = await steps();
      catalog.completeOperation(operationId);
      return result;
    } catch (err) {
      const orphaned =
        err instanceof GatewayError ? err.details?.orphanedDocumentId : undefined;
      if (typeof orphaned === "string") {
        catalog.updateOperation(operationId, {
          detail: { orphanedDocumentId: orphaned },
        });
      }
      logger.error({ err, operationId }, "Operation interrupted; pending marker kept");
      throw err;
    }
  }

  return {
    async createProject(name, options) {
      const projectName = requireText(name, "name");
      const operationId = catalog.beginOperation("create_project", null, {
        projectName,
      });

      const projectId = await tracked(operationId, async () => {
        const remoteIndexId = await gateway.createIndex(projectName, options);
        catalog.updateOperation(operationId, { detail: { remoteIndexId } });
        return catalog.createProject(projectName, remoteIndexId);
      });

      const project = getProject(projectId);
      logger.info(
        { projectId, remoteIndexId: project.remoteIndexId },
        "Project created",
      );
      return project;
    },

    renameProject(projectId, newName) {
      catalog.renameProject(projectId, requireText(newName, "name"));
      return getProject(projectId);
    },

    archiveProject(projectId) {
      catalog.archiveProject(projectId);
      logger.info({ projectId }, "Project archived");
      return getProject(projectId);
    },

    getProject,

    listProjects(activeOnly) {
      return catalog.listProjects(activeOnly);
    },

    listDocuments(projectId) {
      getProject(projectId);
      return catalog.listDocuments(projectId);
    },

    async uploadDocument(projectId, bytes, filename, options = {}) {
      const remoteIndexId = requireActiveIndex(projectId);
      const name = requireText(filename, "filename");
      const hash = fingerprint(bytes);

      if ((options.dedup ?? true) && catalog.hasFingerprint(projectId, hash)) {
        logger.info(
          { projectId, filename: name, fingerprint: hash },
          "Duplicate upload skipped",
        );
        return { status: "skipped", reason: "duplicate", fingerprint: hash };
      }

      const operationId = catalog.beginOperation("add_document", projectId, {
        filename: name,
        fingerprint: hash,
        remoteIndexId,
      });

      const document = await tracked(operationId, async () => {
        const remoteDocumentId = await gateway.addDocument(
          remoteIndexId,
          bytes,
          name,
          { timeoutMs: options.timeoutMs },
        );
        catalog.updateOperation(operationId, { detail: { remoteDocumentId } });
        return catalog.addDocument(projectId, remoteDocumentId, name, hash);
      });

      logger.info(
        { projectId, remoteIndexId, remoteDocumentId: document.remoteDocumentId },
        "Document added",
      );
      return { status: "added", document };
    },

    async removeDocument(projectId, remoteDocumentId, options) {
      const remoteIndexId = requireActiveIndex(projectId);
      const operationId = catalog.beginOperation("remove_document", projectId, {
        remoteDocumentId,
        remoteIndexId,
      });

      await tracked(operationId, async () => {
        await gateway.removeDocument(remoteIndexId, remoteDocumentId, options);
        catalog.removeDocument(projectId, remoteDocumentId);
      });

      logger.info({ projectId, remoteIndexId, remoteDocumentId }, "Document removed");
    },

    listPendingOperations(projectId) {
      return catalog.listPendingOperations(projectId);
    },

    dismissPendingOperation(operationId) {
      if (!catalog.completeOperation(operationId)) {
        throw new NotFoundError(`Pending operation not found: ${operationId}`, {
          operationId,
        });
      }
      logger.info({ operationId }, "Pending marker dismissed");
    },
  };
}
