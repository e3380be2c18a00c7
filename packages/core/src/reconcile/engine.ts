import type { Logger } from "pino";
import type { CatalogStore } from "../catalog/store.js";
import type { CallOptions, IndexGateway } from "../gateway/types.js";
import { NotFoundError } from "../errors/catalog.js";
import type { ReconcileReport, RepairResult } from "./types.js";

export interface ReconcileEngineDeps {
  catalog: CatalogStore;
  gateway: IndexGateway;
  logger: Logger;
}

export interface ReconcileEngine {
  /** Read-only diff of local and remote document ids. */
  reconcile(projectId: string, options?: CallOptions): Promise<ReconcileReport>;

  /**
   * Records every remote-only document in the catalog, using its remote id
   * as filename and no fingerprint. Local-only rows are left alone.
   */
  repair(projectId: string, options?: CallOptions): Promise<RepairResult>;
}

function difference(a: Set<string>, b: Set<string>): string[] {
  return [...a].filter((id) => !b.has(id)).sort();
}

export function createReconcileEngine(deps: ReconcileEngineDeps): ReconcileEngine {
  const { catalog, gateway, logger } = deps;

  async function reconcile(
    projectId: string,
    options?: CallOptions,
  ): Promise<ReconcileReport> {
    // Archived projects can still be reconciled.
    const project = catalog.getProject(projectId);
    if (!project) {
      throw new NotFoundError(`Project not found: ${projectId}`, { projectId });
    }

    const listing = await gateway.listDocuments(project.remoteIndexId, options);
    const remoteSet = new Set(listing.documentIds);
    const localSet = new Set(
      catalog.listDocuments(projectId).map((doc) => doc.remoteDocumentId),
    );

    const report: ReconcileReport = {
      projectId,
      remoteIndexId: project.remoteIndexId,
      onlyLocal: difference(localSet, remoteSet),
      onlyRemote: difference(remoteSet, localSet),
      remoteTruncated: listing.truncated,
      pendingOperations: catalog.listPendingOperations(projectId),
    };

    logger.info(
      {
        projectId,
        remoteIndexId: project.remoteIndexId,
        onlyLocal: report.onlyLocal.length,
        onlyRemote: report.onlyRemote.length,
        remoteTruncated: report.remoteTruncated,
        pendingOperations: report.pendingOperations.length,
      },
      "Reconciliation complete",
    );
    if (listing.truncated) {
      logger.warn(
        { projectId, remoteIndexId: project.remoteIndexId },
        "Remote listing truncated; onlyLocal may contain documents that do exist remotely",
      );
    }

    return report;
  }

  async function repair(
    projectId: string,
    options?: CallOptions,
  ): Promise<RepairResult> {
    const report = await reconcile(projectId, options);
    for (const remoteDocumentId of report.onlyRemote) {
      catalog.addDocument(projectId, remoteDocumentId, remoteDocumentId, null);
    }
    if (report.onlyRemote.length > 0) {
      logger.info(
        { projectId, added: report.onlyRemote },
        "Recorded remote-only documents in catalog",
      );
    }
    return { projectId, added: report.onlyRemote, report };
  }

  return { reconcile, repair };
}
