import type { PendingOperation } from "../catalog/types.js";

/** Drift between the catalog and the remote index for one project. */
export interface ReconcileReport {
  projectId: string;
  remoteIndexId: string;
  /** In the catalog but not confirmed by the remote listing. Sorted. */
  onlyLocal: string[];
  /** In the remote listing but unknown to the catalog. Sorted. */
  onlyRemote: string[];
  /** The remote listing stopped at the configured cap. */
  remoteTruncated: boolean;
  /** Interrupted multi-step actions recorded for this project. */
  pendingOperations: PendingOperation[];
}

export interface RepairResult {
  projectId: string;
  /** Remote document ids newly recorded in the catalog. */
  added: string[];
  /** The drift found before repairing. */
  report: ReconcileReport;
}
