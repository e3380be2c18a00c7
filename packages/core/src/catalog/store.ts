import { randomUUID } from "node:crypto";
import Database from "better-sqlite3";
import { ConflictError, NotFoundError } from "../errors/catalog.js";
import type {
  PendingOperation,
  PendingOperationKind,
  Project,
  ProjectDocument,
  ProjectStatus,
} from "./types.js";

export interface CatalogStore {
  createProject(name: string, remoteIndexId: string): string;
  renameProject(projectId: string, newName: string): void;
  /** Idempotent; archiving an archived project changes nothing. */
  archiveProject(projectId: string): void;
  getProject(projectId: string): Project | undefined;
  /** Index id of an active project; undefined for unknown or archived ones. */
  findActiveIndexId(projectId: string): string | undefined;
  listProjects(activeOnly: boolean): Project[];

  /** Upsert on (projectId, remoteDocumentId). */
  addDocument(
    projectId: string,
    remoteDocumentId: string,
    filename: string,
    fingerprint: string | null,
  ): ProjectDocument;
  /** Returns whether a row was removed. */
  removeDocument(projectId: string, remoteDocumentId: string): boolean;
  listDocuments(projectId: string): ProjectDocument[];
  hasFingerprint(projectId: string, fingerprint: string): boolean;

  beginOperation(
    kind: PendingOperationKind,
    projectId: string | null,
    detail: Record<string, unknown>,
  ): string;
  /** Merges `patch` into the marker's detail (and sets projectId if given). */
  updateOperation(
    operationId: string,
    patch: { projectId?: string; detail?: Record<string, unknown> },
  ): void;
  /** Returns whether a marker was removed. */
  completeOperation(operationId: string): boolean;
  listPendingOperations(projectId?: string): PendingOperation[];

  close(): void;
}

export interface CatalogStoreOptions {
  now?: () => Date;
}

interface ProjectRow {
  project_id: string;
  project_name: string;
  vector_store_id: string;
  status: string;
  created_at: string;
  updated_at: string;
}

interface FileRow {
  project_id: string;
  file_id: string;
  filename: string;
  sha256: string | null;
  added_at: string;
}

interface OperationRow {
  operation_id: string;
  kind: string;
  project_id: string | null;
  detail: string;
  started_at: string;
  updated_at: string;
}

const OPERATION_KINDS: ReadonlySet<string> = new Set<PendingOperationKind>([
  "create_project",
  "add_document",
  "remove_document",
]);

function isOperationKind(value: string): value is PendingOperationKind {
  return OPERATION_KINDS.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function rowToProject(row: ProjectRow): Project {
  const status: ProjectStatus = row.status === "archived" ? "archived" : "active";
  return {
    projectId: row.project_id,
    projectName: row.project_name,
    remoteIndexId: row.vector_store_id,
    status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToDocument(row: FileRow): ProjectDocument {
  return {
    projectId: row.project_id,
    remoteDocumentId: row.file_id,
    filename: row.filename,
    contentFingerprint: row.sha256,
    addedAt: row.added_at,
  };
}

function parseDetail(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return { unparsed: raw };
  }
}

function rowToOperation(row: OperationRow): PendingOperation | undefined {
  if (!isOperationKind(row.kind)) return undefined;
  return {
    operationId: row.operation_id,
    kind: row.kind,
    projectId: row.project_id,
    detail: parseDetail(row.detail),
    startedAt: row.started_at,
    updatedAt: row.updated_at,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    (err.code === "SQLITE_CONSTRAINT_UNIQUE" ||
      err.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

export function createCatalogStore(
  db: Database.Database,
  options?: CatalogStoreOptions,
): CatalogStore {
  const now = () => (options?.now ?? (() => new Date()))().toISOString();

  const insertProjectStmt = db.prepare<{
    project_id: string;
    project_name: string;
    vector_store_id: string;
    ts: string;
  }>(
    `INSERT INTO projects (project_id, project_name, vector_store_id, status, created_at, updated_at)
     VALUES (@project_id, @project_name, @vector_store_id, 'active', @ts, @ts)`,
  );

  const renameProjectStmt = db.prepare<{
    project_id: string;
    project_name: string;
    ts: string;
  }>(
    "UPDATE projects SET project_name = @project_name, updated_at = @ts WHERE project_id = @project_id",
  );

  const archiveProjectStmt = db.prepare<{ project_id: string; ts: string }>(
    "UPDATE projects SET status = 'archived', updated_at = @ts WHERE project_id = @project_id AND status <> 'archived'",
  );

  const getProjectStmt = db.prepare<{ project_id: string }>(
    "SELECT * FROM projects WHERE project_id = @project_id",
  );

  const findActiveIndexStmt = db.prepare<{ project_id: string }>(
    "SELECT vector_store_id FROM projects WHERE project_id = @project_id AND status = 'active'",
  );

  const findByIndexStmt = db.prepare<{ vector_store_id: string }>(
    "SELECT project_id FROM projects WHERE vector_store_id = @vector_store_id",
  );

  const listActiveStmt = db.prepare(
    "SELECT * FROM projects WHERE status = 'active' ORDER BY updated_at DESC, rowid DESC",
  );

  const listAllStmt = db.prepare(
    "SELECT * FROM projects ORDER BY updated_at DESC, rowid DESC",
  );

  const upsertFileStmt = db.prepare<{
    project_id: string;
    file_id: string;
    filename: string;
    sha256: string | null;
    added_at: string;
  }>(
    `INSERT OR REPLACE INTO project_files (project_id, file_id, filename, sha256, added_at)
     VALUES (@project_id, @file_id, @filename, @sha256, @added_at)`,
  );

  const deleteFileStmt = db.prepare<{ project_id: string; file_id: string }>(
    "DELETE FROM project_files WHERE project_id = @project_id AND file_id = @file_id",
  );

  const listFilesStmt = db.prepare<{ project_id: string }>(
    `SELECT project_id, file_id, filename, sha256, added_at
     FROM project_files
     WHERE project_id = @project_id
     ORDER BY added_at DESC, rowid DESC`,
  );

  const hasShaStmt = db.prepare<{ project_id: string; sha256: string }>(
    "SELECT 1 FROM project_files WHERE project_id = @project_id AND sha256 = @sha256 LIMIT 1",
  );

  const insertOperationStmt = db.prepare<{
    operation_id: string;
    kind: string;
    project_id: string | null;
    detail: string;
    ts: string;
  }>(
    `INSERT INTO pending_operations (operation_id, kind, project_id, detail, started_at, updated_at)
     VALUES (@operation_id, @kind, @project_id, @detail, @ts, @ts)`,
  );

  const getOperationStmt = db.prepare<{ operation_id: string }>(
    "SELECT * FROM pending_operations WHERE operation_id = @operation_id",
  );

  const updateOperationStmt = db.prepare<{
    operation_id: string;
    project_id: string | null;
    detail: string;
    ts: string;
  }>(
    `UPDATE pending_operations SET project_id = @project_id, detail = @detail, updated_at = @ts
     WHERE operation_id = @operation_id`,
  );

  const deleteOperationStmt = db.prepare<{ operation_id: string }>(
    "DELETE FROM pending_operations WHERE operation_id = @operation_id",
  );

  const listOperationsStmt = db.prepare(
    "SELECT * FROM pending_operations ORDER BY started_at ASC, rowid ASC",
  );

  const listOperationsByProjectStmt = db.prepare<{ project_id: string }>(
    "SELECT * FROM pending_operations WHERE project_id = @project_id ORDER BY started_at ASC, rowid ASC",
  );

  function requireProject(projectId: string): ProjectRow {
    const row = getProjectStmt.get({ project_id: projectId }) as
      | ProjectRow
      | undefined;
    if (!row) {
      throw new NotFoundError(`Project not found: ${projectId}`, { projectId });
    }
    return row;
  }

  return {
    createProject(name, remoteIndexId) {
      const projectId = randomUUID();
      try {
        insertProjectStmt.run({
          project_id: projectId,
          project_name: name,
          vector_store_id: remoteIndexId,
          ts: now(),
        });
      } catch (err) {
        if (isUniqueViolation(err)) {
          const existing = findByIndexStmt.get({
            vector_store_id: remoteIndexId,
          }) as { project_id: string } | undefined;
          throw new ConflictError(
            `Remote index ${remoteIndexId} is already bound to a project`,
            {
              remoteIndexId,
              ...(existing !== undefined && { projectId: existing.project_id }),
            },
          );
        }
        throw err;
      }
      return projectId;
    },

    renameProject(projectId, newName) {
      const result = renameProjectStmt.run({
        project_id: projectId,
        project_name: newName,
        ts: now(),
      });
      if (result.changes === 0) {
        throw new NotFoundError(`Project not found: ${projectId}`, {
          projectId,
        });
      }
    },

    archiveProject(projectId) {
      requireProject(projectId);
      archiveProjectStmt.run({ project_id: projectId, ts: now() });
    },

    getProject(projectId) {
      const row = getProjectStmt.get({ project_id: projectId }) as
        | ProjectRow
        | undefined;
      return row ? rowToProject(row) : undefined;
    },

    findActiveIndexId(projectId) {
      const row = findActiveIndexStmt.get({ project_id: projectId }) as
        | { vector_store_id: string }
        | undefined;
      return row?.vector_store_id || undefined;
    },

    listProjects(activeOnly) {
      const rows = (activeOnly ? listActiveStmt : listAllStmt).all() as ProjectRow[];
      return rows.map(rowToProject);
    },

    addDocument(projectId, remoteDocumentId, filename, fingerprint) {
      const row: FileRow = {
        project_id: projectId,
        file_id: remoteDocumentId,
        filename,
        sha256: fingerprint,
        added_at: now(),
      };
      upsertFileStmt.run(row);
      return rowToDocument(row);
    },

    removeDocument(projectId, remoteDocumentId) {
      const result = deleteFileStmt.run({
        project_id: projectId,
        file_id: remoteDocumentId,
      });
      return result.changes > 0;
    },

    listDocuments(projectId) {
      const rows = listFilesStmt.all({ project_id: projectId }) as FileRow[];
      return rows.map(rowToDocument);
    },

    hasFingerprint(projectId, fingerprint) {
      return (
        hasShaStmt.get({ project_id: projectId, sha256: fingerprint }) !==
        undefined
      );
    },

    beginOperation(kind, projectId, detail) {
      const operationId = randomUUID();
      insertOperationStmt.run({
        operation_id: operationId,
        kind,
        project_id: projectId,
        detail: JSON.stringify(detail),
        ts: now(),
      });
      return operationId;
    },

    updateOperation(operationId, patch) {
      const row = getOperationStmt.get({ operation_id: operationId }) as
        | OperationRow
        | undefined;
      if (!row) {
        throw new NotFoundError(`Pending operation not found: ${operationId}`, {
          operationId,
        });
      }
      updateOperationStmt.run({
        operation_id: operationId,
        project_id: patch.projectId ?? row.project_id,
        detail: JSON.stringify({ ...parseDetail(row.detail), ...patch.detail }),
        ts: now(),
      });
    },

    completeOperation(operationId) {
      return deleteOperationStmt.run({ operation_id: operationId }).changes > 0;
    },

    listPendingOperations(projectId) {
      const rows = (
        projectId === undefined
          ? listOperationsStmt.all()
          : listOperationsByProjectStmt.all({ project_id: projectId })
      ) as OperationRow[];
      return rows.flatMap((row) => {
        const op = rowToOperation(row);
        return op ? [op] : [];
      });
    },

    close() {
      db.close();
    },
  };
}
