export type ProjectStatus = 'active' | 'archived'

export interface Project {
  projectId: string
  projectName: string
  remoteIndexId: string // bound at creation, never rebound
  status: ProjectStatus
  createdAt: string // ISO 8601
  updatedAt: string // ISO 8601
}

export interface ProjectDocument {
  projectId: string
  remoteDocumentId: string
  filename: string
  contentFingerprint: string | null // null when learned from the remote side
  addedAt: string // ISO 8601
}

export type PendingOperationKind =
  | 'create_project'
  | 'add_document'
  | 'remove_document'

/**
 * Marker for a multi-step action spanning the remote index and the catalog.
 * Written before the first remote call, removed after the last local write.
 */
export interface PendingOperation {
  operationId: string
  kind: PendingOperationKind
  projectId: string | null
  detail: Record<string, unknown>
  startedAt: string
  updatedAt: string
}
