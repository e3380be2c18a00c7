import Database from 'better-sqlite3'

const CREATE_TABLES_SQL = [
  `CREATE TABLE IF NOT EXISTS projects (
  project_id TEXT PRIMARY KEY,
  project_name TEXT NOT NULL,
  vector_store_id TEXT NOT NULL UNIQUE,
  status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'archived')),
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)`,
  `CREATE TABLE IF NOT EXISTS project_files (
  project_id TEXT NOT NULL,
  file_id TEXT NOT NULL,
  filename TEXT NOT NULL,
  sha256 TEXT,
  added_at TEXT NOT NULL,
  PRIMARY KEY (project_id, file_id)
)`,
  `CREATE TABLE IF NOT EXISTS pending_operations (
  operation_id TEXT PRIMARY KEY,
  kind TEXT NOT NULL,
  project_id TEXT,
  detail TEXT NOT NULL DEFAULT '{}',
  started_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)`,
]

const CREATE_INDEXES_SQL = [
  'CREATE INDEX IF NOT EXISTS idx_project_files_project ON project_files (project_id)',
  'CREATE INDEX IF NOT EXISTS idx_project_files_sha256 ON project_files (sha256)',
  'CREATE INDEX IF NOT EXISTS idx_pending_operations_project ON pending_operations (project_id)',
]

/** Open/create the catalog database, create tables if missing, set WAL mode */
export function initializeCatalogDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath)

  db.pragma('journal_mode = WAL')

  for (const sql of CREATE_TABLES_SQL) {
    db.exec(sql)
  }
  for (const sql of CREATE_INDEXES_SQL) {
    db.exec(sql)
  }

  return db
}
