/**
 * Journal schema, one statement per entry. Portable across SQLite and
 * PostgreSQL; both backends apply it inside a single transaction.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS runs (
  id TEXT PRIMARY KEY,
  status TEXT NOT NULL,
  files_processed INTEGER NOT NULL DEFAULT 0,
  files_failed INTEGER NOT NULL DEFAULT 0,
  files_recovered INTEGER NOT NULL DEFAULT 0,
  residual_failures INTEGER NOT NULL DEFAULT 0,
  started_at TEXT NOT NULL,
  finished_at TEXT
)`,
  `CREATE TABLE IF NOT EXISTS file_attempts (
  id TEXT PRIMARY KEY,
  run_id TEXT NOT NULL REFERENCES runs(id),
  object_key TEXT NOT NULL,
  location TEXT NOT NULL,
  location_id TEXT NOT NULL,
  year TEXT NOT NULL,
  phase TEXT NOT NULL,
  state TEXT NOT NULL,
  status TEXT NOT NULL,
  error_name TEXT,
  error_message TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)`,
  `CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status)`,
  `CREATE INDEX IF NOT EXISTS idx_file_attempts_run ON file_attempts(run_id)`,
  `CREATE INDEX IF NOT EXISTS idx_file_attempts_key ON file_attempts(object_key)`,
];
