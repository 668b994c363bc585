import type Database from 'better-sqlite3'

/**
 * scan_info: one row per submitted report. most_recent marks the host's
 * current snapshot; the partial unique index allows at most one per host.
 *
 * java_info: runtimes found by a scan, removed together with their scan.
 */
const STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS scan_info (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    scan_ts TEXT NOT NULL,
    computer_name TEXT NOT NULL,
    user_name TEXT NOT NULL,
    scan_duration TEXT NOT NULL,
    has_oracle_jdk INTEGER NOT NULL,
    count_result INTEGER NOT NULL,
    count_require_license INTEGER NOT NULL,
    scanned_dirs INTEGER NOT NULL,
    scan_path TEXT NOT NULL,
    platform_info TEXT,
    most_recent INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS ix_scan_info_host_ts ON scan_info (computer_name, scan_ts DESC)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS ux_scan_info_current ON scan_info (computer_name) WHERE most_recent = 1`,
  `CREATE TABLE IF NOT EXISTS java_info (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    scan_id INTEGER NOT NULL REFERENCES scan_info (id) ON DELETE CASCADE,
    computer_name TEXT NOT NULL,
    java_executable TEXT NOT NULL,
    java_runtime TEXT,
    java_vendor TEXT,
    is_oracle INTEGER,
    java_version TEXT,
    java_version_major INTEGER,
    java_version_update INTEGER,
    require_license INTEGER,
    created_at TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS ix_java_info_scan ON java_info (scan_id)`,
  `CREATE INDEX IF NOT EXISTS ix_java_info_oracle ON java_info (scan_id) WHERE is_oracle = 1`
]

export function createSchema(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of STATEMENTS) db.exec(sql)
  })()
}
