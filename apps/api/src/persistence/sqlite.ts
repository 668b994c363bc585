import Database from 'better-sqlite3'
import type { Logger } from 'pino'
import {
  ConflictError,
  StorageUnavailableError,
  parseReport,
  type HistorySelection,
  type ID,
  type RuntimeRecord,
  type ScanReport,
  type ScanSnapshot
} from '@jfind/core'
import type { ScanRepository } from '../types.js'
import { createSchema } from './schema.js'

interface ScanRow {
  id: number
  scan_ts: string
  computer_name: string
  user_name: string
  scan_duration: string
  has_oracle_jdk: number
  count_result: number
  count_require_license: number
  scanned_dirs: number
  scan_path: string
  platform_info: string | null
  most_recent: number
  created_at: string
}

interface RuntimeRow {
  id: number
  scan_id: number
  computer_name: string
  java_executable: string
  java_runtime: string | null
  java_vendor: string | null
  is_oracle: number | null
  java_version: string | null
  java_version_major: number | null
  java_version_update: number | null
  require_license: number | null
  created_at: string
}

type ScanInsert = Omit<ScanRow, 'id' | 'most_recent'>
type RuntimeInsert = Omit<RuntimeRow, 'id'>

const SCAN_ORDER = 'ORDER BY scan_ts DESC, id DESC'

export interface SqliteOptions {
  file: string
  logger: Logger
  /** How long a writer waits for another connection's lock before failing. Defaults to 5000. */
  busyTimeoutMs?: number
}

export class SqliteScanRepository implements ScanRepository {
  private readonly db: Database.Database
  private readonly log: Logger

  private readonly clearCurrent: Database.Statement<[string]>
  private readonly insertScan: Database.Statement<[ScanInsert]>
  private readonly insertRuntime: Database.Statement<[RuntimeInsert]>
  private readonly selectById: Database.Statement<[number], ScanRow>
  private readonly selectCurrent: Database.Statement<[string], ScanRow>
  private readonly selectAllForHost: Database.Statement<[string], ScanRow>
  private readonly selectRecentForHost: Database.Statement<[string, number], ScanRow>
  private readonly selectFleet: Database.Statement<[number], ScanRow>
  private readonly selectRuntimes: Database.Statement<[string], RuntimeRow>
  private readonly selectOracle: Database.Statement<[number], RuntimeRow>
  private readonly writeReport: Database.Transaction<(report: ScanReport, createdAt: string) => number>

  constructor(db: Database.Database, logger: Logger) {
    this.db = db
    this.log = logger.child({ module: 'scan-repository', store: 'sqlite' })
    db.pragma('foreign_keys = ON')
    createSchema(db)

    this.clearCurrent = db.prepare<[string]>('UPDATE scan_info SET most_recent = 0 WHERE computer_name = ? AND most_recent = 1')
    this.insertScan = db.prepare<ScanInsert>(`
      INSERT INTO scan_info (scan_ts, computer_name, user_name, scan_duration, has_oracle_jdk, count_result,
        count_require_license, scanned_dirs, scan_path, platform_info, most_recent, created_at)
      VALUES (@scan_ts, @computer_name, @user_name, @scan_duration, @has_oracle_jdk, @count_result,
        @count_require_license, @scanned_dirs, @scan_path, @platform_info, 1, @created_at)
    `)
    this.insertRuntime = db.prepare<RuntimeInsert>(`
      INSERT INTO java_info (scan_id, computer_name, java_executable, java_runtime, java_vendor, is_oracle,
        java_version, java_version_major, java_version_update, require_license, created_at)
      VALUES (@scan_id, @computer_name, @java_executable, @java_runtime, @java_vendor, @is_oracle,
        @java_version, @java_version_major, @java_version_update, @require_license, @created_at)
    `)
    this.selectById = db.prepare<[number], ScanRow>('SELECT * FROM scan_info WHERE id = ?')
    this.selectCurrent = db.prepare<[string], ScanRow>('SELECT * FROM scan_info WHERE computer_name = ? AND most_recent = 1')
    this.selectAllForHost = db.prepare<[string], ScanRow>(`SELECT * FROM scan_info WHERE computer_name = ? ${SCAN_ORDER}`)
    this.selectRecentForHost = db.prepare<[string, number], ScanRow>(`SELECT * FROM scan_info WHERE computer_name = ? ${SCAN_ORDER} LIMIT ?`)
    this.selectFleet = db.prepare<[number], ScanRow>(`SELECT * FROM scan_info WHERE most_recent = 1 ${SCAN_ORDER} LIMIT ?`)
    this.selectRuntimes = db.prepare<[string], RuntimeRow>(
      'SELECT * FROM java_info WHERE scan_id IN (SELECT value FROM json_each(?)) ORDER BY scan_id, id'
    )
    this.selectOracle = db.prepare<[number], RuntimeRow>(`
      SELECT j.* FROM java_info j
      JOIN scan_info s ON s.id = j.scan_id
      WHERE j.is_oracle = 1 AND s.most_recent = 1
      ORDER BY s.scan_ts DESC, s.id DESC, j.id ASC
      LIMIT ?
    `)

    this.writeReport = db.transaction((report: ScanReport, createdAt: string) => {
      const { meta } = report
      this.clearCurrent.run(meta.computerName)
      const info = this.insertScan.run({
        scan_ts: meta.scanTs,
        computer_name: meta.computerName,
        user_name: meta.userName,
        scan_duration: meta.scanDuration,
        has_oracle_jdk: flag(meta.hasOracleJdk),
        count_result: meta.countResult,
        count_require_license: meta.countRequireLicense,
        scanned_dirs: meta.scannedDirs,
        scan_path: meta.scanPath,
        platform_info: meta.platformInfo,
        created_at: createdAt
      })
      const scanId = Number(info.lastInsertRowid)
      for (const r of report.runtimes) {
        this.insertRuntime.run({
          scan_id: scanId,
          computer_name: meta.computerName,
          java_executable: r.javaExecutable,
          java_runtime: r.javaRuntime,
          java_vendor: r.javaVendor,
          is_oracle: optionalFlag(r.isOracle),
          java_version: r.javaVersion,
          java_version_major: r.javaVersionMajor,
          java_version_update: r.javaVersionUpdate,
          require_license: optionalFlag(r.requireLicense),
          created_at: createdAt
        })
      }
      return scanId
    })
  }

  static open(options: SqliteOptions): SqliteScanRepository {
    const db = new Database(options.file, { timeout: options.busyTimeoutMs ?? 5000 })
    db.pragma('journal_mode = WAL')
    return new SqliteScanRepository(db, options.logger)
  }

  async submit(input: unknown): Promise<ScanSnapshot> {
    const report = parseReport(input)
    const { computerName } = report.meta
    // IMMEDIATE takes the write lock before the flag flip is read, so writers for a host queue up
    const id = this.guard('submit', computerName, () => this.writeReport.immediate(report, new Date().toISOString()))
    this.log.info({ computerName, scanId: id, runtimes: report.runtimes.length }, 'scan stored')

    const stored = await this.fetchById(id)
    if (!stored) throw new ConflictError(computerName, `scan ${id} vanished after commit`)
    return stored
  }

  async fetchById(id: ID): Promise<ScanSnapshot | undefined> {
    return this.guard('fetchById', undefined, () => {
      const row = this.selectById.get(id)
      return row ? this.withRuntimes([row])[0] : undefined
    })
  }

  async fetchCurrent(computerName: string): Promise<ScanSnapshot | undefined> {
    return this.guard('fetchCurrent', computerName, () => {
      const rows = this.selectCurrent.all(computerName)
      if (rows.length > 1) {
        throw new ConflictError(computerName, `host ${computerName} has ${rows.length} current scans`)
      }
      return this.withRuntimes(rows)[0]
    })
  }

  async fetchHistory(computerName: string, selection: HistorySelection): Promise<ScanSnapshot[]> {
    switch (selection.kind) {
      case 'current': {
        const current = await this.fetchCurrent(computerName)
        return current ? [current] : []
      }
      case 'all':
        return this.guard('fetchHistory', computerName, () => this.withRuntimes(this.selectAllForHost.all(computerName)))
      case 'recent':
        return this.guard('fetchHistory', computerName, () =>
          this.withRuntimes(this.selectRecentForHost.all(computerName, selection.count)))
    }
  }

  async fetchLatestFleet(limit: number): Promise<ScanSnapshot[]> {
    return this.guard('fetchLatestFleet', undefined, () => this.withRuntimes(this.selectFleet.all(limit)))
  }

  async fetchOracleRuntimes(limit: number): Promise<RuntimeRecord[]> {
    return this.guard('fetchOracleRuntimes', undefined, () => this.selectOracle.all(limit).map(toRuntimeRecord))
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close()
  }

  private withRuntimes(rows: ScanRow[]): ScanSnapshot[] {
    if (!rows.length) return []
    const byScan = new Map<number, RuntimeRecord[]>()
    for (const r of this.selectRuntimes.all(JSON.stringify(rows.map(row => row.id)))) {
      const list = byScan.get(r.scan_id) ?? []
      list.push(toRuntimeRecord(r))
      byScan.set(r.scan_id, list)
    }
    return rows.map(row => toSnapshot(row, byScan.get(row.id) ?? []))
  }

  private guard<T>(operation: string, computerName: string | undefined, fn: () => T): T {
    try {
      return fn()
    } catch (err) {
      if (err instanceof Database.SqliteError) {
        if (computerName && err.code.startsWith('SQLITE_CONSTRAINT_UNIQUE')) {
          this.log.error({ err, operation, computerName }, 'current-scan uniqueness violated')
          throw new ConflictError(computerName, `concurrent write left ${computerName} with two current scans`, { cause: err })
        }
      } else if (this.db.open) {
        throw err
      }
      this.log.error({ err, operation, computerName }, 'storage operation failed')
      throw new StorageUnavailableError(operation, err)
    }
  }
}

function flag(value: boolean): number {
  return value ? 1 : 0
}

function optionalFlag(value: boolean | null): number | null {
  return value === null ? null : flag(value)
}

function optionalBool(value: number | null): boolean | null {
  return value === null ? null : value !== 0
}

function toRuntimeRecord(r: RuntimeRow): RuntimeRecord {
  return {
    id: r.id,
    scanId: r.scan_id,
    computerName: r.computer_name,
    javaExecutable: r.java_executable,
    javaRuntime: r.java_runtime,
    javaVendor: r.java_vendor,
    isOracle: optionalBool(r.is_oracle),
    javaVersion: r.java_version,
    javaVersionMajor: r.java_version_major,
    javaVersionUpdate: r.java_version_update,
    requireLicense: optionalBool(r.require_license),
    createdAt: r.created_at
  }
}

function toSnapshot(row: ScanRow, runtimes: RuntimeRecord[]): ScanSnapshot {
  return {
    id: row.id,
    scanTs: row.scan_ts,
    computerName: row.computer_name,
    userName: row.user_name,
    scanDuration: row.scan_duration,
    hasOracleJdk: row.has_oracle_jdk !== 0,
    countResult: row.count_result,
    countRequireLicense: row.count_require_license,
    scannedDirs: row.scanned_dirs,
    scanPath: row.scan_path,
    platformInfo: row.platform_info,
    mostRecent: row.most_recent !== 0,
    createdAt: row.created_at,
    runtimes
  }
}
