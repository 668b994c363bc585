import type { Logger } from 'pino'
import {
  ConflictError,
  parseReport,
  type HistorySelection,
  type ID,
  type RuntimeRecord,
  type ScanSnapshot
} from '@jfind/core'
import type { ScanRepository } from '../types.js'

type StoredScan = Omit<ScanSnapshot, 'runtimes'>

// Negative limits mean no limit, as with SQLite's LIMIT.
const take = <T>(list: T[], limit: number) => (limit < 0 ? list : list.slice(0, limit))

const byScanTsDesc = (a: StoredScan, b: StoredScan) =>
  a.scanTs < b.scanTs ? 1 : a.scanTs > b.scanTs ? -1 : b.id - a.id

/**
 * In-process repository used by tests and by `STORE=memory`. State is lost on exit.
 */
export class MemoryScanRepository implements ScanRepository {
  scans: StoredScan[] = []
  runtimes: RuntimeRecord[] = []
  private nextScanId = 1
  private nextRuntimeId = 1
  private readonly log?: Logger

  constructor(logger?: Logger) {
    this.log = logger?.child({ module: 'scan-repository', store: 'memory' })
  }

  async submit(input: unknown): Promise<ScanSnapshot> {
    const report = parseReport(input)
    const { meta } = report
    const createdAt = new Date().toISOString()

    // No await between the flag flip and the inserts: the event loop cannot interleave another submit.
    for (const s of this.scans) {
      if (s.computerName === meta.computerName && s.mostRecent) s.mostRecent = false
    }
    const scan: StoredScan = { ...meta, id: this.nextScanId++, mostRecent: true, createdAt }
    this.scans.push(scan)
    this.runtimes.push(...report.runtimes.map(r => ({
      ...r,
      id: this.nextRuntimeId++,
      scanId: scan.id,
      computerName: meta.computerName,
      createdAt
    })))

    this.log?.info({ computerName: meta.computerName, scanId: scan.id, runtimes: report.runtimes.length }, 'scan stored')
    return this.hydrate(scan)
  }

  async fetchById(id: ID): Promise<ScanSnapshot | undefined> {
    const scan = this.scans.find(s => s.id === id)
    return scan ? this.hydrate(scan) : undefined
  }

  async fetchCurrent(computerName: string): Promise<ScanSnapshot | undefined> {
    const current = this.scans.filter(s => s.computerName === computerName && s.mostRecent)
    if (current.length > 1) {
      throw new ConflictError(computerName, `host ${computerName} has ${current.length} current scans`)
    }
    return current.length ? this.hydrate(current[0]) : undefined
  }

  async fetchHistory(computerName: string, selection: HistorySelection): Promise<ScanSnapshot[]> {
    if (selection.kind === 'current') {
      const current = await this.fetchCurrent(computerName)
      return current ? [current] : []
    }
    const list = this.scans.filter(s => s.computerName === computerName).sort(byScanTsDesc)
    const picked = selection.kind === 'recent' ? take(list, selection.count) : list
    return picked.map(s => this.hydrate(s))
  }

  async fetchLatestFleet(limit: number): Promise<ScanSnapshot[]> {
    const current = this.scans.filter(s => s.mostRecent).sort(byScanTsDesc)
    return take(current, limit).map(s => this.hydrate(s))
  }

  async fetchOracleRuntimes(limit: number): Promise<RuntimeRecord[]> {
    const owners = this.scans.filter(s => s.mostRecent).sort(byScanTsDesc)
    const out: RuntimeRecord[] = []
    for (const owner of owners) {
      for (const r of this.runtimes) {
        if (r.scanId === owner.id && r.isOracle === true) out.push({ ...r })
      }
    }
    return take(out, limit)
  }

  async close(): Promise<void> {}

  private hydrate(scan: StoredScan): ScanSnapshot {
    return {
      ...scan,
      runtimes: this.runtimes.filter(r => r.scanId === scan.id).map(r => ({ ...r }))
    }
  }
}
