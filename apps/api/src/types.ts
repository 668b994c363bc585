import type { HistorySelection, ID, RuntimeRecord, ScanSnapshot } from '@jfind/core'

/**
 * Persistence for scan snapshots and their runtime records.
 *
 * `submit` is the only write path. It validates the raw report, clears the
 * host's previous current snapshot and inserts the new one with its runtimes
 * as one atomic unit, so a host never has two current snapshots.
 *
 * A negative `limit` returns every match; zero returns none.
 */
export interface ScanRepository {
  submit(report: unknown): Promise<ScanSnapshot>
  fetchById(id: ID): Promise<ScanSnapshot | undefined>
  fetchCurrent(computerName: string): Promise<ScanSnapshot | undefined>
  fetchHistory(computerName: string, selection: HistorySelection): Promise<ScanSnapshot[]>
  fetchLatestFleet(limit: number): Promise<ScanSnapshot[]>
  fetchOracleRuntimes(limit: number): Promise<RuntimeRecord[]>
  close(): Promise<void>
}

export type ScanQuery =
  | { kind: 'id'; id: ID }
  | { kind: 'host'; computerName: string; limit: number }
  | { kind: 'latest'; limit: number }
