export type ID = number

export interface ScanMeta {
  scanTs: string
  computerName: string
  userName: string
  scanDuration: string
  hasOracleJdk: boolean
  countResult: number
  countRequireLicense: number
  scannedDirs: number
  scanPath: string
  platformInfo: string | null
}

export interface RuntimeEntry {
  javaExecutable: string
  javaRuntime: string | null
  javaVendor: string | null
  isOracle: boolean | null
  javaVersion: string | null
  javaVersionMajor: number | null
  javaVersionUpdate: number | null
  requireLicense: boolean | null
}

// A validated report, ready to be written. scanTs is normalized UTC ISO-8601.
export interface ScanReport {
  meta: ScanMeta
  runtimes: RuntimeEntry[]
}

export interface RuntimeRecord extends RuntimeEntry {
  id: ID
  scanId: ID
  computerName: string
  createdAt: string
}

export interface ScanSnapshot extends ScanMeta {
  id: ID
  mostRecent: boolean
  createdAt: string
  runtimes: RuntimeRecord[]
}

/**
 * Which snapshots of one host a history query returns.
 *
 * - `all`: every snapshot, newest scan first
 * - `current`: only the snapshot flagged as current (zero or one)
 * - `recent`: the `count` newest snapshots by scan timestamp, current or not
 */
export type HistorySelection =
  | { kind: 'all' }
  | { kind: 'current' }
  | { kind: 'recent'; count: number }

export type LicenseRequirement = 'required' | 'not-required' | 'unknown'
