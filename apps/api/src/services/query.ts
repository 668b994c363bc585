import {
  NotFoundError,
  evaluateLicenseRequirement,
  historySelectionFromLimit,
  type ID,
  type LicenseRequirement,
  type RuntimeRecord,
  type ScanSnapshot
} from '@jfind/core'
import type { ScanQuery, ScanRepository } from '../types.js'

/**
 * Read side of the service. Every call goes to the repository; nothing is cached,
 * so a query issued after a submit completes sees that submit.
 */
export class QueryService {
  constructor(private readonly repository: ScanRepository) {}

  async getScan(id: ID): Promise<ScanSnapshot> {
    const scan = await this.repository.fetchById(id)
    if (!scan) throw new NotFoundError(`Scan with ID ${id} not found`)
    return scan
  }

  async findScans(query: ScanQuery): Promise<ScanSnapshot[]> {
    switch (query.kind) {
      case 'id':
        return [await this.getScan(query.id)]
      case 'host':
        return this.history(query.computerName, query.limit)
      case 'latest':
        return this.latestFleet(query.limit)
    }
  }

  currentScan(computerName: string): Promise<ScanSnapshot | undefined> {
    return this.repository.fetchCurrent(computerName)
  }

  history(computerName: string, limit: number): Promise<ScanSnapshot[]> {
    return this.repository.fetchHistory(computerName, historySelectionFromLimit(limit))
  }

  latestFleet(limit: number): Promise<ScanSnapshot[]> {
    return this.repository.fetchLatestFleet(limit)
  }

  oracleRuntimes(limit: number): Promise<RuntimeRecord[]> {
    return this.repository.fetchOracleRuntimes(limit)
  }

  async checkLicenseRequirement(computerName: string): Promise<LicenseRequirement> {
    // Only reached on a miss: rows written before the current flag existed fall back to their newest scan.
    const scan = (await this.repository.fetchCurrent(computerName))
      ?? (await this.repository.fetchHistory(computerName, { kind: 'recent', count: 1 }))[0]
    return evaluateLicenseRequirement(scan?.runtimes)
  }
}
