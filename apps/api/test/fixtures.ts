import Database from 'better-sqlite3'
import pino from 'pino'
import type { RuntimeInput, ScanReportInput } from '@jfind/core'
import { SqliteScanRepository } from '../src/persistence/sqlite.js'
import { MemoryScanRepository } from '../src/store/memory.js'
import type { ScanRepository } from '../src/types.js'

export const silentLogger = pino({ level: 'silent' })

export const oracle8: RuntimeInput = {
  java_executable: '/opt/jdk1.8.0_401/bin/java',
  java_runtime: 'Java(TM) SE Runtime Environment',
  java_vendor: 'Oracle Corporation',
  is_oracle: true,
  java_version: '1.8.0_401',
  java_version_major: 8,
  java_version_update: 401,
  require_license: true
}

export const temurin17: RuntimeInput = {
  java_executable: '/opt/temurin-17/bin/java',
  java_runtime: 'OpenJDK Runtime Environment',
  java_vendor: 'Eclipse Adoptium',
  is_oracle: false,
  java_version: '17.0.10',
  java_version_major: 17,
  java_version_update: 10,
  require_license: false
}

export function makeReport(computerName: string, scanTs: string, runtimes: RuntimeInput[] = []): ScanReportInput {
  return {
    meta: {
      scan_ts: scanTs,
      computer_name: computerName,
      user_name: 'svc-scan',
      scan_duration: '1.5s',
      has_oracle_jdk: runtimes.some(r => r.is_oracle === true),
      count_result: runtimes.length,
      count_require_license: runtimes.filter(r => r.require_license === true).length,
      scanned_dirs: 42,
      scan_path: '/',
      platform_info: 'linux/amd64'
    },
    runtimes
  }
}

export const repositoryFactories: Array<[string, () => ScanRepository]> = [
  ['sqlite', () => new SqliteScanRepository(new Database(':memory:'), silentLogger)],
  ['memory', () => new MemoryScanRepository(silentLogger)]
]
