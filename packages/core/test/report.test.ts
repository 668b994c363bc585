import { describe, it, expect } from 'vitest'
import { parseReport, type ScanReportInput } from '../src/report/parse.js'
import { ValidationError } from '../src/errors.js'

function report(): ScanReportInput {
  return {
    meta: {
      scan_ts: '2024-06-01T12:00:00+02:00',
      computer_name: 'build-01',
      user_name: 'svc-scan',
      scan_duration: '3.2s',
      has_oracle_jdk: true,
      count_result: 2,
      count_require_license: 1,
      scanned_dirs: 120,
      scan_path: '/opt',
      platform_info: 'linux/amd64'
    },
    runtimes: [
      {
        java_executable: '/opt/jdk8/bin/java',
        java_runtime: 'Java(TM) SE Runtime Environment',
        java_vendor: 'Oracle Corporation',
        is_oracle: true,
        java_version: '1.8.0_401',
        java_version_major: 8,
        java_version_update: 401,
        require_license: true
      },
      { java_executable: '/opt/temurin-17/bin/java' }
    ]
  }
}

function issuesOf(input: unknown): string[] {
  try {
    parseReport(input)
  } catch (err) {
    if (err instanceof ValidationError) return err.issues.map(i => i.path)
    throw err
  }
  throw new Error('expected a ValidationError')
}

describe('parseReport', () => {
  it('maps the scanner payload onto a typed report', () => {
    const parsed = parseReport(report())
    expect(parsed.meta).toEqual({
      scanTs: '2024-06-01T10:00:00.000Z',
      computerName: 'build-01',
      userName: 'svc-scan',
      scanDuration: '3.2s',
      hasOracleJdk: true,
      countResult: 2,
      countRequireLicense: 1,
      scannedDirs: 120,
      scanPath: '/opt',
      platformInfo: 'linux/amd64'
    })
    expect(parsed.runtimes).toHaveLength(2)
    expect(parsed.runtimes[0].javaVersionUpdate).toBe(401)
  })

  it('fills omitted runtime fields with null', () => {
    const parsed = parseReport(report())
    expect(parsed.runtimes[1]).toEqual({
      javaExecutable: '/opt/temurin-17/bin/java',
      javaRuntime: null,
      javaVendor: null,
      isOracle: null,
      javaVersion: null,
      javaVersionMajor: null,
      javaVersionUpdate: null,
      requireLicense: null
    })
  })

  it('accepts a missing platform_info', () => {
    const input = report()
    delete input.meta.platform_info
    expect(parseReport(input).meta.platformInfo).toBeNull()
  })

  it('reads runtimes from the legacy result key', () => {
    const { runtimes, ...rest } = report()
    const parsed = parseReport({ ...rest, result: runtimes })
    expect(parsed.runtimes.map(r => r.javaExecutable)).toEqual(['/opt/jdk8/bin/java', '/opt/temurin-17/bin/java'])
  })

  it('treats a report without runtime list as empty', () => {
    const { meta } = report()
    expect(parseReport({ meta }).runtimes).toEqual([])
  })

  it('ignores fields it does not know', () => {
    const input = report()
    const parsed = parseReport({ ...input, runtimes: [{ java_executable: '/usr/bin/java', exec_failed: true }] })
    expect(parsed.runtimes[0].javaExecutable).toBe('/usr/bin/java')
  })

  it('rejects a report without a host name', () => {
    const input = report()
    input.meta.computer_name = '  '
    expect(issuesOf(input)).toEqual(['meta.computer_name'])
  })

  it('keeps the host name exactly as reported', () => {
    const input = report()
    input.meta.computer_name = 'build-01 '
    expect(parseReport(input).meta.computerName).toBe('build-01 ')
  })

  it('rejects an unparsable timestamp', () => {
    const input = report()
    input.meta.scan_ts = '06/01/2024 12:00'
    expect(issuesOf(input)).toEqual(['meta.scan_ts'])
  })

  it('rejects a runtime without an executable path', () => {
    const input = report()
    expect(issuesOf({ ...input, runtimes: [{ java_vendor: 'Azul Systems' }] })).toEqual(['runtimes.0.java_executable'])
  })

  it('lists every failing field', () => {
    expect(issuesOf({ meta: { computer_name: 'x' } })).toEqual([
      'meta.scan_ts',
      'meta.user_name',
      'meta.scan_duration',
      'meta.has_oracle_jdk',
      'meta.count_result',
      'meta.count_require_license',
      'meta.scanned_dirs',
      'meta.scan_path'
    ])
    expect(issuesOf(null)).toEqual(['(root)'])
  })
})
