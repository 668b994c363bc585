import type { RuntimeRecord, ScanSnapshot } from '@jfind/core'

// Wire shapes use the scanner's snake_case field names.

export function toMetaResponse(scan: ScanSnapshot) {
  return {
    scan_id: scan.id,
    scan_ts: scan.scanTs,
    computer_name: scan.computerName,
    user_name: scan.userName,
    scan_duration: scan.scanDuration,
    has_oracle_jdk: scan.hasOracleJdk,
    count_result: scan.countResult,
    count_require_license: scan.countRequireLicense,
    scanned_dirs: scan.scannedDirs,
    scan_path: scan.scanPath,
    platform_info: scan.platformInfo,
    most_recent: scan.mostRecent,
    created_at: scan.createdAt
  }
}

export function toRuntimeResponse(r: RuntimeRecord) {
  return {
    java_executable: r.javaExecutable,
    java_runtime: r.javaRuntime,
    java_vendor: r.javaVendor,
    is_oracle: r.isOracle,
    java_version: r.javaVersion,
    java_version_major: r.javaVersionMajor,
    java_version_update: r.javaVersionUpdate,
    require_license: r.requireLicense
  }
}

export function toScanResponse(scan: ScanSnapshot) {
  return {
    meta: toMetaResponse(scan),
    runtimes: scan.runtimes.map(toRuntimeResponse)
  }
}
