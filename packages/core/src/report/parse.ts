import { z } from 'zod'
import { ValidationError, type ValidationIssue } from '../errors.js'
import type { RuntimeEntry, ScanReport } from '../types.js'
import { parseScanTimestamp } from './timestamp.js'

const count = z.number().int().nonnegative()

const scanTimestamp = z.string().transform((value, ctx) => {
  const parsed = parseScanTimestamp(value)
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid ISO-8601 timestamp: ${value}` })
    return z.NEVER
  }
  return parsed.toISOString()
})

const runtimeSchema = z.object({
  java_executable: z.string().min(1),
  java_runtime: z.string().nullish(),
  java_vendor: z.string().nullish(),
  is_oracle: z.boolean().nullish(),
  java_version: z.string().nullish(),
  java_version_major: z.number().int().nullish(),
  java_version_update: z.number().int().nullish(),
  require_license: z.boolean().nullish()
})

const metaSchema = z.object({
  scan_ts: scanTimestamp,
  // Stored exactly as reported; lookups match the raw name.
  computer_name: z.string().regex(/\S/, 'computer_name must not be blank'),
  user_name: z.string(),
  scan_duration: z.string(),
  has_oracle_jdk: z.boolean(),
  count_result: count,
  count_require_license: count,
  scanned_dirs: count,
  scan_path: z.string(),
  platform_info: z.string().nullish()
})

// Older scanners emit the runtime list under `result`.
const reportSchema = z.object({
  meta: metaSchema,
  runtimes: z.array(runtimeSchema).optional(),
  result: z.array(runtimeSchema).optional()
})

export type ScanReportInput = z.input<typeof reportSchema>
export type RuntimeInput = z.input<typeof runtimeSchema>

export function parseReport(input: unknown): ScanReport {
  const parsed = reportSchema.safeParse(input)
  if (!parsed.success) {
    const issues = toIssues(parsed.error)
    throw new ValidationError(`invalid scan report: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`, issues)
  }
  const { meta, runtimes, result } = parsed.data
  return {
    meta: {
      scanTs: meta.scan_ts,
      computerName: meta.computer_name,
      userName: meta.user_name,
      scanDuration: meta.scan_duration,
      hasOracleJdk: meta.has_oracle_jdk,
      countResult: meta.count_result,
      countRequireLicense: meta.count_require_license,
      scannedDirs: meta.scanned_dirs,
      scanPath: meta.scan_path,
      platformInfo: meta.platform_info ?? null
    },
    runtimes: (runtimes ?? result ?? []).map(toRuntimeEntry)
  }
}

function toRuntimeEntry(r: z.output<typeof runtimeSchema>): RuntimeEntry {
  return {
    javaExecutable: r.java_executable,
    javaRuntime: r.java_runtime ?? null,
    javaVendor: r.java_vendor ?? null,
    isOracle: r.is_oracle ?? null,
    javaVersion: r.java_version ?? null,
    javaVersionMajor: r.java_version_major ?? null,
    javaVersionUpdate: r.java_version_update ?? null,
    requireLicense: r.require_license ?? null
  }
}

export function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message
  }))
}
