import { describe, it, expect } from 'vitest'
import { evaluateLicenseRequirement, licenseRequirementToWire } from '../src/licenses/requirement.js'
import type { RuntimeEntry } from '../src/types.js'

const runtime = (requireLicense: boolean | null): RuntimeEntry => ({
  javaExecutable: '/usr/bin/java',
  javaRuntime: null,
  javaVendor: null,
  isOracle: null,
  javaVersion: null,
  javaVersionMajor: null,
  javaVersionUpdate: null,
  requireLicense
})

describe('evaluateLicenseRequirement', () => {
  it('is unknown when the host was never scanned', () => {
    expect(evaluateLicenseRequirement(undefined)).toBe('unknown')
  })

  it('is not-required for a scan without runtimes', () => {
    expect(evaluateLicenseRequirement([])).toBe('not-required')
  })

  it('is required when any runtime needs a license', () => {
    expect(evaluateLicenseRequirement([runtime(false), runtime(true)])).toBe('required')
  })

  it('does not count unknown license flags as required', () => {
    expect(evaluateLicenseRequirement([runtime(null), runtime(false)])).toBe('not-required')
  })
})

describe('licenseRequirementToWire', () => {
  it('uses the string tri-state of the scanner API', () => {
    expect(licenseRequirementToWire('required')).toBe('true')
    expect(licenseRequirementToWire('not-required')).toBe('false')
    expect(licenseRequirementToWire('unknown')).toBe('unknown')
  })
})
