import type { LicenseRequirement, RuntimeEntry } from '../types.js'

export function evaluateLicenseRequirement(runtimes: readonly RuntimeEntry[] | undefined): LicenseRequirement {
  if (!runtimes) return 'unknown'
  return runtimes.some(r => r.requireLicense === true) ? 'required' : 'not-required'
}

const WIRE: Record<LicenseRequirement, 'true' | 'false' | 'unknown'> = {
  'required': 'true',
  'not-required': 'false',
  'unknown': 'unknown'
}

// The scanner-facing API reports the tri-state as strings.
export function licenseRequirementToWire(value: LicenseRequirement): 'true' | 'false' | 'unknown' {
  return WIRE[value]
}
