export * from './types.js'
export * from './errors.js'
export { parseScanTimestamp } from './report/timestamp.js'
export { parseReport, toIssues, type ScanReportInput, type RuntimeInput } from './report/parse.js'
export { historySelectionFromLimit } from './history.js'
export { evaluateLicenseRequirement, licenseRequirementToWire } from './licenses/requirement.js'
