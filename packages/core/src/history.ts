import { ValidationError } from './errors.js'
import type { HistorySelection } from './types.js'

/**
 * Maps the signed `limit` query parameter onto a history selection:
 * negative = all, zero = current only, positive = that many newest.
 */
export function historySelectionFromLimit(limit: number): HistorySelection {
  if (!Number.isSafeInteger(limit)) {
    throw new ValidationError(`limit must be an integer, got ${limit}`, [{ path: 'limit', message: 'expected an integer' }])
  }
  if (limit < 0) return { kind: 'all' }
  if (limit === 0) return { kind: 'current' }
  return { kind: 'recent', count: limit }
}
