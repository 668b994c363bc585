// YYYY-MM-DD[(T| )hh:mm[:ss[.fff]]][Z|±hh:mm|±hhmm]
const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?(Z|z|[+-]\d{2}:?\d{2})?)?$/

/**
 * Parses the ISO-8601 timestamps the scanner writes into `meta.scan_ts`.
 * A value without an offset is read as UTC. Returns undefined for anything
 * that is not a real calendar instant.
 */
export function parseScanTimestamp(value: string): Date | undefined {
  const m = ISO_PATTERN.exec(value.trim())
  if (!m) return undefined

  const year = Number(m[1])
  const month = Number(m[2])
  const day = Number(m[3])
  const hour = Number(m[4] ?? '0')
  const minute = Number(m[5] ?? '0')
  const second = Number(m[6] ?? '0')
  const millis = m[7] ? Math.floor(Number(`0.${m[7]}`) * 1000) : 0

  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) return undefined

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis)
  const probe = new Date(Date.UTC(year, month - 1, day))
  // Date.UTC rolls Feb 30 over into March
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) return undefined

  const offsetMinutes = parseOffset(m[8])
  if (offsetMinutes === undefined) return undefined
  return new Date(utc - offsetMinutes * 60_000)
}

function parseOffset(raw: string | undefined): number | undefined {
  if (!raw || raw === 'Z' || raw === 'z') return 0
  const sign = raw.startsWith('-') ? -1 : 1
  const digits = raw.slice(1).replace(':', '')
  const hours = Number(digits.slice(0, 2))
  const minutes = Number(digits.slice(2, 4))
  if (hours > 23 || minutes > 59) return undefined
  return sign * (hours * 60 + minutes)
}
