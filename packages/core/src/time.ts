const DAY_MS = 24 * 60 * 60 * 1000

// ISO strings without a zone designator are read as UTC, never as local time
const HAS_ZONE = /(?:Z|[+-]\d{2}:?\d{2})$/i
// `2024-06-01 10:00:00` is the same instant as `2024-06-01T10:00:00`
const SPACE_SEPARATOR = /^(\d{4}-\d{2}-\d{2}) +(?=\d)/

export function toUtcDate(value: Date | string | number): Date {
  if (value instanceof Date) return new Date(value.getTime())
  if (typeof value === 'number') return new Date(value)
  const text = value.trim().replace(SPACE_SEPARATOR, '$1T')
  const withZone = text.includes('T') && !HAS_ZONE.test(text) ? `${text}Z` : text
  const d = new Date(withZone)
  if (Number.isNaN(d.getTime())) throw new RangeError(`invalid timestamp: ${value}`)
  return d
}

export function addDays(time: Date, days: number): Date {
  return new Date(time.getTime() + days * DAY_MS)
}

export function laterOf(a: Date | null, b: Date): Date {
  return a && a.getTime() >= b.getTime() ? a : b
}
