import type { CvssVersion, DetailValue, Severity } from './types.js'

/**
 * Maps a CVSS base score to the 1..4 severity scale.
 *
 * CVSS v3 calls 0.0 "None"; it is mapped to 1 here because stored severities
 * have always been in 1..4 for vulnerabilities.
 */
export function severityFromCvss(score: number, version: CvssVersion): Severity {
  if (version === '2') {
    if (score === 10) return 4
    if (score >= 7.0) return 3
    if (score >= 4.0) return 2
    return 1
  }
  if (score >= 9.0) return 4
  if (score >= 7.0) return 3
  if (score >= 4.0) return 2
  return 1
}

// notifications fire when a ticket becomes High (3) or Critical (4)
export const NOTIFY_SEVERITY = 3

// a missing previous severity counts as below the threshold
export function crossesNotifyThreshold(from: DetailValue, to: DetailValue): boolean {
  const before = from === null ? 0 : from
  return typeof before === 'number' && typeof to === 'number' && before < NOTIFY_SEVERITY && to >= NOTIFY_SEVERITY
}
