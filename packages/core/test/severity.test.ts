import { describe, it, expect } from 'vitest'
import { crossesNotifyThreshold, severityFromCvss } from '../src/severity.js'

describe('severityFromCvss', () => {
  it('maps CVSS v2 scores, with only a perfect 10 being critical', () => {
    expect(severityFromCvss(10, '2')).toBe(4)
    expect(severityFromCvss(9.9, '2')).toBe(3)
    expect(severityFromCvss(7.0, '2')).toBe(3)
    expect(severityFromCvss(6.9, '2')).toBe(2)
    expect(severityFromCvss(4.0, '2')).toBe(2)
    expect(severityFromCvss(3.9, '2')).toBe(1)
  })

  it('maps CVSS v3 scores', () => {
    expect(severityFromCvss(9.0, '3')).toBe(4)
    expect(severityFromCvss(8.9, '3')).toBe(3)
    expect(severityFromCvss(7.0, '3')).toBe(3)
    expect(severityFromCvss(4.0, '3')).toBe(2)
    expect(severityFromCvss(3.1, '3')).toBe(1)
  })

  it('keeps a v3 score of 0.0 at severity 1', () => {
    expect(severityFromCvss(0, '3')).toBe(1)
  })
})

describe('crossesNotifyThreshold', () => {
  it('fires only when moving from below High to High or above', () => {
    expect(crossesNotifyThreshold(2, 3)).toBe(true)
    expect(crossesNotifyThreshold(1, 4)).toBe(true)
    expect(crossesNotifyThreshold(3, 4)).toBe(false)
    expect(crossesNotifyThreshold(4, 2)).toBe(false)
    expect(crossesNotifyThreshold(2, 2)).toBe(false)
  })

  it('counts a missing previous severity as below the threshold', () => {
    expect(crossesNotifyThreshold(null, 3)).toBe(true)
  })
})
