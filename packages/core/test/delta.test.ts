import { describe, it, expect } from 'vitest'
import { calculateDelta, deltaEntry } from '../src/delta.js'

describe('calculateDelta', () => {
  it('reports changed and added keys over the union of both sides', () => {
    const delta = calculateDelta({ a: 1, b: 2 }, { a: 1, b: 3, c: 4 })
    expect(delta).toEqual([
      { key: 'b', from: 2, to: 3 },
      { key: 'c', from: null, to: 4 }
    ])
  })

  it('reports keys dropped from the new side', () => {
    expect(calculateDelta({ a: 'x', gone: true }, { a: 'x' })).toEqual([
      { key: 'gone', from: true, to: null }
    ])
  })

  it('returns an empty list for identical maps', () => {
    expect(calculateDelta({ severity: 3, kev: false }, { kev: false, severity: 3 })).toEqual([])
  })

  it('treats a missing key and an explicit null as equal', () => {
    expect(calculateDelta({ cve: null }, {})).toEqual([])
  })

  it('finds an entry by key', () => {
    const delta = calculateDelta({ severity: 2 }, { severity: 3 })
    expect(deltaEntry(delta, 'severity')).toEqual({ key: 'severity', from: 2, to: 3 })
    expect(deltaEntry(delta, 'kev')).toBeUndefined()
  })
})
