import type { DeltaEntry, DetailValue } from './types.js'

type DetailMap = Readonly<Record<string, DetailValue | undefined>>

/**
 * Lists every key whose value differs between two detail maps, over the union
 * of both key sets. A key present on one side only shows `null` on the other.
 */
export function calculateDelta(from: DetailMap, to: DetailMap): DeltaEntry[] {
  const keys = new Set([...Object.keys(from), ...Object.keys(to)])
  const delta: DeltaEntry[] = []
  for (const key of keys) {
    const a = from[key] ?? null
    const b = to[key] ?? null
    if (a !== b) delta.push({ key, from: a, to: b })
  }
  return delta
}

export function deltaEntry(delta: readonly DeltaEntry[], key: string): DeltaEntry | undefined {
  return delta.find(d => d.key === key)
}
