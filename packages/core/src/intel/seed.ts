import fs from 'node:fs'
import path from 'node:path'
import type { CveRecord, CvssVersion, Severity } from '../types.js'
import type { VulnIntelLookup } from '../store/types.js'

/** Vulnerability intelligence held in memory, usually loaded from seed files. */
export class SeedIntel implements VulnIntelLookup {
  private readonly cves = new Map<string, CveRecord>()
  private readonly kev = new Set<string>()

  constructor(cves: Iterable<CveRecord> = [], kev: Iterable<string> = []) {
    for (const c of cves) this.cves.set(c.id.toUpperCase(), c)
    for (const id of kev) this.kev.add(id.toUpperCase())
  }

  get size() { return { cves: this.cves.size, kev: this.kev.size } }

  async lookupCve(id: string): Promise<CveRecord | null> {
    return this.cves.get(id.toUpperCase()) ?? null
  }

  async isKnownExploited(id: string): Promise<boolean> {
    return this.kev.has(id.toUpperCase())
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value)
}

function readJsonArray(file: string): unknown[] {
  if (!fs.existsSync(file)) return []
  const data: unknown = JSON.parse(fs.readFileSync(file, 'utf8'))
  return Array.isArray(data) ? data : []
}

// '3.0' and '3.1' both score on the v3 scale
function toVersion(raw: unknown): CvssVersion | null {
  const v = String(raw ?? '')
  if (v === '2' || v.startsWith('2.')) return '2'
  if (v === '3' || v.startsWith('3.')) return '3'
  return null
}

function toSeverity(raw: unknown): Severity | null {
  const n = Number(raw)
  return n === 1 || n === 2 || n === 3 || n === 4 ? n : null
}

function toCve(entry: unknown): CveRecord | null {
  if (!isRecord(entry)) return null
  const id = typeof entry.id === 'string' ? entry.id : null
  const cvssScore = Number(entry.cvssScore)
  const cvssVersion = toVersion(entry.cvssVersion)
  const severity = toSeverity(entry.severity)
  if (!id || Number.isNaN(cvssScore) || !cvssVersion || severity === null) return null
  return { id, cvssScore, cvssVersion, severity }
}

// KEV entries are either bare ids or catalog objects carrying `cveID`
function toKevId(entry: unknown): string | null {
  if (typeof entry === 'string') return entry
  if (isRecord(entry) && typeof entry.cveID === 'string') return entry.cveID
  return null
}

/**
 * Loads `cves.json` and `kev.json` from `seedDir`. Missing files give an empty
 * lookup; malformed entries are skipped.
 */
export function loadSeedIntel(seedDir = path.resolve(process.cwd(), 'data', 'intel')): SeedIntel {
  const cves = readJsonArray(path.join(seedDir, 'cves.json'))
    .map(toCve)
    .filter((c): c is CveRecord => c !== null)
  const kev = readJsonArray(path.join(seedDir, 'kev.json'))
    .map(toKevId)
    .filter((id): id is string => id !== null)
  return new SeedIntel(cves, kev)
}
