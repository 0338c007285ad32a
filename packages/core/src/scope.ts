import { ReconcileError } from './errors.js'
import { IpSet } from './ip.js'
import type { Protocol } from './types.js'

export const MAX_PORTS_COUNT = 65535

// Host-level findings carry no port and are filed on port 0
export const GENERAL_PORT = 0

export interface VulnerabilityScope {
  ips: IpSet
  ports: Set<number>
  sourceIds: Set<number>
  source: string
}

export interface PortScope {
  ips: IpSet
  ports: Set<number>
  protocols: Set<Protocol>
}

export interface HostScope {
  ips: IpSet
}

export interface VulnerabilityScopeInput {
  ips: Iterable<string>
  ports: Iterable<number>
  sourceIds: Iterable<number>
  source: string
}

export interface PortScopeInput {
  ips: Iterable<string>
  ports: Iterable<number>
  protocols: Iterable<Protocol>
}

export interface HostScopeInput {
  ips: Iterable<string>
}

function checkPort(port: number): number {
  if (!Number.isInteger(port) || port < 0 || port > MAX_PORTS_COUNT) {
    throw new ReconcileError('INVALID_PORT', `port out of range: ${port}`)
  }
  return port
}

export function vulnerabilityScope(input: VulnerabilityScopeInput): VulnerabilityScope {
  const ports = new Set([...input.ports].map(checkPort))
  // scanners never report port 0 as open, so it has to be added for general findings to be covered
  ports.add(GENERAL_PORT)
  return {
    ips: new IpSet(input.ips),
    ports,
    sourceIds: new Set(input.sourceIds),
    source: input.source
  }
}

export function portScope(input: PortScopeInput): PortScope {
  return {
    ips: new IpSet(input.ips),
    ports: new Set([...input.ports].map(checkPort)),
    protocols: new Set(input.protocols)
  }
}

export function hostScope(input: HostScopeInput): HostScope {
  return { ips: new IpSet(input.ips) }
}

/** Parses nmap-style port lists such as `22,80,8000-8100`. */
export function parsePortList(text: string): number[] {
  const out = new Set<number>()
  for (const raw of text.split(',')) {
    const part = raw.trim()
    if (!part) continue
    const m = part.match(/^(\d+)(?:-(\d+))?$/)
    if (!m) throw new ReconcileError('INVALID_PORT', `bad port list entry: ${part}`)
    const lo = checkPort(parseInt(m[1] ?? '', 10))
    const hi = m[2] === undefined ? lo : checkPort(parseInt(m[2], 10))
    if (hi < lo) throw new ReconcileError('INVALID_PORT', `bad port range: ${part}`)
    for (let p = lo; p <= hi; p++) out.add(p)
  }
  return [...out].sort((a, b) => a - b)
}
