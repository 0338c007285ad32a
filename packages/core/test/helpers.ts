import { ipToInt } from '../src/ip.js'
import { MemoryStore } from '../src/store/memory.js'
import type {
  PortFinding,
  Ticket,
  TicketDraft,
  VulnerabilityDetails,
  VulnerabilityFinding
} from '../src/types.js'

export const NOW = new Date('2024-06-01T12:00:00Z')
export const SCAN_TIME = new Date('2024-06-01T10:00:00Z')
export const OPENED_AT = new Date('2024-05-01T00:00:00Z')

export function vulnFinding(overrides: Partial<VulnerabilityFinding> = {}): VulnerabilityFinding {
  return {
    id: 'rec-1',
    ip: '10.0.0.5',
    port: 443,
    protocol: 'tcp',
    source: 'nessus',
    pluginId: 1001,
    pluginName: 'Weak TLS',
    severity: 2,
    cvssBaseScore: 5.0,
    owner: 'ACME',
    time: SCAN_TIME,
    ...overrides
  }
}

export function portFinding(overrides: Partial<PortFinding> = {}): PortFinding {
  return {
    id: 'port-1',
    ip: '10.0.0.5',
    port: 22,
    protocol: 'tcp',
    source: 'nmap',
    sourceId: 1,
    name: 'ssh',
    service: 'ssh',
    owner: 'ACME',
    time: SCAN_TIME,
    ...overrides
  }
}

// what buildDetails produces for vulnFinding() with no intelligence match
export function vulnDetails(overrides: Partial<VulnerabilityDetails> = {}): VulnerabilityDetails {
  return {
    kind: 'vulnerability',
    cve: null,
    cvssBaseScore: 5.0,
    cvssVersion: '2',
    kev: false,
    name: 'Weak TLS',
    scoreSource: 'nessus',
    severity: 2,
    vprScore: null,
    ...overrides
  }
}

export function existingTicket(overrides: Partial<TicketDraft> = {}): TicketDraft {
  const ip = overrides.ip ?? '10.0.0.5'
  return {
    ip,
    ipInt: ipToInt(ip),
    port: 443,
    protocol: 'tcp',
    source: 'nessus',
    sourceId: 1001,
    owner: 'ACME',
    loc: null,
    open: true,
    falsePositive: false,
    fpEffectiveDate: null,
    fpExpirationDate: null,
    details: vulnDetails(),
    timeOpened: OPENED_AT,
    timeClosed: null,
    events: [{ action: 'OPENED', reason: 'vulnscan', reference: 'rec-0', time: OPENED_AT }],
    ...overrides
  }
}

export async function seed(store: MemoryStore, overrides: Partial<TicketDraft> = {}): Promise<Ticket> {
  return store.tickets.save(existingTicket(overrides))
}

export function actions(ticket: { events: { action: string }[] } | null): string[] {
  return ticket ? ticket.events.map(e => e.action) : []
}
