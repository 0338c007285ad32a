export type ID = string

export type Protocol = 'tcp' | 'udp'

export type CvssVersion = '2' | '3'

// 1=Low .. 4=Critical, 0 for findings that are not vulnerabilities (open ports)
export type Severity = 0 | 1 | 2 | 3 | 4

export type EventAction = 'OPENED' | 'VERIFIED' | 'REOPENED' | 'CHANGED' | 'UNVERIFIED' | 'CLOSED'

export type DetailValue = string | number | boolean | null

export interface DeltaEntry {
  key: string
  from: DetailValue
  to: DetailValue
}

export interface TicketEvent {
  action: EventAction
  reason: string
  reference: ID | null
  time: Date
  delta?: DeltaEntry[]
  manual?: boolean
}

export type VulnerabilityDetails = {
  kind: 'vulnerability'
  cve: string | null
  cvssBaseScore: number
  cvssVersion: CvssVersion
  kev: boolean
  name: string
  scoreSource: string
  severity: Severity
  vprScore: number | null
}

export type PortDetails = {
  kind: 'port'
  cve: null
  cvssBaseScore: null
  name: string
  scoreSource: null
  service: string
  severity: 0
}

export type TicketDetails = VulnerabilityDetails | PortDetails

export interface TicketKey {
  ipInt: number
  port: number
  protocol: Protocol
  source: string
  sourceId: number
}

export type GeoLocation = [number, number]

export interface Ticket extends TicketKey {
  id: ID
  ip: string
  owner: string
  loc: GeoLocation | null
  open: boolean
  falsePositive: boolean
  fpEffectiveDate: Date | null
  fpExpirationDate: Date | null
  details: TicketDetails
  timeOpened: Date
  timeClosed: Date | null
  events: TicketEvent[]
}

// a ticket that has not been persisted yet has no id
export type TicketDraft = Omit<Ticket, 'id'> & { id?: ID }

export interface ScanRecord {
  id: ID
  ip: string
  ipInt: number
  port: number
  protocol: Protocol
  source: string
  sourceId: number
  latest: boolean
  time: Date
}

export interface HostRecord {
  ip: string
  loc: GeoLocation | null
}

export interface Notification {
  id: ID
  ticketId: ID
  ticketOwner: string
  generatedFor: string[]
}

export interface CveRecord {
  id: string
  cvssScore: number
  cvssVersion: CvssVersion
  severity: Severity
}

export interface VulnerabilityFinding {
  // id of the scan record this finding came from
  id: ID
  ip: string
  port: number
  protocol: Protocol
  source: string
  pluginId: number
  pluginName: string
  severity: Severity
  cvssBaseScore: number
  cvss3BaseScore?: number
  cve?: string
  vprScore?: number
  owner: string
  time: Date
}

export interface PortFinding {
  id: ID
  ip: string
  port: number
  protocol: Protocol
  source: string
  sourceId: number
  name: string
  service: string
  owner: string
  time: Date
}

export type OpenOutcome = 'opened' | 'verified' | 'reopened' | 'skipped'

export interface OpenResult {
  outcome: OpenOutcome
  ticket: Ticket | null
  notified: boolean
}

export interface CloseResult {
  closed: number
  unverified: number
}
