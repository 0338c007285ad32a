import type {
  CveRecord,
  HostRecord,
  ID,
  Notification,
  Protocol,
  ScanRecord,
  Ticket,
  TicketDraft,
  TicketKey
} from '../types.js'

// Every field narrows the match; list fields mean "one of", an empty list matches nothing.
export interface TicketQuery {
  key?: TicketKey
  open?: boolean
  closedAfter?: Date
  ipInts?: readonly number[]
  ports?: readonly number[]
  excludePorts?: readonly number[]
  protocols?: readonly Protocol[]
  source?: string
  sourceIds?: readonly number[]
  excludeIds?: readonly ID[]
}

export interface ScanRecordQuery {
  latest?: boolean
  ipInts?: readonly number[]
  ports?: readonly number[]
  sourceIds?: readonly number[]
  source?: string
  excludeIds?: readonly ID[]
}

export interface TicketStore {
  findOne(query: TicketQuery): Promise<Ticket | null>
  find(query: TicketQuery): Promise<Ticket[]>
  /** Persists the ticket, assigning an id to drafts. Rejects when the write fails. */
  save(ticket: TicketDraft): Promise<Ticket>
}

export interface ScanRecordStore {
  find(query: ScanRecordQuery): Promise<ScanRecord[]>
  save(record: ScanRecord): Promise<ScanRecord>
}

export interface HostDirectory {
  getByIp(ip: string): Promise<HostRecord | null>
}

export interface VulnIntelLookup {
  lookupCve(id: string): Promise<CveRecord | null>
  isKnownExploited(id: string): Promise<boolean>
}

export interface NotificationSink {
  create(ticketId: ID, owner: string): Promise<Notification>
}
