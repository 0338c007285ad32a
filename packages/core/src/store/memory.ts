import type {
  HostRecord,
  ID,
  Notification,
  ScanRecord,
  Ticket,
  TicketDraft,
  TicketKey
} from '../types.js'
import type {
  HostDirectory,
  NotificationSink,
  ScanRecordQuery,
  ScanRecordStore,
  TicketQuery,
  TicketStore
} from './types.js'

const genId = (p: string) => `${p}_${Math.random().toString(36).slice(2, 10)}`

function allows<T>(list: readonly T[] | undefined, value: T): boolean {
  return !list || list.includes(value)
}

function sameKey(a: TicketKey, b: TicketKey): boolean {
  return a.ipInt === b.ipInt && a.port === b.port && a.protocol === b.protocol &&
    a.source === b.source && a.sourceId === b.sourceId
}

function matchesTicket(t: Ticket, q: TicketQuery): boolean {
  if (q.key && !sameKey(t, q.key)) return false
  if (q.open !== undefined && t.open !== q.open) return false
  if (q.closedAfter && !(t.timeClosed && t.timeClosed.getTime() > q.closedAfter.getTime())) return false
  if (!allows(q.ipInts, t.ipInt)) return false
  if (!allows(q.ports, t.port)) return false
  if (q.excludePorts?.includes(t.port)) return false
  if (!allows(q.protocols, t.protocol)) return false
  if (q.source !== undefined && t.source !== q.source) return false
  if (!allows(q.sourceIds, t.sourceId)) return false
  if (q.excludeIds?.includes(t.id)) return false
  return true
}

function matchesRecord(r: ScanRecord, q: ScanRecordQuery): boolean {
  if (q.latest !== undefined && r.latest !== q.latest) return false
  if (!allows(q.ipInts, r.ipInt)) return false
  if (!allows(q.ports, r.port)) return false
  if (!allows(q.sourceIds, r.sourceId)) return false
  if (q.source !== undefined && r.source !== q.source) return false
  if (q.excludeIds?.includes(r.id)) return false
  return true
}

/** Rows are cloned on the way in and out, so callers never share state with the store. */
export class MemoryTicketStore implements TicketStore {
  rows: Ticket[] = []

  async findOne(query: TicketQuery): Promise<Ticket | null> {
    const t = this.rows.find(row => matchesTicket(row, query))
    return t ? structuredClone(t) : null
  }

  async find(query: TicketQuery): Promise<Ticket[]> {
    return this.rows.filter(row => matchesTicket(row, query)).map(t => structuredClone(t))
  }

  async get(id: ID): Promise<Ticket | null> {
    const t = this.rows.find(row => row.id === id)
    return t ? structuredClone(t) : null
  }

  async save(draft: TicketDraft): Promise<Ticket> {
    const ticket: Ticket = { ...structuredClone(draft), id: draft.id ?? genId('ticket') }
    // behaves like a unique index on the identity key of open tickets
    if (ticket.open && this.rows.some(r => r.open && r.id !== ticket.id && sameKey(r, ticket))) {
      throw new Error(`an open ticket already exists for ${ticket.ip}:${ticket.port}/${ticket.protocol} ${ticket.source}:${ticket.sourceId}`)
    }
    const idx = this.rows.findIndex(r => r.id === ticket.id)
    if (idx === -1) this.rows.push(ticket)
    else this.rows[idx] = ticket
    return structuredClone(ticket)
  }
}

export class MemoryScanRecordStore implements ScanRecordStore {
  rows: ScanRecord[] = []

  async find(query: ScanRecordQuery): Promise<ScanRecord[]> {
    return this.rows.filter(row => matchesRecord(row, query)).map(r => ({ ...r }))
  }

  async save(record: ScanRecord): Promise<ScanRecord> {
    const idx = this.rows.findIndex(r => r.id === record.id)
    if (idx === -1) this.rows.push({ ...record })
    else this.rows[idx] = { ...record }
    return { ...record }
  }
}

export class MemoryHostDirectory implements HostDirectory {
  hosts = new Map<string, HostRecord>()

  put(host: HostRecord) { this.hosts.set(host.ip, { ...host }) }

  async getByIp(ip: string): Promise<HostRecord | null> {
    const h = this.hosts.get(ip)
    return h ? { ...h } : null
  }
}

export class MemoryNotificationSink implements NotificationSink {
  notifications: Notification[] = []

  async create(ticketId: ID, owner: string): Promise<Notification> {
    // generatedFor is filled in later by whatever renders the notification
    const n: Notification = { id: genId('notif'), ticketId, ticketOwner: owner, generatedFor: [] }
    this.notifications.push(n)
    return { ...n, generatedFor: [] }
  }
}

export class MemoryStore {
  tickets = new MemoryTicketStore()
  scanRecords = new MemoryScanRecordStore()
  hosts = new MemoryHostDirectory()
  notifications = new MemoryNotificationSink()
}
