import { appendEvent, makeEvent, resolveAbsence, type EventContext } from '../events.js'
import { defaultLogger, type Logger } from '../logger.js'
import { keyString, type RunContext } from '../run.js'
import { addDays } from '../time.js'
import type { HostDirectory, ScanRecordStore, TicketStore } from '../store/types.js'
import type { CloseResult, ID, OpenResult, ScanRecord, Ticket, TicketDetails, TicketDraft, TicketKey } from '../types.js'

export const DEFAULT_REOPEN_DAYS = 90
export const UNKNOWN_OWNER = 'UNKNOWN'

export interface ManagerOptions {
  /** Closed tickets younger than this are reopened instead of replaced by a new ticket. */
  reopenDays?: number
  /** Marks every event written by this manager as coming from an out-of-band scan. */
  manual?: boolean
  unknownOwner?: string
  clock?: () => Date
  logger?: Logger
}

export interface BaseDeps {
  tickets: TicketStore
  scanRecords: ScanRecordStore
}

export interface DraftInit {
  key: TicketKey
  ip: string
  owner: string
  details: TicketDetails
  ctx: EventContext
}

export abstract class TicketManager<R extends RunContext<unknown>> {
  protected readonly tickets: TicketStore
  protected readonly scanRecords: ScanRecordStore
  protected readonly reopenDays: number
  protected readonly manual: boolean
  protected readonly unknownOwner: string
  protected readonly clock: () => Date
  protected readonly log: Logger

  constructor(deps: BaseDeps, options: ManagerOptions = {}) {
    this.tickets = deps.tickets
    this.scanRecords = deps.scanRecords
    this.reopenDays = options.reopenDays ?? DEFAULT_REOPEN_DAYS
    this.manual = options.manual ?? false
    this.unknownOwner = options.unknownOwner ?? UNKNOWN_OWNER
    this.clock = options.clock ?? (() => new Date())
    this.log = options.logger ?? defaultLogger()
  }

  /** Scope-based closing is refused unless every scope dimension is non-empty. */
  abstract readyToReconcile(run: R): boolean

  protected eventContext(reason: string, reference: ID | null, time: Date): EventContext {
    return { reason, reference, time, manual: this.manual }
  }

  protected findOpen(key: TicketKey): Promise<Ticket | null> {
    return this.tickets.findOne({ key, open: true })
  }

  /** Most recently closed ticket at `key` still inside the reopen window. */
  protected async findReopenable(key: TicketKey): Promise<Ticket | null> {
    const cutoff = addDays(this.clock(), -this.reopenDays)
    const closed = await this.tickets.find({ key, open: false, closedAfter: cutoff })
    let best: Ticket | null = null
    for (const t of closed) {
      if (!best || (t.timeClosed?.getTime() ?? 0) > (best.timeClosed?.getTime() ?? 0)) best = t
    }
    return best
  }

  /**
   * A key already handled in this run is left alone, so feeding the same finding
   * twice never doubles its events.
   */
  protected async skipIfSeen(run: R, key: TicketKey, recordId: ID): Promise<OpenResult | null> {
    if (!run.seenKeys.has(keyString(key))) return null
    run.seenRecords.add(recordId)
    const ticket = await this.findOpen(key)
    this.log.debug({ ticketId: ticket?.id ?? null, reference: recordId }, 'finding already handled this run')
    return { outcome: 'skipped', ticket, notified: false }
  }

  protected async draftTicket(init: DraftInit, run: R, hosts: HostDirectory): Promise<TicketDraft> {
    const host = await hosts.getByIp(init.ip)
    let draft: TicketDraft = {
      ...init.key,
      ip: init.ip,
      owner: init.owner,
      loc: host?.loc ?? null,
      open: true,
      falsePositive: false,
      fpEffectiveDate: null,
      fpExpirationDate: null,
      details: init.details,
      timeOpened: init.ctx.time,
      timeClosed: null,
      events: []
    }
    draft = appendEvent(draft, makeEvent('OPENED', init.ctx))
    if (init.owner === this.unknownOwner) {
      const closing = this.eventContext('No associated owner', null, init.ctx.time)
      draft = appendEvent(
        { ...draft, open: false, timeClosed: run.resolveClosingTime(this.clock()) },
        makeEvent('CLOSED', closing)
      )
    }
    return draft
  }

  protected markSeen(run: R, ticket: Ticket, recordId: ID) {
    run.seenTickets.add(ticket.id)
    run.seenKeys.add(keyString(ticket))
    run.seenRecords.add(recordId)
  }

  protected async closeAbsent(tickets: Ticket[], reason: string, time: Date): Promise<CloseResult> {
    const result: CloseResult = { closed: 0, unverified: 0 }
    for (const ticket of tickets) {
      const next = resolveAbsence(ticket, reason, time, this.manual)
      await this.tickets.save(next.ticket)
      if (next.closed) result.closed++
      else result.unverified++
      this.log.debug({ ticketId: ticket.id, closed: next.closed, reason }, 'ticket not confirmed by run')
    }
    return result
  }

  protected async clearLatest(records: ScanRecord[]): Promise<number> {
    for (const record of records) {
      await this.scanRecords.save({ ...record, latest: false })
    }
    return records.length
  }
}
