import { calculateDelta } from './delta.js'
import { ReconcileError } from './errors.js'
import { addDays } from './time.js'
import type { DeltaEntry, EventAction, ID, TicketDetails, TicketDraft, TicketEvent } from './types.js'

export interface EventContext {
  reason: string
  reference: ID | null
  time: Date
  manual?: boolean
}

export function makeEvent(action: EventAction, ctx: EventContext, delta?: DeltaEntry[]): TicketEvent {
  const event: TicketEvent = { action, reason: ctx.reason, reference: ctx.reference, time: ctx.time }
  if (delta) event.delta = delta
  if (ctx.manual) event.manual = true
  return event
}

/**
 * Returns a copy of the ticket with the event appended. An event older than the
 * last recorded one takes the last event's time so the log never goes backwards.
 */
export function appendEvent<T extends TicketDraft>(ticket: T, event: TicketEvent): T {
  const last = ticket.events[ticket.events.length - 1]
  const time = last && last.time.getTime() > event.time.getTime() ? last.time : event.time
  return { ...ticket, events: [...ticket.events, { ...event, time }] }
}

export function expireFalsePositive<T extends TicketDraft>(ticket: T, time: Date, manual = false): T {
  if (!ticket.falsePositive || !ticket.fpExpirationDate) return ticket
  if (ticket.fpExpirationDate.getTime() >= time.getTime()) return ticket
  const event = makeEvent(
    'CHANGED',
    { reason: 'False positive expired', reference: null, time, manual },
    [{ key: 'falsePositive', from: true, to: false }]
  )
  return appendEvent({ ...ticket, falsePositive: false }, event)
}

export function verifyTicket<T extends TicketDraft>(ticket: T, ctx: EventContext): T {
  return appendEvent(ticket, makeEvent('VERIFIED', ctx))
}

export function reopenTicket<T extends TicketDraft>(ticket: T, ctx: EventContext): T {
  return appendEvent({ ...ticket, open: true, timeClosed: null }, makeEvent('REOPENED', ctx))
}

/** `timeClosed` follows the CLOSED event, including when appendEvent moved it forward. */
export function closeTicket<T extends TicketDraft>(ticket: T, ctx: EventContext): T {
  const next = appendEvent({ ...ticket, open: false }, makeEvent('CLOSED', ctx))
  const closed = next.events[next.events.length - 1]
  return { ...next, timeClosed: closed ? closed.time : ctx.time }
}

export function unverifyTicket<T extends TicketDraft>(ticket: T, ctx: EventContext): T {
  return appendEvent(ticket, makeEvent('UNVERIFIED', ctx))
}

export interface DetailsChange<T extends TicketDraft> {
  ticket: T
  delta: DeltaEntry[]
}

/** Replaces the ticket details, recording a CHANGED event when anything differs. */
export function changeDetails<T extends TicketDraft>(ticket: T, details: TicketDetails, ctx: EventContext): DetailsChange<T> {
  const delta = calculateDelta(ticket.details, details)
  const next = { ...ticket, details }
  if (!delta.length) return { ticket: next, delta }
  return { ticket: appendEvent(next, makeEvent('CHANGED', { ...ctx, reason: 'details changed' }, delta)), delta }
}

export interface AbsenceResult<T extends TicketDraft> {
  ticket: T
  closed: boolean
}

/**
 * A ticket in scope that was not seen this run. False positives stay open and
 * get UNVERIFIED; everything else is closed at `time`.
 */
export function resolveAbsence<T extends TicketDraft>(ticket: T, reason: string, time: Date, manual = false): AbsenceResult<T> {
  const current = expireFalsePositive(ticket, time, manual)
  const ctx: EventContext = { reason, reference: null, time, manual }
  if (current.falsePositive) return { ticket: unverifyTicket(current, ctx), closed: false }
  return { ticket: closeTicket(current, ctx), closed: true }
}

export interface FalsePositiveRequest {
  reason: string
  time: Date
  days: number
  maxDays: number
  manual?: boolean
}

export function markFalsePositive<T extends TicketDraft>(ticket: T, req: FalsePositiveRequest): T {
  if (!ticket.open) throw new ReconcileError('TICKET_CLOSED', 'only open tickets can be marked as false positives')
  if (ticket.falsePositive) throw new ReconcileError('ALREADY_FALSE_POSITIVE', 'ticket is already a false positive')
  if (!Number.isInteger(req.days) || req.days < 1 || req.days > req.maxDays) {
    throw new ReconcileError('INVALID_FALSE_POSITIVE', `false positive period must be between 1 and ${req.maxDays} days`)
  }
  const event = makeEvent(
    'CHANGED',
    { reason: req.reason, reference: null, time: req.time, manual: req.manual },
    [{ key: 'falsePositive', from: false, to: true }]
  )
  return appendEvent({
    ...ticket,
    falsePositive: true,
    fpEffectiveDate: req.time,
    fpExpirationDate: addDays(req.time, req.days)
  }, event)
}
