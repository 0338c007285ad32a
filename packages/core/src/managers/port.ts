import { expireFalsePositive, reopenTicket, verifyTicket } from '../events.js'
import { ipToInt } from '../ip.js'
import { PortRun } from '../run.js'
import { GENERAL_PORT, MAX_PORTS_COUNT, portScope, type PortScopeInput } from '../scope.js'
import type { HostDirectory, NotificationSink } from '../store/types.js'
import type { CloseResult, OpenResult, PortDetails, PortFinding, Ticket, TicketKey } from '../types.js'
import { TicketManager, type BaseDeps, type ManagerOptions } from './base.js'

const NOT_OPEN = 'port not open'

export interface PortDeps extends BaseDeps {
  hosts: HostDirectory
  notifications: NotificationSink
}

export function portDetails(finding: PortFinding): PortDetails {
  return {
    kind: 'port',
    cve: null,
    cvssBaseScore: null,
    name: finding.name,
    scoreSource: null,
    service: finding.service,
    severity: 0
  }
}

export class PortTicketManager extends TicketManager<PortRun> {
  private readonly hosts: HostDirectory
  private readonly notifications: NotificationSink

  constructor(deps: PortDeps, options: ManagerOptions = {}) {
    super(deps, options)
    this.hosts = deps.hosts
    this.notifications = deps.notifications
  }

  startRun(input: PortScopeInput): PortRun {
    return new PortRun(portScope(input))
  }

  readyToReconcile(run: PortRun): boolean {
    const { ips, ports, protocols } = run.scope
    return ips.size > 0 && ports.size > 0 && protocols.size > 0
  }

  portOpen(run: PortRun, ip: string, port: number) {
    run.portOpen(ipToInt(ip), port)
  }

  async openTicket(run: PortRun, finding: PortFinding, reason: string): Promise<OpenResult> {
    run.observe(finding.time)
    const key: TicketKey = {
      ipInt: ipToInt(finding.ip),
      port: finding.port,
      protocol: finding.protocol,
      source: finding.source,
      sourceId: finding.sourceId
    }
    run.portOpen(key.ipInt, key.port)
    const skipped = await this.skipIfSeen(run, key, finding.id)
    if (skipped) return skipped

    const ctx = this.eventContext(reason, finding.id, finding.time)

    const open = await this.findOpen(key)
    if (open) {
      const current = expireFalsePositive(open, finding.time, this.manual)
      const saved = await this.tickets.save(verifyTicket(current, ctx))
      this.markSeen(run, saved, finding.id)
      return { outcome: 'verified', ticket: saved, notified: false }
    }

    const closed = await this.findReopenable(key)
    if (closed) {
      const current = expireFalsePositive(closed, finding.time, this.manual)
      const saved = await this.tickets.save(reopenTicket(current, ctx))
      this.markSeen(run, saved, finding.id)
      this.log.debug({ ticketId: saved.id }, 'port ticket reopened')
      return { outcome: 'reopened', ticket: saved, notified: false }
    }

    const draft = await this.draftTicket(
      { key, ip: finding.ip, owner: finding.owner, details: portDetails(finding), ctx },
      run,
      this.hosts
    )
    const saved = await this.tickets.save(draft)
    this.markSeen(run, saved, finding.id)
    await this.notifications.create(saved.id, saved.owner)
    this.log.debug({ ticketId: saved.id, open: saved.open }, 'port ticket opened')
    return { outcome: 'opened', ticket: saved, notified: true }
  }

  async closeTickets(run: PortRun, closingTime?: Date): Promise<CloseResult> {
    if (!this.readyToReconcile(run)) {
      this.log.warn('port scope incomplete; not closing tickets')
      return { closed: 0, unverified: 0 }
    }
    const { ips, ports, protocols } = run.scope
    const time = run.resolveClosingTime(this.clock(), closingTime)
    const result: CloseResult = { closed: 0, unverified: 0 }
    let tickets: Ticket[]

    if (ports.size === MAX_PORTS_COUNT) {
      // With every port scanned, a host showing no open port cannot still have a
      // valid service-level (port 0) finding, so everything on it can be closed now.
      const silent = ips.difference(run.openPorts.keys())
      const onSilent = await this.tickets.find({ ipInts: silent.toArray(), open: true })
      add(result, await this.closeAbsent(onSilent, NOT_OPEN, time))
      tickets = await this.tickets.find({
        ipInts: ips.toArray(),
        open: true,
        excludePorts: [GENERAL_PORT],
        protocols: [...protocols],
        // false positives handled above are still open
        excludeIds: onSilent.map(t => t.id)
      })
    } else {
      tickets = await this.tickets.find({
        ipInts: ips.toArray(),
        open: true,
        ports: [...ports],
        protocols: [...protocols]
      })
    }

    const absent = tickets.filter(t => !run.isOpen(t.ipInt, t.port))
    add(result, await this.closeAbsent(absent, NOT_OPEN, time))
    this.log.info({ ...result, fullSweep: ports.size === MAX_PORTS_COUNT }, 'port tickets reconciled')
    return result
  }

  /** Clears the latest flag of in-scope records whose ip:port was not seen open. */
  async clearLatestFlags(run: PortRun): Promise<number> {
    if (!this.readyToReconcile(run)) {
      this.log.warn('port scope incomplete; not clearing latest flags')
      return 0
    }
    const records = await this.scanRecords.find({ latest: true, ipInts: run.scope.ips.toArray() })
    return this.clearLatest(records.filter(r => !run.isOpen(r.ipInt, r.port)))
  }
}

function add(into: CloseResult, from: CloseResult) {
  into.closed += from.closed
  into.unverified += from.unverified
}
