import { deltaEntry } from '../delta.js'
import { changeDetails, expireFalsePositive, reopenTicket, verifyTicket } from '../events.js'
import { ipToInt } from '../ip.js'
import { RunContext, type VulnerabilityRun } from '../run.js'
import { vulnerabilityScope, type VulnerabilityScopeInput } from '../scope.js'
import { crossesNotifyThreshold, severityFromCvss } from '../severity.js'
import type { HostDirectory, NotificationSink, VulnIntelLookup } from '../store/types.js'
import type {
  CloseResult,
  DeltaEntry,
  OpenResult,
  Ticket,
  TicketKey,
  VulnerabilityDetails,
  VulnerabilityFinding
} from '../types.js'
import { TicketManager, type BaseDeps, type ManagerOptions } from './base.js'

// score source recorded when the CVSS data comes from the intelligence feed
export const INTEL_SCORE_SOURCE = 'nvd'

export interface VulnerabilityDeps extends BaseDeps {
  hosts: HostDirectory
  notifications: NotificationSink
  intel: VulnIntelLookup
}

/**
 * Notify when a ticket turns High/Critical or lands on the known-exploited list.
 * Any other change (e.g. 3 -> 4, kev true -> false) stays quiet.
 */
export function deltaWarrantsNotification(delta: readonly DeltaEntry[]): boolean {
  const severity = deltaEntry(delta, 'severity')
  if (severity && crossesNotifyThreshold(severity.from, severity.to)) return true
  const kev = deltaEntry(delta, 'kev')
  return Boolean(kev && kev.from === false && kev.to === true)
}

export class VulnerabilityTicketManager extends TicketManager<VulnerabilityRun> {
  private readonly hosts: HostDirectory
  private readonly notifications: NotificationSink
  private readonly intel: VulnIntelLookup

  constructor(deps: VulnerabilityDeps, options: ManagerOptions = {}) {
    super(deps, options)
    this.hosts = deps.hosts
    this.notifications = deps.notifications
    this.intel = deps.intel
  }

  startRun(input: VulnerabilityScopeInput): VulnerabilityRun {
    return new RunContext(vulnerabilityScope(input))
  }

  readyToReconcile(run: VulnerabilityRun): boolean {
    const { ips, ports, sourceIds } = run.scope
    return ips.size > 0 && ports.size > 0 && sourceIds.size > 0
  }

  async buildDetails(finding: VulnerabilityFinding): Promise<VulnerabilityDetails> {
    let details: VulnerabilityDetails = {
      kind: 'vulnerability',
      cve: finding.cve ?? null,
      cvssBaseScore: finding.cvss3BaseScore ?? finding.cvssBaseScore,
      cvssVersion: finding.cvss3BaseScore === undefined ? '2' : '3',
      kev: false,
      name: finding.pluginName,
      scoreSource: finding.source,
      severity: finding.severity,
      vprScore: finding.vprScore ?? null
    }

    if (finding.cve) {
      const cve = await this.intel.lookupCve(finding.cve)
      if (cve) {
        details = {
          ...details,
          cvssBaseScore: cve.cvssScore,
          cvssVersion: cve.cvssVersion,
          scoreSource: INTEL_SCORE_SOURCE,
          severity: cve.severity
        }
      }
      if (await this.intel.isKnownExploited(finding.cve)) details = { ...details, kev: true }
    }

    // scanner-reported severities do not always agree with their own score
    if (details.scoreSource !== INTEL_SCORE_SOURCE) {
      details = { ...details, severity: severityFromCvss(details.cvssBaseScore, details.cvssVersion) }
    }
    return details
  }

  async openTicket(run: VulnerabilityRun, finding: VulnerabilityFinding, reason: string): Promise<OpenResult> {
    run.observe(finding.time)
    const key: TicketKey = {
      ipInt: ipToInt(finding.ip),
      port: finding.port,
      protocol: finding.protocol,
      source: finding.source,
      sourceId: finding.pluginId
    }
    const skipped = await this.skipIfSeen(run, key, finding.id)
    if (skipped) return skipped

    const ctx = this.eventContext(reason, finding.id, finding.time)
    const details = await this.buildDetails(finding)

    const open = await this.findOpen(key)
    if (open) {
      const current = expireFalsePositive(open, finding.time, this.manual)
      const change = changeDetails(current, details, ctx)
      const saved = await this.tickets.save(verifyTicket(change.ticket, ctx))
      this.markSeen(run, saved, finding.id)
      const notified = !saved.falsePositive && deltaWarrantsNotification(change.delta) && await this.notify(saved)
      this.log.debug({ ticketId: saved.id, changed: change.delta.length }, 'ticket verified')
      return { outcome: 'verified', ticket: saved, notified }
    }

    const closed = await this.findReopenable(key)
    if (closed) {
      const current = expireFalsePositive(closed, finding.time, this.manual)
      const change = changeDetails(current, details, ctx)
      const saved = await this.tickets.save(reopenTicket(change.ticket, ctx))
      this.markSeen(run, saved, finding.id)
      const notified = !saved.falsePositive && deltaWarrantsNotification(change.delta) && await this.notify(saved)
      this.log.debug({ ticketId: saved.id }, 'ticket reopened')
      return { outcome: 'reopened', ticket: saved, notified }
    }

    const draft = await this.draftTicket({ key, ip: finding.ip, owner: finding.owner, details, ctx }, run, this.hosts)
    const saved = await this.tickets.save(draft)
    this.markSeen(run, saved, finding.id)
    const notified = (details.severity > 2 || details.kev) && await this.notify(saved)
    this.log.debug({ ticketId: saved.id, open: saved.open }, 'ticket opened')
    return { outcome: 'opened', ticket: saved, notified }
  }

  async closeTickets(run: VulnerabilityRun): Promise<CloseResult> {
    if (!this.readyToReconcile(run)) {
      this.log.warn({ source: run.scope.source }, 'vulnerability scope incomplete; not closing tickets')
      return { closed: 0, unverified: 0 }
    }
    const { ips, ports, sourceIds, source } = run.scope
    const closingTime = run.resolveClosingTime(this.clock())
    const candidates = await this.tickets.find({
      open: true,
      ipInts: ips.toArray(),
      ports: [...ports],
      sourceIds: [...sourceIds],
      source,
      excludeIds: [...run.seenTickets]
    })
    const result = await this.closeAbsent(candidates, 'vulnerability not detected', closingTime)
    this.log.info({ source, ...result }, 'vulnerability tickets reconciled')
    return result
  }

  async clearLatestFlags(run: VulnerabilityRun): Promise<number> {
    if (!this.readyToReconcile(run)) {
      this.log.warn({ source: run.scope.source }, 'vulnerability scope incomplete; not clearing latest flags')
      return 0
    }
    const { ips, ports, sourceIds, source } = run.scope
    const stale = await this.scanRecords.find({
      latest: true,
      ipInts: ips.toArray(),
      ports: [...ports],
      sourceIds: [...sourceIds],
      source,
      excludeIds: [...run.seenRecords]
    })
    return this.clearLatest(stale)
  }

  private async notify(ticket: Ticket): Promise<boolean> {
    await this.notifications.create(ticket.id, ticket.owner)
    return true
  }
}
