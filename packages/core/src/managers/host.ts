import { ipToInt } from '../ip.js'
import { HostRun } from '../run.js'
import { hostScope, type HostScopeInput } from '../scope.js'
import type { CloseResult } from '../types.js'
import { TicketManager } from './base.js'

/** Closes the tickets of hosts a network scan no longer finds up. Never opens tickets. */
export class HostTicketManager extends TicketManager<HostRun> {
  startRun(input: HostScopeInput): HostRun {
    return new HostRun(hostScope(input))
  }

  readyToReconcile(run: HostRun): boolean {
    return run.scope.ips.size > 0
  }

  ipUp(run: HostRun, ip: string, time?: Date) {
    run.upHosts.add(ipToInt(ip))
    if (time) run.observe(time)
  }

  async closeTickets(run: HostRun, closingTime?: Date): Promise<CloseResult> {
    if (!this.readyToReconcile(run)) {
      this.log.warn('host scope empty; not closing tickets')
      return { closed: 0, unverified: 0 }
    }
    const down = run.scope.ips.difference(run.upHosts)
    const time = run.resolveClosingTime(this.clock(), closingTime)
    const tickets = await this.tickets.find({ ipInts: down.toArray(), open: true })
    const result = await this.closeAbsent(tickets, 'host down', time)
    this.log.info({ ...result, down: down.size }, 'host tickets reconciled')
    return result
  }

  async clearLatestFlags(run: HostRun): Promise<number> {
    if (!this.readyToReconcile(run)) {
      this.log.warn('host scope empty; not clearing latest flags')
      return 0
    }
    const down = run.scope.ips.difference(run.upHosts)
    const records = await this.scanRecords.find({ latest: true, ipInts: down.toArray() })
    return this.clearLatest(records)
  }
}
