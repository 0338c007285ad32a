import { laterOf } from './time.js'
import type { HostScope, PortScope, VulnerabilityScope } from './scope.js'
import type { ID, TicketKey } from './types.js'

export function keyString(key: TicketKey): string {
  return `${key.ipInt}:${key.port}/${key.protocol}:${key.source}:${key.sourceId}`
}

/**
 * State of a single reconciliation run. Created by a manager's `startRun`, owned by
 * the caller and handed back into every call of that run; never reused across runs.
 */
export class RunContext<S> {
  readonly scope: S
  readonly seenTickets = new Set<ID>()
  readonly seenRecords = new Set<ID>()
  readonly seenKeys = new Set<string>()
  private latestFinding: Date | null = null

  constructor(scope: S) {
    this.scope = scope
  }

  observe(time: Date) {
    this.latestFinding = laterOf(this.latestFinding, time)
  }

  get closingTime(): Date | null { return this.latestFinding }

  resolveClosingTime(now: Date, override?: Date): Date {
    return override ?? this.latestFinding ?? now
  }
}

export type VulnerabilityRun = RunContext<VulnerabilityScope>

export class PortRun extends RunContext<PortScope> {
  // ipInt -> ports seen open this run
  readonly openPorts = new Map<number, Set<number>>()

  portOpen(ipInt: number, port: number) {
    const ports = this.openPorts.get(ipInt) ?? new Set<number>()
    ports.add(port)
    this.openPorts.set(ipInt, ports)
  }

  isOpen(ipInt: number, port: number): boolean {
    return this.openPorts.get(ipInt)?.has(port) ?? false
  }
}

export class HostRun extends RunContext<HostScope> {
  readonly upHosts = new Set<number>()
}
