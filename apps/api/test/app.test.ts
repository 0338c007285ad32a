import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { fileURLToPath } from 'node:url'
import type { FastifyInstance } from 'fastify'
import { MemoryStore, loadSeedIntel, type Notification, type Ticket } from '@scanledger/core'
import { buildServer } from '../src/app.js'
import { ConfigSchema } from '../src/config.js'
import type { ApiError, HostRunSummary, RunSummary } from '../src/types.js'

const NOW = new Date('2024-06-08T12:00:00Z')
const intel = loadSeedIntel(fileURLToPath(new URL('../data/intel', import.meta.url)))

let app: FastifyInstance
let store: MemoryStore
let now: Date

beforeEach(() => {
  store = new MemoryStore()
  now = NOW
  app = buildServer({ config: ConfigSchema.parse({}), store, intel, clock: () => now, logger: false })
})

afterEach(async () => {
  await app.close()
})

function vulnFinding(id: string, ip: string, extra: Record<string, unknown> = {}) {
  return {
    id,
    ip,
    port: 443,
    protocol: 'tcp',
    pluginId: 1001,
    pluginName: 'Weak TLS',
    severity: 2,
    cvssBaseScore: 5.0,
    owner: 'ACME',
    time: '2024-06-01T10:00:00',
    ...extra
  }
}

function vulnRun(findings: unknown[], scope: Record<string, unknown> = {}) {
  return {
    source: 'nessus',
    scope: { ips: ['10.0.0.4/30'], ports: '443', sourceIds: [1001], ...scope },
    findings
  }
}

async function firstRun() {
  return app.inject({
    method: 'POST',
    url: '/runs/vulnerability',
    payload: vulnRun([
      vulnFinding('f-1', '10.0.0.5', { cvssBaseScore: 7.5 }),
      vulnFinding('f-2', '10.0.0.6', { cve: 'CVE-2099-1002' })
    ])
  })
}

describe('health', () => {
  it('responds ok', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' })
    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({ status: 'ok' })
  })
})

describe('POST /runs/vulnerability', () => {
  it('opens tickets and notifies for High and known-exploited findings', async () => {
    await app.inject({ method: 'PUT', url: '/hosts/10.0.0.5', payload: { loc: [52.5, 13.4] } })
    const res = await firstRun()
    expect(res.statusCode).toBe(200)
    expect(res.json<RunSummary>()).toEqual({
      opened: 2, verified: 0, reopened: 0, skipped: 0,
      closed: 0, unverified: 0, notified: 2, latestCleared: 0,
      closingTime: '2024-06-01T10:00:00.000Z'
    })

    const list = await app.inject({ method: 'GET', url: '/tickets?open=true&ip=10.0.0.6' })
    const [kevTicket] = list.json<Ticket[]>()
    expect(kevTicket?.details).toEqual({
      kind: 'vulnerability',
      cve: 'CVE-2099-1002',
      cvssBaseScore: 6.5,
      cvssVersion: '3',
      kev: true,
      name: 'Weak TLS',
      scoreSource: 'nvd',
      severity: 2,
      vprScore: null
    })

    const located = await app.inject({ method: 'GET', url: '/tickets?ip=10.0.0.5' })
    expect(located.json<Ticket[]>()[0]?.loc).toEqual([52.5, 13.4])

    const notifications = await app.inject({ method: 'GET', url: '/notifications' })
    expect(notifications.json<Notification[]>().map(n => n.ticketOwner)).toEqual(['ACME', 'ACME'])
  })

  it('verifies what it sees again and closes what is gone', async () => {
    await firstRun()
    const res = await app.inject({
      method: 'POST',
      url: '/runs/vulnerability',
      payload: vulnRun([vulnFinding('f-3', '10.0.0.5', { cvssBaseScore: 7.5, time: '2024-06-08T10:00:00Z' })])
    })
    expect(res.json<RunSummary>()).toEqual({
      opened: 0, verified: 1, reopened: 0, skipped: 0,
      closed: 1, unverified: 0, notified: 0, latestCleared: 2,
      closingTime: '2024-06-08T10:00:00.000Z'
    })

    const closed = await app.inject({ method: 'GET', url: '/tickets?open=false' })
    const [ticket] = closed.json<Ticket[]>()
    expect(ticket?.ip).toBe('10.0.0.6')
    expect(ticket?.timeClosed).toBe('2024-06-08T10:00:00.000Z')
  })

  it('rejects malformed bodies', async () => {
    const res = await app.inject({ method: 'POST', url: '/runs/vulnerability', payload: { source: 'nessus' } })
    expect(res.statusCode).toBe(400)
    expect(res.json<ApiError>().code).toBe('BAD_REQUEST')
  })

  it('rejects invalid addresses in scope', async () => {
    const res = await app.inject({ method: 'POST', url: '/runs/vulnerability', payload: vulnRun([], { ips: ['10.0.0'] }) })
    expect(res.statusCode).toBe(400)
    expect(res.json()).toEqual({ code: 'INVALID_IP', message: 'not an IPv4 address: 10.0.0' })
  })

  it('rejects scope blocks wider than /16', async () => {
    const res = await app.inject({ method: 'POST', url: '/runs/vulnerability', payload: vulnRun([], { ips: ['10.0.0.0/8'] }) })
    expect(res.statusCode).toBe(400)
    expect(res.json<ApiError>().code).toBe('INVALID_SCOPE')
  })
})

describe('POST /runs/port', () => {
  function portRun(ports: number[], closingTime?: string) {
    return {
      scope: { ips: ['10.0.0.5'], ports: '22,80', protocols: ['tcp'] },
      findings: ports.map(port => ({
        id: `p-${port}`, ip: '10.0.0.5', port, protocol: 'tcp', name: `port ${port}`, owner: 'ACME', time: '2024-06-01T10:00:00Z'
      })),
      closingTime
    }
  }

  it('opens port tickets and closes ports that went away', async () => {
    const first = await app.inject({ method: 'POST', url: '/runs/port', payload: portRun([22, 80]) })
    expect(first.json<RunSummary>()).toMatchObject({ opened: 2, notified: 2, closed: 0 })

    const second = await app.inject({ method: 'POST', url: '/runs/port', payload: portRun([22], '2024-06-09T00:00:00Z') })
    expect(second.json<RunSummary>()).toEqual({
      opened: 0, verified: 1, reopened: 0, skipped: 0,
      closed: 1, unverified: 0, notified: 0, latestCleared: 0,
      closingTime: '2024-06-09T00:00:00.000Z'
    })
    const closed = await app.inject({ method: 'GET', url: '/tickets?open=false' })
    expect(closed.json<Ticket[]>().map(t => t.port)).toEqual([80])
  })
})

describe('POST /runs/host', () => {
  it('closes tickets of hosts that are down', async () => {
    await firstRun()
    const res = await app.inject({
      method: 'POST',
      url: '/runs/host',
      payload: { scope: { ips: ['10.0.0.5', '10.0.0.6'] }, up: ['10.0.0.5'] }
    })
    expect(res.json<HostRunSummary>()).toEqual({ closed: 1, unverified: 0, up: 1, latestCleared: 1 })
    const closed = await app.inject({ method: 'GET', url: '/tickets?open=false' })
    expect(closed.json<Ticket[]>()[0]?.timeClosed).toBe(NOW.toISOString())
  })
})

describe('tickets', () => {
  it('marks a ticket as a false positive once', async () => {
    await firstRun()
    const [ticket] = store.tickets.rows
    const url = `/tickets/${ticket?.id}/false-positive`

    const res = await app.inject({ method: 'POST', url, payload: { reason: 'accepted risk', days: 30 } })
    expect(res.statusCode).toBe(200)
    expect(res.json<Ticket>()).toMatchObject({
      falsePositive: true,
      fpEffectiveDate: '2024-06-08T12:00:00.000Z',
      fpExpirationDate: '2024-07-08T12:00:00.000Z'
    })

    const again = await app.inject({ method: 'POST', url, payload: { reason: 'accepted risk', days: 30 } })
    expect(again.statusCode).toBe(409)
    expect(again.json<ApiError>().code).toBe('ALREADY_FALSE_POSITIVE')
  })

  it('renews a false positive whose window has run out', async () => {
    await firstRun()
    const [ticket] = store.tickets.rows
    const url = `/tickets/${ticket?.id}/false-positive`
    await app.inject({ method: 'POST', url, payload: { reason: 'accepted risk', days: 1 } })

    now = new Date('2024-06-10T12:00:00Z')
    const res = await app.inject({ method: 'POST', url, payload: { reason: 'still accepted', days: 30 } })
    expect(res.statusCode).toBe(200)
    const renewed = res.json<Ticket>()
    expect(renewed).toMatchObject({
      falsePositive: true,
      fpEffectiveDate: '2024-06-10T12:00:00.000Z',
      fpExpirationDate: '2024-07-10T12:00:00.000Z'
    })
    expect(renewed.events.map(e => [e.action, e.reason])).toEqual([
      ['OPENED', 'vulnscan'],
      ['CHANGED', 'accepted risk'],
      ['CHANGED', 'False positive expired'],
      ['CHANGED', 'still accepted']
    ])
  })

  it('rejects false positive periods beyond the configured maximum', async () => {
    await firstRun()
    const [ticket] = store.tickets.rows
    const res = await app.inject({
      method: 'POST',
      url: `/tickets/${ticket?.id}/false-positive`,
      payload: { reason: 'accepted risk', days: 400 }
    })
    expect(res.statusCode).toBe(400)
    expect(res.json<ApiError>().code).toBe('INVALID_FALSE_POSITIVE')
  })

  it('returns 404 for unknown tickets', async () => {
    const res = await app.inject({ method: 'GET', url: '/tickets/ticket_missing' })
    expect(res.statusCode).toBe(404)
    expect(res.json()).toEqual({ code: 'TICKET_NOT_FOUND', message: 'ticket not found: ticket_missing' })
  })

  it('fetches a ticket with its event log', async () => {
    await firstRun()
    const [ticket] = store.tickets.rows
    const res = await app.inject({ method: 'GET', url: `/tickets/${ticket?.id}` })
    expect(res.json<Ticket>().events).toEqual([
      { action: 'OPENED', reason: 'vulnscan', reference: 'f-1', time: '2024-06-01T10:00:00.000Z' }
    ])
  })
})
