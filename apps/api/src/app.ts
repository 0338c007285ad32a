import Fastify, { type FastifyInstance } from 'fastify'
import { ZodError } from 'zod'
import {
  HostTicketManager,
  MemoryStore,
  PortTicketManager,
  ReconcileError,
  VulnerabilityTicketManager,
  expireFalsePositive,
  ipToInt,
  isReconcileError,
  loadSeedIntel,
  markFalsePositive,
  type Logger,
  type ManagerOptions,
  type OpenResult,
  type ReconcileErrorCode,
  type VulnIntelLookup
} from '@scanledger/core'
import type { AppConfig } from './config.js'
import {
  FalsePositiveSchema,
  HostRecordSchema,
  HostRunSchema,
  IdParamsSchema,
  IpParamsSchema,
  PortRunSchema,
  TicketListQuerySchema,
  VulnerabilityRunSchema
} from './schemas.js'
import type { ApiError, HostRunSummary, OutcomeCounts, RunSummary } from './types.js'

export interface BuildOptions {
  config: AppConfig
  store?: MemoryStore
  intel?: VulnIntelLookup
  clock?: () => Date
  logger?: boolean
}

const STATUS_BY_CODE: Record<ReconcileErrorCode, number> = {
  INVALID_IP: 400,
  INVALID_SCOPE: 400,
  INVALID_PORT: 400,
  INVALID_FALSE_POSITIVE: 400,
  TICKET_NOT_FOUND: 404,
  TICKET_CLOSED: 409,
  ALREADY_FALSE_POSITIVE: 409
}

function emptyCounts(): OutcomeCounts {
  return { opened: 0, verified: 0, reopened: 0, skipped: 0 }
}

function tally(counts: OutcomeCounts, result: OpenResult): number {
  counts[result.outcome]++
  return result.notified ? 1 : 0
}

function describeIssues(err: ZodError): string {
  return err.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ')
}

export function buildServer(opts: BuildOptions): FastifyInstance {
  const { config } = opts
  const app = Fastify({ logger: opts.logger === false ? false : { level: config.logLevel } })
  const store = opts.store ?? new MemoryStore()
  const intel = opts.intel ?? loadSeedIntel(config.intelSeedDir)
  const clock = opts.clock ?? (() => new Date())

  const managerOptions = (logger: Logger, manual: boolean): ManagerOptions => ({
    reopenDays: config.reopenDays,
    unknownOwner: config.unknownOwner,
    manual,
    clock,
    logger
  })

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      const body: ApiError = { code: 'BAD_REQUEST', message: describeIssues(err) }
      return reply.code(400).send(body)
    }
    if (isReconcileError(err)) {
      const body: ApiError = { code: err.code, message: err.message }
      return reply.code(STATUS_BY_CODE[err.code]).send(body)
    }
    const status = err.statusCode ?? 500
    if (status < 500) return reply.code(status).send({ code: 'BAD_REQUEST', message: err.message })
    req.log.error({ err }, 'request failed')
    return reply.code(500).send({ code: 'INTERNAL', message: 'internal error' })
  })

  app.get('/health', async () => ({ status: 'ok' }))

  app.put('/hosts/:ip', async (req) => {
    const { ip } = IpParamsSchema.parse(req.params)
    const body = HostRecordSchema.parse(req.body ?? {})
    ipToInt(ip)
    store.hosts.put({ ip, loc: body.loc })
    return { ip, loc: body.loc }
  })

  app.post('/runs/vulnerability', async (req, reply) => {
    const body = VulnerabilityRunSchema.parse(req.body)
    const manager = new VulnerabilityTicketManager(
      { tickets: store.tickets, scanRecords: store.scanRecords, hosts: store.hosts, notifications: store.notifications, intel },
      managerOptions(req.log, body.manual)
    )
    const run = manager.startRun({ ...body.scope, source: body.source })
    const counts = emptyCounts()
    let notified = 0
    for (const f of body.findings) {
      const ipInt = ipToInt(f.ip)
      await store.scanRecords.save({
        id: f.id, ip: f.ip, ipInt, port: f.port, protocol: f.protocol,
        source: body.source, sourceId: f.pluginId, latest: true, time: f.time
      })
      notified += tally(counts, await manager.openTicket(run, { ...f, source: body.source }, body.reason))
    }
    const closed = await manager.closeTickets(run)
    const latestCleared = await manager.clearLatestFlags(run)
    const summary: RunSummary = {
      ...counts, ...closed, notified, latestCleared,
      closingTime: run.closingTime ? run.closingTime.toISOString() : null
    }
    return reply.code(200).send(summary)
  })

  app.post('/runs/port', async (req, reply) => {
    const body = PortRunSchema.parse(req.body)
    const manager = new PortTicketManager(
      { tickets: store.tickets, scanRecords: store.scanRecords, hosts: store.hosts, notifications: store.notifications },
      managerOptions(req.log, body.manual)
    )
    const run = manager.startRun(body.scope)
    const counts = emptyCounts()
    let notified = 0
    for (const f of body.findings) {
      notified += tally(counts, await manager.openTicket(run, { ...f, source: body.source }, body.reason))
    }
    const closed = await manager.closeTickets(run, body.closingTime)
    const latestCleared = await manager.clearLatestFlags(run)
    const closingTime = body.closingTime ?? run.closingTime
    const summary: RunSummary = {
      ...counts, ...closed, notified, latestCleared,
      closingTime: closingTime ? closingTime.toISOString() : null
    }
    return reply.code(200).send(summary)
  })

  app.post('/runs/host', async (req, reply) => {
    const body = HostRunSchema.parse(req.body)
    const manager = new HostTicketManager(
      { tickets: store.tickets, scanRecords: store.scanRecords },
      managerOptions(req.log, body.manual)
    )
    const run = manager.startRun(body.scope)
    for (const ip of body.up) manager.ipUp(run, ip)
    const closed = await manager.closeTickets(run, body.closingTime)
    const latestCleared = await manager.clearLatestFlags(run)
    const summary: HostRunSummary = { ...closed, up: run.upHosts.size, latestCleared }
    return reply.code(200).send(summary)
  })

  app.get('/tickets', async (req) => {
    const query = TicketListQuerySchema.parse(req.query)
    return store.tickets.find({
      open: query.open === undefined ? undefined : query.open === 'true',
      ipInts: query.ip ? [ipToInt(query.ip)] : undefined
    })
  })

  app.get('/tickets/:id', async (req) => {
    const { id } = IdParamsSchema.parse(req.params)
    const ticket = await store.tickets.get(id)
    if (!ticket) throw new ReconcileError('TICKET_NOT_FOUND', `ticket not found: ${id}`)
    return ticket
  })

  app.post('/tickets/:id/false-positive', async (req) => {
    const { id } = IdParamsSchema.parse(req.params)
    const body = FalsePositiveSchema.parse(req.body)
    const ticket = await store.tickets.get(id)
    if (!ticket) throw new ReconcileError('TICKET_NOT_FOUND', `ticket not found: ${id}`)
    const now = clock()
    // an expired flag is cleared first so the ticket can be marked again
    const next = markFalsePositive(expireFalsePositive(ticket, now), {
      reason: body.reason,
      time: now,
      days: body.days,
      maxDays: config.falsePositiveMaxDays
    })
    return store.tickets.save(next)
  })

  app.get('/notifications', async () => store.notifications.notifications)

  return app
}
