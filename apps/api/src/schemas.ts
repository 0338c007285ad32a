import { z } from 'zod'
import { isReconcileError, parsePortList, toUtcDate, type Severity } from '@scanledger/core'

const timestamp = z.union([z.string(), z.number(), z.date()]).transform((value, ctx) => {
  try {
    return toUtcDate(value)
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp: ${String(value)}` })
    return z.NEVER
  }
})

const port = z.number().int().min(0).max(65535)

// either a list of numbers or an nmap-style string such as "1-1024,8080"
const portList = z.union([z.array(port), z.string()]).transform((value, ctx) => {
  if (Array.isArray(value)) return value
  try {
    return parsePortList(value)
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: isReconcileError(err) ? err.message : 'invalid port list' })
    return z.NEVER
  }
})

const protocol = z.enum(['tcp', 'udp'])

function isSeverity(n: number): n is Severity {
  return n === 0 || n === 1 || n === 2 || n === 3 || n === 4
}

const severity = z.number().refine(isSeverity, { message: 'severity must be an integer from 0 to 4' })

const ipList = z.array(z.string().min(1))

export const VulnerabilityFindingSchema = z.object({
  id: z.string().min(1),
  ip: z.string().min(1),
  port,
  protocol,
  pluginId: z.number().int(),
  pluginName: z.string().min(1),
  severity,
  cvssBaseScore: z.number().min(0).max(10),
  cvss3BaseScore: z.number().min(0).max(10).optional(),
  cve: z.string().min(1).optional(),
  vprScore: z.number().optional(),
  owner: z.string().min(1),
  time: timestamp
})

export const VulnerabilityRunSchema = z.object({
  source: z.string().min(1),
  reason: z.string().min(1).default('vulnscan'),
  manual: z.boolean().default(false),
  scope: z.object({
    ips: ipList,
    ports: portList,
    sourceIds: z.array(z.number().int())
  }),
  findings: z.array(VulnerabilityFindingSchema)
})

export const PortFindingSchema = z.object({
  id: z.string().min(1),
  ip: z.string().min(1),
  port,
  protocol,
  sourceId: z.number().int().default(1),
  name: z.string().min(1),
  service: z.string().default('unknown'),
  owner: z.string().min(1),
  time: timestamp
})

export const PortRunSchema = z.object({
  source: z.string().min(1).default('nmap'),
  reason: z.string().min(1).default('portscan'),
  manual: z.boolean().default(false),
  scope: z.object({
    ips: ipList,
    ports: portList,
    protocols: z.array(protocol)
  }),
  findings: z.array(PortFindingSchema),
  closingTime: timestamp.optional()
})

export const HostRunSchema = z.object({
  manual: z.boolean().default(false),
  scope: z.object({ ips: ipList }),
  up: ipList,
  closingTime: timestamp.optional()
})

export const FalsePositiveSchema = z.object({
  reason: z.string().min(1),
  days: z.number().int().positive()
})

export const HostRecordSchema = z.object({
  loc: z.tuple([z.number(), z.number()]).nullable().default(null)
})

export const TicketListQuerySchema = z.object({
  open: z.enum(['true', 'false']).optional(),
  ip: z.string().min(1).optional()
})

export const IdParamsSchema = z.object({ id: z.string().min(1) })

export const IpParamsSchema = z.object({ ip: z.string().min(1) })
