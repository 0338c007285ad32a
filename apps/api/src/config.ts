import fs from 'node:fs'
import path from 'node:path'
import YAML from 'yaml'
import { z } from 'zod'

export const ConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(3333),
  host: z.string().min(1).default('0.0.0.0'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  reopenDays: z.coerce.number().int().positive().default(90),
  unknownOwner: z.string().min(1).default('UNKNOWN'),
  falsePositiveMaxDays: z.coerce.number().int().positive().default(365),
  intelSeedDir: z.string().min(1).optional()
})

export type AppConfig = z.infer<typeof ConfigSchema>

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value)
}

function readConfigFile(file: string): Record<string, unknown> {
  const parsed: unknown = YAML.parse(fs.readFileSync(path.resolve(file), 'utf8'))
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) throw new Error(`config file ${file} must hold a mapping`)
  return parsed
}

// Environment variables win over the YAML file; unset ones are left to the file or the defaults
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fromFile = env.SCANLEDGER_CONFIG ? readConfigFile(env.SCANLEDGER_CONFIG) : {}
  const fromEnv: Record<string, string> = {}
  const mapping: Record<string, string | undefined> = {
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    reopenDays: env.REOPEN_DAYS,
    intelSeedDir: env.INTEL_SEED_DIR
  }
  for (const [key, value] of Object.entries(mapping)) {
    if (value !== undefined && value !== '') fromEnv[key] = value
  }
  return ConfigSchema.parse({ ...fromFile, ...fromEnv })
}
