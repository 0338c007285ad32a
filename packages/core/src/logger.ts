import { pino, type BaseLogger } from 'pino'

export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>

let shared: Logger | null = null

// Lazily created so that callers passing their own logger (e.g. Fastify's) never spin one up
export function defaultLogger(): Logger {
  if (!shared) shared = pino({ name: 'scanledger', level: process.env.LOG_LEVEL ?? 'info' })
  return shared
}
