import { buildServer } from './app.js'
import { loadConfig } from './config.js'

const config = loadConfig()
const app = buildServer({ config })

async function listenWithFallback(startPort: number, host: string, attempts = 10) {
  for (let i = 0; i <= attempts; i++) {
    const tryPort = startPort + i
    try {
      await app.listen({ port: tryPort, host })
      app.log.info(`API listening on http://localhost:${tryPort}`)
      return
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined
      if (code !== 'EADDRINUSE') {
        app.log.error({ err }, `Failed to start server on port ${tryPort}`)
        throw err
      }
      app.log.warn(`Port ${tryPort} in use. Trying next...`)
    }
  }
  throw new Error(`All ports ${startPort}-${startPort + attempts} busy`)
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.close().then(() => process.exit(0), (err: unknown) => {
      app.log.error({ err }, 'Failed to close server')
      process.exit(1)
    })
  })
}

await listenWithFallback(config.port, config.host)
