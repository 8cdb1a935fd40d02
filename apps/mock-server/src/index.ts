import { serve } from '@hono/node-server'
import { createLogger } from '@fairness-check/shared'
import { createApp } from './app'
import { readServerEnv } from './lib/env'

const env = readServerEnv()
const logger = createLogger({ level: env.LOG_LEVEL, bindings: { service: 'mock-server' } })
const app = createApp({ logger })

// ─── Server start + graceful shutdown ─────────────────────────────────────

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  logger.info('server_started', { port: info.port })
})

function shutdown(signal: string) {
  logger.info('shutdown', { signal })

  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
