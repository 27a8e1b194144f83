import { serve } from '@hono/node-server'
import { PgReadingStore, queryClient } from '@millscope/db'
import { createApp } from './app'
import { env } from './lib/env'
import { writeJsonLine } from './lib/log'

const app = createApp({
  store: new PgReadingStore(),
  config: env.ANALYSIS,
  corsOrigins: env.CORS_ORIGINS,
  exposeStacks: env.NODE_ENV !== 'production',
  healthChecks: {
    postgres: async () => {
      await queryClient`SELECT 1`
    },
  },
})

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  writeJsonLine('stdout', {
    event: 'server_started',
    port: info.port,
    env: env.NODE_ENV,
  })
})

function shutdown(signal: string) {
  writeJsonLine('stdout', { event: 'shutdown', signal })

  server.close(() => {
    queryClient.end({ timeout: 5 }).then(
      () => process.exit(0),
      () => process.exit(1),
    )
  })
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
