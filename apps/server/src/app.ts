import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { HTTPException } from 'hono/http-exception'
import type { AnalysisConfig } from '@millscope/config'
import { isAnalyticsError, type ReadingStore } from '@millscope/mill-analytics'
import { writeJsonLine, type LogWriter } from './lib/log'
import { rateLimit } from './lib/rate-limit'
import { requestLogger } from './lib/request-logger'
import { analysisRoutes } from './routes/analysis'
import { readingRoutes } from './routes/readings'

export type HealthCheck = () => Promise<void>

export interface AppOptions {
  store: ReadingStore
  config: AnalysisConfig
  corsOrigins?: string[]
  /** Named dependency probes for /health; each throws when unhealthy. */
  healthChecks?: Record<string, HealthCheck>
  /** Include stack traces in error logs. */
  exposeStacks?: boolean
  log?: LogWriter
}

export function createApp(options: AppOptions) {
  const { store, config, healthChecks = {}, log = writeJsonLine } = options
  const app = new Hono()

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    // Statistic undefined for this snapshot
    if (isAnalyticsError(err)) {
      return c.json({ error: err.message, kind: err.kind }, 422)
    }
    if (err instanceof HTTPException) return err.getResponse()

    log('stderr', {
      level: 'error',
      method: c.req.method,
      path: c.req.path,
      error: err.message,
      stack: options.exposeStacks ? err.stack : undefined,
    })
    return c.json({ error: 'Internal server error.' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ---------------------------------------------------------------------------
  // Middleware stack (order matters)
  // ---------------------------------------------------------------------------

  // 1. Request logging (first so it captures total duration)
  app.use('*', requestLogger(log))

  // 2. CORS
  app.use(
    '*',
    cors({
      origin: options.corsOrigins ?? '*',
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )

  // 3. Rate limiting on the expensive and write endpoints
  app.use('/analysis/report', rateLimit({ windowMs: 60_000, max: 30 }))
  app.use('/readings', rateLimit({ windowMs: 60_000, max: 60 }))

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------

  app.get('/health', async (c) => {
    const checks: Record<string, string> = {}
    for (const [name, probe] of Object.entries(healthChecks)) {
      try {
        await probe()
        checks[name] = 'ok'
      } catch (err) {
        checks[name] = 'error'
        log('stderr', { level: 'warn', check: name, error: err instanceof Error ? err.message : String(err) })
      }
    }

    const healthy = Object.values(checks).every((v) => v === 'ok')
    return c.json({ status: healthy ? 'healthy' : 'degraded', checks }, healthy ? 200 : 503)
  })

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.route('/analysis', analysisRoutes({ store, config }))
  app.route('/readings', readingRoutes(store))

  app.get('/', (c) => c.json({ name: 'millscope API', version: '0.1.0' }))

  return app
}
