/**
 * Request logging middleware.
 *
 * Emits one JSON line per request with method, path, response status and
 * duration in ms. Registered first so the duration covers every handler.
 */

import type { Context, Next } from 'hono'
import { writeJsonLine, type LogWriter } from './log'

export function requestLogger(write: LogWriter = writeJsonLine) {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    const ms = Number((performance.now() - start).toFixed(1))

    write('stdout', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms,
    })
  }
}
