/**
 * In-memory fixed-window rate limiter for Hono.
 *
 * Each middleware instance keeps its own counters, so separately limited
 * route groups never share a budget. Expired windows are dropped lazily.
 */

import type { Context, Next } from 'hono'

interface RateLimitConfig {
  /** Time window in milliseconds. */
  windowMs: number
  /** Maximum requests per window per key. */
  max: number
  /** Custom key extractor. Defaults to client IP. */
  keyFn?: (c: Context) => string
  /** Clock, for tests. */
  now?: () => number
}

interface Entry {
  count: number
  resetAt: number
}

export function rateLimit(config: RateLimitConfig) {
  const entries = new Map<string, Entry>()
  const now = config.now ?? Date.now

  function sweep(at: number): void {
    for (const [key, entry] of entries) {
      if (at > entry.resetAt) entries.delete(key)
    }
  }

  return async (c: Context, next: Next): Promise<Response | void> => {
    const key =
      config.keyFn?.(c) ??
      c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ??
      'unknown'

    const at = now()
    const entry = entries.get(key)

    if (!entry || at > entry.resetAt) {
      if (entries.size > 10_000) sweep(at)
      entries.set(key, { count: 1, resetAt: at + config.windowMs })
      return next()
    }

    if (entry.count >= config.max) {
      c.header('Retry-After', String(Math.ceil((entry.resetAt - at) / 1000)))
      return c.json({ error: 'Too many requests. Please try again later.' }, 429)
    }

    entry.count++
    return next()
  }
}
