/**
 * Environment variable validation: fail-fast on startup.
 *
 * Only the server entry point imports this module; the app factory takes
 * its settings as arguments so tests never need a database URL.
 */

import { resolveAnalysisConfig } from '@millscope/config'

function required(key: string): string {
  const val = process.env[key]
  if (!val) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Set it in .env or your deployment configuration.`,
    )
  }
  return val
}

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback
}

function port(raw: string): number {
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 1 || value > 65_535) {
    throw new Error(`Invalid PORT: ${raw}`)
  }
  return value
}

export const env = {
  DATABASE_URL: required('DATABASE_URL'),
  PORT: port(optional('PORT', '4000')),
  NODE_ENV: optional('NODE_ENV', 'development'),
  CORS_ORIGINS: optional('CORS_ORIGINS', 'http://localhost:3000').split(',').map((o) => o.trim()),
  ANALYSIS: resolveAnalysisConfig(process.env),
} as const
