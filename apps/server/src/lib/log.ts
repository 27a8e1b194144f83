/**
 * Structured JSON-line logging.
 *
 * Request and lifecycle events go to stdout, failures to stderr. Each entry
 * is one JSON object per line so any log aggregator can ingest it.
 */

export type LogStream = 'stdout' | 'stderr'

export type LogEntry = Record<string, unknown>

export type LogWriter = (stream: LogStream, entry: LogEntry) => void

export const writeJsonLine: LogWriter = (stream, entry) => {
  process[stream].write(JSON.stringify({ ts: new Date().toISOString(), ...entry }) + '\n')
}
