import { Hono } from 'hono'
import {
  cleanReadings,
  nullProfile,
  type ReadingStore,
  type WritableReadingStore,
} from '@millscope/mill-analytics'
import { rawReadingBatchSchema } from '@millscope/shared'
import { parseBody, isResponse } from '../lib/validate'

function isWritable(store: ReadingStore): store is WritableReadingStore {
  return 'append' in store && typeof store.append === 'function'
}

/** Raw reading ingestion and data-quality profile. */
export function readingRoutes(store: ReadingStore) {
  const routes = new Hono()

  /** GET /readings/profile - null counts per column and cleaning outcome */
  routes.get('/profile', async (c) => {
    const raw = await store.loadRaw()
    const { readings, droppedNullThroughput, droppedDuplicates } = cleanReadings(raw)
    return c.json({
      rows: raw.length,
      usable: readings.length,
      droppedNullThroughput,
      droppedDuplicates,
      nulls: nullProfile(raw),
    })
  })

  /** POST /readings - append a batch of raw historian rows */
  routes.post('/', async (c) => {
    if (!isWritable(store)) return c.json({ error: 'Reading store is read-only.' }, 405)
    const rows = await parseBody(c, rawReadingBatchSchema)
    if (isResponse(rows)) return rows
    const stored = await store.append(rows)
    return c.json({ stored }, 201)
  })

  return routes
}
