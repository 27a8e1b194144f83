import { Hono } from 'hono'
import type { AnalysisConfig } from '@millscope/config'
import {
  TREND_PRESETS,
  analyzeBatch,
  analyzeOutliers,
  buildAlertCatalog,
  evaluateAlert,
  groupedMean,
  loadCleanReadings,
  monthlyTrend,
  pearsonCorrelation,
  quartiles,
  rollingMean,
  runningHours,
  sortByTime,
  summarize,
  type ReadingStore,
} from '@millscope/mill-analytics'
import {
  alertParam,
  breakdownQuery,
  correlationQuery,
  fieldParam,
  outlierQuery,
  rollingQuery,
  runningHoursQuery,
  trendParam,
} from '@millscope/shared'
import { parseInput, isResponse } from '../lib/validate'

export interface AnalysisDeps {
  store: ReadingStore
  config: AnalysisConfig
}

/**
 * Read-only analysis endpoints. Every request loads one snapshot from the
 * store, cleans it, and runs a single analysis over it. Analytics errors
 * propagate to the app's error handler.
 */
export function analysisRoutes({ store, config }: AnalysisDeps) {
  const routes = new Hono()
  const catalog = buildAlertCatalog(config)

  async function snapshot() {
    const { readings } = await loadCleanReadings(store)
    return readings
  }

  /** GET /analysis/summary/:field - descriptive statistics */
  routes.get('/summary/:field', async (c) => {
    const params = parseInput(c, fieldParam, c.req.param())
    if (isResponse(params)) return params
    return c.json({ summary: summarize(await snapshot(), params.field) })
  })

  /** GET /analysis/quartiles/:field - Q1, median, Q3 */
  routes.get('/quartiles/:field', async (c) => {
    const params = parseInput(c, fieldParam, c.req.param())
    if (isResponse(params)) return params
    return c.json({ quartiles: quartiles(await snapshot(), params.field) })
  })

  /** GET /analysis/outliers?fields=a,b&multiplier=k - IQR outliers, most recent first */
  routes.get('/outliers', async (c) => {
    const query = parseInput(c, outlierQuery, c.req.query())
    if (isResponse(query)) return query
    const report = analyzeOutliers(await snapshot(), query.fields, {
      multiplier: query.multiplier ?? config.IQR_MULTIPLIER,
    })
    return c.json(report)
  })

  /** GET /analysis/correlation?x=&y= - Pearson r */
  routes.get('/correlation', async (c) => {
    const query = parseInput(c, correlationQuery, c.req.query())
    if (isResponse(query)) return query
    const r = pearsonCorrelation(await snapshot(), query.x, query.y)
    return c.json({ x: query.x, y: query.y, r })
  })

  /** GET /analysis/alerts/:alertId - evaluate one catalogue alert */
  routes.get('/alerts/:alertId', async (c) => {
    const params = parseInput(c, alertParam, c.req.param())
    if (isResponse(params)) return params
    return c.json(evaluateAlert(await snapshot(), catalog[params.alertId]))
  })

  /** GET /analysis/rolling/:field?window=n - trailing mean, most recent first */
  routes.get('/rolling/:field', async (c) => {
    const params = parseInput(c, fieldParam, c.req.param())
    if (isResponse(params)) return params
    const query = parseInput(c, rollingQuery, c.req.query())
    if (isResponse(query)) return query

    const window = query.window ?? config.ROLLING_WINDOW
    const ordered = sortByTime(await snapshot(), 'asc')
    const points = [...rollingMean(ordered, params.field, { window })].reverse()
    return c.json({ field: params.field, window, points })
  })

  /** GET /analysis/trends/:preset - monthly aggregates with growth */
  routes.get('/trends/:preset', async (c) => {
    const params = parseInput(c, trendParam, c.req.param())
    if (isResponse(params)) return params
    const buckets = monthlyTrend<string>(await snapshot(), TREND_PRESETS[params.preset])
    return c.json({ preset: params.preset, buckets })
  })

  /** GET /analysis/breakdown?by=&of= - mean of one field per value of another */
  routes.get('/breakdown', async (c) => {
    const query = parseInput(c, breakdownQuery, c.req.query())
    if (isResponse(query)) return query
    return c.json({ by: query.by, of: query.of, groups: groupedMean(await snapshot(), query.by, query.of) })
  })

  /** GET /analysis/running-hours/:field?limit= - hours logged per load */
  routes.get('/running-hours/:field', async (c) => {
    const params = parseInput(c, fieldParam, c.req.param())
    if (isResponse(params)) return params
    const query = parseInput(c, runningHoursQuery, c.req.query())
    if (isResponse(query)) return query

    const limit = query.limit ?? config.RUNNING_HOURS_LIMIT
    return c.json({ field: params.field, limit, hours: runningHours(await snapshot(), params.field, limit) })
  })

  /** GET /analysis/report - every analysis, failures isolated per entry */
  routes.get('/report', async (c) => {
    return c.json(analyzeBatch(await snapshot(), config))
  })

  return routes
}
