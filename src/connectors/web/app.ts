import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { MalformedQueryError, MissingFieldError, UpstreamError } from '../../core/errors.js'
import type { IncomeStatementSource } from '../../fmp/client.js'
import { parseQuery } from '../../statements/query.js'
import { applyCriteria } from '../../statements/transform.js'

export interface AppDeps {
  source: IncomeStatementSource
}

/**
 * Build the HTTP app. Kept separate from the server plugin so tests can drive
 * it in-process through `app.request()`.
 */
export function createApp({ source }: AppDeps) {
  const app = new Hono()

  // Any origin
  app.use('*', cors())

  // ==================== Income statements ====================

  app.get('/fetch_data', async (c) => {
    // Query is validated before the upstream call
    const { criteria, sortKey } = parseQuery(c.req.query())
    const records = await source.fetchIncomeStatements()
    return c.json(applyCriteria(records, criteria, sortKey))
  })

  // ==================== Errors ====================

  app.notFound((c) => c.json({ error: 'Not found' }, 404))

  app.onError((err, c) => {
    if (err instanceof MalformedQueryError) {
      return c.json({ error: err.message }, 400)
    }
    if (err instanceof UpstreamError) {
      return c.json({ error: err.message }, 500)
    }
    if (err instanceof MissingFieldError) {
      console.warn(`web: bad upstream data on ${c.req.path}: ${err.message}`)
      return c.json({ error: err.message }, 502)
    }
    console.error(`web: unhandled error on ${c.req.method} ${c.req.path}:`, err)
    return c.json({ error: 'Internal server error' }, 500)
  })

  return app
}
