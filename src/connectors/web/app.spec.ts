import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createApp } from './app.js'
import { UpstreamError } from '../../core/errors.js'
import { FmpIncomeStatementClient, type IncomeStatementSource } from '../../fmp/client.js'
import type { FinancialRecord } from '../../fmp/types/income-statement.js'

const rec2023 = { date: 2023, revenue: 100, netIncome: 10 }
const rec2022 = { date: 2022, revenue: 200, netIncome: 20 }

function sourceOf(records: FinancialRecord[]) {
  return { fetchIncomeStatements: vi.fn(async () => records) } satisfies IncomeStatementSource
}

function failingSource(error: Error) {
  return {
    fetchIncomeStatements: vi.fn(async (): Promise<FinancialRecord[]> => {
      throw error
    }),
  } satisfies IncomeStatementSource
}

describe('GET /fetch_data', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.unstubAllGlobals()
    vi.restoreAllMocks()
  })

  // ==================== Success ====================

  it('returns all records sorted by date descending when no parameters are given', async () => {
    const app = createApp({ source: sourceOf([rec2022, rec2023]) })

    const res = await app.request('/fetch_data')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual([rec2023, rec2022])
  })

  it('keeps upstream order when already descending', async () => {
    const app = createApp({ source: sourceOf([rec2023, rec2022]) })

    const res = await app.request('/fetch_data')
    expect(await res.json()).toEqual([rec2023, rec2022])
  })

  it('filters by minRevenue', async () => {
    const app = createApp({ source: sourceOf([rec2023, rec2022]) })

    const res = await app.request('/fetch_data?minRevenue=150')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual([rec2022])
  })

  it('sorts by revenue', async () => {
    const app = createApp({ source: sourceOf([rec2023, rec2022]) })

    const res = await app.request('/fetch_data?sortBy=revenue')
    expect(await res.json()).toEqual([rec2022, rec2023])
  })

  it('ignores a zero bound', async () => {
    const app = createApp({ source: sourceOf([rec2023, rec2022]) })

    const res = await app.request('/fetch_data?maxRevenue=0&sortBy=netIncome')
    expect(await res.json()).toEqual([rec2022, rec2023])
  })

  it('leaves upstream order for an unknown sort key', async () => {
    const app = createApp({ source: sourceOf([rec2022, rec2023]) })

    const res = await app.request('/fetch_data?sortBy=eps')
    expect(await res.json()).toEqual([rec2022, rec2023])
  })

  it('allows any origin', async () => {
    const app = createApp({ source: sourceOf([]) })

    const res = await app.request('/fetch_data', { headers: { Origin: 'https://dashboard.example' } })
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*')
  })

  // ==================== Errors ====================

  it('returns 500 with the upstream message when the provider call fails', async () => {
    const app = createApp({ source: failingSource(new UpstreamError('FMP request failed with status 503: ')) })

    const res = await app.request('/fetch_data')
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: 'FMP request failed with status 503: ' })
  })

  it('returns 500 end to end when the network is down', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed')))
    const source = new FmpIncomeStatementClient({
      baseUrl: 'https://fmp.test',
      apiKey: 'test-key',
      symbol: 'AAPL',
      period: 'annual',
    })
    const app = createApp({ source })

    const res = await app.request('/fetch_data?minRevenue=150')
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({
      error: 'FMP request to https://fmp.test/api/v3/income-statement/AAPL failed: fetch failed',
    })
  })

  it('returns 400 for a malformed parameter without calling upstream', async () => {
    const source = sourceOf([rec2023])
    const app = createApp({ source })

    const res = await app.request('/fetch_data?minRevenue=lots')
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: 'Invalid value "lots" for query parameter minRevenue: expected a number',
    })
    expect(source.fetchIncomeStatements).not.toHaveBeenCalled()
  })

  it('returns 502 when a record lacks a field the request needs', async () => {
    const app = createApp({ source: sourceOf([{ date: 2023, revenue: 100 }]) })

    const res = await app.request('/fetch_data?minNetIncome=5')
    expect(res.status).toBe(502)
    expect(await res.json()).toEqual({ error: 'Upstream record at index 0 has no usable "netIncome" field' })
  })

  it('hides unexpected errors behind a generic 500', async () => {
    const app = createApp({ source: failingSource(new Error('boom')) })

    const res = await app.request('/fetch_data')
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: 'Internal server error' })
    expect(console.error).toHaveBeenCalledTimes(1)
  })

  it('returns 404 JSON for other routes', async () => {
    const app = createApp({ source: sourceOf([]) })

    const res = await app.request('/income')
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Not found' })
  })
})
