/**
 * Financial Modeling Prep income-statement client.
 *
 * The request URL is fixed at construction (symbol, period and key come from
 * config). One GET per call, no retry, no caching.
 */

import type { FmpConfig } from '../core/config.js'
import { UpstreamError } from '../core/errors.js'
import type { FinancialRecord, FmpErrorBody } from './types/income-statement.js'

/** Anything that can produce the raw record sequence; the web connector depends on this, not on FMP. */
export interface IncomeStatementSource {
  fetchIncomeStatements(): Promise<FinancialRecord[]>
}

export class FmpIncomeStatementClient implements IncomeStatementSource {
  private readonly url: string
  /** Same URL without the query string, safe to put in logs and error messages. */
  private readonly displayUrl: string

  constructor(config: FmpConfig) {
    const baseUrl = config.baseUrl.replace(/\/$/, '')
    const path = `/api/v3/income-statement/${encodeURIComponent(config.symbol)}`
    const query = new URLSearchParams({ period: config.period, apikey: config.apiKey })

    this.url = `${baseUrl}${path}?${query.toString()}`
    this.displayUrl = `${baseUrl}${path}`
  }

  async fetchIncomeStatements(): Promise<FinancialRecord[]> {
    try {
      return await this.request()
    } catch (err) {
      const error = err instanceof UpstreamError
        ? err
        : new UpstreamError(`FMP request to ${this.displayUrl} failed: ${errorMessage(err)}`, { cause: err })
      console.error(`fmp: ${error.message}`)
      throw error
    }
  }

  // ==================== Internal ====================

  private async request(): Promise<FinancialRecord[]> {
    const res = await fetch(this.url)

    if (!res.ok) {
      const body = await res.text().catch(() => '')
      throw new UpstreamError(
        `FMP request to ${this.displayUrl} failed with status ${res.status}: ${body.slice(0, 200)}`,
        { status: res.status },
      )
    }

    let payload: unknown
    try {
      payload = await res.json()
    } catch (err) {
      throw new UpstreamError('FMP response body was not valid JSON', { status: res.status, cause: err })
    }

    if (isFmpErrorBody(payload)) {
      throw new UpstreamError(`FMP error: ${payload['Error Message']}`, { status: res.status })
    }

    if (!isRecordList(payload)) {
      throw new UpstreamError('FMP response was not a list of records', { status: res.status })
    }

    return payload
  }
}

// ==================== Guards ====================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isFmpErrorBody(value: unknown): value is FmpErrorBody {
  return isPlainObject(value) && typeof value['Error Message'] === 'string'
}

function isRecordList(value: unknown): value is FinancialRecord[] {
  return Array.isArray(value) && value.every(isPlainObject)
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    // undici wraps the socket-level reason (ECONNREFUSED, ENOTFOUND) in `cause`
    return err.cause instanceof Error ? `${err.message} (${err.cause.message})` : err.message
  }
  return String(err)
}
