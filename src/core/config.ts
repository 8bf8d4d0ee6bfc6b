import { z } from 'zod'
import { ConfigError } from './errors.js'

// ==================== Provider constants ====================

/** Financial Modeling Prep; fixed for this service, not configurable per request. */
export const FMP_BASE_URL = 'https://financialmodelingprep.com'
export const FMP_SYMBOL = 'AAPL'
export const FMP_PERIOD = 'annual'

// ==================== Schema ====================

const envSchema = z.object({
  API_KEY: z.string().trim().min(1, 'API_KEY is required'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(5000),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
})

export interface FmpConfig {
  baseUrl: string
  apiKey: string
  symbol: string
  period: string
}

export interface Config {
  fmp: FmpConfig
  web: {
    host: string
    port: number
  }
}

// ==================== Loader ====================

/**
 * Build the process-wide configuration from environment variables.
 * Called once at startup; the result is frozen and passed down explicitly.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<Config> {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`config: invalid environment (${details})`)
  }

  const { API_KEY, PORT, HOST } = parsed.data
  return Object.freeze({
    fmp: Object.freeze({
      baseUrl: FMP_BASE_URL,
      apiKey: API_KEY,
      symbol: FMP_SYMBOL,
      period: FMP_PERIOD,
    }),
    web: Object.freeze({ host: HOST, port: PORT }),
  })
}
