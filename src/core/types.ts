import type { Config } from './config.js'
import type { IncomeStatementSource } from '../fmp/client.js'

export interface Plugin {
  name: string
  start(ctx: EngineContext): Promise<void>
  stop(): Promise<void>
}

/** Shared, immutable wiring handed to every plugin at start. */
export interface EngineContext {
  config: Readonly<Config>
  source: IncomeStatementSource
}
