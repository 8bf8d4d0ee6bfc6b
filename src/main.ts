import 'dotenv/config'
import { loadConfig } from './core/config.js'
import type { Plugin, EngineContext } from './core/types.js'
import { FmpIncomeStatementClient } from './fmp/client.js'
import { WebPlugin } from './connectors/web/index.js'

async function main() {
  const config = loadConfig()

  // ==================== Infrastructure ====================

  const ctx: EngineContext = {
    config,
    source: new FmpIncomeStatementClient(config.fmp),
  }

  // ==================== Plugins ====================

  const plugins: Plugin[] = [new WebPlugin()]

  for (const plugin of plugins) {
    await plugin.start(ctx)
  }

  // ==================== Shutdown ====================

  let stopping = false
  const shutdown = async () => {
    if (stopping) return
    stopping = true
    for (const plugin of plugins) {
      try {
        await plugin.stop()
      } catch (err) {
        console.error(`engine: failed to stop plugin ${plugin.name}:`, err)
      }
    }
    process.exit(0)
  }
  process.on('SIGINT', () => void shutdown())
  process.on('SIGTERM', () => void shutdown())

  console.log(`engine: serving ${config.fmp.symbol} ${config.fmp.period} income statements`)
}

main().catch((err) => {
  console.error('engine: fatal error:', err)
  process.exit(1)
})
