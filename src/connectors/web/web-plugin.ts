import { serve } from '@hono/node-server'
import type { Plugin, EngineContext } from '../../core/types.js'
import { createApp } from './app.js'

export class WebPlugin implements Plugin {
  name = 'web'
  private server: ReturnType<typeof serve> | null = null

  async start(ctx: EngineContext) {
    if (this.server) return

    const app = createApp({ source: ctx.source })
    const { host, port } = ctx.config.web

    // ==================== Start server ====================
    await new Promise<void>((resolve) => {
      this.server = serve({ fetch: app.fetch, hostname: host, port }, (info) => {
        console.log(`web: listening on http://${info.address}:${info.port}`)
        resolve()
      })
    })
  }

  /** Resolves once in-flight requests have finished and the listener is closed. */
  async stop() {
    const server = this.server
    if (!server) return
    this.server = null

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()))
    })
    console.log('web: stopped')
  }

  /** Bound port, or null when not started. */
  port(): number | null {
    const address = this.server?.address()
    return address && typeof address === 'object' ? address.port : null
  }
}
