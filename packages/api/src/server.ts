// ---------------------------------------------------------------------------
// Node entry point (local development and container deployments)
// ---------------------------------------------------------------------------

import { serve } from '@hono/node-server'
import { app } from './app'
import { getConfig } from './config'
import { closeDb } from './db'

const { PORT, NODE_ENV } = getConfig()

const server = serve({ fetch: app.fetch, port: PORT }, (info) => {
  console.log(`[server] listening on http://localhost:${info.port} (${NODE_ENV})`)
})

function shutdown(signal: string) {
  console.log(`[server] ${signal} received, shutting down`)
  server.close(() => {
    closeDb()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[server] failed to close database pool', err)
        process.exit(1)
      })
  })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
