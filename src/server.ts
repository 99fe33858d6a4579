import 'dotenv/config'
import { serve } from '@hono/node-server'
import app from './app.ts'
import { getReconConfig } from './config/recon-config.ts'
import { initializeDatabase, shutdownDatabase } from './database/client.ts'
import { errorMessage } from './plumbing/errors.ts'
import { log } from './plumbing/logger.ts'
import { parseNumber } from './plumbing/env.ts'

const main = async (): Promise<void> => {
  if (!process.env.PORT) {
    log('process.env.PORT is undefined - defaulting to 3000')
  }
  const port = parseNumber(process.env.PORT, 3000)

  // Fail at startup rather than on the first request
  getReconConfig()
  await initializeDatabase()

  const server = serve({ fetch: app.fetch, port }, (address) => {
    log(`Recon service listening at http://localhost:${address.port}`)
  })

  const shutdown = (signal: string): void => {
    log({ message: 'Shutting down', signal })
    server.close()
    shutdownDatabase().catch((error: unknown) => {
      log({ message: 'Shutdown failed', error: errorMessage(error) })
      process.exitCode = 1
    })
  }

  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

main().catch((error: unknown) => {
  log({ message: 'Failed to start service', error: errorMessage(error) })
  process.exitCode = 1
})
