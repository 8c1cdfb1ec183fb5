import 'dotenv/config'
import { serve } from '@hono/node-server'
import { createDatabase, resetDemoData } from '@nat/db'
import { createApp } from './app.js'
import { loadConfig } from './config.js'
import { createLogger } from './lib/logger.js'
import { OpportunityLedger } from './services/opportunity-ledger.js'
import { createDrizzleOpportunityStore } from './services/opportunity-store.js'

const config = loadConfig()
const logger = createLogger({ level: config.logLevel })
const database = createDatabase(config.databaseUrl)

const ledger = new OpportunityLedger(createDrizzleOpportunityStore(database.db), logger)

const app = createApp({
  ledger,
  logger,
  allowedOrigins: config.allowedOrigins,
  demo: config.demoResetEnabled ? { reset: (now) => resetDemoData(database.db, now) } : null,
})

const server = serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info('API listening', { url: `http://localhost:${info.port}`, env: config.nodeEnv })
    if (config.demoResetEnabled) {
      logger.warn('Demo reset endpoint is enabled')
    }
  },
)

database.checkDatabaseConnection().then(
  () => logger.info('Database connection verified'),
  (error: unknown) =>
    logger.error('Database connection check failed', {
      error: error instanceof Error ? error.message : String(error),
    }),
)

function shutdown(signal: string) {
  logger.info('Shutting down', { signal })
  server.close()
  database.pool.end().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error('Failed to close database pool', {
        error: error instanceof Error ? error.message : String(error),
      })
      process.exit(1)
    },
  )
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
