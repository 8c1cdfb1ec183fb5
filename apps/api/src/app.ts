import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { TENANT_HEADER } from '@nat/schema'
import type { Logger } from './lib/logger.js'
import { requestId, requestLogger } from './middleware/request.js'
import { createCoreApiRoutes } from './routes/core-api.js'
import type { DemoDataService } from './routes/demo.js'
import { fail, failWithError } from './routes/_api.js'
import { LedgerError } from './services/ledger-errors.js'
import { systemClock, type Clock, type OpportunityLedger } from './services/opportunity-ledger.js'

export const SERVICE_NAME = 'next-action-tracker-api'
export const API_VERSION = '1.0.0'

export type AppDeps = {
  ledger: OpportunityLedger
  logger: Logger
  allowedOrigins: string[]
  /** Demo reset is mounted only when a service is supplied. */
  demo?: DemoDataService | null
  clock?: Clock
}

/**
 * Builds the HTTP application. No I/O happens here; `server.ts` wires the
 * database-backed ledger and starts listening.
 */
export function createApp({ ledger, logger, allowedOrigins, demo = null, clock = systemClock }: AppDeps) {
  const app = new Hono()

  app.use('*', requestId)
  app.use('*', requestLogger(logger))
  app.use(
    '/*',
    cors({
      origin: allowedOrigins,
      allowHeaders: ['Content-Type', TENANT_HEADER, 'X-Request-ID'],
      exposeHeaders: ['X-Request-ID'],
      credentials: true,
    }),
  )

  app.get('/', (c) => {
    return c.json({ message: 'Next Action Tracker API', version: API_VERSION })
  })

  app.get('/health', (c) => {
    return c.json({ status: 'healthy', service: SERVICE_NAME, version: API_VERSION })
  })

  app.route('/api/v1', createCoreApiRoutes({ ledger, logger, clock, demo }))

  app.onError((err, c) => {
    if (err instanceof LedgerError) {
      return failWithError(c, err)
    }
    logger.error('Unhandled error', { error: err.message, errorType: err.name, path: c.req.path })
    return fail(c, 'SERVER_ERROR', 'Internal server error', 500)
  })

  app.notFound((c) => fail(c, 'NOT_FOUND', 'Not found', 404))

  return app
}
