/**
 * Versioned API router (`/api/v1`).
 */

import { Hono } from 'hono'
import type { Logger } from '../lib/logger.js'
import type { Clock, OpportunityLedger } from '../services/opportunity-ledger.js'
import { createDemoRoutes, type DemoDataService } from './demo.js'
import { createOpportunityRoutes } from './opportunities.js'

export type CoreApiDeps = {
  ledger: OpportunityLedger
  clock: Clock
  logger: Logger
  demo: DemoDataService | null
}

export function createCoreApiRoutes(deps: CoreApiDeps) {
  const coreApiRoutes = new Hono()

  coreApiRoutes.route('/', createOpportunityRoutes(deps))
  if (deps.demo) {
    coreApiRoutes.route('/', createDemoRoutes({ demo: deps.demo, clock: deps.clock, logger: deps.logger }))
  }

  return coreApiRoutes
}
