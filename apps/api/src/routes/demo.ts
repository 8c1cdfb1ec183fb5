/**
 * Demo data reset. Mounted only when `DEMO_RESET_ENABLED` is set.
 */

import { Hono } from 'hono'
import type { DemoResetResult } from '@nat/db'
import type { DemoResetResponse } from '@nat/schema'
import type { Logger } from '../lib/logger.js'
import { requireTenant } from '../middleware/tenant.js'
import type { Clock } from '../services/opportunity-ledger.js'
import { fail } from './_api.js'

export type DemoDataService = {
  reset: (now: Date) => Promise<DemoResetResult>
}

export type DemoRouteDeps = {
  demo: DemoDataService
  clock: Clock
  logger: Logger
}

export function createDemoRoutes({ demo, clock, logger }: DemoRouteDeps) {
  const demoRoutes = new Hono()

  demoRoutes.post('/demo/reset', requireTenant, async (c) => {
    const log = logger.child({ tenantId: c.get('tenantId') })
    const startedAt = Date.now()
    log.info('Starting demo data reset')

    let result: DemoResetResult
    try {
      result = await demo.reset(clock())
    } catch (error) {
      log.error('Failed to reset demo data', {
        error: error instanceof Error ? error.message : String(error),
        ms: Date.now() - startedAt,
      })
      return fail(c, 'SERVER_ERROR', 'Failed to reset demo data', 500)
    }

    log.info('Demo data reset', {
      tenantsCreated: result.tenantsCreated,
      opportunitiesCreated: result.opportunitiesCreated,
      ms: Date.now() - startedAt,
    })

    const response: DemoResetResponse = {
      message: `Demo data reset. ${result.opportunitiesCreated} opportunities created.`,
      tenants_created: result.tenantsCreated,
      opportunities_created: result.opportunitiesCreated,
    }
    return c.json(response)
  })

  return demoRoutes
}
