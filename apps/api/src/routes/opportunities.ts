/**
 * Opportunity routes (tenant-scoped).
 */

import { Hono } from 'hono'
import {
  completeActionBodySchema,
  type CompleteActionResponse,
  type DueOpportunityPayload,
} from '@nat/schema'
import { requireTenant } from '../middleware/tenant.js'
import type { Clock, OpportunityLedger } from '../services/opportunity-ledger.js'
import type { DueOpportunity } from '../services/opportunity-store.js'
import { failWithZodError } from './_api.js'

export type OpportunityRouteDeps = {
  ledger: OpportunityLedger
  clock: Clock
}

function toDuePayload(row: DueOpportunity): DueOpportunityPayload {
  return {
    id: row.id,
    name: row.name,
    value: row.value,
    stage: row.stage,
    next_action_at: row.nextActionAt.toISOString(),
    next_action_details: row.nextActionDetails,
  }
}

export function createOpportunityRoutes({ ledger, clock }: OpportunityRouteDeps) {
  const opportunityRoutes = new Hono()

  opportunityRoutes.get('/opportunities/due', requireTenant, async (c) => {
    const rows = await ledger.listDueActions(c.get('tenantId'), clock())
    return c.json(rows.map(toDuePayload))
  })

  opportunityRoutes.post('/opportunities/:opportunityId/complete_action', requireTenant, async (c) => {
    const opportunityId = c.req.param('opportunityId')

    const body: unknown = await c.req.json().catch(() => null)
    const parsed = completeActionBodySchema.safeParse(body)
    if (!parsed.success) {
      return failWithZodError(c, parsed.error)
    }

    const completed = await ledger.completeAction(
      c.get('tenantId'),
      opportunityId,
      new Date(parsed.data.new_next_action_at),
      parsed.data.new_next_action_details,
      clock(),
    )

    const response: CompleteActionResponse = {
      message: 'Action completed and next action scheduled successfully',
      opportunity_id: completed.opportunityId,
      updated_at: completed.updatedAt.toISOString(),
    }
    return c.json(response)
  })

  return opportunityRoutes
}
