import type { Database } from './client'
import { OPPORTUNITY_ID_TAG, TENANT_ID_TAG, generateId } from './id'
import { opportunities, type NewOpportunity } from './schema/opportunities'
import { tenants, type NewTenant } from './schema/tenants'

/** Fixed tenant ids so demo clients can hard-code their tenant header. */
export const DEMO_TENANT_ID = `${TENANT_ID_TAG}_${'DemoCompany'.padEnd(27, '0')}`
export const SECOND_TENANT_ID = `${TENANT_ID_TAG}_${'TestOrganization'.padEnd(27, '0')}`

export type DemoSeed = {
  tenants: NewTenant[]
  opportunities: NewOpportunity[]
}

export type DemoResetResult = {
  tenantsCreated: number
  opportunitiesCreated: number
}

function plusHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * 60 * 60 * 1000)
}

function plusDays(date: Date, days: number): Date {
  return plusHours(date, days * 24)
}

/**
 * Demo rows relative to `now`, spread across the three urgency tiers plus one
 * future action that must stay off the dashboard. The second tenant exists to
 * show isolation.
 */
export function buildDemoSeed(now: Date): DemoSeed {
  // Rows are created at their last activity.
  const opportunity = (
    row: Omit<NewOpportunity, 'id' | 'tenantId' | 'lastActivityAt'> & { lastActivityAt: Date },
    tenantId = DEMO_TENANT_ID,
  ): NewOpportunity => ({
    id: generateId(OPPORTUNITY_ID_TAG),
    tenantId,
    createdAt: row.lastActivityAt,
    updatedAt: row.lastActivityAt,
    ...row,
  })
  const tenantsCreatedAt = plusDays(now, -30)

  return {
    tenants: [
      { id: DEMO_TENANT_ID, name: 'Demo Company', createdAt: tenantsCreatedAt },
      { id: SECOND_TENANT_ID, name: 'Test Organization', createdAt: tenantsCreatedAt },
    ],
    opportunities: [
      opportunity({
        name: 'Enterprise Deal - Acme Corp',
        value: 50000,
        stage: 'Proposal',
        nextActionAt: plusDays(now, -7),
        nextActionDetails: 'Follow up on proposal feedback',
        lastActivityAt: plusDays(now, -8),
      }),
      opportunity({
        name: 'Mid-Market - TechStart Inc',
        value: 25000,
        stage: 'Negotiation',
        nextActionAt: plusDays(now, -2),
        nextActionDetails: 'Send revised pricing',
        lastActivityAt: plusDays(now, -3),
      }),
      opportunity({
        name: 'SMB Deal - Local Business',
        value: 5000,
        stage: 'Discovery',
        nextActionAt: now,
        nextActionDetails: 'Schedule demo call',
        lastActivityAt: plusHours(now, -6),
      }),
      opportunity({
        name: 'Renewal - Existing Customer',
        value: 15000,
        stage: 'Closed Won',
        nextActionAt: plusDays(now, -1),
        nextActionDetails: 'Send renewal contract',
        lastActivityAt: plusDays(now, -2),
      }),
      opportunity({
        name: 'Future Opportunity',
        value: 30000,
        stage: 'Qualification',
        nextActionAt: plusDays(now, 3),
        nextActionDetails: 'Initial discovery call',
        lastActivityAt: plusHours(now, -2),
      }),
      opportunity({
        name: 'Healthcare Solutions Inc',
        value: 120000,
        stage: 'Negotiation',
        nextActionAt: plusDays(now, -5),
        nextActionDetails: 'Review contract terms and prepare counter-proposal',
        lastActivityAt: plusDays(now, -6),
      }),
      opportunity(
        {
          name: 'Different Tenant Deal',
          value: 40000,
          stage: 'Discovery',
          nextActionAt: plusHours(now, -2),
          nextActionDetails: 'This should not appear for Demo Company tenant',
          lastActivityAt: plusHours(now, -3),
        },
        SECOND_TENANT_ID,
      ),
    ],
  }
}

/**
 * Removes every opportunity and tenant. Opportunities go first because of the
 * tenant foreign key.
 */
export async function clearDemoData(db: Database): Promise<void> {
  await db.transaction(async (tx) => {
    await tx.delete(opportunities)
    await tx.delete(tenants)
  })
}

/**
 * Clears both tables and re-inserts the demo seed in one transaction.
 */
export async function resetDemoData(db: Database, now = new Date()): Promise<DemoResetResult> {
  const seed = buildDemoSeed(now)

  return db.transaction(async (tx) => {
    await tx.delete(opportunities)
    await tx.delete(tenants)

    const insertedTenants = await tx.insert(tenants).values(seed.tenants).returning({ id: tenants.id })
    const insertedOpportunities = await tx
      .insert(opportunities)
      .values(seed.opportunities)
      .returning({ id: opportunities.id })

    return {
      tenantsCreated: insertedTenants.length,
      opportunitiesCreated: insertedOpportunities.length,
    }
  })
}
