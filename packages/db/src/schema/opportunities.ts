import { sql } from 'drizzle-orm'
import { check, index, integer, pgTable, text, timestamp } from 'drizzle-orm/pg-core'
import { OPPORTUNITY_ID_TAG } from '../id'
import { createdAt, idRef, idWithTag, updatedAt } from './_common'
import { tenants } from './tenants'

/**
 * opportunities
 *
 * Sales deals tracked through a free-text pipeline stage, each with at most
 * one scheduled follow-up.
 *
 * Relation notes:
 * - Owned by exactly one tenant for its whole lifetime; there is no
 *   re-parenting path.
 * - `next_action_at`/`next_action_details` are written together by the
 *   complete-action flow. Legacy rows may carry either one as null.
 */
export const opportunities = pgTable('opportunities', {
  id: idWithTag(OPPORTUNITY_ID_TAG),
  tenantId: idRef('tenant_id').references(() => tenants.id).notNull(),

  name: text('name').notNull(),

  /** Deal size in a currency-agnostic integer unit. */
  value: integer('value'),

  stage: text('stage').notNull(),

  /** When the next follow-up is due; null means nothing is scheduled. */
  nextActionAt: timestamp('next_action_at', { withTimezone: true }),

  nextActionDetails: text('next_action_details'),

  /** Touched by every completed action; never moves backwards. */
  lastActivityAt: timestamp('last_activity_at', { withTimezone: true }).defaultNow().notNull(),

  createdAt: createdAt,
  updatedAt: updatedAt,
}, (table) => ({
  opportunitiesTenantDueIdx: index('idx_opportunities_tenant_due')
    .on(table.tenantId, table.nextActionAt)
    .where(sql`${table.nextActionAt} is not null`),
  opportunitiesTenantIdx: index('idx_opportunities_tenant_id').on(table.tenantId),
  opportunitiesLastActivityIdx: index('idx_opportunities_last_activity').on(table.tenantId, table.lastActivityAt),
  opportunitiesValueNonNegative: check(
    'opportunities_value_non_negative',
    sql`${table.value} is null or ${table.value} >= 0`,
  ),
}))

export type Opportunity = typeof opportunities.$inferSelect
export type NewOpportunity = typeof opportunities.$inferInsert
