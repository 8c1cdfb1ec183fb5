import { and, asc, eq, isNotNull, lte, sql } from 'drizzle-orm'
import { opportunities, type QueryDatabase } from '@nat/db'

/** Projection returned by the due-actions query. */
export type DueOpportunity = {
  id: string
  name: string
  value: number | null
  stage: string
  nextActionAt: Date
  nextActionDetails: string | null
}

export type NextActionUpdate = {
  nextActionAt: Date
  nextActionDetails: string
  completedAt: Date
}

export type CompletedAction = {
  opportunityId: string
  updatedAt: Date
}

/**
 * Persistence seam for the ledger. Every method takes the tenant id and must
 * scope its statement by it.
 */
export interface OpportunityStore {
  /** Rows with `nextActionAt <= now`, ascending by `nextActionAt`. */
  findDue(tenantId: string, now: Date): Promise<DueOpportunity[]>

  /**
   * Applies the completion to the row matching both ids in one statement.
   * Resolves `null` when no row matches.
   */
  completeAction(tenantId: string, opportunityId: string, update: NextActionUpdate): Promise<CompletedAction | null>
}

export function createDrizzleOpportunityStore(db: QueryDatabase): OpportunityStore {
  return {
    async findDue(tenantId, now) {
      const rows = await db
        .select({
          id: opportunities.id,
          name: opportunities.name,
          value: opportunities.value,
          stage: opportunities.stage,
          nextActionAt: opportunities.nextActionAt,
          nextActionDetails: opportunities.nextActionDetails,
        })
        .from(opportunities)
        .where(
          and(
            eq(opportunities.tenantId, tenantId),
            isNotNull(opportunities.nextActionAt),
            lte(opportunities.nextActionAt, now),
          ),
        )
        .orderBy(asc(opportunities.nextActionAt))

      // The WHERE clause already excludes nulls; this narrows the column type.
      return rows.flatMap(({ nextActionAt, ...row }) => (nextActionAt ? [{ ...row, nextActionAt }] : []))
    },

    async completeAction(tenantId, opportunityId, update) {
      const [row] = await db
        .update(opportunities)
        .set({
          nextActionAt: update.nextActionAt,
          nextActionDetails: update.nextActionDetails,
          lastActivityAt: sql`greatest(${opportunities.lastActivityAt}, ${update.completedAt.toISOString()}::timestamptz)`,
          updatedAt: update.completedAt,
        })
        .where(and(eq(opportunities.id, opportunityId), eq(opportunities.tenantId, tenantId)))
        .returning({ opportunityId: opportunities.id, updatedAt: opportunities.updatedAt })

      return row ?? null
    },
  }
}
