import 'dotenv/config'
import { and, eq, isNotNull, lte } from 'drizzle-orm'
import { clearDemoData, createDatabase, DEMO_TENANT_ID, opportunities, resetDemoData } from '../src/index'

/**
 * Seeds the demo tenants and opportunities.
 *
 * Usage:
 * - `npm run seed`          clear + seed + print a due-action summary
 * - `npm run seed:cleanup`  clear only
 */
async function main() {
  const connectionString = process.env.DATABASE_URL
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to seed the database')
  }

  const { db, pool } = createDatabase(connectionString)
  try {
    if (process.argv[2] === 'cleanup') {
      await clearDemoData(db)
      console.log('Database cleanup completed.')
      return
    }

    const now = new Date()
    const result = await resetDemoData(db, now)
    console.log(`Seeded ${result.tenantsCreated} tenants, ${result.opportunitiesCreated} opportunities.`)

    const due = await db
      .select({ id: opportunities.id })
      .from(opportunities)
      .where(
        and(
          eq(opportunities.tenantId, DEMO_TENANT_ID),
          isNotNull(opportunities.nextActionAt),
          lte(opportunities.nextActionAt, now),
        ),
      )
    console.log(`Due actions for Demo Company: ${due.length}`)
  } finally {
    await pool.end()
  }
}

main().catch((error) => {
  console.error('Seeding failed:', error)
  process.exit(1)
})
