import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres'
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import { Pool } from 'pg'
import * as opportunitiesSchema from './schema/opportunities'
import * as tenantsSchema from './schema/tenants'

/**
 * Unified Drizzle schema registry.
 */
export const schema = {
  ...tenantsSchema,
  ...opportunitiesSchema,
}

export type Database = NodePgDatabase<typeof schema>

/** Query surface shared by every Postgres driver Drizzle supports. */
export type QueryDatabase = PgDatabase<PgQueryResultHKT, typeof schema>

export type DatabaseHandle = {
  db: Database
  pool: Pool
  checkDatabaseConnection: () => Promise<boolean>
}

/**
 * Creates the process-wide pool and the Drizzle handle bound to it.
 *
 * The pool connects lazily, so constructing a handle never touches the network.
 */
export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new Pool({ connectionString })
  const db = drizzle(pool, { schema })

  async function checkDatabaseConnection(): Promise<boolean> {
    const client = await pool.connect()
    try {
      await client.query('SELECT 1')
      return true
    } finally {
      client.release()
    }
  }

  return { db, pool, checkDatabaseConnection }
}
