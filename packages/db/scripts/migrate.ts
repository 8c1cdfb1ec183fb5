import "dotenv/config";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import { createDatabase } from "../src";

/**
 * Applies the drizzle-kit migrations in `packages/db/migrations`.
 *
 * Keep this script tiny and deterministic so CI/ops can call
 * `npm run db:migrate` without environment-specific wrappers.
 */
async function run() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("DATABASE_URL is required to run migrations");
  }

  const { db, pool } = createDatabase(connectionString);
  try {
    await migrate(db, { migrationsFolder: "./migrations" });
    console.log("Database migrations applied successfully.");
  } finally {
    await pool.end();
  }
}

run().catch((error) => {
  console.error("Migration failed:", error);
  process.exit(1);
});
