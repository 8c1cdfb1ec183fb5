import { defineConfig } from "drizzle-kit";
import { config } from "dotenv";
config({ path: "../../.env" });

/**
 * `npm run generate` diffs `src/schema` against the journal in `./migrations`
 * and writes the next SQL migration. `npm run migrate` applies them.
 */
export default defineConfig({
  schema: ["./src/schema/*.ts"],
  out: "./migrations",
  dialect: "postgresql",
  dbCredentials: {
    url: process.env.DATABASE_URL || "postgresql://localhost:5432/next_action_tracker",
  },
  verbose: true,
  strict: true,
});
