import { pgTable, text } from "drizzle-orm/pg-core";
import { TENANT_ID_TAG } from "../id";
import { createdAt, idWithTag } from "./_common";

/**
 * tenants
 *
 * Root of strict data isolation.
 * Every opportunity row is scoped by `tenant_id`. Rows are written once by
 * seeding/admin tooling and never updated afterwards.
 */
export const tenants = pgTable("tenants", {
  id: idWithTag(TENANT_ID_TAG),

  /** Human-facing organization name. */
  name: text("name").notNull(),

  createdAt,
});

export type Tenant = typeof tenants.$inferSelect;
export type NewTenant = typeof tenants.$inferInsert;
