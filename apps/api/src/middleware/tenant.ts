/**
 * Tenant scoping for the opportunity API.
 *
 * The caller names its tenant in `X-Tenant-ID`. The header is not
 * authenticated; it only selects the partition every query is filtered by.
 */

import type { Context, Next } from 'hono'
import { isTenantId } from '@nat/db'
import { TENANT_HEADER } from '@nat/schema'
import { fail } from '../routes/_api.js'

export async function requireTenant(c: Context, next: Next) {
  const tenantId = c.req.header(TENANT_HEADER)?.trim()

  if (!tenantId) {
    return fail(c, 'INVALID_TENANT', `${TENANT_HEADER} header is required`, 400)
  }

  if (!isTenantId(tenantId)) {
    return fail(c, 'INVALID_TENANT', `${TENANT_HEADER} must be a valid tenant id`, 400)
  }

  c.set('tenantId', tenantId)
  await next()
}
