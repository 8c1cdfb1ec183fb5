/**
 * @fileoverview HTTP contract tests for the opportunity and demo routes
 *
 * @description
 * Drives the Hono app through `app.request()` with the in-process store, so
 * the JSON shapes and status codes are checked without a server or database.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest'
import { generateId } from '@nat/db'
import { createApp } from '../../app.js'
import { silentLogger } from '../../lib/logger.js'
import { OpportunityLedger } from '../../services/opportunity-ledger.js'
import { InMemoryOpportunityStore } from '../../services/__tests__/memory-store.js'
import type { DemoDataService } from '../demo.js'

const HOUR = 60 * 60 * 1000
const DAY = 24 * HOUR

const now = new Date('2025-01-10T12:00:00.000Z')
const at = (offsetMs: number) => new Date(now.getTime() + offsetMs)

const tenantId = generateId('tenant')
const otherTenantId = generateId('tenant')

function setup(demo: DemoDataService | null = null) {
  const store = new InMemoryOpportunityStore()
  const ledger = new OpportunityLedger(store, silentLogger)
  const app = createApp({
    ledger,
    logger: silentLogger,
    allowedOrigins: ['http://localhost:3000'],
    clock: () => now,
    demo,
  })
  return { app, store }
}

function completeRequest(body: unknown, tenant = tenantId): RequestInit {
  return {
    method: 'POST',
    headers: { 'content-type': 'application/json', 'x-tenant-id': tenant },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  }
}

describe('GET /api/v1/opportunities/due', () => {
  let ctx: ReturnType<typeof setup>

  beforeEach(() => {
    ctx = setup()
  })

  it('requires the tenant header', async () => {
    const res = await ctx.app.request('/api/v1/opportunities/due')

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ detail: 'X-Tenant-ID header is required', error_code: 'INVALID_TENANT' })
  })

  it('rejects a malformed tenant header', async () => {
    const res = await ctx.app.request('/api/v1/opportunities/due', {
      headers: { 'x-tenant-id': 'demo-tenant-123' },
    })

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      detail: 'X-Tenant-ID must be a valid tenant id',
      error_code: 'INVALID_TENANT',
    })
  })

  it('returns due opportunities as snake_case JSON, oldest first', async () => {
    const overdue = ctx.store.insert({
      id: generateId('opp'),
      tenantId,
      name: 'Enterprise Deal - Acme Corp',
      value: 50000,
      stage: 'Proposal',
      nextActionAt: at(-7 * DAY),
      nextActionDetails: 'Follow up on proposal feedback',
    })
    const dueNow = ctx.store.insert({
      id: generateId('opp'),
      tenantId,
      name: 'SMB Deal',
      stage: 'Discovery',
      nextActionAt: at(0),
    })
    ctx.store.insert({ id: generateId('opp'), tenantId, name: 'Future', nextActionAt: at(3 * DAY) })
    ctx.store.insert({ id: generateId('opp'), tenantId: otherTenantId, name: 'Foreign', nextActionAt: at(-DAY) })

    const res = await ctx.app.request('/api/v1/opportunities/due', { headers: { 'x-tenant-id': tenantId } })

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual([
      {
        id: overdue.id,
        name: 'Enterprise Deal - Acme Corp',
        value: 50000,
        stage: 'Proposal',
        next_action_at: '2025-01-03T12:00:00.000Z',
        next_action_details: 'Follow up on proposal feedback',
      },
      {
        id: dueNow.id,
        name: 'SMB Deal',
        value: null,
        stage: 'Discovery',
        next_action_at: '2025-01-10T12:00:00.000Z',
        next_action_details: null,
      },
    ])
  })

  it('maps storage failures to a generic server error', async () => {
    ctx.store.failure = new Error('connection terminated unexpectedly')

    const res = await ctx.app.request('/api/v1/opportunities/due', { headers: { 'x-tenant-id': tenantId } })

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ detail: 'Failed to retrieve due opportunities', error_code: 'SERVER_ERROR' })
  })
})

describe('POST /api/v1/opportunities/:opportunityId/complete_action', () => {
  let ctx: ReturnType<typeof setup>
  let opportunityId: string

  beforeEach(() => {
    ctx = setup()
    opportunityId = ctx.store.insert({
      id: generateId('opp'),
      tenantId,
      name: 'Renewal - Existing Customer',
      nextActionAt: at(-DAY),
      nextActionDetails: 'Send renewal contract',
    }).id
  })

  it('completes the action and schedules the next one', async () => {
    const res = await ctx.app.request(
      `/api/v1/opportunities/${opportunityId}/complete_action`,
      completeRequest({
        new_next_action_at: '2025-01-15T09:00:00.000Z',
        new_next_action_details: 'Confirm signature with legal',
      }),
    )

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      message: 'Action completed and next action scheduled successfully',
      opportunity_id: opportunityId,
      updated_at: '2025-01-10T12:00:00.000Z',
    })
    expect(ctx.store.get(opportunityId)).toMatchObject({
      nextActionAt: new Date('2025-01-15T09:00:00.000Z'),
      nextActionDetails: 'Confirm signature with legal',
      lastActivityAt: now,
    })
  })

  it('rejects a date on an earlier day with field details', async () => {
    const res = await ctx.app.request(
      `/api/v1/opportunities/${opportunityId}/complete_action`,
      completeRequest({
        new_next_action_at: '2025-01-05T09:00:00.000Z',
        new_next_action_details: 'Confirm signature with legal',
      }),
    )

    expect(res.status).toBe(422)
    expect(await res.json()).toEqual({
      detail: 'Validation failed: new_next_action_at must be today or in the future',
      error_code: 'VALIDATION_FAILED',
      issues: [{ field: 'new_next_action_at', message: 'must be today or in the future' }],
    })
    expect(ctx.store.get(opportunityId)?.nextActionDetails).toBe('Send renewal contract')
  })

  it('rejects short details', async () => {
    const res = await ctx.app.request(
      `/api/v1/opportunities/${opportunityId}/complete_action`,
      completeRequest({ new_next_action_at: '2025-01-15T09:00:00.000Z', new_next_action_details: 'ok' }),
    )

    expect(res.status).toBe(422)
    expect(await res.json()).toMatchObject({
      error_code: 'VALIDATION_FAILED',
      issues: [{ field: 'new_next_action_details', message: 'must be at least 5 characters' }],
    })
  })

  it('rejects a body with missing fields', async () => {
    const res = await ctx.app.request(`/api/v1/opportunities/${opportunityId}/complete_action`, completeRequest({}))

    expect(res.status).toBe(422)
    expect(await res.json()).toEqual({
      detail: 'Validation failed: new_next_action_at is required; new_next_action_details is required',
      error_code: 'VALIDATION_FAILED',
      issues: [
        { field: 'new_next_action_at', message: 'is required' },
        { field: 'new_next_action_details', message: 'is required' },
      ],
    })
  })

  it('rejects a body that is not JSON', async () => {
    const res = await ctx.app.request(
      `/api/v1/opportunities/${opportunityId}/complete_action`,
      completeRequest('{not json'),
    )

    expect(res.status).toBe(422)
    expect(await res.json()).toMatchObject({
      error_code: 'VALIDATION_FAILED',
      issues: [{ field: 'body', message: 'Expected object, received null' }],
    })
  })

  it('answers a foreign tenant exactly like an unknown id', async () => {
    const body = { new_next_action_at: '2025-01-15T09:00:00.000Z', new_next_action_details: 'Confirm signature' }

    const foreign = await ctx.app.request(
      `/api/v1/opportunities/${opportunityId}/complete_action`,
      completeRequest(body, otherTenantId),
    )
    const unknown = await ctx.app.request(
      `/api/v1/opportunities/${generateId('opp')}/complete_action`,
      completeRequest(body),
    )

    expect(foreign.status).toBe(404)
    expect(unknown.status).toBe(404)
    const expected = { detail: 'Opportunity not found', error_code: 'NOT_FOUND' }
    expect(await foreign.json()).toEqual(expected)
    expect(await unknown.json()).toEqual(expected)
    expect(ctx.store.get(opportunityId)?.nextActionDetails).toBe('Send renewal contract')
  })
})

describe('service routes', () => {
  it('reports health without a tenant', async () => {
    const { app } = setup()

    const res = await app.request('/health')

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'healthy', service: 'next-action-tracker-api', version: '1.0.0' })
  })

  it('echoes the request id', async () => {
    const { app } = setup()

    const res = await app.request('/health', { headers: { 'x-request-id': 'req-123' } })

    expect(res.headers.get('x-request-id')).toBe('req-123')
  })

  it('answers unknown routes with the error shape', async () => {
    const { app } = setup()

    const res = await app.request('/api/v1/nope')

    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ detail: 'Not found', error_code: 'NOT_FOUND' })
  })
})

describe('POST /api/v1/demo/reset', () => {
  it('is not mounted without a demo service', async () => {
    const { app } = setup()

    const res = await app.request('/api/v1/demo/reset', { method: 'POST', headers: { 'x-tenant-id': tenantId } })

    expect(res.status).toBe(404)
  })

  it('resets the demo data at the current time', async () => {
    const reset = vi.fn<DemoDataService['reset']>().mockResolvedValue({ tenantsCreated: 2, opportunitiesCreated: 7 })
    const { app } = setup({ reset })

    const res = await app.request('/api/v1/demo/reset', { method: 'POST', headers: { 'x-tenant-id': tenantId } })

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      message: 'Demo data reset. 7 opportunities created.',
      tenants_created: 2,
      opportunities_created: 7,
    })
    expect(reset).toHaveBeenCalledWith(now)
  })

  it('still requires a tenant header', async () => {
    const reset = vi.fn<DemoDataService['reset']>()
    const { app } = setup({ reset })

    const res = await app.request('/api/v1/demo/reset', { method: 'POST' })

    expect(res.status).toBe(400)
    expect(reset).not.toHaveBeenCalled()
  })

  it('reports a failed reset as a server error', async () => {
    const reset = vi.fn<DemoDataService['reset']>().mockRejectedValue(new Error('lock timeout'))
    const { app } = setup({ reset })

    const res = await app.request('/api/v1/demo/reset', { method: 'POST', headers: { 'x-tenant-id': tenantId } })

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ detail: 'Failed to reset demo data', error_code: 'SERVER_ERROR' })
  })
})
