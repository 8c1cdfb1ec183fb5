import {
  TENANT_HEADER,
  completeActionResponseSchema,
  demoResetResponseSchema,
  dueOpportunityListSchema,
  errorResponseSchema,
  type CompleteActionBody,
  type ErrorCode,
  type FieldIssue,
} from '@nat/schema'
import type { z } from 'zod'

/**
 * Typed client for the opportunities API.
 *
 * Every request carries the tenant header. Responses are parsed with the
 * shared wire schemas and handed back camelCased with real `Date`s.
 */

export type DueAction = {
  id: string
  name: string
  value: number | null
  stage: string
  nextActionAt: Date
  nextActionDetails: string | null
}

export type CompletedAction = {
  opportunityId: string
  updatedAt: Date
}

export type DemoResetSummary = {
  message: string
  tenantsCreated: number
  opportunitiesCreated: number
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export type OpportunitiesApiOptions = {
  tenantId: string
  /** Defaults to the same-origin `/api/v1`. */
  baseUrl?: string
  /** Sent with every request; the tenant header always wins. */
  headers?: HeadersInit
  fetch?: FetchLike
}

export class ApiRequestError extends Error {
  status: number
  errorCode: ErrorCode | null
  issues: FieldIssue[]
  payload: unknown

  constructor(status: number, message: string, payload: unknown) {
    super(message)
    this.name = 'ApiRequestError'
    this.status = status
    this.payload = payload

    const parsed = errorResponseSchema.safeParse(payload)
    this.errorCode = parsed.success ? parsed.data.error_code : null
    this.issues = parsed.success ? (parsed.data.issues ?? []) : []
  }
}

function extractErrorMessage(payload: unknown): string | null {
  const parsed = errorResponseSchema.safeParse(payload)
  if (parsed.success && parsed.data.detail.trim().length > 0) return parsed.data.detail
  return null
}

/** Toast text shown when completing an action fails. */
export function describeCompleteActionError(error: unknown): string {
  if (error instanceof ApiRequestError) {
    if (error.status === 422) return 'Please check your input and try again'
    if (error.status === 404) return 'This opportunity could not be found'
    return error.message
  }
  return 'Failed to complete action'
}

export function createOpportunitiesApi(options: OpportunitiesApiOptions) {
  const baseUrl = (options.baseUrl ?? '/api/v1').replace(/\/+$/, '')
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init))

  async function requestJson<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    init?: RequestInit,
  ): Promise<z.infer<T>> {
    const headers = new Headers(options.headers)
    new Headers(init?.headers).forEach((value, key) => headers.set(key, value))
    if (!headers.has('content-type')) headers.set('content-type', 'application/json')
    headers.set(TENANT_HEADER, options.tenantId)

    const response = await fetchImpl(`${baseUrl}${path}`, { ...init, headers })

    const rawText = await response.text().catch(() => '')
    let payload: unknown = null
    if (rawText) {
      try {
        payload = JSON.parse(rawText)
      } catch {
        payload = null
      }
    }

    if (!response.ok) {
      const fallback =
        response.status >= 500
          ? `Server error (HTTP ${response.status})`
          : `Request failed with HTTP ${response.status}`
      throw new ApiRequestError(response.status, extractErrorMessage(payload) ?? fallback, payload)
    }

    const parsed = schema.safeParse(payload)
    if (!parsed.success) {
      throw new ApiRequestError(response.status, 'Unexpected response from the API', payload)
    }
    return parsed.data
  }

  return {
    async listDue(): Promise<DueAction[]> {
      const rows = await requestJson('/opportunities/due', dueOpportunityListSchema)
      return rows.map((row) => ({
        id: row.id,
        name: row.name,
        value: row.value,
        stage: row.stage,
        nextActionAt: new Date(row.next_action_at),
        nextActionDetails: row.next_action_details,
      }))
    },

    async completeAction(opportunityId: string, nextActionAt: Date, details: string): Promise<CompletedAction> {
      const body: CompleteActionBody = {
        new_next_action_at: nextActionAt.toISOString(),
        new_next_action_details: details.trim(),
      }
      const result = await requestJson(
        `/opportunities/${encodeURIComponent(opportunityId)}/complete_action`,
        completeActionResponseSchema,
        { method: 'POST', body: JSON.stringify(body) },
      )
      return { opportunityId: result.opportunity_id, updatedAt: new Date(result.updated_at) }
    },

    async resetDemo(): Promise<DemoResetSummary> {
      const result = await requestJson('/demo/reset', demoResetResponseSchema, { method: 'POST' })
      return {
        message: result.message,
        tenantsCreated: result.tenants_created,
        opportunitiesCreated: result.opportunities_created,
      }
    },
  }
}

export type OpportunitiesApi = ReturnType<typeof createOpportunitiesApi>
