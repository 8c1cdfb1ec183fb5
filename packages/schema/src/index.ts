import { z } from 'zod'

/**
 * Wire contracts shared by the API and the dashboard client.
 *
 * Field names are snake_case on the wire; nothing in here knows about the
 * database or the ledger.
 */

export const TENANT_HEADER = 'X-Tenant-ID'

/** Lower bound on trimmed next-action details. */
export const NEXT_ACTION_DETAILS_MIN_LENGTH = 5
export const NEXT_ACTION_DETAILS_MAX_LENGTH = 1000

const isoDateTime = z.string().datetime({ offset: true, message: 'must be an ISO-8601 timestamp' })

// Due actions
export const dueOpportunitySchema = z.object({
  id: z.string(),
  name: z.string(),
  value: z.number().int().nullable(),
  stage: z.string(),
  next_action_at: isoDateTime,
  next_action_details: z.string().nullable(),
})

export const dueOpportunityListSchema = z.array(dueOpportunitySchema)

// Complete action
export const completeActionBodySchema = z.object({
  new_next_action_at: z.string({ required_error: 'is required' }).datetime({
    offset: true,
    message: 'must be an ISO-8601 timestamp',
  }),
  new_next_action_details: z.string({ required_error: 'is required' }),
})

export const completeActionResponseSchema = z.object({
  message: z.string(),
  opportunity_id: z.string(),
  updated_at: isoDateTime,
})

// Demo
export const demoResetResponseSchema = z.object({
  message: z.string(),
  tenants_created: z.number().int(),
  opportunities_created: z.number().int(),
})

// Errors
export const errorCodeSchema = z.enum(['INVALID_TENANT', 'NOT_FOUND', 'VALIDATION_FAILED', 'SERVER_ERROR'])

export const fieldIssueSchema = z.object({
  field: z.string(),
  message: z.string(),
})

export const errorResponseSchema = z.object({
  detail: z.string(),
  error_code: errorCodeSchema,
  issues: z.array(fieldIssueSchema).optional(),
})

export type DueOpportunityPayload = z.infer<typeof dueOpportunitySchema>
export type CompleteActionBody = z.infer<typeof completeActionBodySchema>
export type CompleteActionResponse = z.infer<typeof completeActionResponseSchema>
export type DemoResetResponse = z.infer<typeof demoResetResponseSchema>
export type ErrorCode = z.infer<typeof errorCodeSchema>
export type FieldIssue = z.infer<typeof fieldIssueSchema>
export type ErrorResponse = z.infer<typeof errorResponseSchema>
