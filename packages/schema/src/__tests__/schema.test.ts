import { describe, expect, it } from 'vitest'
import { completeActionBodySchema, dueOpportunitySchema, errorResponseSchema } from '../index'

describe('wire schemas', () => {
  it('accepts a due opportunity with null value and details', () => {
    const parsed = dueOpportunitySchema.safeParse({
      id: 'opp_1',
      name: 'Renewal',
      value: null,
      stage: 'Proposal',
      next_action_at: '2025-01-10T09:00:00.000Z',
      next_action_details: null,
    })
    expect(parsed.success).toBe(true)
  })

  it('accepts offsets on the new next action timestamp', () => {
    const parsed = completeActionBodySchema.safeParse({
      new_next_action_at: '2025-01-15T09:00:00+02:00',
      new_next_action_details: 'Send the contract',
    })
    expect(parsed.success).toBe(true)
  })

  it('reports missing body fields by path', () => {
    const parsed = completeActionBodySchema.safeParse({})
    expect(parsed.success).toBe(false)
    if (parsed.success) return

    expect(parsed.error.issues.map((issue) => [issue.path.join('.'), issue.message])).toEqual([
      ['new_next_action_at', 'is required'],
      ['new_next_action_details', 'is required'],
    ])
  })

  it('rejects a timestamp that is not ISO-8601', () => {
    const parsed = completeActionBodySchema.safeParse({
      new_next_action_at: 'next tuesday',
      new_next_action_details: 'Send the contract',
    })
    expect(parsed.success).toBe(false)
    if (parsed.success) return
    expect(parsed.error.issues[0]?.message).toBe('must be an ISO-8601 timestamp')
  })

  it('rejects unknown error codes', () => {
    expect(errorResponseSchema.safeParse({ detail: 'x', error_code: 'TEAPOT' }).success).toBe(false)
  })
})
