import { randomUUID } from 'node:crypto'
import type { Context, MiddlewareHandler, Next } from 'hono'
import type { Logger } from '../lib/logger.js'

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string
    tenantId: string
  }
}

/**
 * Ensure each request has a stable request id for tracing.
 */
export async function requestId(c: Context, next: Next) {
  const id = c.req.header('x-request-id') ?? randomUUID()
  c.set('requestId', id)
  c.header('x-request-id', id)
  await next()
}

/**
 * One line per request once the response is ready. 5xx logs as error, 4xx as
 * warn.
 */
export function requestLogger(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now()
    await next()

    const status = c.res.status
    const fields = {
      method: c.req.method,
      path: c.req.path,
      status,
      ms: Date.now() - start,
      tenant: c.get('tenantId') ?? '-',
      requestId: c.get('requestId'),
    }

    if (status >= 500) logger.error('request', fields)
    else if (status >= 400) logger.warn('request', fields)
    else logger.info('request', fields)
  }
}
