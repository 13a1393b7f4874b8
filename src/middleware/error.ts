import type { Context, ErrorHandler } from 'hono'
import type { MockAppEnv } from '../app'
import type { ErrorDetail, ErrorEnvelope } from '../types'
import { ErrorCode, MockError } from '../helpers/errors'
import { CONTENT_TYPES } from '../helpers/format'

/**
 * Creates the error handler for the mock endpoint's app.onError().
 *
 * Mock errors keep their code and status, so the client can raise the same
 * error again; a RequestNotFoundError keeps the literal path. Anything else is
 * logged and answered with a 500 envelope.
 *
 * Usage:
 *   const app = new Hono()
 *   app.onError(createErrorHandler())
 */
export function createErrorHandler(): ErrorHandler<MockAppEnv> {
  return (err: Error, c: Context<MockAppEnv>): Response => {
    let detail: ErrorDetail
    if (err instanceof MockError) {
      detail = err.toDetail()
    } else {
      console.error('Unhandled error:', err)
      detail = {
        message: err.message || 'Internal server error',
        code: ErrorCode.INTERNAL_ERROR,
        status: 500,
      }
    }

    const envelope: ErrorEnvelope = { error: detail }
    const headers: Record<string, string> = { 'Content-Type': CONTENT_TYPES.json }
    const requestId = c.var.requestId
    if (requestId) headers['X-Request-Id'] = requestId

    return new Response(JSON.stringify(envelope, null, 2), {
      status: getErrorStatus(detail),
      headers,
    })
  }
}

/**
 * HTTP status for an error detail, 500 unless it carries a valid error status
 */
function getErrorStatus(detail: ErrorDetail): number {
  const status = detail.status
  if (typeof status === 'number' && status >= 400 && status < 600) {
    return status
  }
  return 500
}
