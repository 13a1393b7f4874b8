import type { MiddlewareHandler } from 'hono'
import type { MockAppEnv } from '../app'
import type { MockEnvironment } from '../mock'

export function contextMiddleware(mock: MockEnvironment): MiddlewareHandler<MockAppEnv> {
  return async (c, next) => {
    const requestId = c.req.header('x-request-id') || crypto.randomUUID()
    c.set('requestId', requestId)
    c.set('mock', mock)

    c.header('X-Request-Id', requestId)
    await next()
  }
}
