/**
 * Mock endpoint
 *
 * A Hono app that answers every request from a MockEnvironment, so code that
 * speaks HTTP can be pointed at the mocks without a network:
 *
 *   const app = createMockApp(mock)
 *   const res = await app.request('/books/1.xml')
 *
 * The path extension picks the encoding (`.xml`, `.json`); without one the
 * environment's `defaultFormat` is used. Failures become an error envelope
 * with the error's status, see createErrorHandler.
 */

import { Hono } from 'hono'
import type { MockEnvironment } from './mock'
import { contextMiddleware } from './middleware/context'
import { createErrorHandler } from './middleware/error'
import { CONTENT_TYPES, encode, formatFromPath } from './helpers/format'

export type MockAppEnv = {
  Variables: {
    requestId: string
    mock: MockEnvironment
  }
}

export function createMockApp(mock: MockEnvironment): Hono<MockAppEnv> {
  const app = new Hono<MockAppEnv>()

  app.onError(createErrorHandler())
  app.use('*', contextMiddleware(mock))

  app.all('*', (c) => {
    const url = new URL(c.req.url)
    const path = `${url.pathname}${url.search}`
    const document = c.var.mock.request(c.req.method, path)

    const format = formatFromPath(url.pathname) ?? c.var.mock.config.defaultFormat
    return new Response(encode(document, format), {
      status: 200,
      headers: {
        'Content-Type': CONTENT_TYPES[format],
        'X-Request-Id': c.var.requestId,
      },
    })
  })

  return app
}
