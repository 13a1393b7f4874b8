/**
 * Resource client
 *
 * The simulated client library used by code under test. It speaks to a
 * resource backend through an injected fetch strategy; in tests that strategy
 * is the mock endpoint, so no request leaves the process:
 *
 *   const client = clientFor(mock)
 *   const books = await client.list('books', { author_id: '2' })
 *   const book = await client.get('books', 1)
 *
 * Error envelopes are raised again as the matching MockError subclass, so a
 * missing mock surfaces as RequestNotFoundError with the path that was asked
 * for.
 */

import type { DocumentFormat, ErrorEnvelope, JsonValue } from './types'
import type { MockEnvironment } from './mock'
import { createMockApp } from './app'
import { MockError, errorFromDetail } from './helpers/errors'

export type Fetcher = (request: Request) => Response | Promise<Response>

export interface ResourceClientOptions {
  fetch: Fetcher
  /** Origin requests are made against. Default: http://mock.local */
  baseUrl?: string
  /** Encoding requested through the path extension. Default: json */
  format?: DocumentFormat
}

function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  if (!value || typeof value !== 'object' || !('error' in value)) return false
  const error = value.error
  return !!error && typeof error === 'object' && 'message' in error && typeof error.message === 'string'
}

export class ResourceClient {
  private readonly fetcher: Fetcher
  private readonly baseUrl: string
  readonly format: DocumentFormat

  constructor(options: ResourceClientOptions) {
    this.fetcher = options.fetch
    this.baseUrl = (options.baseUrl ?? 'http://mock.local').replace(/\/+$/, '')
    this.format = options.format ?? 'json'
  }

  /** Every record of a collection, optionally filtered by query parameters */
  list(collection: string, params: Record<string, string> = {}): Promise<JsonValue> {
    const query = new URLSearchParams(params).toString()
    return this.request('GET', `/${collection}.${this.format}${query ? `?${query}` : ''}`)
  }

  get(collection: string, id: number | string): Promise<JsonValue> {
    return this.request('GET', `/${collection}/${id}.${this.format}`)
  }

  /**
   * Issue a request. JSON bodies are parsed, XML is returned as text.
   */
  async request(verb: string, path: string): Promise<JsonValue> {
    const response = await this.fetcher(new Request(`${this.baseUrl}${path}`, { method: verb.toUpperCase() }))
    const text = await response.text()

    if (!response.ok) {
      throw this.toError(response.status, text, path)
    }

    const contentType = response.headers.get('content-type') ?? ''
    if (contentType.includes('json')) {
      const parsed: JsonValue = JSON.parse(text)
      return parsed
    }
    return text
  }

  private toError(status: number, text: string, path: string): MockError {
    let body: unknown
    try {
      body = JSON.parse(text)
    } catch {
      return new MockError(`Request to ${path} failed with status ${status}`, { status })
    }
    if (isErrorEnvelope(body)) return errorFromDetail(body.error, path)
    return new MockError(`Request to ${path} failed with status ${status}`, { status })
  }
}

/**
 * A client wired to the mock endpoint of `mock`.
 */
export function clientFor(mock: MockEnvironment, options: Omit<ResourceClientOptions, 'fetch'> = {}): ResourceClient {
  const app = createMockApp(mock)
  return new ResourceClient({ ...options, fetch: (request) => app.fetch(request) })
}
