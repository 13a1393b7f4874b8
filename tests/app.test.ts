import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createMockApp } from '../src/app'
import { createMock, MockEnvironment } from '../src/mock'

describe('createMockApp', () => {
  let mock: MockEnvironment

  beforeEach(() => {
    mock = createMock({ diagnostics: false, defaultFormat: 'json' })
    mock.create('book', { title: 'Dune' })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('encodes as XML for an .xml path', async () => {
    const res = await createMockApp(mock).request('/books/1.xml')
    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toBe('application/xml; charset=utf-8')
    expect(await res.text()).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>\n<book>\n  <id type="integer">1</id>\n  <title>Dune</title>\n</book>\n',
    )
  })

  it('uses the configured format without an extension', async () => {
    const res = await createMockApp(mock).request('/books/1')
    expect(res.headers.get('content-type')).toBe('application/json; charset=utf-8')
    expect(await res.text()).toBe('{\n  "id": 1,\n  "title": "Dune"\n}')
  })

  it('honours an XML default format', async () => {
    const xmlMock = createMock({ diagnostics: false, defaultFormat: 'xml' })
    xmlMock.create('book', { title: 'Dune' })
    const res = await createMockApp(xmlMock).request('/books')
    expect(await res.text()).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>\n<books type="array">\n  <book>\n    <id type="integer">1</id>\n    <title>Dune</title>\n  </book>\n</books>\n',
    )
  })

  it('passes the query string to the router', async () => {
    mock.create('book', { title: 'Emma' })
    const res = await createMockApp(mock).request('/books.json?title=Emma')
    expect(await res.json()).toEqual([{ id: 2, title: 'Emma' }])
  })

  it('answers custom routes for any verb', async () => {
    mock.register('POST', '/books', () => ({ created: true }))
    const res = await createMockApp(mock).request('/books.json', { method: 'POST' })
    expect(res.status).toBe(404)
    const ok = await createMockApp(mock).request('/books', { method: 'POST' })
    expect(await ok.json()).toEqual({ created: true })
  })

  it('returns an error envelope for unknown requests', async () => {
    const res = await createMockApp(mock).request('/unknown.xml')
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({
      error: {
        message: 'No mock registered for GET /unknown.xml',
        code: 'REQUEST_NOT_FOUND',
        status: 404,
        path: '/unknown.xml',
        verb: 'GET',
      },
    })
  })

  it('returns 404 for a missing record', async () => {
    const res = await createMockApp(mock).request('/books/9')
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({
      error: { message: 'book with id 9 not found', code: 'NOT_FOUND', status: 404, type: 'book', id: '9' },
    })
  })

  it('returns 500 when a handler fails unexpectedly', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    mock.register('GET', '/explode', () => {
      throw new Error('kaput')
    })
    const res = await createMockApp(mock).request('/explode')
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: { message: 'kaput', code: 'INTERNAL_ERROR', status: 500 } })
  })

  it('echoes the request id', async () => {
    const res = await createMockApp(mock).request('/books/1', { headers: { 'x-request-id': 'req-1' } })
    expect(res.headers.get('x-request-id')).toBe('req-1')
  })

  it('generates a request id when none is given', async () => {
    const res = await createMockApp(mock).request('/books/1')
    expect(res.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/)
  })
})
