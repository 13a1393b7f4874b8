import { describe, it, expect } from 'vitest'
import { Router, compilePattern, defaultRoutes, parseQuery } from '../src/router'
import { GraphSerializer } from '../src/serializer'
import { DefinitionRegistry } from '../src/definitions'
import { ResourceStore } from '../src/store'
import { Factory } from '../src/factory'
import { QueryEngine } from '../src/query'
import { MockRecord } from '../src/record'
import { InvalidPatternError, NotFoundError, RequestNotFoundError } from '../src/helpers/errors'

function setup() {
  const registry = new DefinitionRegistry()
  const store = new ResourceStore()
  const factory = new Factory(registry, store)
  const query = new QueryEngine(registry, store)
  const router = new Router({
    serializer: new GraphSerializer(),
    defaults: () => store.types().flatMap((type) => defaultRoutes(type, query)),
  })
  return { factory, router }
}

describe('compilePattern', () => {
  it('anchors string patterns', () => {
    const pattern = compilePattern('/books')
    expect(pattern.test('/books')).toBe(true)
    expect(pattern.test('/books/1')).toBe(false)
    expect(pattern.test('/api/books')).toBe(false)
  })

  it('anchors alternations as a whole', () => {
    const pattern = compilePattern('/a|/b')
    expect(pattern.test('/b')).toBe(true)
    expect(pattern.test('/a/b')).toBe(false)
  })

  it('drops stateful flags from RegExp patterns', () => {
    const pattern = compilePattern(/^\/books$/gi)
    expect(pattern.flags).toBe('i')
    expect(pattern.test('/BOOKS')).toBe(true)
    expect(pattern.test('/BOOKS')).toBe(true)
  })

  it('rejects malformed patterns', () => {
    expect(() => compilePattern('/books/(')).toThrow(InvalidPatternError)
  })
})

describe('parseQuery', () => {
  it('decodes parameters', () => {
    expect(parseQuery('author_id=2&title=A%20B')).toEqual({ author_id: '2', title: 'A B' })
  })

  it('returns no parameters for an empty query', () => {
    expect(parseQuery(undefined)).toEqual({})
    expect(parseQuery('')).toEqual({})
  })
})

describe('Router', () => {
  it('passes captures to the handler in order', () => {
    const { router } = setup()
    router.register('GET', '/books/(\\d+)/reviews/(\\d+)\\.xml', (bookId, reviewId) => ({ bookId: bookId ?? '', reviewId: reviewId ?? '' }))
    expect(router.dispatch('GET', '/books/4/reviews/9.xml').document).toEqual({ bookId: '4', reviewId: '9' })
  })

  it('passes undefined for groups that did not participate', () => {
    const { router } = setup()
    router.register('GET', '/items(?:/(\\d+))?', (id) => (id === undefined ? 'all' : `one ${id}`))
    expect(router.dispatch('GET', '/items').document).toBe('all')
    expect(router.dispatch('GET', '/items/3').document).toBe('one 3')
  })

  it('prefers the first matching custom route', () => {
    const { router } = setup()
    router.register('GET', '/books/.*', () => 'first')
    router.register('GET', '/books/1', () => 'second')
    expect(router.dispatch('GET', '/books/1').document).toBe('first')
  })

  it('tries custom routes before default routes', () => {
    const { factory, router } = setup()
    factory.create('book', { title: 'Stored' })
    router.register('GET', '/books/1\\.xml', () => 'custom')
    expect(router.dispatch('GET', '/books/1.xml').document).toBe('custom')
    expect(router.dispatch('GET', '/books/1.json').document).toEqual({
      kind: 'record',
      type: 'book',
      id: 1,
      attributes: [{ name: 'title', value: 'Stored' }],
    })
  })

  it('matches verbs case-insensitively', () => {
    const { router } = setup()
    router.register('post', '/books', () => 'created')
    expect(router.dispatch('POST', '/books').document).toBe('created')
    expect(() => router.dispatch('GET', '/books')).toThrow(RequestNotFoundError)
  })

  it('serializes records returned by handlers', () => {
    const { router } = setup()
    const book = new MockRecord('book', 7, [['title', 'Dune']])
    router.register('GET', '/featured', () => book)
    const { route, document } = router.dispatch('GET', '/featured')
    expect(route.class).toBe('custom')
    expect(document).toEqual({ kind: 'record', type: 'book', id: 7, attributes: [{ name: 'title', value: 'Dune' }] })
  })

  it('fails with the literal path when nothing matches', () => {
    const { router } = setup()
    try {
      router.dispatch('GET', '/unknown.xml')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(RequestNotFoundError)
      if (err instanceof RequestNotFoundError) {
        expect(err.path).toBe('/unknown.xml')
        expect(err.verb).toBe('GET')
        expect(err.message).toBe('No mock registered for GET /unknown.xml')
      }
    }
  })

  it('lists routes by class', () => {
    const { factory, router } = setup()
    factory.create('book')
    router.register('GET', '/x', () => null)
    expect(router.routes('custom')).toHaveLength(1)
    expect(router.routes('default').map((route) => route.resource)).toEqual(['book', 'book'])
    expect(router.routes()).toHaveLength(3)
  })

  it('forgets custom routes on reset', () => {
    const { router } = setup()
    router.register('GET', '/x', () => null)
    router.reset()
    expect(router.routes()).toEqual([])
  })
})

describe('default routes', () => {
  it('serves the collection with or without an extension', () => {
    const { factory, router } = setup()
    factory.create('books', [{ title: 'A' }, { title: 'B' }])
    for (const path of ['/books', '/books.xml', '/books.json']) {
      const { document } = router.dispatch('GET', path)
      expect(document).toEqual({
        kind: 'collection',
        type: 'book',
        items: [
          { kind: 'record', type: 'book', id: 1, attributes: [{ name: 'title', value: 'A' }] },
          { kind: 'record', type: 'book', id: 2, attributes: [{ name: 'title', value: 'B' }] },
        ],
      })
    }
  })

  it('filters the collection by query parameters', () => {
    const { factory, router } = setup()
    const ann = factory.create('author', { name: 'Ann' })
    const bob = factory.create('author', { name: 'Bob' })
    factory.create('books', [
      { title: 'A', author: ann },
      { title: 'B', author: bob },
    ])
    const { document } = router.dispatch('GET', '/books.xml?author_id=2')
    expect(document).toEqual({
      kind: 'collection',
      type: 'book',
      items: [
        {
          kind: 'record',
          type: 'book',
          id: 2,
          attributes: [
            { name: 'title', value: 'B' },
            { name: 'author', value: { kind: 'record', type: 'author', id: 2, attributes: [{ name: 'name', value: 'Bob' }] } },
          ],
        },
      ],
    })
  })

  it('raises NotFoundError for a missing member', () => {
    const { factory, router } = setup()
    factory.create('book')
    expect(() => router.dispatch('GET', '/books/5.xml')).toThrow(NotFoundError)
    expect(() => router.dispatch('GET', '/books/5.xml')).toThrow('book with id 5 not found')
  })

  it('pluralizes the collection name', () => {
    const { factory, router } = setup()
    factory.create('category', { name: 'Fiction' })
    expect(router.dispatch('GET', '/categories/1').document).toEqual({
      kind: 'record',
      type: 'category',
      id: 1,
      attributes: [{ name: 'name', value: 'Fiction' }],
    })
  })
})
