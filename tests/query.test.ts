import { describe, it, expect } from 'vitest'
import { DefinitionRegistry } from '../src/definitions'
import { ResourceStore } from '../src/store'
import { Factory } from '../src/factory'
import { QueryEngine, matchesParam, parseId } from '../src/query'
import { NotFoundError } from '../src/helpers/errors'

function setup() {
  const registry = new DefinitionRegistry()
  const store = new ResourceStore()
  const factory = new Factory(registry, store)
  const query = new QueryEngine(registry, store)
  return { registry, store, factory, query }
}

describe('parseId', () => {
  it('accepts positive integers and numeric strings', () => {
    expect(parseId(3)).toBe(3)
    expect(parseId('42')).toBe(42)
  })

  it('rejects everything else', () => {
    expect(parseId(0)).toBeNull()
    expect(parseId(1.5)).toBeNull()
    expect(parseId('abc')).toBeNull()
    expect(parseId('-1')).toBeNull()
    expect(parseId('')).toBeNull()
  })
})

describe('QueryEngine.find', () => {
  it('returns all records of a type in creation order', () => {
    const { factory, query } = setup()
    const [a, b] = factory.create('books', [{ title: 'A' }, { title: 'B' }])
    expect(query.find('books')).toEqual([a, b])
    expect(query.find('book')).toEqual([a, b])
  })

  it('returns an empty list for a type with no records', () => {
    const { query } = setup()
    expect(query.find('books')).toEqual([])
  })

  it('filters with a predicate', () => {
    const { factory, query } = setup()
    factory.create('books', [
      { title: 'Dune', pages: 600 },
      { title: 'Emma', pages: 400 },
      { title: 'Dune Messiah', pages: 250 },
    ])
    const result = query.find('books', (book) => (book.string('title') ?? '').includes('Dune') && (book.number('pages') ?? 0) > 300)
    expect(result.map((book) => book.get('title'))).toEqual(['Dune'])
  })

  it('dereferences relations inside predicates', () => {
    const { factory, query } = setup()
    const ann = factory.create('author', { name: 'Ann' })
    const bob = factory.create('author', { name: 'Bob' })
    factory.create('books', [{ title: 'A', author: ann }, { title: 'B', author: bob }])
    const result = query.find('books', (book) => book.ref('author')?.get('name') === 'Bob')
    expect(result.map((book) => book.get('title'))).toEqual(['B'])
  })

  it('finds a record by id, numeric or string', () => {
    const { factory, query } = setup()
    factory.create('book')
    const second = factory.create('book')
    expect(query.find('book', 2)).toBe(second)
    expect(query.find('books', '2')).toBe(second)
  })

  it('throws NotFoundError for a missing id', () => {
    const { factory, query } = setup()
    factory.create('book')
    expect(() => query.find('books', 9)).toThrow(NotFoundError)
    expect(() => query.find('books', 9)).toThrow('book with id 9 not found')
  })

  it('throws NotFoundError for a malformed id', () => {
    const { query } = setup()
    expect(() => query.find('book', 'abc')).toThrow('book with id abc not found')
  })
})

describe('QueryEngine.where', () => {
  it('matches scalar attributes by their string form', () => {
    const { factory, query } = setup()
    factory.create('books', [
      { title: 'A', pages: 10, inPrint: true },
      { title: 'B', pages: 20, inPrint: false },
    ])
    expect(query.where('books', { pages: '20' }).map((b) => b.get('title'))).toEqual(['B'])
    expect(query.where('books', { inPrint: 'true' }).map((b) => b.get('title'))).toEqual(['A'])
  })

  it('matches relation ids through the _id suffix', () => {
    const { factory, query } = setup()
    const ann = factory.create('authors', { name: 'Ann' })
    const bob = factory.create('authors', { name: 'Bob' })
    factory.create('books', [
      { title: 'A', author: ann },
      { title: 'B', author: bob },
      { title: 'C', author: bob },
    ])
    expect(query.where('books', { author_id: '2' }).map((b) => b.get('title'))).toEqual(['B', 'C'])
  })

  it('returns every record without parameters', () => {
    const { factory, query } = setup()
    factory.stub(3, 'books')
    expect(query.where('books')).toHaveLength(3)
  })

  it('matches the record id', () => {
    const { factory, query } = setup()
    factory.create('books', [{ title: 'A' }, { title: 'B' }])
    expect(query.where('books', { id: '2' }).map((b) => b.get('title'))).toEqual(['B'])
    expect(query.where('books', { id: '3' })).toEqual([])
  })

  it('requires every parameter to match', () => {
    const { factory, query } = setup()
    factory.create('books', [
      { title: 'A', pages: 10 },
      { title: 'A', pages: 20 },
    ])
    expect(query.where('books', { title: 'A', pages: '20' }).map((b) => b.id)).toEqual([2])
  })
})

describe('matchesParam', () => {
  it('prefers an attribute literally named with _id', () => {
    const { factory } = setup()
    const record = factory.create('book', { author_id: 5 })
    expect(matchesParam(record, 'author_id', '5')).toBe(true)
  })

  it('does not match missing attributes', () => {
    const { factory } = setup()
    const record = factory.create('book')
    expect(matchesParam(record, 'title', 'A')).toBe(false)
    expect(matchesParam(record, 'author_id', '1')).toBe(false)
  })
})
