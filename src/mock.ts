/**
 * Mock environment
 *
 * The scenario-scoped state object tying definitions, store, factory, query
 * engine, serializer and router together. Test code defines its types once,
 * calls `beginScenario()` at the start of every scenario, then creates records
 * and registers custom routes. Code under test reaches the same instance
 * through `request()`, directly or through the mock endpoint.
 *
 *   const mock = createMock()
 *   mock.define('author', (t) => t.uniquify('name'))
 *   mock.define('book', (t) => {
 *     t.uniquify('name')
 *     t.plain('author', () => mock.create('author'))
 *   })
 *
 *   mock.beginScenario()
 *   const book = mock.create('book')
 *   mock.request('GET', `/books/${book.id}.xml`)
 *
 * Scenarios that run in parallel need an instance each.
 */

import type { Attributes, HandlerResult, MockConfig, ResourceSchema, RouteHandler, RouteRegistration, SerializedDocument } from './types'
import { DefinitionRegistry, type SchemaBuilderFn } from './definitions'
import { ResourceStore } from './store'
import { Factory, type StubOptions } from './factory'
import { QueryEngine, type RecordPredicate } from './query'
import { GraphSerializer } from './serializer'
import { Router, defaultRoutes } from './router'
import { DiagnosticsLog } from './diagnostics'
import { resolveConfig, type MockInput } from './config'
import { resolveType } from './helpers/resolve-type'
import { ErrorCode, MockError } from './helpers/errors'
import type { MockRecord } from './record'

export class MockEnvironment {
  readonly config: MockConfig
  readonly registry = new DefinitionRegistry()
  readonly store = new ResourceStore()
  readonly diagnostics: DiagnosticsLog
  private readonly factory: Factory
  private readonly query: QueryEngine
  private readonly serializer: GraphSerializer
  private readonly router: Router

  constructor(config: MockConfig) {
    this.config = config
    this.factory = new Factory(this.registry, this.store, { uniqueAttempts: config.uniqueAttempts })
    this.query = new QueryEngine(this.registry, this.store)
    this.serializer = new GraphSerializer({ attributeOrder: (type) => this.registry.attributeOrder(type) })
    this.router = new Router({
      serializer: this.serializer,
      defaults: () => this.resourceTypes().flatMap((type) => defaultRoutes(type, this.query)),
    })
    this.diagnostics = new DiagnosticsLog(() => this.config.diagnostics)
  }

  // ---------------------------------------------------------------------------
  // Definitions
  // ---------------------------------------------------------------------------

  define(type: string, build?: SchemaBuilderFn): this {
    const existing = this.store.count(type)
    this.registry.define(type, build)
    if (existing > 0) {
      console.warn(`[mock] ${type} redefined with ${existing} existing record(s); they keep their current attributes`)
    }
    return this
  }

  schemaFor(type: string): ResourceSchema {
    return this.registry.schemaFor(resolveType(type, this.registry, this.store))
  }

  // ---------------------------------------------------------------------------
  // Records
  // ---------------------------------------------------------------------------

  create(type: string, attributes?: Attributes): MockRecord
  create(type: string, attributes: readonly Attributes[]): MockRecord[]
  create(type: string, attributes: Attributes | readonly Attributes[] = {}): MockRecord | MockRecord[] {
    return isList(attributes) ? this.factory.create(type, attributes) : this.factory.create(type, attributes)
  }

  stub(count: number, type: string, options?: StubOptions): MockRecord[] {
    return this.factory.stub(count, type, options)
  }

  find(type: string): MockRecord[]
  find(type: string, predicate: RecordPredicate): MockRecord[]
  find(type: string, id: number | string): MockRecord
  find(type: string, selector?: RecordPredicate | number | string): MockRecord | MockRecord[] {
    if (selector === undefined) return this.query.find(type)
    if (typeof selector === 'function') return this.query.find(type, selector)
    return this.query.find(type, selector)
  }

  where(type: string, params?: Record<string, string>): MockRecord[] {
    return this.query.where(type, params)
  }

  first(type: string, predicate?: RecordPredicate): MockRecord | undefined {
    return this.query.first(type, predicate)
  }

  /** Remove a record from the store; records referencing it keep the reference */
  destroy(record: MockRecord): boolean {
    return this.store.destroy(record.type, record.id)
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  register(verb: string, pattern: RegExp | string, handler: RouteHandler): RouteRegistration {
    return this.router.register(verb, pattern, handler)
  }

  routes(): RouteRegistration[] {
    return this.router.routes()
  }

  /**
   * Dispatch a simulated request and return the serialized document.
   * Throws RequestNotFoundError when no route matches.
   */
  request(verb: string, path: string): SerializedDocument {
    const method = verb.toUpperCase()
    try {
      const { document } = this.router.dispatch(method, path)
      this.diagnostics.record({ verb: method, path, document })
      return document
    } catch (err) {
      this.diagnostics.record({ verb: method, path, error: err instanceof MockError ? err.code : ErrorCode.INTERNAL_ERROR })
      throw err
    }
  }

  serialize(result: HandlerResult): SerializedDocument {
    return this.serializer.serialize(result)
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Reset scenario state: records, id sequences, custom routes and the
   * diagnostics log. Definitions stay.
   */
  beginScenario(): void {
    this.store.reset()
    this.factory.reset()
    this.router.reset()
    this.diagnostics.clear()
  }

  /** Defined types first, then types that only exist in the store */
  resourceTypes(): string[] {
    const defined = this.registry.types()
    return [...defined, ...this.store.types().filter((type) => !defined.includes(type))]
  }
}

function isList(value: Attributes | readonly Attributes[]): value is readonly Attributes[] {
  return Array.isArray(value)
}

export function createMock(input?: MockInput): MockEnvironment {
  return new MockEnvironment(resolveConfig(input))
}
