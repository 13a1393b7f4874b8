/**
 * Request Router
 *
 * Maps simulated requests to handlers without any transport. A registration
 * is a verb, a pattern matched against the full path including its query
 * string, and a handler receiving the captured groups in order:
 *
 *   router.register('GET', '/books/(\\d+)/reviews\\.xml', (bookId) => ...)
 *
 * Two classes of routes exist:
 * - custom:  registered by the test author, always tried first
 * - default: derived per resource type, tried afterwards
 *   - GET /books[.xml|.json][?query]   -> records matching the query
 *   - GET /books/<id>[.xml|.json]      -> one record, or NotFoundError
 *
 * Within a class the first registration that matches wins. A request nothing
 * matches fails with RequestNotFoundError carrying the literal path.
 */

import type { DispatchResult, HandlerResult, RouteClass, RouteHandler, RouteRegistration } from './types'
import type { GraphSerializer } from './serializer'
import type { QueryEngine } from './query'
import { pluralize } from './helpers/inflect'
import { InvalidPatternError, RequestNotFoundError } from './helpers/errors'

// =============================================================================
// Patterns
// =============================================================================

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&')
}

/**
 * Compile a route pattern.
 *
 * Strings are anchored at both ends. RegExp objects are used as given, minus
 * the `g` and `y` flags whose `lastIndex` state would leak between requests.
 */
export function compilePattern(pattern: RegExp | string): RegExp {
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
  }
  try {
    return new RegExp(`^(?:${pattern})$`)
  } catch (err) {
    throw new InvalidPatternError(pattern, err instanceof Error ? err.message : String(err))
  }
}

/**
 * Split a query string into parameters. Later duplicates win.
 */
export function parseQuery(query: string | undefined): Record<string, string> {
  const params: Record<string, string> = {}
  if (!query) return params
  for (const [key, value] of new URLSearchParams(query)) {
    params[key] = value
  }
  return params
}

// =============================================================================
// Default routes
// =============================================================================

const FORMAT_SUFFIX = '(?:\\.(?:xml|json))?'

/**
 * Collection and member routes for one resource type.
 */
export function defaultRoutes(type: string, query: QueryEngine): RouteRegistration[] {
  const collection = escapeRegExp(pluralize(type))
  return [
    {
      verb: 'GET',
      pattern: new RegExp(`^/${collection}${FORMAT_SUFFIX}(?:\\?(.*))?$`),
      handler: (search) => (search ? query.where(type, parseQuery(search)) : query.find(type)),
      class: 'default',
      resource: type,
    },
    {
      verb: 'GET',
      pattern: new RegExp(`^/${collection}/(\\d+)${FORMAT_SUFFIX}(?:\\?.*)?$`),
      handler: (id) => query.find(type, id ?? ''),
      class: 'default',
      resource: type,
    },
  ]
}

// =============================================================================
// Router
// =============================================================================

export interface RouterOptions {
  serializer: GraphSerializer
  /** Default routes, computed at dispatch time so newly defined types are routable */
  defaults?: () => RouteRegistration[]
}

export interface RouteMatch {
  route: RouteRegistration
  captures: Array<string | undefined>
}

export class Router {
  private custom: RouteRegistration[] = []
  private readonly serializer: GraphSerializer
  private readonly defaults: () => RouteRegistration[]

  constructor(options: RouterOptions) {
    this.serializer = options.serializer
    this.defaults = options.defaults ?? (() => [])
  }

  register(verb: string, pattern: RegExp | string, handler: RouteHandler): RouteRegistration {
    const route: RouteRegistration = {
      verb: verb.toUpperCase(),
      pattern: compilePattern(pattern),
      handler,
      class: 'custom',
    }
    this.custom.push(route)
    return route
  }

  /** Custom routes in registration order, then the default routes */
  routes(routeClass?: RouteClass): RouteRegistration[] {
    const all = [...this.custom, ...this.defaults()]
    return routeClass ? all.filter((route) => route.class === routeClass) : all
  }

  match(verb: string, path: string): RouteMatch | null {
    const method = verb.toUpperCase()
    for (const route of this.routes()) {
      if (route.verb !== method) continue
      const result = route.pattern.exec(path)
      if (result) return { route, captures: result.slice(1) }
    }
    return null
  }

  /**
   * Run the winning handler and serialize its result.
   */
  dispatch(verb: string, path: string): DispatchResult {
    const matched = this.match(verb, path)
    if (!matched) throw new RequestNotFoundError(path, verb)
    const result: HandlerResult = matched.route.handler(...matched.captures)
    return { route: matched.route, document: this.serializer.serialize(result, matched.route.resource) }
  }

  /** Drop custom registrations; default routes follow the definitions */
  reset(): void {
    this.custom = []
  }
}
