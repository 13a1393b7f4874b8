/**
 * Definition Registry
 *
 * Holds the attribute schema of every mock resource type:
 *
 *   registry.define('book', (t) => {
 *     t.uniquify('name')
 *     t.plain('pages', 120)
 *     t.plain('author', () => factory.create('author'))
 *     t.plain('slug', (book) => String(book.get('name')).toLowerCase())
 *   })
 *
 * Defining a type again extends its schema. Types that were never defined
 * have an empty schema, so ad-hoc records of any type can still be created.
 */

import type { AttributeDefinition, AttributeValue, DefaultProvider, DependentGenerator, ValueGenerator, ResourceSchema } from './types'
import { DefinitionConflictError } from './helpers/errors'

/**
 * A literal default, or a function computing one. Zero-parameter functions
 * fit DependentGenerator as well, so one function type covers both.
 */
export type DefaultInput = AttributeValue | DependentGenerator

/**
 * Classify a default: zero-parameter functions are generators, functions
 * declaring a parameter receive the partially built record.
 */
export function toProvider(input?: DefaultInput): DefaultProvider {
  if (input === undefined) return { kind: 'none' }
  if (typeof input === 'function') {
    return isGenerator(input) ? { kind: 'generator', fn: input } : { kind: 'dependent', fn: input }
  }
  return { kind: 'literal', value: input }
}

function isGenerator(fn: DependentGenerator): fn is ValueGenerator {
  return fn.length === 0
}

function sameProvider(a: DefaultProvider, b: DefaultProvider): boolean {
  switch (a.kind) {
    case 'none':
      return b.kind === 'none'
    case 'literal':
      return b.kind === 'literal' && Object.is(a.value, b.value)
    case 'generator':
      return b.kind === 'generator' && sameFunction(a.fn, b.fn)
    case 'dependent':
      return b.kind === 'dependent' && sameFunction(a.fn, b.fn)
  }
}

/**
 * Setup blocks that run again for every scenario create fresh closures, so
 * functions with the same source count as the same default.
 */
function sameFunction(a: DependentGenerator, b: DependentGenerator): boolean {
  return a === b || a.toString() === b.toString()
}

/**
 * Builder handed to the `define` callback.
 */
export class SchemaBuilder {
  constructor(
    private readonly type: string,
    private readonly attributes: AttributeDefinition[],
  ) {}

  /** Declare an attribute, optionally with a literal or generated default */
  plain(name: string, defaultValue?: DefaultInput): this {
    this.declare({ name, provider: toProvider(defaultValue), unique: false })
    return this
  }

  /** Declare an attribute whose generated values are distinct within the type */
  uniquify(name: string, generator?: DependentGenerator): this {
    this.declare({ name, provider: toProvider(generator), unique: true })
    return this
  }

  private declare(definition: AttributeDefinition): void {
    const index = this.attributes.findIndex((attr) => attr.name === definition.name)
    const existing = this.attributes[index]
    if (!existing) {
      this.attributes.push(definition)
      return
    }
    // Re-declaring without a default keeps what is there
    if (definition.provider.kind === 'none' && existing.unique === definition.unique) return
    if (existing.unique !== definition.unique || !sameProvider(existing.provider, definition.provider)) {
      throw new DefinitionConflictError(this.type, definition.name)
    }
    // The newer closure replaces the older one, keeping the declared position
    this.attributes[index] = definition
  }
}

export type SchemaBuilderFn = (builder: SchemaBuilder) => void

export class DefinitionRegistry {
  private readonly schemas = new Map<string, AttributeDefinition[]>()

  /**
   * Register a type or extend its schema. If the builder throws, the schema is
   * left as it was before the call.
   */
  define(type: string, build: SchemaBuilderFn = () => {}): ResourceSchema {
    const current = this.schemas.get(type) ?? []
    const draft = [...current]
    build(new SchemaBuilder(type, draft))
    this.schemas.set(type, draft)
    return { type, attributes: draft }
  }

  /** Accumulated schema, or an empty one for a type never defined */
  schemaFor(type: string): ResourceSchema {
    return { type, attributes: this.schemas.get(type) ?? [] }
  }

  /** Attribute names in declaration order */
  attributeOrder(type: string): string[] {
    return (this.schemas.get(type) ?? []).map((attr) => attr.name)
  }

  has(type: string): boolean {
    return this.schemas.has(type)
  }

  /** Defined type names in definition order */
  types(): string[] {
    return [...this.schemas.keys()]
  }

  clear(): void {
    this.schemas.clear()
  }
}
