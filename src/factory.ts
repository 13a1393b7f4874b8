/**
 * Factory / Stubber
 *
 * Builds records from a type's schema and caller overrides, then writes them
 * to the store:
 *
 *   factory.create('book')                          // all defaults
 *   factory.create('book', { title: null })         // explicit null wins
 *   factory.create('books', [{ title: 'A' }, {}])   // one record per map
 *   factory.stub(3, 'books', { like: { pages: 10 } })
 */

import type { AttributeDefinition, AttributeValue, Attributes, DefaultProvider, PartialRecord } from './types'
import type { DefinitionRegistry } from './definitions'
import type { ResourceStore } from './store'
import { MockRecord, isValueArray } from './record'
import { resolveType } from './helpers/resolve-type'
import { ReservedAttributeError, UniquenessExhaustedError } from './helpers/errors'

/** Assigned by the store, never by callers */
const RESERVED_ATTRIBUTE = 'id'

export interface FactoryOptions {
  /** Evaluations allowed when generating a unique value */
  uniqueAttempts?: number
}

export interface StubOptions {
  /** Attributes shared by every stubbed record */
  like?: Attributes
  /** Per-record overrides, laid over `like` */
  each?: (index: number) => Attributes
}

/** Record under construction, seen by dependent generators */
class DraftRecord implements PartialRecord {
  readonly values = new Map<string, AttributeValue>()

  constructor(readonly type: string) {}

  get(name: string): AttributeValue | undefined {
    return this.values.get(name)
  }

  has(name: string): boolean {
    return this.values.has(name)
  }
}

function isAttributeList(value: Attributes | readonly Attributes[]): value is readonly Attributes[] {
  return Array.isArray(value)
}

function sameValue(a: AttributeValue | undefined, b: AttributeValue): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
  return Object.is(a, b)
}

export class Factory {
  private readonly uniqueAttempts: number
  /** Per `type.attribute` counter for uniquified attributes without a generator */
  private readonly sequences = new Map<string, number>()
  /** Unique values chosen by builds that have not been stored yet */
  private readonly reserved = new Map<string, AttributeValue[]>()

  constructor(
    private readonly registry: DefinitionRegistry,
    private readonly store: ResourceStore,
    options: FactoryOptions = {},
  ) {
    this.uniqueAttempts = options.uniqueAttempts ?? 100
  }

  /**
   * Create one record, or one record per attribute map when given an array.
   */
  create(type: string, overrides?: Attributes): MockRecord
  create(type: string, overrides: readonly Attributes[]): MockRecord[]
  create(type: string, overrides: Attributes | readonly Attributes[] = {}): MockRecord | MockRecord[] {
    const resolved = resolveType(type, this.registry, this.store)
    if (isAttributeList(overrides)) {
      return overrides.map((attrs) => this.build(resolved, attrs))
    }
    return this.build(resolved, overrides)
  }

  /**
   * Create `count` records sharing the `like` template.
   */
  stub(count: number, type: string, options: StubOptions = {}): MockRecord[] {
    const resolved = resolveType(type, this.registry, this.store)
    const records: MockRecord[] = []
    for (let index = 0; index < count; index++) {
      records.push(this.build(resolved, { ...options.like, ...options.each?.(index) }))
    }
    return records
  }

  /** Forget uniqueness sequences; called together with a store reset */
  reset(): void {
    this.sequences.clear()
    this.reserved.clear()
  }

  private build(type: string, overrides: Attributes): MockRecord {
    if (RESERVED_ATTRIBUTE in overrides) throw new ReservedAttributeError(type, RESERVED_ATTRIBUTE)

    const schema = this.registry.schemaFor(type)
    const draft = new DraftRecord(type)
    const reservations: Array<[string, AttributeValue]> = []

    for (const [name, value] of Object.entries(overrides)) {
      draft.values.set(name, value)
    }

    try {
      for (const attribute of schema.attributes) {
        if (draft.has(attribute.name)) continue
        let value: AttributeValue
        if (attribute.unique) {
          value = this.uniqueValue(type, attribute, draft)
          // Nested creates of the same type run before this record is stored
          this.reserve(type, attribute.name, value)
          reservations.push([attribute.name, value])
        } else {
          value = this.evaluate(attribute.provider, draft)
        }
        draft.values.set(attribute.name, value)
      }

      // Schema order first, then attributes only the caller supplied
      const ordered: Array<[string, AttributeValue]> = []
      for (const attribute of schema.attributes) {
        const value = draft.get(attribute.name)
        if (value !== undefined) ordered.push([attribute.name, value])
      }
      for (const [name, value] of draft.values) {
        if (!schema.attributes.some((attribute) => attribute.name === name)) ordered.push([name, value])
      }

      const record = new MockRecord(type, this.store.nextId(type), ordered)
      return this.store.insert(record)
    } finally {
      for (const [name, value] of reservations) this.release(type, name, value)
    }
  }

  private evaluate(provider: DefaultProvider, draft: DraftRecord): AttributeValue {
    switch (provider.kind) {
      case 'none':
        return null
      case 'literal':
        return isValueArray(provider.value) ? [...provider.value] : provider.value
      case 'generator':
        return provider.fn()
      case 'dependent':
        return provider.fn(draft)
    }
  }

  private uniqueValue(type: string, attribute: AttributeDefinition, draft: DraftRecord): AttributeValue {
    const key = `${type}.${attribute.name}`
    const taken = (candidate: AttributeValue) =>
      (this.reserved.get(key) ?? []).some((value) => sameValue(value, candidate)) ||
      this.store.all(type).some((record) => sameValue(record.get(attribute.name), candidate))

    for (let attempt = 1; attempt <= this.uniqueAttempts; attempt++) {
      let candidate: AttributeValue
      if (attribute.provider.kind === 'none') {
        candidate = `${type} ${attribute.name} ${this.nextSequence(type, attribute.name)}`
      } else {
        candidate = this.evaluate(attribute.provider, draft)
        if (attempt > 1 && typeof candidate === 'string') candidate = `${candidate} ${attempt}`
      }
      if (!taken(candidate)) return candidate
    }

    throw new UniquenessExhaustedError(type, attribute.name, this.uniqueAttempts)
  }

  private reserve(type: string, attribute: string, value: AttributeValue): void {
    const key = `${type}.${attribute}`
    const values = this.reserved.get(key) ?? []
    values.push(value)
    this.reserved.set(key, values)
  }

  private release(type: string, attribute: string, value: AttributeValue): void {
    const key = `${type}.${attribute}`
    const values = this.reserved.get(key)
    if (!values) return
    const index = values.findIndex((candidate) => sameValue(candidate, value))
    if (index !== -1) values.splice(index, 1)
    if (values.length === 0) this.reserved.delete(key)
  }

  private nextSequence(type: string, attribute: string): number {
    const key = `${type}.${attribute}`
    const next = (this.sequences.get(key) ?? 0) + 1
    this.sequences.set(key, next)
    return next
  }
}
