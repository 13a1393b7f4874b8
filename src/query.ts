/**
 * Query Engine
 *
 * Linear lookups over the store. Stores hold tens to a few hundred records
 * per scenario, so there is no indexing.
 */

import type { DefinitionRegistry } from './definitions'
import type { ResourceStore } from './store'
import { MockRecord } from './record'
import { resolveType } from './helpers/resolve-type'
import { NotFoundError } from './helpers/errors'

export type RecordPredicate = (record: MockRecord) => boolean

/**
 * Parse an id as given by a caller or captured from a path.
 * Returns null for anything that is not a positive integer.
 */
export function parseId(id: number | string): number | null {
  if (typeof id === 'number') return Number.isInteger(id) && id > 0 ? id : null
  if (!/^\d+$/.test(id)) return null
  const parsed = parseInt(id, 10)
  return parsed > 0 ? parsed : null
}

/**
 * Whether a record matches a string parameter.
 *
 * `id=2` compares the record's own id. `author_id=2` matches when the `author` attribute references a record with
 * id 2 (and there is no `author_id` attribute of its own). Any other key
 * compares the attribute's string form.
 */
export function matchesParam(record: MockRecord, key: string, expected: string): boolean {
  if (key === 'id') return String(record.id) === expected
  if (record.has(key)) {
    const value = record.get(key)
    if (value instanceof MockRecord) return String(value.id) === expected
    if (value instanceof Date) return value.toISOString() === expected
    return String(value) === expected
  }
  if (key.endsWith('_id')) {
    const related = record.get(key.slice(0, -3))
    return related instanceof MockRecord && String(related.id) === expected
  }
  return false
}

export class QueryEngine {
  constructor(
    private readonly registry: DefinitionRegistry,
    private readonly store: ResourceStore,
  ) {}

  /**
   * - `find(type)` all records in creation order
   * - `find(type, predicate)` records the predicate accepts
   * - `find(type, id)` the record, or NotFoundError
   */
  find(type: string): MockRecord[]
  find(type: string, predicate: RecordPredicate): MockRecord[]
  find(type: string, id: number | string): MockRecord
  find(type: string, selector?: RecordPredicate | number | string): MockRecord | MockRecord[] {
    const resolved = this.resolve(type)
    if (selector === undefined) return this.store.all(resolved)
    if (typeof selector === 'function') return this.store.all(resolved).filter(selector)

    const id = parseId(selector)
    const record = id === null ? undefined : this.store.get(resolved, id)
    if (!record) throw new NotFoundError(resolved, selector)
    return record
  }

  /**
   * Records matching every parameter (see `matchesParam`).
   */
  where(type: string, params: Record<string, string> = {}): MockRecord[] {
    const entries = Object.entries(params)
    return this.store.all(this.resolve(type)).filter((record) =>
      entries.every(([key, expected]) => matchesParam(record, key, expected)),
    )
  }

  /** First record the predicate accepts, if any */
  first(type: string, predicate?: RecordPredicate): MockRecord | undefined {
    const records = this.store.all(this.resolve(type))
    return predicate ? records.find(predicate) : records[0]
  }

  private resolve(type: string): string {
    return resolveType(type, this.registry, this.store)
  }
}
