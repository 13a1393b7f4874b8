import type { AttributeValue, Attributes, PartialRecord } from './types'

/** Key identifying a record across types, e.g. `book#3` */
export type RecordKey = `${string}#${number}`

export function recordKey(type: string, id: number): RecordKey {
  return `${type}#${id}`
}

/**
 * A single mock resource instance.
 *
 * Attributes keep their insertion order. References to other records are
 * stored as the records themselves; they are associations, so nothing here
 * owns the records it points at.
 */
export class MockRecord implements PartialRecord {
  readonly type: string
  readonly id: number
  private readonly values: Map<string, AttributeValue>

  constructor(type: string, id: number, attributes?: Iterable<[string, AttributeValue]>) {
    this.type = type
    this.id = id
    this.values = new Map(attributes)
  }

  get key(): RecordKey {
    return recordKey(this.type, this.id)
  }

  get(name: string): AttributeValue | undefined {
    return this.values.get(name)
  }

  has(name: string): boolean {
    return this.values.has(name)
  }

  set(name: string, value: AttributeValue): this {
    this.values.set(name, value)
    return this
  }

  /** Attribute names in insertion order */
  attributeNames(): string[] {
    return [...this.values.keys()]
  }

  /** Read an attribute expected to hold a string */
  string(name: string): string | undefined {
    const value = this.values.get(name)
    return typeof value === 'string' ? value : undefined
  }

  /** Read an attribute expected to hold a number */
  number(name: string): number | undefined {
    const value = this.values.get(name)
    return typeof value === 'number' ? value : undefined
  }

  /** Read an attribute expected to reference another record */
  ref(name: string): MockRecord | undefined {
    const value = this.values.get(name)
    return value instanceof MockRecord ? value : undefined
  }

  /** Read an attribute expected to hold records; non-record elements are skipped */
  refs(name: string): MockRecord[] {
    const value = this.values.get(name)
    if (!isValueArray(value)) return []
    return value.filter((item): item is MockRecord => item instanceof MockRecord)
  }

  /** Shallow copy of the attributes, references left as records */
  attributes(): Attributes {
    return Object.fromEntries(this.values)
  }

  toString(): string {
    return `${this.type}#${this.id}`
  }
}

export function isValueArray(value: AttributeValue | undefined): value is readonly AttributeValue[] {
  return Array.isArray(value)
}

export function isRecord(value: unknown): value is MockRecord {
  return value instanceof MockRecord
}

export function isRecordArray(value: unknown): value is readonly MockRecord[] {
  return Array.isArray(value) && value.every((item) => item instanceof MockRecord)
}
