/**
 * Graph Serializer
 *
 * Turns records that may reference each other in cycles (author <-> books)
 * into a tree, the way a real backend would render them. Each root is walked
 * depth first while the `type#id` keys on the active path are tracked:
 *
 * - a record not on the path is pushed, fully expanded, then popped
 * - a record already on the path (a back edge) is emitted with its id and
 *   every attribute except those that would re-enter the path
 *
 * Serializing author#1 whose books point back at it:
 *
 *   author#1 { name, books: [ book#1 { title, author: author#1 { name } } ] }
 *
 * Attribute order is the schema order when the type is defined, then the
 * remaining attributes in insertion order, so identical graphs always render
 * identically.
 */

import type { AttributeValue, DocumentAttribute, DocumentCollection, DocumentNode, DocumentValue, HandlerResult, SerializedDocument } from './types'
import { MockRecord, isRecordArray, isValueArray, type RecordKey } from './record'

export interface SerializerOptions {
  /** Declared attribute order of a type; empty when the type has no schema */
  attributeOrder?: (type: string) => readonly string[]
}

export class GraphSerializer {
  private readonly attributeOrder: (type: string) => readonly string[]

  constructor(options: SerializerOptions = {}) {
    this.attributeOrder = options.attributeOrder ?? (() => [])
  }

  /**
   * Serialize a handler result. Records and arrays of records become document
   * nodes and collections; any other value is a raw document and is returned
   * unchanged.
   */
  serialize(result: HandlerResult, typeHint?: string): SerializedDocument {
    if (result instanceof MockRecord) return this.record(result)
    if (isRecordArray(result)) return this.collection(result, typeHint)
    return result
  }

  /** Serialize a single root record */
  record(record: MockRecord): DocumentNode {
    return this.visit(record, new Set())
  }

  /**
   * Serialize several roots; each root starts with an empty path. `typeHint`
   * names the type of an empty result, when the caller knows it.
   */
  collection(records: readonly MockRecord[], typeHint?: string): DocumentCollection {
    return {
      kind: 'collection',
      type: records.length === 0 ? (typeHint ?? null) : collectionType(records),
      items: records.map((record) => this.visit(record, new Set())),
    }
  }

  /** Attribute names of a record in emission order */
  orderedNames(record: MockRecord): string[] {
    const present = record.attributeNames()
    const declared = this.attributeOrder(record.type).filter((name) => record.has(name))
    return [...declared, ...present.filter((name) => !declared.includes(name))]
  }

  private visit(record: MockRecord, path: Set<RecordKey>): DocumentNode {
    const key = record.key
    const backEdge = path.has(key)
    if (!backEdge) path.add(key)

    const attributes: DocumentAttribute[] = []
    for (const name of this.orderedNames(record)) {
      const value = record.get(name)
      if (value === undefined) continue
      if (backEdge && reentersPath(value, path)) continue
      attributes.push({ name, value: this.value(value, path) })
    }

    if (!backEdge) path.delete(key)
    return { kind: 'record', type: record.type, id: record.id, attributes }
  }

  private value(value: AttributeValue, path: Set<RecordKey>): DocumentValue {
    if (value instanceof MockRecord) return this.visit(value, path)
    if (isValueArray(value)) {
      return {
        kind: 'collection',
        type: isRecordArray(value) ? collectionType(value) : null,
        items: value.map((item) => this.value(item, path)),
      }
    }
    return value
  }
}

function reentersPath(value: AttributeValue, path: Set<RecordKey>): boolean {
  if (value instanceof MockRecord) return path.has(value.key)
  if (isValueArray(value)) return value.some((item) => reentersPath(item, path))
  return false
}

/** Type shared by every record, or null when empty or mixed */
function collectionType(records: readonly MockRecord[]): string | null {
  const first = records[0]
  if (!first) return null
  return records.every((record) => record.type === first.type) ? first.type : null
}
