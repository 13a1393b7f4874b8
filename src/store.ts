/**
 * Resource Store
 *
 * Created records grouped by type, in creation order, plus an id sequence per
 * type. Ids start at 1 and are never handed out twice, not even after a
 * record is destroyed. The store is scenario-scoped and only ever cleared as
 * a whole.
 */

import type { MockRecord } from './record'

interface TypeBucket {
  records: MockRecord[]
  lastId: number
}

export class ResourceStore {
  private readonly buckets = new Map<string, TypeBucket>()

  private bucket(type: string): TypeBucket {
    let bucket = this.buckets.get(type)
    if (!bucket) {
      bucket = { records: [], lastId: 0 }
      this.buckets.set(type, bucket)
    }
    return bucket
  }

  /** Allocate the next id of a type */
  nextId(type: string): number {
    const bucket = this.bucket(type)
    bucket.lastId += 1
    return bucket.lastId
  }

  /**
   * Append a record. A record inserted with an id above the sequence moves the
   * sequence forward so later ids stay strictly increasing.
   */
  insert(record: MockRecord): MockRecord {
    const bucket = this.bucket(record.type)
    bucket.records.push(record)
    if (record.id > bucket.lastId) bucket.lastId = record.id
    return record
  }

  /** Records of a type in creation order */
  all(type: string): MockRecord[] {
    return [...(this.buckets.get(type)?.records ?? [])]
  }

  get(type: string, id: number): MockRecord | undefined {
    return this.buckets.get(type)?.records.find((record) => record.id === id)
  }

  /**
   * Remove a single record. References held by other records are left alone.
   */
  destroy(type: string, id: number): boolean {
    const bucket = this.buckets.get(type)
    if (!bucket) return false
    const index = bucket.records.findIndex((record) => record.id === id)
    if (index === -1) return false
    bucket.records.splice(index, 1)
    return true
  }

  has(type: string): boolean {
    return this.buckets.has(type)
  }

  /** Type names in the order their first record (or id) was allocated */
  types(): string[] {
    return [...this.buckets.keys()]
  }

  count(type?: string): number {
    if (type !== undefined) return this.buckets.get(type)?.records.length ?? 0
    let total = 0
    for (const bucket of this.buckets.values()) total += bucket.records.length
    return total
  }

  reset(): void {
    this.buckets.clear()
  }
}
