import type { MockRecord } from './record'

// =============================================================================
// Attribute values
// =============================================================================

export type Scalar = string | number | boolean | null | Date

/**
 * Value held by a record attribute: a scalar, a reference to another record,
 * or an array of either.
 */
export type AttributeValue = Scalar | MockRecord | readonly AttributeValue[]

export type Attributes = Record<string, AttributeValue>

/** Read-only view of a record while its defaults are still being resolved. */
export interface PartialRecord {
  readonly type: string
  get(name: string): AttributeValue | undefined
  has(name: string): boolean
}

// =============================================================================
// Definitions
// =============================================================================

export type ValueGenerator = () => AttributeValue
export type DependentGenerator = (record: PartialRecord) => AttributeValue

/**
 * How an attribute obtains its value when the caller does not provide one.
 */
export type DefaultProvider =
  | { kind: 'none' }
  | { kind: 'literal'; value: AttributeValue }
  | { kind: 'generator'; fn: ValueGenerator }
  | { kind: 'dependent'; fn: DependentGenerator }

export interface AttributeDefinition {
  name: string
  provider: DefaultProvider
  unique: boolean
}

export interface ResourceSchema {
  type: string
  attributes: readonly AttributeDefinition[]
}

// =============================================================================
// Documents
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

export interface DocumentAttribute {
  name: string
  value: DocumentValue
}

export interface DocumentNode {
  kind: 'record'
  type: string
  id: number
  attributes: DocumentAttribute[]
}

export interface DocumentCollection {
  kind: 'collection'
  /** Type of the contained records, null when unknown (empty or mixed) */
  type: string | null
  items: DocumentValue[]
}

export type DocumentValue = Scalar | DocumentNode | DocumentCollection

/** Handler output that is not made of records; passed through as is */
export type RawDocument = JsonValue

export type SerializedDocument = DocumentValue | RawDocument

export type HandlerResult = MockRecord | readonly MockRecord[] | RawDocument

// =============================================================================
// Routing
// =============================================================================

export type RouteHandler = (...captures: Array<string | undefined>) => HandlerResult

export type RouteClass = 'custom' | 'default'

export interface RouteRegistration {
  verb: string
  pattern: RegExp
  handler: RouteHandler
  class: RouteClass
  /** Type the route was derived for (default routes only) */
  resource?: string
}

export interface DispatchResult {
  route: RouteRegistration
  document: SerializedDocument
}

// =============================================================================
// Configuration
// =============================================================================

export type DocumentFormat = 'json' | 'xml'

export interface MockConfig {
  name: string
  /** Record every dispatched request in the diagnostics log */
  diagnostics: boolean
  /** Evaluations allowed when generating a unique value */
  uniqueAttempts: number
  /** Encoding used by the mock endpoint when the path carries no extension */
  defaultFormat: DocumentFormat
}

// =============================================================================
// Errors
// =============================================================================

export interface ErrorDetail {
  message: string
  code?: string
  status?: number
  /** Request path, for REQUEST_NOT_FOUND */
  path?: string
  verb?: string
  /** Resource type and id, for NOT_FOUND */
  type?: string
  id?: string
}

export interface ErrorEnvelope {
  error: ErrorDetail
}
