// Mock environment
export { MockEnvironment, createMock } from './mock'

// Definitions, records and store
export { DefinitionRegistry, SchemaBuilder, toProvider } from './definitions'
export type { DefaultInput, SchemaBuilderFn } from './definitions'
export { MockRecord, recordKey, isRecord, isRecordArray } from './record'
export type { RecordKey } from './record'
export { ResourceStore } from './store'
export { Factory } from './factory'
export type { FactoryOptions, StubOptions } from './factory'
export { QueryEngine, parseId, matchesParam } from './query'
export type { RecordPredicate } from './query'

// Serialization and routing
export { GraphSerializer } from './serializer'
export type { SerializerOptions } from './serializer'
export { Router, compilePattern, defaultRoutes, parseQuery } from './router'
export type { RouterOptions, RouteMatch } from './router'

// Diagnostics and configuration
export { DiagnosticsLog, enableDiagnostics, disableDiagnostics, diagnosticsEnabled } from './diagnostics'
export type { DiagnosticsEntry } from './diagnostics'
export { resolveConfig, discoverEnv, parseFormat, DEFAULT_CONFIG } from './config'
export type { MockInput } from './config'

// Endpoint and client
export { createMockApp } from './app'
export type { MockAppEnv } from './app'
export { ResourceClient, clientFor } from './client'
export type { Fetcher, ResourceClientOptions } from './client'

// Helpers
export { encode, toJson, toXml, toPlain, escapeXml, formatFromPath, CONTENT_TYPES } from './helpers/format'
export { pluralize, singularize, isPlural } from './helpers/inflect'
export {
  ErrorCode,
  MockError,
  NotFoundError,
  RequestNotFoundError,
  UniquenessExhaustedError,
  DefinitionConflictError,
  InvalidPatternError,
  ReservedAttributeError,
  errorFromDetail,
} from './helpers/errors'
export type { ErrorCodeType, MockErrorOptions } from './helpers/errors'

// Types
export type * from './types'
