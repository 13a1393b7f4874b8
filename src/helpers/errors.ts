import type { ErrorDetail } from '../types'

export const ErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  REQUEST_NOT_FOUND: 'REQUEST_NOT_FOUND',
  UNIQUENESS_EXHAUSTED: 'UNIQUENESS_EXHAUSTED',
  DEFINITION_CONFLICT: 'DEFINITION_CONFLICT',
  INVALID_PATTERN: 'INVALID_PATTERN',
  RESERVED_ATTRIBUTE: 'RESERVED_ATTRIBUTE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode]

// =============================================================================
// MockError: throwable error with status and code
// =============================================================================

export interface MockErrorOptions {
  code?: string
  status?: number
}

/**
 * Base class for every error the mock layer raises. The code and status
 * survive the trip through the mock endpoint, so a client can rebuild the
 * same error on its side.
 */
export class MockError extends Error {
  code: string
  status: number

  constructor(message: string, options: MockErrorOptions = {}) {
    super(message)
    this.name = 'MockError'
    this.code = options.code || ErrorCode.INTERNAL_ERROR
    this.status = options.status || 500
  }

  toDetail(): ErrorDetail {
    return { message: this.message, code: this.code, status: this.status }
  }
}

/** An id lookup missed. */
export class NotFoundError extends MockError {
  readonly type: string
  readonly id: string

  constructor(type: string, id: number | string) {
    super(`${type} with id ${id} not found`, { code: ErrorCode.NOT_FOUND, status: 404 })
    this.name = 'NotFoundError'
    this.type = type
    this.id = String(id)
  }

  override toDetail(): ErrorDetail {
    return { ...super.toDetail(), type: this.type, id: this.id }
  }
}

/**
 * No registered route matches a simulated request. The message carries the
 * literal path so the scenario output names the mock that is missing.
 */
export class RequestNotFoundError extends MockError {
  readonly verb: string
  readonly path: string

  constructor(path: string, verb = 'GET') {
    super(`No mock registered for ${verb.toUpperCase()} ${path}`, { code: ErrorCode.REQUEST_NOT_FOUND, status: 404 })
    this.name = 'RequestNotFoundError'
    this.verb = verb.toUpperCase()
    this.path = path
  }

  override toDetail(): ErrorDetail {
    return { ...super.toDetail(), path: this.path, verb: this.verb }
  }
}

export class UniquenessExhaustedError extends MockError {
  readonly type: string
  readonly attribute: string
  readonly attempts: number

  constructor(type: string, attribute: string, attempts: number) {
    super(`Could not generate a unique ${type}.${attribute} after ${attempts} attempts`, {
      code: ErrorCode.UNIQUENESS_EXHAUSTED,
      status: 500,
    })
    this.name = 'UniquenessExhaustedError'
    this.type = type
    this.attribute = attribute
    this.attempts = attempts
  }
}

/** An attribute was redefined with a different default or uniqueness flag. */
export class DefinitionConflictError extends MockError {
  readonly type: string
  readonly attribute: string

  constructor(type: string, attribute: string) {
    super(`Conflicting redefinition of ${type}.${attribute}`, { code: ErrorCode.DEFINITION_CONFLICT, status: 500 })
    this.name = 'DefinitionConflictError'
    this.type = type
    this.attribute = attribute
  }
}

export class InvalidPatternError extends MockError {
  readonly pattern: string

  constructor(pattern: string, reason: string) {
    super(`Invalid route pattern ${pattern}: ${reason}`, { code: ErrorCode.INVALID_PATTERN, status: 400 })
    this.name = 'InvalidPatternError'
    this.pattern = pattern
  }
}

/** An attribute name the record itself owns, such as `id`, was supplied. */
export class ReservedAttributeError extends MockError {
  readonly type: string
  readonly attribute: string

  constructor(type: string, attribute: string) {
    super(`${type}.${attribute} is assigned by the store and cannot be set`, {
      code: ErrorCode.RESERVED_ATTRIBUTE,
      status: 400,
    })
    this.name = 'ReservedAttributeError'
    this.type = type
    this.attribute = attribute
  }
}

// =============================================================================
// Rebuilding errors from an error envelope
// =============================================================================

/**
 * Turn an error envelope received from the mock endpoint back into the
 * matching error class.
 */
export function errorFromDetail(detail: ErrorDetail, fallbackPath: string): MockError {
  switch (detail.code) {
    case ErrorCode.REQUEST_NOT_FOUND:
      return new RequestNotFoundError(detail.path ?? fallbackPath, detail.verb)
    case ErrorCode.NOT_FOUND:
      if (detail.type && detail.id) return new NotFoundError(detail.type, detail.id)
      return new MockError(detail.message, { code: detail.code, status: detail.status ?? 404 })
    default:
      return new MockError(detail.message, { code: detail.code, status: detail.status })
  }
}
