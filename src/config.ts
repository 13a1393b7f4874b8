import type { DocumentFormat, MockConfig } from './types'

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_CONFIG: MockConfig = {
  name: 'mock',
  diagnostics: false,
  uniqueAttempts: 100,
  defaultFormat: 'json',
}

/** Flexible input: any subset of MockConfig, or nothing */
export type MockInput = Partial<MockConfig> | undefined

// =============================================================================
// Main Resolver
// =============================================================================

/**
 * Resolve input into a complete MockConfig.
 *
 * Precedence, lowest first:
 * 1. DEFAULT_CONFIG
 * 2. values discovered from `env` (process.env unless given)
 * 3. explicit input
 *
 * An explicit `uniqueAttempts` that is not a positive integer is ignored,
 * the same as an unparseable MOCK_UNIQUE_ATTEMPTS.
 */
export function resolveConfig(input?: MockInput, env: Record<string, string | undefined> = process.env): MockConfig {
  const explicit: Partial<MockConfig> = {}
  if (input?.name !== undefined) explicit.name = input.name
  if (input?.diagnostics !== undefined) explicit.diagnostics = input.diagnostics
  if (input?.uniqueAttempts !== undefined && isPositiveInteger(input.uniqueAttempts)) {
    explicit.uniqueAttempts = input.uniqueAttempts
  }
  if (input?.defaultFormat !== undefined) explicit.defaultFormat = input.defaultFormat

  return {
    ...DEFAULT_CONFIG,
    ...discoverEnv(env),
    ...explicit,
  }
}

// =============================================================================
// Env Auto-Discovery
// =============================================================================

/**
 * Discover configuration from environment variables.
 *
 * | Variable             | Effect                                      |
 * |----------------------|---------------------------------------------|
 * | MOCK_DIAGNOSTICS     | `1` / `true` record every request            |
 * | MOCK_UNIQUE_ATTEMPTS | positive integer, unique value attempts      |
 * | MOCK_FORMAT          | `json` / `xml`, encoding without extension   |
 *
 * Unparseable values are ignored.
 */
export function discoverEnv(env: Record<string, string | undefined>): Partial<MockConfig> {
  const discovered: Partial<MockConfig> = {}

  const diagnostics = env.MOCK_DIAGNOSTICS?.toLowerCase()
  if (diagnostics === '1' || diagnostics === 'true') {
    discovered.diagnostics = true
  } else if (diagnostics === '0' || diagnostics === 'false') {
    discovered.diagnostics = false
  }

  const attempts = env.MOCK_UNIQUE_ATTEMPTS
  if (attempts && /^\d+$/.test(attempts) && isPositiveInteger(parseInt(attempts, 10))) {
    discovered.uniqueAttempts = parseInt(attempts, 10)
  }

  const format = parseFormat(env.MOCK_FORMAT)
  if (format) discovered.defaultFormat = format

  return discovered
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0
}

export function parseFormat(value: string | undefined): DocumentFormat | null {
  const lower = value?.toLowerCase()
  if (lower === 'json' || lower === 'xml') return lower
  return null
}
