import type { DefinitionRegistry } from '../definitions'
import type { ResourceStore } from '../store'
import { isPlural, singularize } from './inflect'

/**
 * Map a type name as written by a caller ('book' or 'books') to the type
 * the registry and store use.
 *
 * - a defined or stored name is used as is
 * - otherwise the singular form, when it differs
 */
export function resolveType(name: string, registry: DefinitionRegistry, store: ResourceStore): string {
  if (registry.has(name) || store.has(name)) return name
  return isPlural(name) ? singularize(name) : name
}
