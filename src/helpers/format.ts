/**
 * Document Encoders
 *
 * Render serialized documents as text, the way a resource backend would:
 *
 * **JSON**: records as objects with `id` first, collections as arrays:
 *   { "id": 1, "title": "Dune", "author": { "id": 3, "name": "Frank" } }
 *
 * **XML**: records as elements named after their type, typed leaves:
 *   <book>
 *     <id type="integer">1</id>
 *     <title>Dune</title>
 *   </book>
 */

import type { DocumentFormat, DocumentValue, JsonValue, SerializedDocument } from '../types'
import { pluralize, singularize } from './inflect'

export const CONTENT_TYPES: Record<DocumentFormat, string> = {
  json: 'application/json; charset=utf-8',
  xml: 'application/xml; charset=utf-8',
}

/**
 * Format requested by a path extension (`/books.xml`, `/books/1.json`).
 * The query string is ignored. Returns null when there is no known extension.
 */
export function formatFromPath(path: string): DocumentFormat | null {
  const pathname = path.split('?')[0] ?? ''
  const match = pathname.match(/\.(xml|json)$/i)
  if (!match?.[1]) return null
  return match[1].toLowerCase() === 'xml' ? 'xml' : 'json'
}

export function encode(document: SerializedDocument, format: DocumentFormat): string {
  return format === 'xml' ? toXml(document) : toJson(document)
}

// =============================================================================
// JSON
// =============================================================================

function isDocumentValue(value: SerializedDocument): value is DocumentValue {
  if (value === null || typeof value !== 'object') return true
  if (value instanceof Date) return true
  return !Array.isArray(value) && (value.kind === 'record' || value.kind === 'collection')
}

/**
 * Plain JSON value for a document. Raw documents are returned unchanged.
 */
export function toPlain(document: SerializedDocument): JsonValue {
  if (!isDocumentValue(document)) return document
  return plainValue(document)
}

function plainValue(value: DocumentValue): JsonValue {
  if (value instanceof Date) return value.toISOString()
  if (value === null || typeof value !== 'object') return value
  if (value.kind === 'collection') return value.items.map(plainValue)
  const result: { [key: string]: JsonValue } = { id: value.id }
  for (const attribute of value.attributes) {
    if (attribute.name === 'id') continue
    result[attribute.name] = plainValue(attribute.value)
  }
  return result
}

export function toJson(document: SerializedDocument): string {
  return JSON.stringify(toPlain(document), null, 2)
}

// =============================================================================
// XML
// =============================================================================

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

function itemName(collectionName: string): string {
  const singular = singularize(collectionName)
  return singular === collectionName ? 'item' : singular
}

function xmlElement(name: string, value: DocumentValue, depth: number, lines: string[]): void {
  const indent = '  '.repeat(depth)

  if (value === null) {
    lines.push(`${indent}<${name} nil="true"/>`)
    return
  }
  if (value instanceof Date) {
    lines.push(`${indent}<${name} type="datetime">${value.toISOString()}</${name}>`)
    return
  }
  if (typeof value === 'number') {
    const type = Number.isInteger(value) ? 'integer' : 'float'
    lines.push(`${indent}<${name} type="${type}">${value}</${name}>`)
    return
  }
  if (typeof value === 'boolean') {
    lines.push(`${indent}<${name} type="boolean">${value}</${name}>`)
    return
  }
  if (typeof value === 'string') {
    lines.push(`${indent}<${name}>${escapeXml(value)}</${name}>`)
    return
  }

  if (value.kind === 'collection') {
    if (value.items.length === 0) {
      lines.push(`${indent}<${name} type="array"/>`)
      return
    }
    lines.push(`${indent}<${name} type="array">`)
    for (const item of value.items) {
      const child = item !== null && typeof item === 'object' && !(item instanceof Date) && item.kind === 'record' ? item.type : itemName(name)
      xmlElement(child, item, depth + 1, lines)
    }
    lines.push(`${indent}</${name}>`)
    return
  }

  lines.push(`${indent}<${name}>`)
  lines.push(`${indent}  <id type="integer">${value.id}</id>`)
  for (const attribute of value.attributes) {
    // The record id is already emitted
    if (attribute.name === 'id') continue
    xmlElement(attribute.name, attribute.value, depth + 1, lines)
  }
  lines.push(`${indent}</${name}>`)
}

/**
 * XML text for a document. Root collections are named after the plural of
 * their type (`records` when unknown). Raw strings are returned unchanged,
 * other raw values JSON-encoded.
 */
export function toXml(document: SerializedDocument): string {
  if (!isDocumentValue(document)) {
    return JSON.stringify(document)
  }
  if (typeof document === 'string') return document

  const lines = ['<?xml version="1.0" encoding="UTF-8"?>']
  if (document !== null && typeof document === 'object' && !(document instanceof Date)) {
    const rootName = document.kind === 'record' ? document.type : document.type ? pluralize(document.type) : 'records'
    xmlElement(rootName, document, 0, lines)
  } else {
    xmlElement('value', document, 0, lines)
  }
  return lines.join('\n') + '\n'
}
