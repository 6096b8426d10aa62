import type { Schema, SchemaRule } from 'shared'
import { WILDCARD } from '../schema/parser.js'

export function matchesPattern(segments: readonly string[], key: string): boolean {
  const keySegments = key.split('.')
  if (keySegments.length !== segments.length) return false
  return segments.every((segment, i) => segment === WILDCARD || segment === keySegments[i])
}

/** First rule in schema order whose pattern matches `key`. */
export function findRule(schema: Schema, key: string): SchemaRule | undefined {
  return schema.rules.find(rule => matchesPattern(rule.segments, key))
}
