import type { Schema, SchemaRule, SysctlDocument, ValueType, Violation } from 'shared'
import { findRule, matchesPattern } from './matcher.js'

export const DEFAULT_BOOLEANS: readonly string[] = ['0', '1', 'true', 'false']

export interface ValidateOptions {
  strict: boolean
  booleans?: readonly string[]
}

const INTEGER = /^[+-]?\d+$/

export function describeType(type: ValueType): string {
  switch (type.kind) {
    case 'enum':
      return `enum(${type.values.join(',')})`
    case 'regex':
      return `regex(${type.source})`
    case 'integer':
      return 'int'
    case 'boolean':
      return 'bool'
    case 'string':
      return 'string'
  }
}

export function checkValue(type: ValueType, value: string, booleans: readonly string[] = DEFAULT_BOOLEANS): boolean {
  switch (type.kind) {
    case 'string':
      return true
    case 'integer':
      return INTEGER.test(value)
    case 'boolean':
      return booleans.includes(value)
    case 'enum':
      return type.values.includes(value)
    case 'regex':
      return type.regex.test(value)
  }
}

function expectedFor(rule: SchemaRule, booleans: readonly string[]): string {
  if (rule.type.kind === 'boolean') return `bool (${booleans.join('/')})`
  return describeType(rule.type)
}

/**
 * Check every entry of `document` against `schema` and collect all violations.
 * Entries are reported in document order, followed by required rules that
 * matched nothing, in schema order.
 */
export function validateDocument(document: SysctlDocument, schema: Schema, options: ValidateOptions): Violation[] {
  const booleans = options.booleans ?? DEFAULT_BOOLEANS
  const violations: Violation[] = []

  for (const entry of document.entries) {
    const rule = findRule(schema, entry.key)
    if (!rule) {
      if (options.strict) {
        violations.push({ kind: 'UnmatchedKeyFault', entry, rule: null, line: entry.line })
      }
      continue
    }

    if (!checkValue(rule.type, entry.value, booleans)) {
      violations.push({
        kind: 'TypeMismatchFault',
        entry,
        rule,
        expected: expectedFor(rule, booleans),
        actual: entry.value,
        line: entry.line,
      })
    }
  }

  for (const rule of schema.rules) {
    if (rule.required && !document.entries.some(entry => matchesPattern(rule.segments, entry.key))) {
      violations.push({ kind: 'MissingKeyFault', entry: null, rule, line: rule.line })
    }
  }

  return violations
}
