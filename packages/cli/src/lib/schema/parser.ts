import type { Result, Schema, SchemaRule, SchemaSyntaxFault, SchemaSyntaxFaultReason, ValueType } from 'shared'
import { scanLines, type LogicalLine } from '../parser/scanner.js'

export const WILDCARD = '*'

const SIMPLE_TYPES = new Map<string, ValueType>([
  ['string', { kind: 'string' }],
  ['int', { kind: 'integer' }],
  ['integer', { kind: 'integer' }],
  ['bool', { kind: 'boolean' }],
  ['boolean', { kind: 'boolean' }],
])

const REQUIRED_SUFFIX = /\s+required$/

type TypeParse = { ok: true; value: ValueType } | { ok: false; reason: SchemaSyntaxFaultReason; detail: string }

function splitDeclaration(text: string): { pattern: string; rest: string } {
  // Accept both `pattern TYPE` and the arrow form `pattern -> TYPE`.
  const arrow = text.match(/^(\S+?)\s*->\s*(.*)$/)
  if (arrow) {
    return { pattern: arrow[1] ?? '', rest: (arrow[2] ?? '').trim() }
  }
  const match = text.match(/^(\S+)\s*(.*)$/)
  return { pattern: match?.[1] ?? '', rest: (match?.[2] ?? '').trim() }
}

export function parsePattern(pattern: string): string[] | null {
  if (pattern.length === 0 || /\s/.test(pattern)) return null
  const segments = pattern.split('.')
  for (const segment of segments) {
    if (segment.length === 0) return null
    if (segment.includes(WILDCARD) && segment !== WILDCARD) return null
  }
  return segments
}

function parseEnumValues(body: string): string[] {
  return body.split(',').map(v => v.trim()).filter(v => v.length > 0)
}

export function parseTypeToken(token: string): TypeParse {
  const simple = SIMPLE_TYPES.get(token)
  if (simple) return { ok: true, value: simple }
  if (token.length === 0) {
    return { ok: false, reason: 'UnknownType', detail: 'missing type' }
  }

  const call = token.match(/^(enum|regex)\((.*)\)$/s)
  if (!call) {
    return { ok: false, reason: 'UnknownType', detail: `unknown type "${token}"` }
  }

  const [, name, body = ''] = call
  if (name === 'enum') {
    const values = parseEnumValues(body)
    if (values.length === 0) {
      return { ok: false, reason: 'UnknownType', detail: 'enum() needs at least one value' }
    }
    return { ok: true, value: { kind: 'enum', values } }
  }

  try {
    // The body must compile alone, or it could close the anchoring group.
    new RegExp(body)
    return { ok: true, value: { kind: 'regex', source: body, regex: new RegExp(`^(?:${body})$`) } }
  } catch (error) {
    return { ok: false, reason: 'InvalidRegex', detail: `invalid regex "${body}": ${error instanceof Error ? error.message : String(error)}` }
  }
}

function fault(logical: LogicalLine, reason: SchemaSyntaxFaultReason, detail: string): SchemaSyntaxFault {
  return { kind: 'SchemaSyntaxFault', reason, line: logical.line, text: logical.text, detail }
}

export function parseRule(logical: LogicalLine): Result<SchemaRule, SchemaSyntaxFault> {
  const { pattern, rest } = splitDeclaration(logical.text.trim())

  const segments = parsePattern(pattern)
  if (!segments) {
    return { ok: false, error: fault(logical, 'MalformedPattern', `malformed pattern "${pattern}"`) }
  }

  const required = REQUIRED_SUFFIX.test(rest)
  const token = rest.replace(REQUIRED_SUFFIX, '')
  const type = parseTypeToken(token)
  if (!type.ok) {
    return { ok: false, error: fault(logical, type.reason, type.detail) }
  }

  return {
    ok: true,
    value: Object.freeze({ pattern, segments: Object.freeze(segments), type: type.value, required, line: logical.line }),
  }
}

export function parseSchema(text: string): Result<Schema, SchemaSyntaxFault> {
  const rules: SchemaRule[] = []
  for (const logical of scanLines(text)) {
    const rule = parseRule(logical)
    if (!rule.ok) return rule
    rules.push(rule.value)
  }
  return { ok: true, value: { rules: Object.freeze(rules) } }
}
