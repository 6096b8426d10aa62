import type { Entry, Result, SyntaxFault } from 'shared'
import type { LogicalLine } from './scanner.js'

const ESCAPE = '\\'

function findSeparator(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const ch = text[i]
    if (ch === ESCAPE) {
      i++
    } else if (ch === '=') {
      return i
    }
  }
  return -1
}

function hasUnescapedWhitespace(key: string): boolean {
  for (let i = 0; i < key.length; i++) {
    const ch = key[i]
    if (ch === ESCAPE) {
      i++
    } else if (ch !== undefined && /\s/.test(ch)) {
      return true
    }
  }
  return false
}

// Strip surrounding whitespace, keeping a trailing space that is escaped.
function trimKey(raw: string): string {
  const key = raw.trimStart()
  let end = 0
  for (let i = 0; i < key.length; i++) {
    const ch = key[i]
    if (ch === ESCAPE) {
      i++
      end = Math.min(i + 1, key.length)
    } else if (ch !== undefined && !/\s/.test(ch)) {
      end = i + 1
    }
  }
  return key.slice(0, end)
}

export function unescapeKey(key: string): string {
  return key.replace(/\\(.)/g, '$1')
}

export function parseEntry({ text, line }: LogicalLine): Result<Entry, SyntaxFault> {
  const separator = findSeparator(text)
  if (separator === -1) {
    return { ok: false, error: { kind: 'SyntaxFault', reason: 'MissingSeparator', line, text } }
  }

  const rawKey = trimKey(text.slice(0, separator))
  if (rawKey.length === 0) {
    return { ok: false, error: { kind: 'SyntaxFault', reason: 'EmptyKey', line, text } }
  }
  if (hasUnescapedWhitespace(rawKey)) {
    return { ok: false, error: { kind: 'SyntaxFault', reason: 'InvalidKey', line, text } }
  }

  // Values stay untyped strings; only the validator knows what a rule expects.
  const value = text.slice(separator + 1).trim()
  return { ok: true, value: { key: unescapeKey(rawKey), value, line } }
}
