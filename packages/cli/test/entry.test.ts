import { describe, it, expect } from 'vitest'
import { parseEntry, unescapeKey } from '../src/lib/parser/entry.js'

describe('parseEntry', () => {
  it('splits on the first = and trims key and value', () => {
    const result = parseEntry({ text: '  net.ipv4.ip_forward   =   1  ', line: 7 })
    expect(result).toEqual({ ok: true, value: { key: 'net.ipv4.ip_forward', value: '1', line: 7 } })
  })

  it('keeps later = characters in the value', () => {
    const result = parseEntry({ text: 'kernel.core_pattern = |/bin/dump a=b', line: 1 })
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.value).toBe('|/bin/dump a=b')
    }
  })

  it('accepts an empty value as an empty string', () => {
    const result = parseEntry({ text: 'kernel.hostname =', line: 2 })
    expect(result).toEqual({ ok: true, value: { key: 'kernel.hostname', value: '', line: 2 } })
  })

  it('keeps the value verbatim, including #', () => {
    const result = parseEntry({ text: 'kernel.domainname = lab#1', line: 1 })
    expect(result.ok && result.value.value).toBe('lab#1')
  })

  it('skips an escaped = when looking for the separator', () => {
    const result = parseEntry({ text: 'odd\\=key = 5', line: 3 })
    expect(result).toEqual({ ok: true, value: { key: 'odd=key', value: '5', line: 3 } })
  })

  it('fails with MissingSeparator when there is no =', () => {
    const result = parseEntry({ text: 'net.ipv4.ip_forward 1', line: 4 })
    expect(result).toEqual({
      ok: false,
      error: { kind: 'SyntaxFault', reason: 'MissingSeparator', line: 4, text: 'net.ipv4.ip_forward 1' },
    })
  })

  it('fails with MissingSeparator when the only = is escaped', () => {
    const result = parseEntry({ text: 'a\\=b', line: 1 })
    expect(!result.ok && result.error.reason).toBe('MissingSeparator')
  })

  it('fails with EmptyKey when nothing precedes =', () => {
    const result = parseEntry({ text: '   = 1', line: 9 })
    expect(!result.ok && result.error.reason).toBe('EmptyKey')
    expect(!result.ok && result.error.line).toBe(9)
  })

  it('fails with InvalidKey when the key contains whitespace', () => {
    const result = parseEntry({ text: 'net ipv4 = 1', line: 1 })
    expect(!result.ok && result.error.reason).toBe('InvalidKey')
  })

  it('allows escaped whitespace inside a key', () => {
    const result = parseEntry({ text: 'a\\ b = 1', line: 1 })
    expect(result.ok && result.value.key).toBe('a b')
  })

  it('keeps an escaped trailing space in the key', () => {
    const result = parseEntry({ text: '  a\\  = 1', line: 1 })
    expect(result).toEqual({ ok: true, value: { key: 'a ', value: '1', line: 1 } })
  })
})

describe('unescapeKey', () => {
  it('drops the backslash before an escaped character', () => {
    expect(unescapeKey('a\\=b\\\\c')).toBe('a=b\\c')
  })
})
