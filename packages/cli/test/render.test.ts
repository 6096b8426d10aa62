import { describe, it, expect } from 'vitest'
import type { SysctlDocument } from 'shared'
import { parseDocument } from '../src/lib/parser/document.js'
import { toJson, toMap, toNested } from '../src/lib/render.js'

function doc(text: string): SysctlDocument {
  const result = parseDocument(text)
  if (!result.ok) throw new Error(`unexpected parse fault on line ${result.error.line}`)
  return result.value
}

const SAMPLE = 'vm.swappiness = 10\nnet.ipv4.ip_forward = 1\nkernel.hostname =\n'

describe('toJson', () => {
  it('renders an ordered list by default', () => {
    expect(JSON.parse(toJson(doc('net.ipv4.ip_forward = 1\n')))).toEqual([
      { key: 'net.ipv4.ip_forward', value: '1', line: 1 },
    ])
  })

  it('pretty-prints with two spaces', () => {
    expect(toJson(doc('a = 1\n'), 'map')).toBe('{\n  "a": "1"\n}')
  })

  it('round-trips list output to the same key/value pairs', () => {
    const d = doc(SAMPLE)
    const parsed: { key: string; value: string }[] = JSON.parse(toJson(d, 'list'))
    expect(parsed.map(e => [e.key, e.value])).toEqual(d.entries.map(e => [e.key, e.value]))
  })

  it('round-trips map output to the same key/value pairs', () => {
    const d = doc(SAMPLE)
    expect(JSON.parse(toJson(d, 'map'))).toEqual({
      'vm.swappiness': '10',
      'net.ipv4.ip_forward': '1',
      'kernel.hostname': '',
    })
  })
})

describe('toMap', () => {
  it('keeps a __proto__ key as plain data', () => {
    const map = toMap(doc('__proto__ = x\n'))
    expect(Object.keys(map)).toEqual(['__proto__'])
    expect(JSON.stringify(map)).toBe('{"__proto__":"x"}')
  })
})

describe('toNested', () => {
  it('splits dotted keys into nested objects', () => {
    expect(toNested(doc('a.b.c.d = final\n'))).toEqual({ a: { b: { c: { d: 'final' } } } })
  })

  it('groups siblings under a shared prefix', () => {
    const text = 'endpoint = localhost:3000\nlog.file = /var/log/console.log\nlog.level = info\n'
    expect(toNested(doc(text))).toEqual({
      endpoint: 'localhost:3000',
      log: { file: '/var/log/console.log', level: 'info' },
    })
  })

  it('replaces a scalar with a table when a deeper key follows', () => {
    expect(toNested(doc('log = on\nlog.level = info\n'))).toEqual({ log: { level: 'info' } })
  })

  it('replaces a table with a scalar when a shorter key follows', () => {
    expect(toNested(doc('log.level = info\nlog = off\n'))).toEqual({ log: 'off' })
  })
})
