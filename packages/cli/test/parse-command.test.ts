import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { parseCommand } from '../src/commands/parse.js'

async function* stdinOf(text: string): AsyncGenerator<string> {
  yield text
}

describe('parseCommand', () => {
  let tempDir: string
  let output: string[]

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'sysctl-lint-parse-'))
    output = []
    vi.spyOn(console, 'log').mockImplementation((msg: string) => { output.push(msg) })
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(tempDir, { recursive: true, force: true })
  })

  it('prints the document from standard input as an ordered list', async () => {
    const result = await parseCommand(undefined, { stdin: stdinOf('net.ipv4.ip_forward = 1\n') })
    expect(result.ok).toBe(true)
    expect(output).toHaveLength(1)
    expect(JSON.parse(output[0] ?? '')).toEqual([{ key: 'net.ipv4.ip_forward', value: '1', line: 1 }])
  })

  it('reads a file path and honours the output format', async () => {
    const path = join(tempDir, '99-tuning.conf')
    await writeFile(path, '# tuning\nlog.file = /var/log/console.log\nlog.level = info\n')

    const result = await parseCommand(path, { format: 'nested' })
    expect(result.ok).toBe(true)
    expect(JSON.parse(output[0] ?? '')).toEqual({ log: { file: '/var/log/console.log', level: 'info' } })
  })

  it('fails on a duplicate key and prints nothing', async () => {
    const result = await parseCommand(undefined, {
      stdin: stdinOf('kernel.hostname = a\nkernel.hostname = b\n'),
    })
    expect(result).toEqual({
      ok: false,
      error: '<stdin>: line 2: duplicate key "kernel.hostname" (first defined on line 1, again on line 2)',
    })
    expect(output).toEqual([])
  })

  it('accepts a duplicate key under last-wins', async () => {
    const result = await parseCommand(undefined, {
      stdin: stdinOf('kernel.hostname = a\nkernel.hostname = b\n'),
      duplicates: 'last-wins',
      format: 'map',
    })
    expect(result.ok).toBe(true)
    expect(JSON.parse(output[0] ?? '')).toEqual({ 'kernel.hostname': 'b' })
  })

  it('fails on a syntax fault with the source name and line', async () => {
    const path = join(tempDir, 'broken.conf')
    await writeFile(path, 'vm.swappiness = 10\nvm.dirty_ratio 20\n')

    const result = await parseCommand(path, {})
    expect(result).toEqual({
      ok: false,
      error: `${path}: line 2: missing "=" separator in "vm.dirty_ratio 20"`,
    })
  })

  it('fails when the file does not exist', async () => {
    const result = await parseCommand(join(tempDir, 'missing.conf'), {})
    expect(result.ok).toBe(false)
  })
})
