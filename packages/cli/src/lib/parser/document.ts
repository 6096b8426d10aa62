import type { DuplicateKeyFault, DuplicatePolicy, Entry, ParseFault, Result, SysctlDocument } from 'shared'
import { scanLines } from './scanner.js'
import { parseEntry } from './entry.js'

export interface BuildOptions {
  duplicates?: DuplicatePolicy
}

function freezeDocument(entries: Entry[]): SysctlDocument {
  const frozen = Object.freeze(entries.map(entry => Object.freeze({ ...entry })))
  return { entries: frozen, keys: new Set(frozen.map(entry => entry.key)) }
}

/**
 * Assemble entries into a document in file order.
 * Under `reject` (the default) a repeated key fails the build; under
 * `last-wins` the later entry replaces the earlier one at the later position.
 */
export function buildDocument(
  entries: Iterable<Entry>,
  options: BuildOptions = {},
): Result<SysctlDocument, DuplicateKeyFault> {
  const policy = options.duplicates ?? 'reject'
  const ordered: Entry[] = []
  const seen = new Map<string, Entry>()

  for (const entry of entries) {
    const previous = seen.get(entry.key)
    if (previous) {
      if (policy === 'reject') {
        return {
          ok: false,
          error: {
            kind: 'DuplicateKeyFault',
            key: entry.key,
            firstLine: previous.line,
            secondLine: entry.line,
            line: entry.line,
          },
        }
      }
      ordered.splice(ordered.indexOf(previous), 1)
    }
    seen.set(entry.key, entry)
    ordered.push(entry)
  }

  return { ok: true, value: freezeDocument(ordered) }
}

export function parseDocument(text: string, options: BuildOptions = {}): Result<SysctlDocument, ParseFault> {
  const entries: Entry[] = []
  for (const logical of scanLines(text)) {
    const parsed = parseEntry(logical)
    if (!parsed.ok) return parsed
    entries.push(parsed.value)
  }
  return buildDocument(entries, options)
}
