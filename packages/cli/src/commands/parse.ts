import type { DuplicatePolicy, OutputFormat, Result, SysctlDocument } from 'shared'
import { parseDocument } from '../lib/parser/document.js'
import { formatFault } from '../lib/faults.js'
import { toJson } from '../lib/render.js'
import { readSource } from '../lib/source.js'

export interface ParseCommandOptions {
  duplicates?: DuplicatePolicy
  format?: OutputFormat
  stdin?: AsyncIterable<string | Buffer>
}

export async function parseCommand(
  path: string | undefined,
  options: ParseCommandOptions,
): Promise<Result<SysctlDocument, string>> {
  const source = await readSource(path, options.stdin)
  if (!source.ok) return source

  const document = parseDocument(source.value.text, { duplicates: options.duplicates })
  if (!document.ok) {
    return { ok: false, error: `${source.value.name}: ${formatFault(document.error)}` }
  }

  console.log(toJson(document.value, options.format))
  return { ok: true, value: document.value }
}
