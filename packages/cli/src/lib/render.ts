import type { Entry, OutputFormat, SysctlDocument } from 'shared'

export type NestedValue = string | { [key: string]: NestedValue }

type NestedTable = Map<string, string | NestedTable>

function insertNested(table: NestedTable, segments: readonly string[], value: string): void {
  const [head, ...tail] = segments
  if (head === undefined) return
  if (tail.length === 0) {
    table.set(head, value)
    return
  }
  const existing = table.get(head)
  // A scalar at an intermediate path is replaced by a table.
  const child: NestedTable = existing instanceof Map ? existing : new Map()
  table.set(head, child)
  insertNested(child, tail, value)
}

function tableToObject(table: NestedTable): { [key: string]: NestedValue } {
  return Object.fromEntries(
    [...table].map(([key, value]): [string, NestedValue] => [key, typeof value === 'string' ? value : tableToObject(value)]),
  )
}

export function toList(document: SysctlDocument): Entry[] {
  return document.entries.map(({ key, value, line }) => ({ key, value, line }))
}

export function toMap(document: SysctlDocument): Record<string, string> {
  return Object.fromEntries(document.entries.map((entry): [string, string] => [entry.key, entry.value]))
}

/** Split keys on `.` into nested objects, later keys overwriting earlier ones at the same path. */
export function toNested(document: SysctlDocument): { [key: string]: NestedValue } {
  const root: NestedTable = new Map()
  for (const entry of document.entries) {
    insertNested(root, entry.key.split('.'), entry.value)
  }
  return tableToObject(root)
}

export function toJson(document: SysctlDocument, format: OutputFormat = 'list'): string {
  switch (format) {
    case 'map':
      return JSON.stringify(toMap(document), null, 2)
    case 'nested':
      return JSON.stringify(toNested(document), null, 2)
    default:
      return JSON.stringify(toList(document), null, 2)
  }
}
