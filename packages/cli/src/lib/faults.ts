import type { Fault } from 'shared'

/** Human-readable message for a fault, without its location. */
export function describeFault(fault: Fault): string {
  switch (fault.kind) {
    case 'SyntaxFault': {
      const text = fault.text.trim()
      if (fault.reason === 'MissingSeparator') return `missing "=" separator in "${text}"`
      if (fault.reason === 'EmptyKey') return `empty key in "${text}"`
      return `key contains whitespace in "${text}"`
    }
    case 'DuplicateKeyFault':
      return `duplicate key "${fault.key}" (first defined on line ${fault.firstLine}, again on line ${fault.secondLine})`
    case 'SchemaSyntaxFault':
      return fault.detail
    case 'UnmatchedKeyFault':
      return `${fault.entry.key}: key not declared in schema`
    case 'TypeMismatchFault':
      return `${fault.entry.key}: expected ${fault.expected}, got "${fault.actual}"`
    case 'MissingKeyFault':
      return `${fault.rule.pattern}: required key not found`
  }
}

export function formatFault(fault: Fault): string {
  return `line ${fault.line}: ${describeFault(fault)}`
}
