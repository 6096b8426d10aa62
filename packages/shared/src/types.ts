export interface Entry {
  readonly key: string
  readonly value: string
  readonly line: number
}

export interface SysctlDocument {
  readonly entries: readonly Entry[]
  readonly keys: ReadonlySet<string>
}

export type DuplicatePolicy = 'reject' | 'last-wins'

export type ValueType =
  | { kind: 'string' }
  | { kind: 'integer' }
  | { kind: 'boolean' }
  | { kind: 'enum'; values: readonly string[] }
  | { kind: 'regex'; source: string; regex: RegExp }

export interface SchemaRule {
  readonly pattern: string
  readonly segments: readonly string[]
  readonly type: ValueType
  readonly required: boolean
  readonly line: number
}

export interface Schema {
  readonly rules: readonly SchemaRule[]
}

export type SyntaxFaultReason = 'MissingSeparator' | 'EmptyKey' | 'InvalidKey'
export type SchemaSyntaxFaultReason = 'UnknownType' | 'MalformedPattern' | 'InvalidRegex'

export interface SyntaxFault {
  kind: 'SyntaxFault'
  reason: SyntaxFaultReason
  line: number
  text: string
}

export interface DuplicateKeyFault {
  kind: 'DuplicateKeyFault'
  key: string
  firstLine: number
  secondLine: number
  line: number
}

export interface SchemaSyntaxFault {
  kind: 'SchemaSyntaxFault'
  reason: SchemaSyntaxFaultReason
  line: number
  text: string
  detail: string
}

export type ParseFault = SyntaxFault | DuplicateKeyFault
export type Fault = ParseFault | SchemaSyntaxFault | Violation

export interface UnmatchedKeyFault {
  kind: 'UnmatchedKeyFault'
  entry: Entry
  rule: null
  line: number
}

export interface TypeMismatchFault {
  kind: 'TypeMismatchFault'
  entry: Entry
  rule: SchemaRule
  expected: string
  actual: string
  line: number
}

export interface MissingKeyFault {
  kind: 'MissingKeyFault'
  entry: null
  rule: SchemaRule
  line: number
}

export type Violation = UnmatchedKeyFault | TypeMismatchFault | MissingKeyFault

export type OutputFormat = 'list' | 'map' | 'nested'
export type ReporterName = 'text' | 'json' | 'junit' | 'github'

export interface ProjectConfig {
  strict?: boolean
  duplicates?: DuplicatePolicy
  format?: OutputFormat
  reporter?: ReporterName
  schema?: string
  booleans?: string[]
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }
