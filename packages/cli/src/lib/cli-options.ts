import type { DuplicatePolicy, OutputFormat, ProjectConfig, ReporterName, Result } from 'shared'

export interface CliOptions {
  schema?: string
  strict?: boolean
  duplicates?: string
  format?: string
  reporter?: string
  booleans?: string
  config?: string
}

export interface ResolvedOptions {
  schema?: string
  strict: boolean
  duplicates: DuplicatePolicy
  format: OutputFormat
  reporter?: ReporterName
  booleans?: string[]
}

const DUPLICATE_POLICIES: readonly DuplicatePolicy[] = ['reject', 'last-wins']
const OUTPUT_FORMATS: readonly OutputFormat[] = ['list', 'map', 'nested']
const REPORTERS: readonly ReporterName[] = ['text', 'json', 'junit', 'github']

function pickChoice<T extends string>(
  flag: string,
  value: string | undefined,
  choices: readonly T[],
): Result<T | undefined, string> {
  if (value === undefined) return { ok: true, value: undefined }
  const choice = choices.find(c => c === value)
  if (choice === undefined) {
    return { ok: false, error: `${flag} must be one of ${choices.join(', ')} (got "${value}")` }
  }
  return { ok: true, value: choice }
}

function parseBooleans(list: string): string[] {
  return list.split(',').map(v => v.trim()).filter(v => v.length > 0)
}

/** Merge command-line flags over project config defaults. */
export function resolveOptions(cli: CliOptions, config: ProjectConfig | null): Result<ResolvedOptions, string> {
  const defaults = config ?? {}

  const duplicates = pickChoice('--duplicates', cli.duplicates, DUPLICATE_POLICIES)
  if (!duplicates.ok) return duplicates
  const format = pickChoice('--format', cli.format, OUTPUT_FORMATS)
  if (!format.ok) return format
  const reporter = pickChoice('--reporter', cli.reporter, REPORTERS)
  if (!reporter.ok) return reporter

  const booleans = cli.booleans !== undefined ? parseBooleans(cli.booleans) : defaults.booleans
  if (booleans !== undefined && booleans.length === 0) {
    return { ok: false, error: '--booleans needs at least one value' }
  }

  return {
    ok: true,
    value: {
      schema: cli.schema ?? defaults.schema,
      strict: cli.strict ?? defaults.strict ?? true,
      duplicates: duplicates.value ?? defaults.duplicates ?? 'reject',
      format: format.value ?? defaults.format ?? 'list',
      reporter: reporter.value ?? defaults.reporter,
      booleans,
    },
  }
}
