import type { DuplicatePolicy, OutputFormat, ReporterName, Result, Violation } from 'shared'
import { parseDocument } from '../lib/parser/document.js'
import { parseSchema } from '../lib/schema/parser.js'
import { validateDocument } from '../lib/validator/validator.js'
import { describeFault, formatFault } from '../lib/faults.js'
import { toJson } from '../lib/render.js'
import { readSource } from '../lib/source.js'
import { formatJUnit } from '../lib/reporters/junit.js'
import { formatGitHub } from '../lib/reporters/github.js'

export interface ValidateCommandOptions {
  schema: string
  strict?: boolean
  duplicates?: DuplicatePolicy
  format?: OutputFormat
  reporter?: ReporterName
  booleans?: string[]
  stdin?: AsyncIterable<string | Buffer>
}

export interface ReportedViolation {
  kind: Violation['kind']
  /** The file `line` points into: the schema for missing keys, the source otherwise. */
  file: string
  line: number
  key: string
  rule: string | null
  message: string
}

export interface ValidationReport {
  passed: boolean
  source: string
  schema: string
  violations: ReportedViolation[]
  timestamp: string
}

export function toReported(violation: Violation, source: string, schema: string): ReportedViolation {
  return {
    kind: violation.kind,
    file: violation.kind === 'MissingKeyFault' ? schema : source,
    line: violation.line,
    key: violation.kind === 'MissingKeyFault' ? violation.rule.pattern : violation.entry.key,
    rule: violation.rule ? violation.rule.pattern : null,
    message: describeFault(violation),
  }
}

export function resolveReporter(reporter: ReporterName | undefined): ReporterName {
  if (reporter) return reporter
  return process.env.GITHUB_ACTIONS === 'true' ? 'github' : 'text'
}

export async function validateCommand(
  path: string | undefined,
  options: ValidateCommandOptions,
): Promise<Result<ValidationReport, string>> {
  const schemaSource = await readSource(options.schema)
  if (!schemaSource.ok) return schemaSource

  const schema = parseSchema(schemaSource.value.text)
  if (!schema.ok) {
    return { ok: false, error: `${options.schema}: ${formatFault(schema.error)}` }
  }

  const source = await readSource(path, options.stdin)
  if (!source.ok) return source

  const document = parseDocument(source.value.text, { duplicates: options.duplicates })
  if (!document.ok) {
    return { ok: false, error: `${source.value.name}: ${formatFault(document.error)}` }
  }

  const violations = validateDocument(document.value, schema.value, {
    strict: options.strict ?? true,
    booleans: options.booleans,
  })

  const sourceName = source.value.name
  const report: ValidationReport = {
    passed: violations.length === 0,
    source: sourceName,
    schema: options.schema,
    violations: violations.map(v => toReported(v, sourceName, options.schema)),
    timestamp: new Date().toISOString(),
  }

  switch (resolveReporter(options.reporter)) {
    case 'json':
      console.log(JSON.stringify(report, null, 2))
      break
    case 'junit':
      console.log(formatJUnit(report))
      break
    case 'github': {
      const annotations = formatGitHub(report)
      if (annotations) console.log(annotations)
      break
    }
    default: {
      for (const v of report.violations) {
        console.error(`${v.file}:${v.line}: ${v.message}`)
      }
      if (report.passed) {
        console.log(toJson(document.value, options.format))
        console.error(`✓ ${report.source}: ${document.value.entries.length} entries valid`)
      } else {
        console.error(`✗ ${report.source}: ${report.violations.length} violation(s)`)
      }
      break
    }
  }

  return { ok: true, value: report }
}
