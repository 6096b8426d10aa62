import type { ValidationReport } from '../../commands/validate.js'
import { STDIN_NAME } from '../source.js'

// Workflow command escaping: data escapes %, CR, LF; properties also escape : and ,
function escapeData(str: string): string {
  return str.replace(/%/g, '%25').replace(/\r/g, '%0D').replace(/\n/g, '%0A')
}

function escapeProperty(str: string): string {
  return escapeData(str).replace(/:/g, '%3A').replace(/,/g, '%2C')
}

function fileProperty(file: string): string {
  return file === STDIN_NAME ? '' : `file=${escapeProperty(file)},`
}

export function formatGitHub(report: ValidationReport): string {
  return report.violations
    .map(v => `::error ${fileProperty(v.file)}line=${v.line}::${escapeData(v.message)}`)
    .join('\n')
}
