import type { ValidationReport } from '../../commands/validate.js'

function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

export function formatJUnit(report: ValidationReport): string {
  const failures = report.violations.length
  const tests = failures || 1
  const suite = escapeXml(report.source)

  let xml = `<?xml version="1.0" encoding="UTF-8"?>\n`
  xml += `<testsuites tests="${tests}" failures="${failures}">\n`
  xml += `  <testsuite name="${suite}" tests="${tests}" failures="${failures}">\n`

  if (failures === 0) {
    xml += `    <testcase name="validate" classname="sysctl-lint">\n`
    xml += `    </testcase>\n`
  }

  for (const v of report.violations) {
    xml += `    <testcase name="${escapeXml(`${v.key} (line ${v.line})`)}" classname="sysctl-lint.${v.kind}" file="${escapeXml(v.file)}">\n`
    xml += `      <failure message="${escapeXml(v.message)}">${escapeXml(v.message)}</failure>\n`
    xml += `    </testcase>\n`
  }

  xml += `  </testsuite>\n`
  xml += `</testsuites>`

  return xml
}
