export interface LogicalLine {
  text: string
  line: number
}

const COMMENT_MARKERS = ['#', ';']

export function isContentLine(raw: string): boolean {
  const trimmed = raw.trim()
  return trimmed.length > 0 && !COMMENT_MARKERS.some(marker => trimmed.startsWith(marker))
}

/**
 * Yield the content lines of `text` with their 1-based line numbers.
 * `\n`, `\r\n` and a lone `\r` all end a line. Comment markers only count
 * at the start of a trimmed line, so `a = b # c` keeps `# c` in its value.
 */
export function* scanLines(text: string): Generator<LogicalLine, void, undefined> {
  const rawLines = text.split(/\r\n|\r|\n/)
  for (let i = 0; i < rawLines.length; i++) {
    const raw = rawLines[i]
    if (raw !== undefined && isContentLine(raw)) {
      yield { text: raw, line: i + 1 }
    }
  }
}
