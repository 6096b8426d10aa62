import { readFile } from 'node:fs/promises'
import type { Result } from 'shared'

export interface Source {
  name: string
  text: string
}

export const STDIN_NAME = '<stdin>'

async function readStream(stream: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
  }
  return Buffer.concat(chunks).toString('utf-8')
}

/** Read text from `path`, or from `stdin` when no path is given. */
export async function readSource(
  path: string | undefined,
  stdin: AsyncIterable<string | Buffer> = process.stdin,
): Promise<Result<Source, string>> {
  if (path === undefined) {
    try {
      return { ok: true, value: { name: STDIN_NAME, text: await readStream(stdin) } }
    } catch (error) {
      return { ok: false, error: `Failed to read standard input: ${error}` }
    }
  }

  try {
    return { ok: true, value: { name: path, text: await readFile(path, 'utf-8') } }
  } catch (error) {
    return { ok: false, error: `Failed to read ${path}: ${error instanceof Error ? error.message : error}` }
  }
}
