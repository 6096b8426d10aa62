import { readFile, access } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import { Ajv } from 'ajv'
import { parse as parseYaml } from 'yaml'
import { projectConfigSchema } from 'shared'
import type { ProjectConfig, Result } from 'shared'

export const PROJECT_CONFIG_FILE = 'sysctl-lint.yaml'

const ajv = new Ajv({ allErrors: true })
const validateConfig = ajv.compile<ProjectConfig>(projectConfigSchema)

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Load defaults from sysctl-lint.yaml. A missing default file yields `null`;
 * a missing file named explicitly is an error. `schema` is resolved against
 * the config file's directory.
 */
export async function loadProjectConfig(
  projectRoot: string,
  explicitPath?: string,
): Promise<Result<ProjectConfig | null, string>> {
  const configPath = explicitPath ? resolve(projectRoot, explicitPath) : join(projectRoot, PROJECT_CONFIG_FILE)
  if (!(await fileExists(configPath))) {
    if (explicitPath) return { ok: false, error: `Config file not found: ${explicitPath}` }
    return { ok: true, value: null }
  }

  let parsed: unknown
  try {
    const content = await readFile(configPath, 'utf-8')
    parsed = parseYaml(content)
  } catch (error) {
    return { ok: false, error: `Failed to parse ${configPath}: ${error}` }
  }

  // An empty file parses to null and means "no overrides".
  if (parsed === null || parsed === undefined) {
    return { ok: true, value: {} }
  }

  if (!validateConfig(parsed)) {
    const messages = (validateConfig.errors ?? []).map(e => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
    return { ok: false, error: `Invalid ${configPath}: ${messages.join('; ')}` }
  }

  const config: ProjectConfig = { ...parsed }
  if (config.schema) {
    config.schema = resolve(dirname(configPath), config.schema)
  }
  return { ok: true, value: config }
}
