#!/usr/bin/env node
import { Command } from 'commander'
import { parseCommand } from './commands/parse.js'
import { validateCommand } from './commands/validate.js'
import { loadProjectConfig } from './lib/project-config.js'
import { resolveOptions, type CliOptions } from './lib/cli-options.js'

const program = new Command()

program
  .name('sysctl-lint')
  .description('Parse sysctl.conf files into JSON and validate them against a key schema')
  .version('0.1.0')
  .argument('[path]', 'Configuration file (reads standard input when omitted)')
  .option('--schema <path>', 'Validate against a schema file')
  .option('--strict', 'Report keys that no schema rule matches (default)')
  .option('--no-strict', 'Ignore keys that no schema rule matches')
  .option('--duplicates <policy>', 'Duplicate key policy: reject, last-wins')
  .option('--format <format>', 'JSON output shape: list, map, nested')
  .option('--reporter <reporter>', 'Violation report: text, json, junit, github')
  .option('--booleans <values>', 'Accepted boolean values (comma-separated)')
  .option('--config <path>', 'Project config file (default: ./sysctl-lint.yaml)')
  .action(async (path: string | undefined, cliOptions: CliOptions) => {
    const config = await loadProjectConfig(process.cwd(), cliOptions.config)
    if (!config.ok) {
      console.error(`Error: ${config.error}`)
      process.exit(1)
    }

    const options = resolveOptions(cliOptions, config.value)
    if (!options.ok) {
      console.error(`Error: ${options.error}`)
      process.exit(2)
    }

    const { schema, ...rest } = options.value
    if (schema === undefined) {
      const result = await parseCommand(path, rest)
      if (!result.ok) {
        console.error(`Error: ${result.error}`)
        process.exit(1)
      }
      return
    }

    const result = await validateCommand(path, { ...rest, schema })
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    } else if (!result.value.passed) {
      process.exit(1)
    }
  })

await program.parseAsync()
