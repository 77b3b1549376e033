/**
 * Command dispatcher. `run` never exits the process; it returns the exit
 * status so tests and `main.ts` can decide what to do with it.
 *
 *   offline-kb [--database <path>] <command> [args] [--flags]
 */

import { parseArgs } from 'node:util'
import { openDatabase, createServices, KnowledgeBaseError } from '@offline-kb/core'
import { COMMANDS, findCommand } from './commands/index.js'
import type { Command, OptionSpec, OptionValues } from './commands/index.js'
import { resolveConfig } from './config.js'
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, exitCodeFor } from './exit-codes.js'

export interface CliIO {
  out: (line: string) => void
  err: (line: string) => void
  env: Record<string, string | undefined>
  homeDir?: string
}

const GLOBAL_OPTIONS: OptionSpec = {
  database: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
}

/** Splits off the first positional, skipping the value of --database. */
function splitCommand(argv: string[]): { name?: string; rest: string[] } {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === undefined) continue
    if (arg === '--database') {
      i++
      continue
    }
    if (arg.startsWith('-')) continue
    return { name: arg, rest: [...argv.slice(0, i), ...argv.slice(i + 1)] }
  }
  return { rest: argv }
}

export function helpText(command?: Command): string[] {
  if (command) {
    return [`usage: offline-kb [--database <path>] ${command.usage}`, '', command.summary]
  }

  const width = Math.max(...COMMANDS.map((c) => c.name.length))
  return [
    'usage: offline-kb [--database <path>] <command> [args] [--flags]',
    '',
    'Commands:',
    ...COMMANDS.map((c) => `  ${c.name.padEnd(width)}  ${c.summary}`),
    `  ${'help'.padEnd(width)}  Show help for a command`,
    '',
    'The database defaults to $OFFLINE_KB_DATABASE, then ~/.local/share/offline-kb/knowledge.db.',
  ]
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

export async function run(argv: string[], io: CliIO): Promise<number> {
  const { name, rest } = splitCommand(argv)

  if (name === undefined || name === 'help') {
    const target = splitCommand(rest).name
    const command = target !== undefined ? findCommand(target) : undefined
    if (target !== undefined && !command) {
      io.err(`Unknown command: ${target}`)
      return EXIT_USAGE
    }
    helpText(command).forEach((line) => io.out(line))
    return name === undefined && !rest.includes('--help') && !rest.includes('-h') ? EXIT_USAGE : EXIT_OK
  }

  const command = findCommand(name)
  if (!command) {
    io.err(`Unknown command: ${name}`)
    io.err('Run "offline-kb help" for the list of commands.')
    return EXIT_USAGE
  }

  let values: OptionValues
  let positionals: string[]
  try {
    const parsed = parseArgs({
      args: rest,
      options: { ...GLOBAL_OPTIONS, ...command.options },
      allowPositionals: true,
      strict: true,
    })
    values = parsed.values
    positionals = parsed.positionals
  } catch (e) {
    io.err(errorMessage(e))
    io.err(`usage: offline-kb ${command.usage}`)
    return EXIT_USAGE
  }

  if (values.help === true) {
    helpText(command).forEach((line) => io.out(line))
    return EXIT_OK
  }

  const config = resolveConfig({
    databaseFlag: typeof values.database === 'string' ? values.database : undefined,
    env: io.env,
    ...(io.homeDir !== undefined ? { homeDir: io.homeDir } : {}),
  })
  if (!config.ok) {
    io.err(config.error.message)
    return exitCodeFor(config.error.code)
  }

  let db: ReturnType<typeof openDatabase>
  try {
    db = openDatabase(config.value.databasePath)
  } catch (e) {
    io.err(`Cannot open database ${config.value.databasePath}: ${errorMessage(e)}`)
    return EXIT_FAILURE
  }

  try {
    const services = createServices(
      db,
      config.value.hashIterations !== undefined ? { hashIterations: config.value.hashIterations } : {},
    )
    const result = await command.run({ services, positionals, values, out: io.out })
    if (!result.ok) {
      io.err(result.error.message)
      return exitCodeFor(result.error.code)
    }
    return EXIT_OK
  } catch (e) {
    const error = KnowledgeBaseError.fromUnknown(e)
    io.err(error.message)
    return exitCodeFor(error.code)
  } finally {
    db.close()
  }
}
