/**
 * invenio-deposit command line.
 *
 *   invenio-deposit validate <file>   - validate metadata, print it with defaults
 *   invenio-deposit template <file>   - write a template metadata file
 *   invenio-deposit upload ...        - create, fill and submit a draft record
 */

import { readFileSync } from 'fs'
import path from 'path'
import type { Writable } from 'stream'
import { parseArgs } from 'util'
import { z } from 'zod'
import { loadConfig } from '../config'
import type { FetchFn } from '../http'
import { logError, setLogLevel } from '../logger'
import type { CommandContext } from './args'
import { templateCommand } from './commands/template'
import { uploadCommand } from './commands/upload'
import { validateCommand } from './commands/validate'
import { CliError, formatError } from './errors'
import { helpText, isHelpTopic } from './help'

const COMMANDS: Record<string, (context: CommandContext) => Promise<void>> = {
  validate: validateCommand,
  template: templateCommand,
  dump: templateCommand,
  upload: uploadCommand,
}

export type CliOptions = {
  stdout?: Writable
  env?: NodeJS.ProcessEnv
  fetch?: FetchFn
}

function packageVersion(): string {
  const manifest = readFileSync(
    path.resolve(__dirname, '..', '..', 'package.json'),
    'utf8',
  )
  return z.object({ version: z.string() }).parse(JSON.parse(manifest)).version
}

function isParseArgsError(error: unknown): error is Error {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  )
}

/**
 * Runs one CLI invocation and resolves to its exit code. Every error is
 * printed to stderr and turns into exit code 1.
 */
export async function runCli(
  argv: string[],
  options: CliOptions = {},
): Promise<number> {
  const stdout = options.stdout ?? process.stdout
  const wantsHelp = argv.includes('-h') || argv.includes('--help')
  const verbose = argv.includes('--verbose')
  const rest = argv.filter(
    (arg) => arg !== '-h' && arg !== '--help' && arg !== '--verbose',
  )

  const commandIndex = rest.findIndex((arg) => !arg.startsWith('-'))
  const globalArgs = commandIndex === -1 ? rest : rest.slice(0, commandIndex)
  const command = commandIndex === -1 ? undefined : rest[commandIndex]
  const commandArgs = commandIndex === -1 ? [] : rest.slice(commandIndex + 1)

  try {
    const config = loadConfig(options.env ?? process.env)
    setLogLevel(verbose ? 'debug' : config.logLevel)

    const { values } = parseArgs({
      args: globalArgs,
      options: { version: { type: 'boolean', short: 'V' } },
      strict: true,
    })

    if (values.version) {
      stdout.write(`invenio-deposit v${packageVersion()}\n`)
      return 0
    }

    if (command === undefined || command === 'help' || wantsHelp) {
      const topic = command === 'help' ? commandArgs[0] : command
      stdout.write(helpText(topic !== undefined && isHelpTopic(topic) ? topic : 'main'))
      return 0
    }

    if (!Object.hasOwn(COMMANDS, command)) {
      throw new CliError(
        `Unknown command: ${command}. Available commands: ${Object.keys(COMMANDS).join(', ')}`,
        'UNKNOWN_COMMAND',
      )
    }

    await COMMANDS[command]({ args: commandArgs, stdout, config, fetch: options.fetch })
    return 0
  } catch (error) {
    const reported = isParseArgsError(error)
      ? new CliError(error.message, 'INVALID_ARGUMENT')
      : error
    logError(`❌ ${formatError(reported)}`)
    return 1
  }
}
