import type { Writable } from 'stream'
import type { Config } from '../config'
import { isFormat, SUPPORTED_FORMATS, type Format } from '../formats'
import type { FetchFn } from '../http'
import { CliError } from './errors'

export type CommandContext = {
  args: string[]
  stdout: Writable
  config: Config
  fetch?: FetchFn
}

export function parseFormat(
  value: string | undefined,
  flag: string,
): Format | undefined {
  if (value === undefined) return undefined
  if (!isFormat(value)) {
    throw new CliError(
      `${flag} must be one of ${SUPPORTED_FORMATS.join(', ')}, got ${value}`,
      'INVALID_ARGUMENT',
    )
  }
  return value
}

export function parseMilliseconds(value: string, flag: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new CliError(
      `${flag} must be a whole number of milliseconds, got ${value}`,
      'INVALID_ARGUMENT',
    )
  }
  return parsed
}

export function requirePositional(
  positionals: string[],
  usage: string,
): string {
  const [value] = positionals
  if (value === undefined) {
    throw new CliError(`File path is required. Usage: ${usage}`, 'MISSING_ARGUMENT')
  }
  return value
}
