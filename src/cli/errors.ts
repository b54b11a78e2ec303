import { HTTPError, PartialUploadError, ValidationError } from '../errors'

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
  ) {
    super(message)
    this.name = 'CliError'
  }
}

export type CliErrorCode = 'INVALID_ARGUMENT' | 'MISSING_ARGUMENT' | 'UNKNOWN_COMMAND'

export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    return `Error [${error.code}]: ${error.message}\n\nRun \`invenio-deposit help\` for usage information.`
  }
  if (error instanceof PartialUploadError) {
    return `Error: ${error.message}\n\nFiles uploaded before ${error.fileName} remain on the draft; delete them or retry the remaining files.`
  }
  if (error instanceof HTTPError || error instanceof ValidationError) {
    return `Error: ${error.message}`
  }
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `\nCaused by: ${error.cause.message}` : ''
    return `Error: ${error.message}${cause}`
  }
  return `Error: ${String(error)}`
}
