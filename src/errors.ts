// A non-2xx answer from the repository. Transport failures are never wrapped
// in this class: they surface as node-fetch's FetchError.
export class HTTPError extends Error {
  constructor(
    readonly operation: string,
    readonly status: number,
    readonly url: string,
    readonly serverMessage: string,
  ) {
    super(`Error while ${operation}, info: ${serverMessage}`)
    this.name = 'HTTPError'
  }
}

// The repository answered 2xx but the body lacks a field we rely on
// (an `id`, a bucket link, a file key).
export class ResponseFormatError extends Error {
  constructor(
    readonly operation: string,
    detail: string,
  ) {
    super(`Unexpected response while ${operation}: ${detail}`)
    this.name = 'ResponseFormatError'
  }
}

export type ValidationIssue = {
  path: string
  message: string
}

export class ValidationError extends Error {
  constructor(readonly issues: ValidationIssue[]) {
    super(
      `Metadata failed validation:\n${issues
        .map((issue) => `  ${issue.path}: ${issue.message}`)
        .join('\n')}`,
    )
    this.name = 'ValidationError'
  }

  get paths(): string[] {
    return this.issues.map((issue) => issue.path)
  }
}

export class DestinationConflictError extends Error {
  constructor(readonly destination: string) {
    super(`${destination} is a file which exists. Must be a directory.`)
    this.name = 'DestinationConflictError'
  }
}

export class MissingSourceFileError extends Error {
  constructor(
    readonly fileName: string,
    readonly source: string,
  ) {
    super(`Cannot upload ${fileName}: source file ${source} does not exist`)
    this.name = 'MissingSourceFileError'
  }
}

// Thrown when a bulk upload stops part way. Files already sent stay on the
// server; `responses` holds every response collected before the failure.
export class PartialUploadError extends Error {
  constructor(
    readonly fileName: string,
    readonly responses: unknown[],
    cause: Error,
  ) {
    super(
      `Upload stopped at ${fileName} after ${responses.length} successful requests: ${cause.message}`,
      { cause },
    )
    this.name = 'PartialUploadError'
  }
}

export class UnsupportedOperationError extends Error {
  constructor(operation: string, dialect: string) {
    super(`${operation} is not supported by the ${dialect} dialect`)
    this.name = 'UnsupportedOperationError'
  }
}

export class UnsupportedFormatError extends Error {
  constructor(
    readonly format: string,
    supported: readonly string[],
  ) {
    super(
      `Cannot handle ${format} format. Valid keys are: ${supported.join(', ')}`,
    )
    this.name = 'UnsupportedFormatError'
  }
}

export class UnrecognizedExtensionError extends Error {
  constructor(readonly path: string) {
    super(`Cannot determine format of ${path}: unrecognized extension`)
    this.name = 'UnrecognizedExtensionError'
  }
}

export class UnknownSchemaError extends Error {
  constructor(
    readonly schema: string,
    available: readonly string[],
  ) {
    super(`Unknown schema ${schema}. Available schemas: ${available.join(', ')}`)
    this.name = 'UnknownSchemaError'
  }
}
