import { createReadStream, createWriteStream } from 'fs'
import { mkdir, stat } from 'fs/promises'
import path from 'path'
import { pipeline } from 'stream/promises'
import {
  DestinationConflictError,
  MissingSourceFileError,
  PartialUploadError,
  ResponseFormatError,
} from './errors'
import { Handle, type UrlScoped } from './handle'
import { call, ensureOk, send } from './http'
import { logInfo } from './logger'
import type {
  FileOrder,
  FileUploads,
  JsonValue,
  QueryParams,
} from './types'

// A draft or record that can hold files.
export interface FileOwner extends UrlScoped {
  readonly id: string
  readonly apiUrl: string
  bucketUrl(): Promise<string>
}

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}

async function sourceSize(name: string, source: string): Promise<number> {
  try {
    const stats = await stat(source)
    if (!stats.isFile()) throw new MissingSourceFileError(name, source)
    return stats.size
  } catch (error) {
    if (isMissing(error)) throw new MissingSourceFileError(name, source)
    throw error
  }
}

// Creates `dest` when missing; refuses when something other than a
// directory already sits there.
export async function prepareDestination(dest: string): Promise<void> {
  try {
    const stats = await stat(dest)
    if (!stats.isDirectory()) throw new DestinationConflictError(dest)
  } catch (error) {
    if (!isMissing(error)) throw error
    await mkdir(dest, { recursive: true })
  }
}

export class FileHandle extends Handle {
  constructor(
    private readonly files: FileSet,
    readonly name: string,
  ) {
    super(files)
  }

  get apiUrl(): string {
    return `${this.files.apiUrl}/${encodeURIComponent(this.name)}`
  }

  get recordId(): string {
    return this.files.recordId
  }

  // Single-file endpoint. Deposition files are addressed by the id the
  // server gave them, which only the file listing knows.
  private async fileUrl(params: QueryParams): Promise<string> {
    if (this.dialect.fileAddressing === 'key') return this.apiUrl
    const operation = `looking up ${this.name} in record ${this.recordId}`
    const id = this.dialect.fileId(await this.files.list(params), this.name, operation)
    if (id === undefined) {
      throw new ResponseFormatError(operation, `no file named ${this.name}`)
    }
    return `${this.files.apiUrl}/${encodeURIComponent(id)}`
  }

  async info(params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      { method: 'GET', url: await this.fileUrl(params), params },
      `getting ${this.name} file info from record ${this.recordId}`,
    )
  }

  // Renames the file on the server.
  async replace(newName: string, params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      {
        method: 'PUT',
        url: await this.fileUrl(params),
        params,
        json: this.dialect.renameBody(newName),
      },
      `updating ${this.name} in record ${this.recordId}`,
    )
  }

  /**
   * Downloads the file into the directory `dest`, creating it if needed.
   * Returns the path written.
   */
  async download(dest = '.', params: QueryParams = {}): Promise<string> {
    await prepareDestination(dest)

    const operation = `downloading file ${this.name} from record ${this.recordId}`
    const info = await this.info(params)
    const key = this.dialect.fileKey(info, operation)
    const response = await ensureOk(
      await send(this, {
        method: 'GET',
        url: this.dialect.contentUrl(info, operation),
        params,
        timeout: 0,
      }),
      operation,
    )

    const target = path.join(dest, path.basename(key))
    await pipeline(response.body, createWriteStream(target))
    logInfo(`📥 Downloaded ${this.name} to ${target}`)
    return target
  }

  async delete(params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      {
        method: 'DELETE',
        url: await this.fileUrl(params),
        params,
        headers: { 'Content-Type': 'application/json' },
      },
      `deleting file ${this.name} from record ${this.recordId}`,
    )
  }

  /**
   * Uploads `source` under this file's name and appends every response to
   * `responses` as it arrives, so callers can see how far a failed upload
   * got. The bucket dialect needs one request; the multipart dialect
   * needs create, content and commit, strictly in that order.
   */
  async upload(
    source: string,
    params: QueryParams = {},
    responses: JsonValue[] = [],
  ): Promise<JsonValue[]> {
    const size = await sourceSize(this.name, source)

    if (this.dialect.uploadMode === 'bucket') {
      const bucket = await this.files.owner.bucketUrl()
      responses.push(
        await this.putContent(
          `${bucket}/${encodeURIComponent(this.name)}`,
          source,
          size,
          params,
          `uploading file ${this.name} to record ${this.recordId}`,
        ),
      )
      return responses
    }

    responses.push(
      await call(
        this,
        {
          method: 'POST',
          url: this.files.apiUrl,
          params,
          json: [{ key: this.name }],
        },
        `starting draft file upload for record ${this.recordId}`,
      ),
    )
    responses.push(
      await this.putContent(
        `${this.apiUrl}/content`,
        source,
        size,
        params,
        `uploading file ${this.name} content to record ${this.recordId}`,
      ),
    )
    responses.push(
      await call(
        this,
        {
          method: 'POST',
          url: `${this.apiUrl}/commit`,
          params,
          headers: { 'Content-Type': 'application/json' },
        },
        `committing file ${this.name} to record ${this.recordId}`,
      ),
    )
    return responses
  }

  private async putContent(
    url: string,
    source: string,
    size: number,
    params: QueryParams,
    operation: string,
  ): Promise<JsonValue> {
    const stream = createReadStream(source)
    try {
      return await call(
        this,
        {
          method: 'PUT',
          url,
          params,
          body: stream,
          contentLength: size,
          timeout: 0,
        },
        operation,
      )
    } finally {
      stream.destroy()
    }
  }
}

export class FileSet extends Handle {
  constructor(readonly owner: FileOwner) {
    super(owner)
  }

  get apiUrl(): string {
    return `${this.owner.apiUrl}/files`
  }

  get recordId(): string {
    return this.owner.id
  }

  file(name: string): FileHandle {
    return new FileHandle(this, name)
  }

  async list(params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      { method: 'GET', url: this.apiUrl, params },
      `listing record ${this.recordId} files`,
    )
  }

  async names(params: QueryParams = {}): Promise<string[]> {
    return this.dialect.fileNames(
      await this.list(params),
      `listing record ${this.recordId} files`,
    )
  }

  async sort(order: FileOrder, params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      { method: 'PUT', url: this.apiUrl, params, json: order },
      `sorting files for record ${this.recordId}`,
    )
  }

  /**
   * Uploads every entry of `files` (server name → local path) in order and
   * returns all responses. Every source is checked before the first request.
   * The first failure stops the loop with a PartialUploadError; files
   * already sent are left on the server.
   */
  async upload(
    files: FileUploads,
    params: QueryParams = {},
  ): Promise<JsonValue[]> {
    const entries = files instanceof Map ? [...files] : Object.entries(files)
    for (const [name, source] of entries) {
      await sourceSize(name, source)
    }

    const responses: JsonValue[] = []
    for (const [name, source] of entries) {
      logInfo(`📤 Uploading ${source} as ${name}`)
      try {
        await this.file(name).upload(source, params, responses)
      } catch (error) {
        if (error instanceof Error) {
          throw new PartialUploadError(name, responses, error)
        }
        throw error
      }
    }
    return responses
  }

  // Downloads every listed file into `dest`; returns the written paths.
  async download(dest: string, params: QueryParams = {}): Promise<string[]> {
    await prepareDestination(dest)
    const written: string[] = []
    for (const name of await this.names(params)) {
      written.push(await this.file(name).download(dest, params))
    }
    return written
  }
}
