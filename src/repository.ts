import { DEFAULT_TIMEOUT } from './config'
import { DIALECTS, type DialectStrategy } from './dialect'
import type { UrlScoped } from './handle'
import { defaultFetch, type FetchFn, type Transport } from './http'
import { Licenses } from './licenses'
import { RecordCollection } from './records'
import type { Dialect } from './types'

export type RepositoryOptions = {
  url: string
  accessToken: string
  dialect?: Dialect
  // Milliseconds for JSON calls; 0 disables. File content is never timed out.
  timeout?: number
  fetch?: FetchFn
  // Community lookups go out without the access token unless this is set.
  authenticateCommunityLookup?: boolean
}

// `https://host/`, `https://host/api` and `https://host/api/` all become
// `https://host/api`.
export function normalizeApiUrl(url: string): string {
  const trimmed = url.trim().replace(/^\/+|\/+$/g, '')
  const base = trimmed.endsWith('/api') ? trimmed.slice(0, -'/api'.length) : trimmed
  return `${base}/api`
}

/**
 * Root of an Invenio-family repository. Holds the base URL and the access
 * token that every handle below it borrows.
 *
 * @example
 * ```ts
 * const repository = new InvenioRepository({
 *   url: 'https://inveniordm.example.org',
 *   accessToken: process.env.INVENIO_API_KEY ?? '',
 * })
 * const draft = await repository.depositions.create()
 * await draft.update(metadata)
 * await draft.files.upload({ 'data.csv': './out/data.csv' })
 * await draft.bind('my-community')
 * await draft.submitReview()
 * ```
 */
export class InvenioRepository implements UrlScoped {
  readonly baseUrl: string
  readonly credential: string
  readonly dialect: DialectStrategy
  readonly transport: Transport
  readonly authenticateCommunityLookup: boolean
  readonly depositions: RecordCollection
  readonly licenses: Licenses

  constructor(options: RepositoryOptions) {
    this.baseUrl = normalizeApiUrl(options.url)
    this.credential = options.accessToken
    this.dialect = DIALECTS[options.dialect ?? 'invenio-draft']
    this.transport = {
      fetch: options.fetch ?? defaultFetch,
      timeout: options.timeout ?? DEFAULT_TIMEOUT,
    }
    this.authenticateCommunityLookup = options.authenticateCommunityLookup ?? false

    this.depositions = new RecordCollection(this)
    this.licenses = new Licenses(this)
  }
}
