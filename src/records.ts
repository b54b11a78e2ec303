import { z } from 'zod'
import { ResponseFormatError, UnsupportedOperationError } from './errors'
import { FileSet, type FileOwner } from './files'
import { Handle, type UrlScoped } from './handle'
import { call, parseResponse } from './http'
import type { JsonValue, QueryParams, ReviewRequest } from './types'

const IdSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
})

const BucketSchema = z.object({
  links: z.object({ bucket: z.string() }),
})

const CommunitySchema = z.object({ id: z.string().min(1) })

const DepositionMetadataSchema = z.object({
  metadata: z
    .object({
      communities: z
        .array(z.object({ identifier: z.string() }).passthrough())
        .optional(),
    })
    .passthrough()
    .default({}),
})

// Shared by drafts and published records: both address one stored entity,
// own a file set and can be read, updated, deleted and published.
abstract class StoredRecord extends Handle implements FileOwner {
  private bucket: string | undefined

  constructor(
    parent: UrlScoped,
    readonly id: string,
  ) {
    super(parent)
  }

  get files(): FileSet {
    return new FileSet(this)
  }

  /**
   * The deposition bucket that raw file PUTs go to. Looked up with `get()`
   * on first use and fixed for the lifetime of this handle.
   */
  async bucketUrl(): Promise<string> {
    if (this.bucket === undefined) {
      await this.get()
    }
    if (this.bucket === undefined) {
      throw new ResponseFormatError(
        `getting record ${this.id}`,
        'response has no links.bucket',
      )
    }
    return this.bucket
  }

  async get(params: QueryParams = {}): Promise<JsonValue> {
    const body = await call(
      this,
      { method: 'GET', url: this.apiUrl, params },
      `getting record ${this.id}`,
    )
    const links = BucketSchema.safeParse(body)
    if (links.success && this.bucket === undefined) {
      this.bucket = links.data.links.bucket
    }
    return body
  }

  async update(data: unknown, params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      { method: 'PUT', url: this.apiUrl, params, json: data },
      `updating record ${this.id}`,
    )
  }

  async delete(params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      { method: 'DELETE', url: this.apiUrl, params },
      `deleting record ${this.id}`,
    )
  }

  async publish(params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      { method: 'POST', url: `${this.apiUrl}/actions/publish`, params },
      `publishing record ${this.id}`,
    )
  }
}

export class DraftHandle extends StoredRecord {
  get apiUrl(): string {
    return this.dialect.draftUrl(this.baseUrl, this.id)
  }

  /**
   * Requests inclusion of this draft in a community. On Invenio the slug is
   * resolved to the community UUID first and a failed lookup stops before
   * the review request is sent. Zenodo depositions carry their communities
   * in their metadata instead.
   */
  async bind(communitySlug: string, params: QueryParams = {}): Promise<JsonValue> {
    if (this.dialect.communityBinding === 'metadata') {
      return this.bindDeposition(communitySlug, params)
    }

    const lookupOperation = `getting the ID for ${communitySlug} community`
    const community = parseResponse(
      CommunitySchema,
      await call(
        this,
        {
          method: 'GET',
          url: `${this.baseUrl}/communities/${encodeURIComponent(communitySlug)}`,
          authenticate: this.authenticateCommunityLookup,
        },
        lookupOperation,
      ),
      lookupOperation,
    )

    const review: ReviewRequest = {
      receiver: { community: community.id },
      type: 'community-submission',
    }
    return call(
      this,
      { method: 'PUT', url: `${this.apiUrl}/review`, params, json: review },
      `binding draft record ${this.id} to community ${communitySlug} with ID ${community.id}`,
    )
  }

  async submitReview(params: QueryParams = {}): Promise<JsonValue> {
    if (this.dialect.communityBinding === 'metadata') {
      throw new UnsupportedOperationError(
        'submitting for review',
        this.dialect.name,
      )
    }
    return call(
      this,
      { method: 'POST', url: `${this.apiUrl}/actions/submit-review`, params },
      `submitting for review record ${this.id}`,
    )
  }

  private async bindDeposition(
    communitySlug: string,
    params: QueryParams,
  ): Promise<JsonValue> {
    const { metadata } = parseResponse(
      DepositionMetadataSchema,
      await this.get(params),
      `getting record ${this.id}`,
    )
    const communities = metadata.communities ?? []
    if (communities.some((entry) => entry.identifier === communitySlug)) {
      return null
    }
    return this.update(
      {
        metadata: {
          ...metadata,
          communities: [...communities, { identifier: communitySlug }],
        },
      },
      params,
    )
  }
}

export class RecordHandle extends StoredRecord {
  get apiUrl(): string {
    return this.dialect.recordUrl(this.baseUrl, this.id)
  }

  // Opens a new draft of this published record.
  async edit(params: QueryParams = {}): Promise<DraftHandle> {
    const operation = `editing record ${this.id}`
    const body = await call(
      this,
      { method: 'POST', url: this.dialect.editUrl(this.baseUrl, this.id), params },
      operation,
    )
    return new DraftHandle(this.parent, parseResponse(IdSchema, body, operation).id)
  }

  async discard(params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      { method: 'POST', url: `${this.apiUrl}/actions/discard`, params },
      `discarding record ${this.id}`,
    )
  }

  async newVersion(params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      { method: 'POST', url: `${this.apiUrl}/actions/newversion`, params },
      `setting new version for record ${this.id}`,
    )
  }
}

// Entry point for records (Invenio) or depositions (Zenodo).
export class RecordCollection extends Handle {
  get apiUrl(): string {
    return this.dialect.collectionUrl(this.baseUrl)
  }

  record(id: string): RecordHandle {
    return new RecordHandle(this, id)
  }

  async get(id: string, params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      { method: 'GET', url: this.dialect.recordUrl(this.baseUrl, id), params },
      `getting record ${id}`,
    )
  }

  async draft(id: string, params: QueryParams = {}): Promise<DraftHandle> {
    const operation = `getting record ${id}`
    const body = await call(
      this,
      { method: 'GET', url: this.dialect.draftUrl(this.baseUrl, id), params },
      operation,
    )
    return new DraftHandle(this, parseResponse(IdSchema, body, operation).id)
  }

  async create(params: QueryParams = {}): Promise<DraftHandle> {
    const body = await call(
      this,
      { method: 'POST', url: this.apiUrl, params, json: {} },
      'creating record',
    )
    return new DraftHandle(this, parseResponse(IdSchema, body, 'creating record').id)
  }

  async list(params: QueryParams = {}): Promise<JsonValue> {
    return call(
      this,
      { method: 'GET', url: this.apiUrl, params },
      'listing records',
    )
  }
}
