import { z } from 'zod'
import { parseResponse } from './http'
import type { Dialect, JsonObject, JsonValue } from './types'

// How one API convention lays out its endpoints and file payloads. The
// repository picks one strategy when it is built and every handle below it
// reads from that instance instead of branching on the dialect name.
export interface DialectStrategy {
  readonly name: Dialect
  // 'bucket': one raw PUT per file to the deposition bucket.
  // 'multipart': create entry, PUT content, commit.
  readonly uploadMode: 'bucket' | 'multipart'
  // 'review': resolve the community and PUT a review request, then submit.
  // 'metadata': list the community under metadata.communities.
  readonly communityBinding: 'review' | 'metadata'
  // 'key': single-file endpoints take the file name.
  // 'id': they take the server-assigned file id, found through fileId.
  readonly fileAddressing: 'key' | 'id'
  collectionUrl(baseUrl: string): string
  draftUrl(baseUrl: string, id: string): string
  recordUrl(baseUrl: string, id: string): string
  editUrl(baseUrl: string, id: string): string
  fileNames(listing: JsonValue, operation: string): string[]
  fileKey(info: JsonValue, operation: string): string
  fileId(listing: JsonValue, name: string, operation: string): string | undefined
  contentUrl(info: JsonValue, operation: string): string
  renameBody(name: string): JsonObject
}

const DepositionFileSchema = z.object({
  id: z.string(),
  filename: z.string(),
  links: z.object({ download: z.string() }).passthrough(),
})

const DraftFileSchema = z.object({
  key: z.string(),
  links: z
    .object({ self: z.string(), content: z.string().optional() })
    .passthrough(),
})

const zenodoDeposition: DialectStrategy = {
  name: 'zenodo-deposition',
  uploadMode: 'bucket',
  communityBinding: 'metadata',
  fileAddressing: 'id',
  collectionUrl: (baseUrl) => `${baseUrl}/deposit/depositions`,
  draftUrl: (baseUrl, id) => `${baseUrl}/deposit/depositions/${id}`,
  recordUrl: (baseUrl, id) => `${baseUrl}/deposit/depositions/${id}`,
  editUrl: (baseUrl, id) => `${baseUrl}/deposit/depositions/${id}/actions/edit`,
  fileNames: (listing, operation) =>
    parseResponse(
      z.array(DepositionFileSchema.passthrough()),
      listing,
      operation,
    ).map((file) => file.filename),
  fileKey: (info, operation) =>
    parseResponse(DepositionFileSchema, info, operation).filename,
  fileId: (listing, name, operation) =>
    parseResponse(z.array(DepositionFileSchema.passthrough()), listing, operation).find(
      (file) => file.filename === name,
    )?.id,
  contentUrl: (info, operation) =>
    parseResponse(DepositionFileSchema, info, operation).links.download,
  renameBody: (name) => ({ filename: name }),
}

const invenioDraft: DialectStrategy = {
  name: 'invenio-draft',
  uploadMode: 'multipart',
  communityBinding: 'review',
  fileAddressing: 'key',
  collectionUrl: (baseUrl) => `${baseUrl}/records`,
  draftUrl: (baseUrl, id) => `${baseUrl}/records/${id}/draft`,
  recordUrl: (baseUrl, id) => `${baseUrl}/records/${id}`,
  editUrl: (baseUrl, id) => `${baseUrl}/records/${id}/draft`,
  fileNames: (listing, operation) =>
    parseResponse(
      z.object({ entries: z.array(DraftFileSchema.passthrough()) }).passthrough(),
      listing,
      operation,
    ).entries.map((file) => file.key),
  fileKey: (info, operation) =>
    parseResponse(DraftFileSchema, info, operation).key,
  fileId: (_listing, name) => name,
  contentUrl: (info, operation) => {
    const { links } = parseResponse(DraftFileSchema, info, operation)
    return links.content ?? `${links.self}/content`
  },
  renameBody: (name) => ({ key: name }),
}

export const DIALECTS: Record<Dialect, DialectStrategy> = {
  'zenodo-deposition': zenodoDeposition,
  'invenio-draft': invenioDraft,
}
