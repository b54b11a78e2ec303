import { glob, hasMagic } from 'glob'
import path from 'path'
import { MissingSourceFileError } from './errors'
import type { Format } from './formats'
import type { FetchFn } from './http'
import { logInfo } from './logger'
import { validateMetadata } from './metadata'
import { InvenioRepository } from './repository'
import type { Dialect, JsonValue } from './types'

export type RecordUploadOptions = {
  apiUrl: string
  apiKey: string
  metadataPath: string
  metadataFormat?: Format
  files?: string[]
  community?: string
  dialect?: Dialect
  timeout?: number
  fetch?: FetchFn
}

export type RecordUploadResult = {
  draftId: string
  uploads: JsonValue[]
  submitted: boolean
}

/**
 * Expands file patterns into an upload mapping keyed by base name, e.g.
 * `['out/*.csv']` → `{ 'a.csv' => 'out/a.csv', 'b.csv' => 'out/b.csv' }`.
 * A later match with the same base name replaces an earlier one. A plain
 * path that matches nothing is an error; an empty wildcard match is not.
 */
export async function createFilesDict(
  patterns: Iterable<string>,
): Promise<Map<string, string>> {
  const files = new Map<string, string>()
  for (const pattern of patterns) {
    const matches = (await glob(pattern, { nodir: true })).sort()
    if (matches.length === 0 && !hasMagic(pattern)) {
      throw new MissingSourceFileError(path.basename(pattern), pattern)
    }
    for (const match of matches) {
      files.set(path.basename(match), match)
    }
  }
  return files
}

/**
 * Creates a draft, fills in the validated metadata, uploads the files and,
 * given a community, binds the draft to it and submits it for review.
 * Nothing is sent before the metadata passes validation.
 */
export async function runRecordUpload(
  options: RecordUploadOptions,
): Promise<RecordUploadResult> {
  logInfo(`🔎 Validating ${options.metadataPath}`)
  const metadata = await validateMetadata({
    kind: 'file',
    path: options.metadataPath,
    format: options.metadataFormat,
  })
  const files = await createFilesDict(options.files ?? [])

  const repository = new InvenioRepository({
    url: options.apiUrl,
    accessToken: options.apiKey,
    dialect: options.dialect,
    timeout: options.timeout,
    fetch: options.fetch,
  })

  logInfo('📝 Creating draft record')
  const draft = await repository.depositions.create()
  logInfo(`✅ Draft created with ID: ${draft.id}`)

  await draft.update(metadata)
  logInfo('🗂️ Metadata attached')

  const uploads = files.size > 0 ? await draft.files.upload(files) : []
  logInfo(`📤 Uploaded ${files.size} file(s)`)

  if (options.community === undefined) {
    logInfo(`ℹ️ No community given; draft ${draft.id} left unsubmitted`)
    return { draftId: draft.id, uploads, submitted: false }
  }

  await draft.bind(options.community)
  logInfo(`🔗 Draft bound to community ${options.community}`)

  if (repository.dialect.communityBinding !== 'review') {
    logInfo(
      `ℹ️ ${repository.dialect.name} has no review step; publish draft ${draft.id} to send it to the community`,
    )
    return { draftId: draft.id, uploads, submitted: false }
  }

  await draft.submitReview()
  logInfo(`🎉 Draft ${draft.id} submitted for review`)
  return { draftId: draft.id, uploads, submitted: true }
}
