export type Dialect = 'zenodo-deposition' | 'invenio-draft'

export type QueryParams = Record<string, string | number | boolean>

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export type JsonObject = { [key: string]: JsonValue }

export type ReviewRequest = {
  receiver: { community: string }
  type: 'community-submission'
}

export type FileOrder = Array<{ id: string }>

// Name on the server mapped to a local source path, in upload order
export type FileUploads = Record<string, string> | Map<string, string>
