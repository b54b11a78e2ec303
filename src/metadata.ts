import { writeFile } from 'fs/promises'
import path from 'path'
import {
  getLoader,
  getStringLoader,
  inferFormat,
  serialize,
  type Format,
} from './formats'
import { logInfo } from './logger'
import {
  validateDocument,
  type MetadataDocument,
  type MetadataSchema,
} from './schemas'

export const EXAMPLES_FOLDER = path.resolve(__dirname, '..', 'examples')
export const TEMPLATE_PATH = path.join(EXAMPLES_FOLDER, 'bare_example.yaml')

// Where a metadata document comes from. Every variant ends up in the same
// load-then-validate pipeline.
export type MetadataSource =
  | { kind: 'inline'; document: unknown }
  | { kind: 'text'; text: string; format: Format }
  | { kind: 'file'; path: string; format?: Format }

export async function loadMetadata(source: MetadataSource): Promise<unknown> {
  switch (source.kind) {
    case 'inline':
      return source.document
    case 'text':
      return getStringLoader(source.format)(source.text)
    case 'file':
      return getLoader(source.format ?? inferFormat(source.path))(source.path)
  }
}

/**
 * Loads and validates a metadata document. The result carries the schema
 * defaults and is what should be sent to the repository.
 */
export async function validateMetadata(
  source: MetadataSource,
  schema: string | MetadataSchema = 'default',
): Promise<MetadataDocument> {
  return validateDocument(await loadMetadata(source), schema)
}

// Writes the bundled example record, validated, as a starting point.
export async function dumpTemplate(
  outFile: string,
  format?: Format,
): Promise<MetadataDocument> {
  const template = await validateMetadata({ kind: 'file', path: TEMPLATE_PATH })
  await writeFile(outFile, serialize(template, format ?? inferFormat(outFile)))
  logInfo(`📝 Template written to ${outFile}`)
  return template
}
