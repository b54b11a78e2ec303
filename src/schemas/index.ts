import type { z } from 'zod'
import { UnknownSchemaError, ValidationError } from '../errors'
import { BaseSchema, type MetadataDocument } from './base'

export type MetadataSchema = z.ZodType<MetadataDocument, z.ZodTypeDef, unknown>

export const SCHEMAS: Record<string, MetadataSchema> = {
  base: BaseSchema,
  default: BaseSchema,
}

export function isSchemaName(name: string): boolean {
  return Object.hasOwn(SCHEMAS, name)
}

export function getSchema(schema: string | MetadataSchema): MetadataSchema {
  if (typeof schema !== 'string') return schema
  if (!isSchemaName(schema)) {
    throw new UnknownSchemaError(schema, Object.keys(SCHEMAS))
  }
  return SCHEMAS[schema]
}

/**
 * Checks `document` against `schema` and returns a copy with every default
 * filled in. The input is left untouched.
 */
export function validateDocument(
  document: unknown,
  schema: string | MetadataSchema = 'default',
): MetadataDocument {
  const result = getSchema(schema).safeParse(document)
  if (result.success) return result.data
  throw new ValidationError(
    result.error.errors.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    })),
  )
}

export * from './base'
