import { z } from 'zod'

export const ORCID_ID_RE = /^(\d{4}-){3}\d{4}$/
export const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i
export const VERSION_RE = /^v\d+(\.\d+)*/

const ISO_DATE_RE = /^(\d{4})-?(\d{2})-?(\d{2})$/

function isAbsoluteUrl(value: string): boolean {
  try {
    const url = new URL(value)
    return url.protocol !== '' && url.host !== ''
  } catch {
    return false
  }
}

// YYYY-MM-DD or YYYYMMDD naming a real calendar day.
function isIsoDate(value: string): boolean {
  const match = ISO_DATE_RE.exec(value)
  if (!match) return false
  const [year, month, day] = match.slice(1).map(Number)
  const date = new Date(Date.UTC(year, month - 1, day))
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  )
}

const NonEmptyString = z.string().min(1)

export const OrcidIdentifierSchema = z
  .object({
    scheme: z.literal('orcid').describe('ID scheme.'),
    identifier: z
      .string()
      .regex(ORCID_ID_RE, 'Expected an ORCID (0000-0000-0000-0000)')
      .describe('An [ORCID](https://orcid.org).'),
  })
  .strict()

export const DoiIdentifierSchema = z
  .object({
    scheme: z.literal('doi').default('doi').describe('ID scheme.'),
    identifier: z
      .string()
      .refine(isAbsoluteUrl, 'Expected an absolute URL with a scheme and host')
      .describe('A [DOI](https://www.doi.org).'),
  })
  .strict()

export const IdentifierSchema = z.union([
  OrcidIdentifierSchema,
  DoiIdentifierSchema,
])

export const PersonOrOrgSchema = z
  .object({
    name: NonEmptyString.optional().describe('Full set of given names.'),
    family_name: NonEmptyString.optional().describe('Family name(s).'),
    given_name: NonEmptyString.optional().describe('Given name(s).'),
    identifiers: z
      .array(IdentifierSchema)
      .optional()
      .describe('ORCIDs or other IDs'),
    type: z.literal('personal').describe('Personal or organisation.'),
  })
  .passthrough()
  .refine(
    (person) => person.name !== undefined || person.family_name !== undefined,
    { message: 'Either name or family_name is required', path: ['name'] },
  )

// Creators tolerate keys the schema does not know about, nested ones too.
export const CreatorSchema = z
  .object({
    affiliations: z
      .array(
        z
          .object({ name: z.string().describe('Name of institution.') })
          .passthrough(),
      )
      .optional()
      .describe('Member affiliations.'),
    person_or_org: PersonOrOrgSchema.describe('Person or organisation.'),
  })
  .passthrough()

export const MetadataBlockSchema = z
  .object({
    title: NonEmptyString.describe('Title of resource.'),
    description: NonEmptyString.describe('Summary of resource.'),
    creators: z.array(CreatorSchema).min(1).describe('List of creators.'),
    rights: z
      .array(
        z
          .object({
            id: z.enum(['cc-by-4.0']).describe('ID of rights or license.'),
          })
          .strict(),
      )
      .describe('Rights or license.'),
    resource_type: z
      .object({ id: z.enum(['model']).describe('Resource class.') })
      .strict()
      .describe('Type of resource.'),
    subjects: z
      .array(
        z.object({ subject: z.string().describe('Subject keyword.') }).strict(),
      )
      .default([])
      .describe('List of keywords defining subjects resource covers.'),
    version: z
      .string()
      .regex(VERSION_RE, 'Expected a version such as v1 or v1.2.3')
      .describe('Current version of resource.'),
    publisher: z.string().optional().describe('Publisher of resource.'),
    publication_date: z
      .union([
        z.string().refine(isIsoDate, 'Expected an ISO calendar date'),
        z.number().finite(),
      ])
      .optional()
      .describe('Date of publication of resource.'),
    identifiers: z
      .array(IdentifierSchema)
      .optional()
      .describe('Resource identifiers such as ORCID or DOI.'),
  })
  .strict()

const Visibility = z.enum(['public', 'private'])

export const AccessSchema = z
  .object({
    embargo: z
      .object({
        active: z.boolean().describe('Whether resource is under embargo.'),
        reason: z.string().nullable().describe('Cause for embargo.'),
      })
      .strict()
      .optional()
      .describe('Details of resource embargo.'),
    files: Visibility.default('public').describe(
      'Accessibility to individual files.',
    ),
    record: Visibility.default('public').describe(
      'Accessibility to record as a whole.',
    ),
    status: z
      .enum(['open', 'closed'])
      .optional()
      .describe('Current status or resource.'),
  })
  .strict()
  .default({ files: 'public', record: 'public' })
  .describe('Accessibility of data outside of owners.')

export const BaseSchema = z
  .object({
    access: AccessSchema,
    files: z
      .object({
        enabled: z.boolean().describe('Whether file is enabled.'),
      })
      .strict()
      .optional()
      .describe('Details of files.'),
    custom_fields: z
      .object({
        dsmd: z
          .array(z.record(z.string(), z.unknown()))
          .describe('Domain specific metadata (dsmd).'),
      })
      .strict()
      .describe('Block for custom data.'),
    metadata: MetadataBlockSchema.describe('Resource metadata.'),
    community: z
      .string()
      .regex(UUID_RE, 'Expected a community UUID')
      .optional()
      .describe('UUID of community associated with resource.'),
  })
  .strict()
  .describe('Base schema from which community specific schemas are built.')

export type Identifier = z.output<typeof IdentifierSchema>
export type Creator = z.output<typeof CreatorSchema>
export type MetadataDocument = z.output<typeof BaseSchema>
