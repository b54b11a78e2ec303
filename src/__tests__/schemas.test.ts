import { describe, expect, it } from 'vitest'
import { UnknownSchemaError, ValidationError } from '../errors'
import { getSchema, IdentifierSchema, SCHEMAS, validateDocument } from '../schemas'

function validDocument(metadata: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    custom_fields: { dsmd: [{ instrument: 'probe', depth_m: 2 }] },
    metadata: {
      title: 'Soil moisture model',
      description: 'Hourly model output for one field site.',
      creators: [
        { person_or_org: { family_name: 'Doe', given_name: 'Jane', type: 'personal' } },
      ],
      rights: [{ id: 'cc-by-4.0' }],
      resource_type: { id: 'model' },
      version: 'v1.2.0',
      ...metadata,
    },
  }
}

function issuePaths(document: unknown): string[] {
  try {
    validateDocument(document)
  } catch (error) {
    if (error instanceof ValidationError) return error.paths
    throw error
  }
  return []
}

describe('validateDocument', () => {
  it('fills in access and subject defaults', () => {
    const validated = validateDocument(validDocument())
    expect(validated.access).toEqual({ files: 'public', record: 'public' })
    expect(validated.metadata.subjects).toEqual([])
    expect(validated.metadata.title).toBe('Soil moisture model')
  })

  it('leaves its input untouched', () => {
    const document = validDocument()
    validateDocument(document)
    expect(document).not.toHaveProperty('access')
  })

  it('is idempotent and survives a JSON round trip', () => {
    const once = validateDocument(validDocument())
    expect(validateDocument(once)).toEqual(once)
    expect(validateDocument(JSON.parse(JSON.stringify(once)))).toEqual(once)
  })

  it('reports a missing title by its path', () => {
    expect(issuePaths(validDocument({ title: undefined }))).toEqual(['metadata.title'])
  })

  it('lists every failing field in the error message', () => {
    expect(() => validateDocument(validDocument({ title: '', version: '1.0' }))).toThrow(
      'Metadata failed validation:\n  metadata.title: String must contain at least 1 character(s)\n  metadata.version: Expected a version such as v1 or v1.2.3',
    )
  })

  it('rejects unknown keys outside creators', () => {
    expect(issuePaths({ ...validDocument(), extra: true })).toEqual(['(root)'])
    expect(issuePaths(validDocument({ keywords: ['a'] }))).toEqual(['metadata'])
  })

  it('keeps unknown keys on creators', () => {
    const validated = validateDocument(
      validDocument({
        creators: [
          {
            role: 'lead',
            affiliations: [{ name: 'Example University', country: 'NL' }],
            person_or_org: { name: 'Jane', type: 'personal', nickname: 'JD' },
          },
        ],
      }),
    )
    expect(validated.metadata.creators[0]).toEqual({
      role: 'lead',
      affiliations: [{ name: 'Example University', country: 'NL' }],
      person_or_org: { name: 'Jane', type: 'personal', nickname: 'JD' },
    })
  })

  it('needs a name or family name on every creator', () => {
    expect(
      issuePaths(
        validDocument({
          creators: [{ person_or_org: { given_name: 'Jane', type: 'personal' } }],
        }),
      ),
    ).toEqual(['metadata.creators.0.person_or_org.name'])
    expect(issuePaths(validDocument({ creators: [] }))).toEqual(['metadata.creators'])
  })

  it('accepts versions that start with v and a number', () => {
    expect(issuePaths(validDocument({ version: 'v1' }))).toEqual([])
    expect(issuePaths(validDocument({ version: 'v2.0.1-rc1' }))).toEqual([])
    expect(issuePaths(validDocument({ version: '2.0.1' }))).toEqual(['metadata.version'])
  })

  it('accepts ISO dates and timestamps as publication dates', () => {
    expect(issuePaths(validDocument({ publication_date: '2024-01-31' }))).toEqual([])
    expect(issuePaths(validDocument({ publication_date: '20240131' }))).toEqual([])
    expect(issuePaths(validDocument({ publication_date: 1706659200 }))).toEqual([])
    expect(issuePaths(validDocument({ publication_date: '2024-02-30' }))).toEqual([
      'metadata.publication_date',
    ])
  })

  it('restricts rights and resource type to the known ids', () => {
    expect(issuePaths(validDocument({ rights: [{ id: 'mit' }] }))).toEqual([
      'metadata.rights.0.id',
    ])
    expect(issuePaths(validDocument({ resource_type: { id: 'dataset' } }))).toEqual([
      'metadata.resource_type.id',
    ])
  })

  it('checks the community UUID', () => {
    const withCommunity = (community: string) => ({ ...validDocument(), community })
    expect(issuePaths(withCommunity('3fa85f64-5717-4562-b3fc-2c963f66afa6'))).toEqual([])
    expect(issuePaths(withCommunity('3FA85F64-5717-4562-B3FC-2C963F66AFA6'))).toEqual([])
    expect(issuePaths(withCommunity('physics'))).toEqual(['community'])
  })

  it('accepts a named schema or a schema object', () => {
    const document = validDocument()
    expect(validateDocument(document, 'base')).toEqual(validateDocument(document))
    expect(validateDocument(document, SCHEMAS.base)).toEqual(validateDocument(document))
  })
})

describe('IdentifierSchema', () => {
  it('accepts an ORCID', () => {
    expect(
      IdentifierSchema.parse({ scheme: 'orcid', identifier: '0000-0002-1825-0097' }),
    ).toEqual({ scheme: 'orcid', identifier: '0000-0002-1825-0097' })
  })

  it('rejects malformed ORCIDs', () => {
    expect(IdentifierSchema.safeParse({ scheme: 'orcid', identifier: '1234' }).success).toBe(
      false,
    )
    expect(
      IdentifierSchema.safeParse({ scheme: 'orcid', identifier: '0000-0002-1825-0097x' })
        .success,
    ).toBe(false)
  })

  it('defaults the scheme to doi for URLs', () => {
    expect(IdentifierSchema.parse({ identifier: 'https://doi.org/10.1234/abcd' })).toEqual({
      scheme: 'doi',
      identifier: 'https://doi.org/10.1234/abcd',
    })
  })

  it('requires an absolute URL for a DOI', () => {
    expect(IdentifierSchema.safeParse({ scheme: 'doi', identifier: '10.1234/abcd' }).success).toBe(
      false,
    )
  })

  it('rejects extra keys', () => {
    expect(
      IdentifierSchema.safeParse({
        scheme: 'orcid',
        identifier: '0000-0002-1825-0097',
        note: 'x',
      }).success,
    ).toBe(false)
  })
})

describe('getSchema', () => {
  it('throws for an unknown name', () => {
    expect(() => getSchema('community-x')).toThrow(UnknownSchemaError)
    expect(() => getSchema('community-x')).toThrow(
      'Unknown schema community-x. Available schemas: base, default',
    )
  })
})
