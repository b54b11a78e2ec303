import { mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import os from 'os'
import path from 'path'
import { Writable } from 'stream'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { runCli } from '../cli'
import { helpText } from '../cli/help'
import { TEMPLATE_PATH, validateMetadata } from '../metadata'
import { FakeInvenio } from './fake_invenio'

const ENV = { LOG_LEVEL: 'error' }

let workdir: string
let errors: string[]

function sink() {
  const chunks: string[] = []
  const out = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk))
      callback()
    },
  })
  return { out, text: () => chunks.join('') }
}

async function run(argv: string[], env: NodeJS.ProcessEnv = ENV, server?: FakeInvenio) {
  const { out, text } = sink()
  const code = await runCli(argv, { stdout: out, env, fetch: server?.fetch })
  return { code, stdout: text() }
}

beforeEach(async () => {
  workdir = await mkdtemp(path.join(os.tmpdir(), 'invenio-cli-'))
  errors = []
  vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
    errors.push(String(message))
  })
})

afterEach(async () => {
  vi.restoreAllMocks()
  await rm(workdir, { recursive: true, force: true })
})

describe('help and version', () => {
  it('prints the main help without a command', async () => {
    await expect(run([])).resolves.toEqual({ code: 0, stdout: helpText('main') })
    await expect(run(['--help'])).resolves.toEqual({ code: 0, stdout: helpText('main') })
  })

  it('prints command help', async () => {
    await expect(run(['help', 'upload'])).resolves.toEqual({
      code: 0,
      stdout: helpText('upload'),
    })
    await expect(run(['validate', '-h'])).resolves.toEqual({
      code: 0,
      stdout: helpText('validate'),
    })
  })

  it('prints the package version', async () => {
    await expect(run(['-V'])).resolves.toEqual({
      code: 0,
      stdout: 'invenio-deposit v0.1.0\n',
    })
  })

  it('fails on an unknown command', async () => {
    const { code } = await run(['publish'])
    expect(code).toBe(1)
    expect(errors).toEqual([
      '❌ Error [UNKNOWN_COMMAND]: Unknown command: publish. Available commands: validate, template, dump, upload\n\nRun `invenio-deposit help` for usage information.',
    ])
  })

  it.each(['toString', 'hasOwnProperty', 'constructor'])(
    'treats the object method name %s as an unknown command',
    async (name) => {
      await expect(run([name])).resolves.toEqual({ code: 1, stdout: '' })
      expect(errors).toEqual([
        `❌ Error [UNKNOWN_COMMAND]: Unknown command: ${name}. Available commands: validate, template, dump, upload\n\nRun \`invenio-deposit help\` for usage information.`,
      ])
    },
  )
})

describe('validate', () => {
  it('prints the document with defaults applied', async () => {
    const { code, stdout } = await run(['validate', TEMPLATE_PATH])
    expect(code).toBe(0)
    expect(JSON.parse(stdout)).toEqual(
      await validateMetadata({ kind: 'file', path: TEMPLATE_PATH }),
    )
  })

  it('reads a file with an explicit format', async () => {
    const file = path.join(workdir, 'record.txt')
    await writeFile(file, await readFile(TEMPLATE_PATH, 'utf8'))
    const { code } = await run(['validate', file, '-f', 'yaml'])
    expect(code).toBe(0)
  })

  it('reports validation failures with exit code 1', async () => {
    const file = path.join(workdir, 'record.yaml')
    const template = await readFile(TEMPLATE_PATH, 'utf8')
    await writeFile(file, template.replace('version: v1.0.0', 'version: 3'))

    const { code, stdout } = await run(['validate', file])

    expect(code).toBe(1)
    expect(stdout).toBe('')
    expect(errors).toEqual([
      '❌ Error: Metadata failed validation:\n  metadata.version: Expected string, received number',
    ])
  })

  it('requires a file argument', async () => {
    const { code } = await run(['validate'])
    expect(code).toBe(1)
    expect(errors).toEqual([
      '❌ Error [MISSING_ARGUMENT]: File path is required. Usage: invenio-deposit validate <file> [-f json|yaml] [-S schema]\n\nRun `invenio-deposit help` for usage information.',
    ])
  })

  it('rejects unknown schemas, formats and flags', async () => {
    await expect(run(['validate', TEMPLATE_PATH, '-S', 'other'])).resolves.toMatchObject({
      code: 1,
    })
    await expect(run(['validate', TEMPLATE_PATH, '-f', 'xml'])).resolves.toMatchObject({
      code: 1,
    })
    await expect(run(['validate', TEMPLATE_PATH, '--nope'])).resolves.toMatchObject({
      code: 1,
    })
    expect(errors[0]).toBe(
      '❌ Error [INVALID_ARGUMENT]: --schema must be one of base, default, got other\n\nRun `invenio-deposit help` for usage information.',
    )
    expect(errors[1]).toBe(
      '❌ Error [INVALID_ARGUMENT]: --format must be one of json, yaml, got xml\n\nRun `invenio-deposit help` for usage information.',
    )
    expect(errors[2]).toMatch(/^❌ Error \[INVALID_ARGUMENT\]: /)
  })
})

describe('template', () => {
  it('writes the template in the format of the file name', async () => {
    const file = path.join(workdir, 'record.json')
    await expect(run(['template', file])).resolves.toEqual({ code: 0, stdout: '' })
    expect(JSON.parse(await readFile(file, 'utf8'))).toEqual(
      await validateMetadata({ kind: 'file', path: TEMPLATE_PATH }),
    )
  })

  it('answers to dump as well', async () => {
    const file = path.join(workdir, 'record.out')
    await expect(run(['dump', file, '--format', 'yaml'])).resolves.toMatchObject({ code: 0 })
    await expect(validateMetadata({ kind: 'file', path: file, format: 'yaml' })).resolves.toEqual(
      await validateMetadata({ kind: 'file', path: TEMPLATE_PATH }),
    )
  })
})

describe('upload', () => {
  let server: FakeInvenio
  let metadataPath: string

  beforeEach(async () => {
    server = new FakeInvenio()
    server.addCommunity('hydrology', '0b6c3a7e-9f51-4c1d-8e2a-5d4f3c2b1a09')
    metadataPath = path.join(workdir, 'metadata.yml')
    await writeFile(metadataPath, await readFile(TEMPLATE_PATH, 'utf8'))
  })

  it('uploads a record and prints the draft id', async () => {
    const data = path.join(workdir, 'data.csv')
    await writeFile(data, 'a,b\n')

    const result = await run(
      [
        'upload',
        '--api-url',
        server.origin,
        '--api-key',
        'test-secret',
        '--metadata-path',
        metadataPath,
        '--community',
        'hydrology',
        data,
      ],
      ENV,
      server,
    )

    expect(result).toEqual({
      code: 0,
      stdout: '{\n  "draft_id": "rec1",\n  "submitted": true\n}\n',
    })
    expect([...(server.records.get('rec1')?.files.keys() ?? [])]).toEqual(['data.csv'])
  })

  it('takes the URL and key from the environment', async () => {
    const result = await run(
      ['upload', '--metadata-path', metadataPath, '--zenodo'],
      { ...ENV, INVENIO_API_URL: server.origin, INVENIO_API_KEY: 'test-secret' },
      server,
    )

    expect(result).toEqual({
      code: 0,
      stdout: '{\n  "draft_id": "1",\n  "submitted": false\n}\n',
    })
    expect(server.calls()[0]).toBe('POST /api/deposit/depositions')
  })

  it('names the missing setting', async () => {
    const { code } = await run(
      ['upload', '--api-url', server.origin, '--metadata-path', metadataPath],
      ENV,
      server,
    )
    expect(code).toBe(1)
    expect(errors).toEqual([
      '❌ Error [MISSING_ARGUMENT]: --api-key is required (or set INVENIO_API_KEY)\n\nRun `invenio-deposit help` for usage information.',
    ])
    expect(server.requests).toHaveLength(0)
  })

  it('reports the failed request', async () => {
    server.failNext('POST', /^\/api\/records$/, 403, 'Permission denied')
    const { code } = await run(
      [
        'upload',
        '--api-url',
        server.origin,
        '--api-key',
        'test-secret',
        '--metadata-path',
        metadataPath,
      ],
      ENV,
      server,
    )
    expect(code).toBe(1)
    expect(errors).toEqual(['❌ Error: Error while creating record, info: Permission denied'])
  })
})
