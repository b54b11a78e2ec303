import { readFile } from 'fs/promises'
import path from 'path'
import type { Writable } from 'stream'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { UnrecognizedExtensionError, UnsupportedFormatError } from './errors'

export const SUPPORTED_FORMATS = ['json', 'yaml'] as const

export type Format = (typeof SUPPORTED_FORMATS)[number]

export type Dumper = (data: unknown, out: Writable) => Promise<void>
export type Loader = (filePath: string) => Promise<unknown>
export type StringLoader = (text: string) => unknown

type Codec = {
  serialize: (data: unknown) => string
  parse: (text: string) => unknown
}

const CODECS: Record<Format, Codec> = {
  json: {
    serialize: (data) => `${JSON.stringify(data, null, 2)}\n`,
    parse: (text) => {
      const data: unknown = JSON.parse(text)
      return data
    },
  },
  yaml: {
    serialize: (data) => stringifyYaml(data),
    parse: (text) => {
      const data: unknown = parseYaml(text)
      return data
    },
  },
}

const EXTENSIONS: Partial<Record<string, Format>> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
}

export function isFormat(value: string): value is Format {
  return SUPPORTED_FORMATS.some((format) => format === value)
}

function codec(format: string): Codec {
  if (!isFormat(format)) {
    throw new UnsupportedFormatError(format, SUPPORTED_FORMATS)
  }
  return CODECS[format]
}

function writeTo(out: Writable, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    out.write(text, (error) => (error ? reject(error) : resolve()))
  })
}

export function getDumper(format: string): Dumper {
  const { serialize } = codec(format)
  return (data, out) => writeTo(out, serialize(data))
}

export function getLoader(format: string): Loader {
  const { parse } = codec(format)
  return async (filePath) => parse(await readFile(filePath, 'utf8'))
}

export function getStringLoader(format: string): StringLoader {
  return codec(format).parse
}

export function serialize(data: unknown, format: string): string {
  return codec(format).serialize(data)
}

/**
 * Picks the format from the file extension: `.json` is json, `.yaml` and
 * `.yml` are yaml. Anything else throws, or gives null with
 * `{ strict: false }`.
 */
export function inferFormat(filePath: string, options?: { strict?: true }): Format
export function inferFormat(
  filePath: string,
  options: { strict: false },
): Format | null
export function inferFormat(
  filePath: string,
  options: { strict?: boolean } = {},
): Format | null {
  const format = EXTENSIONS[path.extname(filePath).toLowerCase()]
  if (format !== undefined) return format
  if (options.strict === false) return null
  throw new UnrecognizedExtensionError(filePath)
}
