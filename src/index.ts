export { InvenioRepository, normalizeApiUrl } from './repository'
export type { RepositoryOptions } from './repository'
export { RecordCollection, DraftHandle, RecordHandle } from './records'
export { FileSet, FileHandle, prepareDestination } from './files'
export type { FileOwner } from './files'
export { Licenses } from './licenses'
export { Handle } from './handle'
export type { UrlScoped } from './handle'
export { DIALECTS } from './dialect'
export type { DialectStrategy } from './dialect'
export { checkResponse, ensureOk, defaultFetch, withQuery } from './http'
export type { FetchFn, Transport } from './http'
export * from './errors'
export * from './types'
export {
  SCHEMAS,
  getSchema,
  validateDocument,
  BaseSchema,
  IdentifierSchema,
  CreatorSchema,
} from './schemas'
export type {
  MetadataSchema,
  MetadataDocument,
  Identifier,
  Creator,
} from './schemas'
export {
  validateMetadata,
  loadMetadata,
  dumpTemplate,
  TEMPLATE_PATH,
} from './metadata'
export type { MetadataSource } from './metadata'
export {
  SUPPORTED_FORMATS,
  getDumper,
  getLoader,
  getStringLoader,
  inferFormat,
  isFormat,
} from './formats'
export type { Format, Dumper, Loader, StringLoader } from './formats'
export { runRecordUpload, createFilesDict } from './upload'
export type { RecordUploadOptions, RecordUploadResult } from './upload'
export { loadConfig, DEFAULT_TIMEOUT } from './config'
export type { Config } from './config'
export { setLogLevel } from './logger'
export type { LogLevel } from './logger'
export { runCli } from './cli'
