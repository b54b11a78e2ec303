import { parseArgs } from 'util'
import { getDumper } from '../../formats'
import { runRecordUpload } from '../../upload'
import { parseFormat, parseMilliseconds, type CommandContext } from '../args'
import { CliError } from '../errors'

function required(
  value: string | undefined,
  flag: string,
  env?: string,
): string {
  if (value === undefined || value === '') {
    const hint = env === undefined ? '' : ` (or set ${env})`
    throw new CliError(`${flag} is required${hint}`, 'MISSING_ARGUMENT')
  }
  return value
}

export async function uploadCommand(context: CommandContext): Promise<void> {
  const { values, positionals } = parseArgs({
    args: context.args,
    options: {
      'api-url': { type: 'string' },
      'api-key': { type: 'string' },
      'metadata-path': { type: 'string' },
      'metadata-format': { type: 'string', short: 'f' },
      files: { type: 'string', multiple: true },
      community: { type: 'string' },
      zenodo: { type: 'boolean' },
      timeout: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  })

  const { config } = context
  const result = await runRecordUpload({
    apiUrl: required(values['api-url'] ?? config.apiUrl, '--api-url', 'INVENIO_API_URL'),
    apiKey: required(values['api-key'] ?? config.apiKey, '--api-key', 'INVENIO_API_KEY'),
    metadataPath: required(values['metadata-path'], '--metadata-path'),
    metadataFormat:
      parseFormat(values['metadata-format'], '--metadata-format') ?? 'yaml',
    files: [...(values.files ?? []), ...positionals],
    community: values.community,
    dialect: values.zenodo ? 'zenodo-deposition' : config.dialect,
    timeout:
      values.timeout !== undefined
        ? parseMilliseconds(values.timeout, '--timeout')
        : config.timeout,
    fetch: context.fetch,
  })

  await getDumper('json')(
    { draft_id: result.draftId, submitted: result.submitted },
    context.stdout,
  )
}
