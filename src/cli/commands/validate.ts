import { parseArgs } from 'util'
import { getDumper } from '../../formats'
import { logInfo } from '../../logger'
import { validateMetadata } from '../../metadata'
import { isSchemaName, SCHEMAS } from '../../schemas'
import { parseFormat, requirePositional, type CommandContext } from '../args'
import { CliError } from '../errors'

export async function validateCommand(context: CommandContext): Promise<void> {
  const { values, positionals } = parseArgs({
    args: context.args,
    options: {
      format: { type: 'string', short: 'f' },
      schema: { type: 'string', short: 'S' },
    },
    allowPositionals: true,
    strict: true,
  })

  const file = requirePositional(
    positionals,
    'invenio-deposit validate <file> [-f json|yaml] [-S schema]',
  )
  const schema = values.schema ?? 'default'
  if (!isSchemaName(schema)) {
    throw new CliError(
      `--schema must be one of ${Object.keys(SCHEMAS).join(', ')}, got ${schema}`,
      'INVALID_ARGUMENT',
    )
  }

  const document = await validateMetadata(
    { kind: 'file', path: file, format: parseFormat(values.format, '--format') },
    schema,
  )
  await getDumper('json')(document, context.stdout)
  logInfo(`✅ ${file} is valid`)
}
