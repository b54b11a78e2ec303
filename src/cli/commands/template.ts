import { parseArgs } from 'util'
import { dumpTemplate } from '../../metadata'
import { parseFormat, requirePositional, type CommandContext } from '../args'

export async function templateCommand(context: CommandContext): Promise<void> {
  const { values, positionals } = parseArgs({
    args: context.args,
    options: {
      format: { type: 'string', short: 'f' },
    },
    allowPositionals: true,
    strict: true,
  })

  const file = requirePositional(
    positionals,
    'invenio-deposit template <file> [-f json|yaml]',
  )
  await dumpTemplate(file, parseFormat(values.format, '--format'))
}
