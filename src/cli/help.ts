const HELP_TEXT = {
  main: `
invenio-deposit - deposit research-data records into Invenio repositories

USAGE:
    invenio-deposit <command> [options]

COMMANDS:
    validate <file>     Validate a metadata file and print it with defaults applied
    template <file>     Write a template metadata file (alias: dump)
    upload              Create a draft, attach metadata and files, submit for review
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -V, --version       Show version information
    --verbose           Log every request

ENVIRONMENT:
    INVENIO_API_URL     Default for upload --api-url
    INVENIO_API_KEY     Default for upload --api-key
    INVENIO_TIMEOUT_MS  Request timeout in milliseconds (0 disables, default 60000)
    INVENIO_DIALECT     invenio-draft (default) or zenodo-deposition
    LOG_LEVEL           debug, info, warn, error or silent
`,
  validate: `
USAGE:
    invenio-deposit validate <file> [-f json|yaml] [-S schema]

OPTIONS:
    -f, --format        Parse FILE as this type (default: determine from suffix)
    -S, --schema        Validate against this schema (default: default)
`,
  template: `
USAGE:
    invenio-deposit template <file> [-f json|yaml]

OPTIONS:
    -f, --format        Write FILE as this type (default: determine from suffix)
`,
  upload: `
USAGE:
    invenio-deposit upload --api-url URL --api-key KEY --metadata-path FILE
                           [-f json|yaml] [--files PATTERN ...] [--community SLUG]
                           [--zenodo] [--timeout MS]

OPTIONS:
    --api-url           Repository URL, e.g. https://inveniordm.example.org/api
    --api-key           Access token with deposit permissions
    --metadata-path     Metadata file for the record
    -f, --metadata-format
                        Parse the metadata file as this type (default: yaml)
    --files             File or glob to upload; repeat the flag or list the
                        paths after the options
    --community         Community slug to submit the draft to
    --zenodo            Use the legacy Zenodo deposition API
    --timeout           Request timeout in milliseconds (0 disables)
`,
}

export type HelpTopic = keyof typeof HELP_TEXT

export function isHelpTopic(value: string): value is HelpTopic {
  return Object.keys(HELP_TEXT).includes(value)
}

export function helpText(topic: HelpTopic = 'main'): string {
  return HELP_TEXT[topic]
}
