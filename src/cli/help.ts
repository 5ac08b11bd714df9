/**
 * @fileoverview Detailed help text for policy-qa CLI commands
 */

const HELP_TEXT = {
  main: `
policy-qa - Ask questions about company policy documents

USAGE:
    policy-qa <command> [options]

COMMANDS:
    ask "<question>"        Answer a question, continuing or starting a session
    sessions                List conversation sessions, most recent first
    history <sessionId>     Show the turns of a session
    delete <sessionId>      Delete a session and all of its turns
    import-index <file>     Import a vector export into the chunk store
    check-providers         Show provider and storage configuration status
    help [command]          Show help for a command

GLOBAL OPTIONS:
    -h, --help              Show help information
    -v, --version           Show version information
    -c, --config <file>     Read settings from a YAML file (or POLICY_QA_CONFIG)
    --json                  Print machine-readable output and errors

ENVIRONMENT:
    AZURE_OPENAI_API_KEY, AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_API_VERSION
    AZURE_OPENAI_CHAT_DEPLOYMENT, AZURE_OPENAI_EMBEDDING_DEPLOYMENT
    AIRTABLE_API_KEY, AIRTABLE_BASE_ID, AIRTABLE_TABLE_NAME
    POLICY_QA_PRIMARY_STORE     sqlite | airtable | none (default: sqlite)
    POLICY_QA_SESSION_DB        SQLite session database (default: .state/sessions.db)
    POLICY_QA_INDEX_DB          Chunk store (default: .state/index.db)
    POLICY_QA_INDEX_EXPORT      Load the index from an export file instead
    POLICY_QA_LOG_LEVEL         debug | info | warn | error | silent

EXAMPLES:
    policy-qa import-index ./policy_export.json
    policy-qa ask "What is the vacation policy?"
    policy-qa ask "What about interns?" --session 3f2c9a
    policy-qa sessions --json

For more information on a specific command, run:
    policy-qa help <command>
`,

  ask: `
policy-qa ask - Answer a question about company policy

USAGE:
    policy-qa ask "<question>" [options]

OPTIONS:
    -s, --session <id>  Continue an existing session
    --new               Start a new session even if --session is given
    --json              Print the full result as JSON

DESCRIPTION:
    Retrieves the most relevant policy passages, answers with the last two
    question/answer pairs of the session as context, and stores the turn pair.
    The session id is printed so follow-up questions can continue it.

EXAMPLES:
    policy-qa ask "How many vacation days do employees get?"
    policy-qa ask "Does that apply to part-time staff?" --session 3f2c9a
`,

  sessions: `
policy-qa sessions - List conversation sessions

USAGE:
    policy-qa sessions [--json]

DESCRIPTION:
    Lists sessions from the primary and the local store with the first
    question as a preview and the time of the last activity.
`,

  history: `
policy-qa history - Show the turns of a session

USAGE:
    policy-qa history <sessionId> [--json]
`,

  delete: `
policy-qa delete - Delete a session

USAGE:
    policy-qa delete <sessionId> [--json]

DESCRIPTION:
    Removes every turn of the session from both stores. Deleting a session
    that does not exist is reported but is not an error.
`,

  'import-index': `
policy-qa import-index - Import a vector export into the chunk store

USAGE:
    policy-qa import-index <export.json> [--db <path>] [--replace]

OPTIONS:
    --db <path>         Chunk store to write (default: POLICY_QA_INDEX_DB or .state/index.db)
    --replace           Remove existing chunks before importing

DESCRIPTION:
    The export is a JSON object with parallel "vectors", "metadatas" and
    "texts" arrays; each metadata entry may carry "page" and "source".
    Chunks are written in batches of 100.
`,

  'check-providers': `
policy-qa check-providers - Show provider and storage configuration status

USAGE:
    policy-qa check-providers [--json]

DESCRIPTION:
    Reports which of the generation provider, embedding provider, vector index
    and primary session store are configured. No external service is called.
`,
} as const;

export type HelpTopic = keyof typeof HELP_TEXT;

export function isHelpTopic(value: string): value is HelpTopic {
  return Object.hasOwn(HELP_TEXT, value);
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) return HELP_TEXT[command];
  return HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}
