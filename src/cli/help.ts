/**
 * @fileoverview Detailed help text for catalog-keeper commands
 */

const HELP_TEXT = {
  main: `
catalog-keeper - Library catalog manager for the terminal

USAGE:
    catalog-keeper [command] [options]

COMMANDS:
    menu                          Interactive menu (default when no command is given)
    add <title> <author> <year>   Add a book
    remove <id>                   Remove a book
    search <field> <query>        Search by title, author or year
    list                          List all books
    set-status <id> <status>      Mark a book available or checked_out
    errors                        Show the error log
    help [command]                Show help for a command

GLOBAL OPTIONS:
    -h, --help              Show help information
    -v, --version           Show version information
    -w, --workspace <dir>   Directory holding the catalog files (default: current directory)
    --data <file>           Book file (default: library.json)
    --error-log <file>      Error log file (default: error_log.json)
    --json                  Print results and errors as JSON

ENVIRONMENT:
    CATALOG_DATA_FILE       Book file when --data is not given
    CATALOG_ERROR_LOG       Error log file when --error-log is not given
    CATALOG_LOG_LEVEL       debug | info | warn | error | silent (default: info)

EXAMPLES:
    catalog-keeper
    catalog-keeper add "1984" "George Orwell" 1949
    catalog-keeper search title dune
    catalog-keeper set-status 1 checked_out
`,

  menu: `
catalog-keeper menu - Interactive menu

USAGE:
    catalog-keeper menu [options]

DESCRIPTION:
    Shows a numbered menu and runs the chosen operation. Type "back" at the
    first prompt of an action (title, book id or search field) to return to
    the menu; later prompts take "back" as text. Choose 0 or close input to
    exit. A book titled "back" has to be added with "catalog-keeper add".
`,

  add: `
catalog-keeper add - Add a book

USAGE:
    catalog-keeper add <title> <author> <year> [--json]

DESCRIPTION:
    The new book gets the next free id and status "available". The year must
    be digits between 1000 and the current year.
`,

  remove: `
catalog-keeper remove - Remove a book

USAGE:
    catalog-keeper remove <id> [--json]
`,

  search: `
catalog-keeper search - Search books

USAGE:
    catalog-keeper search <title|author|year> <query> [--json]

DESCRIPTION:
    Case-insensitive substring match on the chosen field.
`,

  list: `
catalog-keeper list - List all books in the order they were added

USAGE:
    catalog-keeper list [--json]
`,

  'set-status': `
catalog-keeper set-status - Change a book's status

USAGE:
    catalog-keeper set-status <id> <available|checked_out> [--json]
`,

  errors: `
catalog-keeper errors - Show the error log

USAGE:
    catalog-keeper errors [--json]

DESCRIPTION:
    Every rejected operation and storage failure is appended to the error log
    with a timestamp.
`,
} as const;

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  if (command) {
    return `Unknown command: ${command}\n${HELP_TEXT.main}`;
  }
  return HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}
