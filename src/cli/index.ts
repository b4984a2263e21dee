#!/usr/bin/env node
/**
 * @fileoverview catalog-keeper CLI
 *
 * Commands:
 *   catalog-keeper [menu]                      - Interactive menu
 *   catalog-keeper add <title> <author> <year> - Add a book
 *   catalog-keeper remove <id>                 - Remove a book
 *   catalog-keeper search <field> <query>      - Search books
 *   catalog-keeper list                        - List all books
 *   catalog-keeper set-status <id> <status>    - Change a book's status
 *   catalog-keeper errors                      - Show the error log
 *
 * @packageDocumentation
 */

import { outputStructuredError, runCli } from './run.js';
import { classifyError, getExitCode } from './errors.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    const envelope = classifyError(error);
    outputStructuredError(envelope, process.argv.includes('--json'));
    process.exitCode = getExitCode(envelope);
  });
