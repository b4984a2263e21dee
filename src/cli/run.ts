/**
 * @fileoverview Argument parsing and dispatch for the catalog-keeper CLI
 */

import { parseArgs } from 'node:util';
import { resolveCatalogConfig } from '../config/index.js';
import { getErrorMessage } from '../core/errors.js';
import { setLogLevel } from '../telemetry/logger.js';
import { showHelp } from './help.js';
import { addCommand } from './commands/add.js';
import { errorLogCommand } from './commands/error_log.js';
import { listCommand } from './commands/list.js';
import { menuCommand } from './commands/menu.js';
import { removeCommand } from './commands/remove.js';
import { searchCommand } from './commands/search.js';
import { setStatusCommand } from './commands/set_status.js';
import type { CommandOptions } from './commands/session.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';

type Command = 'menu' | 'add' | 'remove' | 'search' | 'list' | 'set-status' | 'errors' | 'help';

const COMMANDS: Record<Exclude<Command, 'help'>, (options: CommandOptions) => Promise<void>> = {
  'menu': menuCommand,
  'add': addCommand,
  'remove': removeCommand,
  'search': searchCommand,
  'list': listCommand,
  'set-status': setStatusCommand,
  'errors': errorLogCommand,
};

function isRunnableCommand(value: string): value is Exclude<Command, 'help'> {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

/**
 * Output a structured error on stderr
 */
export function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  if (useJson) {
    console.error(formatErrorJson(envelope));
  } else {
    console.error(formatErrorWithHints(envelope));
  }
}

function parseCliArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      workspace: { type: 'string', short: 'w' },
      data: { type: 'string' },
      'error-log': { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

/**
 * Run one CLI invocation and return its exit code. Errors are printed on
 * stderr as envelopes, never thrown.
 */
export async function runCli(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const jsonMode = args.includes('--json');

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(args);
  } catch (error) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', getErrorMessage(error));
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }
  const { values, positionals } = parsed;

  if (values.version) {
    const { CATALOG_VERSION } = await import('../index.js');
    console.log(`catalog-keeper ${CATALOG_VERSION.string}`);
    return 0;
  }

  const command = positionals[0] ?? 'menu';
  const commandArgs = positionals.slice(1);

  if (values.help || command === 'help') {
    showHelp(command === 'help' ? commandArgs[0] : positionals[0]);
    return 0;
  }

  if (!isRunnableCommand(command)) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', `Unknown command: ${command}`, {
      recoveryHints: [
        `Run 'catalog-keeper help' for usage information`,
        `Available commands: ${Object.keys(COMMANDS).join(', ')}`,
      ],
      context: { command },
    });
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }

  try {
    const config = resolveCatalogConfig(
      {
        workspace: values.workspace,
        dataFile: values.data,
        errorLogFile: values['error-log'],
      },
      env,
    );
    setLogLevel(config.logLevel);

    await COMMANDS[command]({ config, args: commandArgs, json: values.json });
    return 0;
  } catch (error) {
    const envelope = classifyError(error);
    if (envelope.context) {
      envelope.context.command = command;
    }
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }
}
