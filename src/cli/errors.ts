/**
 * @fileoverview CLI error envelopes
 *
 * Every failure that reaches the command line is turned into an
 * ErrorEnvelope: a machine-readable code, a message, recovery hints and an
 * exit code. `--json` prints the envelope as JSON; otherwise it is rendered
 * as text with the hints underneath.
 */

import { CatalogError, StorageError, getErrorMessage } from '../core/errors.js';

export const ErrorCodes = {
  ENOT_FOUND: 'No book has the given id',
  EINVALID_STATUS: 'Status is not one of the allowed values',
  EINVALID_INPUT: 'A book field or id failed validation',
  ESTORAGE: 'A catalog file could not be read or written',
  ESTORAGE_LOCKED: 'Another session holds the catalog lock',
  EINVALID_ARGUMENT: 'The command line could not be understood',
  EUNKNOWN: 'Unexpected failure',
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export interface ErrorEnvelope {
  code: string;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

export const ErrorMetadata: Record<ErrorCode, { retryable: boolean; recoveryHints: string[] }> = {
  ENOT_FOUND: {
    retryable: false,
    recoveryHints: ['Run `catalog-keeper list` to see the ids in use'],
  },
  EINVALID_STATUS: {
    retryable: false,
    recoveryHints: ['Use `available` or `checked_out`'],
  },
  EINVALID_INPUT: {
    retryable: false,
    recoveryHints: ['Check the value and try again', 'Years are digits between 1000 and the current year'],
  },
  ESTORAGE: {
    retryable: true,
    recoveryHints: ['Check that the catalog directory is writable', 'Run `catalog-keeper errors` to see logged failures'],
  },
  ESTORAGE_LOCKED: {
    retryable: true,
    recoveryHints: ['Close the other catalog-keeper session and retry', 'Remove a stale `.lock` directory if no session is running'],
  },
  EINVALID_ARGUMENT: {
    retryable: false,
    recoveryHints: ["Run 'catalog-keeper help <command>' for usage information"],
  },
  EUNKNOWN: {
    retryable: false,
    recoveryHints: ['Re-run with CATALOG_LOG_LEVEL=debug for details'],
  },
};

export const ExitCodes: Record<ErrorCode, number> = {
  ENOT_FOUND: 10,
  EINVALID_STATUS: 11,
  EINVALID_INPUT: 12,
  ESTORAGE: 20,
  ESTORAGE_LOCKED: 21,
  EINVALID_ARGUMENT: 50,
  EUNKNOWN: 1,
};

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code);
}

export class CliError extends Error {
  constructor(
    message: string,
    public readonly errorCode: ErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }

  toEnvelope(): ErrorEnvelope {
    return createErrorEnvelope(this.errorCode, this.message, { context: this.details });
  }
}

export function invalidArgument(message: string, details?: Record<string, unknown>): CliError {
  return new CliError(message, 'EINVALID_ARGUMENT', details);
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  overrides: Partial<Pick<ErrorEnvelope, 'retryable' | 'recoveryHints' | 'context'>> = {},
): ErrorEnvelope {
  const metadata = ErrorMetadata[code];
  return {
    code,
    message,
    retryable: overrides.retryable ?? metadata.retryable,
    recoveryHints: overrides.recoveryHints ?? [...metadata.recoveryHints],
    context: { ...overrides.context, timestamp: new Date().toISOString() },
  };
}

export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string' &&
    'retryable' in value &&
    typeof value.retryable === 'boolean' &&
    'recoveryHints' in value &&
    Array.isArray(value.recoveryHints)
  );
}

function codeForCatalogError(error: CatalogError): ErrorCode {
  switch (error.code) {
    case 'NOT_FOUND':
      return 'ENOT_FOUND';
    case 'INVALID_STATUS':
      return 'EINVALID_STATUS';
    case 'VALIDATION_ERROR':
      return 'EINVALID_INPUT';
    case 'STORAGE_ERROR':
      return error instanceof StorageError && error.operation === 'lock' ? 'ESTORAGE_LOCKED' : 'ESTORAGE';
  }
}

/**
 * Turn anything thrown into an envelope.
 */
export function classifyError(error: unknown): ErrorEnvelope {
  if (isErrorEnvelope(error)) {
    return error;
  }
  if (error instanceof CliError) {
    return error.toEnvelope();
  }
  if (error instanceof CatalogError) {
    const details = error.toJSON().details;
    return createErrorEnvelope(codeForCatalogError(error), error.message, { context: details });
  }
  const message = getErrorMessage(error);
  if (error instanceof Error && 'code' in error && (error.code === 'EACCES' || error.code === 'ENOENT')) {
    return createErrorEnvelope('ESTORAGE', message);
  }
  return createErrorEnvelope('EUNKNOWN', error instanceof Error ? message : String(error));
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return isErrorCode(envelope.code) ? ExitCodes[envelope.code] : 1;
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.recoveryHints.length > 0) {
    lines.push('', 'Recovery suggestions:');
    for (const hint of envelope.recoveryHints) {
      lines.push(`  - ${hint}`);
    }
  }
  if (envelope.retryable) {
    lines.push('', 'This error is retryable.');
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
