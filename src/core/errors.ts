/**
 * @fileoverview Catalog error hierarchy
 *
 * Every failure an operation can report is one of these. Operations return
 * them inside a Result; the CLI turns them into error envelopes.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

export type CatalogErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_STATUS'
  | 'VALIDATION_ERROR'
  | 'STORAGE_ERROR';

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class CatalogError extends Error {
  abstract readonly code: CatalogErrorCode;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// LOOKUP ERRORS
// ============================================================================

export class NotFoundError extends CatalogError {
  readonly code = 'NOT_FOUND';

  constructor(readonly bookId: number) {
    super(`Book with id ${bookId} not found`);
    this.name = 'NotFoundError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { bookId: this.bookId } };
  }
}

// ============================================================================
// INPUT ERRORS
// ============================================================================

export class InvalidStatusError extends CatalogError {
  readonly code = 'INVALID_STATUS';

  constructor(
    readonly status: string,
    readonly allowed: readonly string[],
  ) {
    super(`Invalid status "${status}". Allowed values: ${allowed.join(', ')}`);
    this.name = 'InvalidStatusError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { status: this.status, allowed: [...this.allowed] } };
  }
}

export class ValidationError extends CatalogError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { field: this.field } };
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'read' | 'write' | 'lock';

export class StorageError extends CatalogError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly filePath: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} failed for ${filePath}: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        filePath: this.filePath,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
