/**
 * @fileoverview Whole-file JSON record store
 *
 * Each store owns one file holding an ordered JSON array. The array is read
 * in full on load and rewritten in full on every save.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { z } from 'zod';
import { StorageError, getErrorMessage, toError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';

export const JSON_INDENT = 4;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonRecordStore<T> {
  constructor(
    readonly filePath: string,
    private readonly schema: z.ZodType<T[], z.ZodTypeDef, unknown>,
    readonly label: string,
  ) {}

  /**
   * Read every record. A missing file is an empty list; anything unreadable
   * or malformed is an error the caller can fall back from.
   */
  async load(): Promise<Result<T[], StorageError>> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        logDebug(`[store] No ${this.label} file yet`, { path: this.filePath });
        return Ok([]);
      }
      return Err(new StorageError('read', this.filePath, getErrorMessage(error), toError(error)));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      return Err(new StorageError('read', this.filePath, `invalid JSON (${getErrorMessage(error)})`, toError(error)));
    }

    const validated = this.schema.safeParse(parsed);
    if (!validated.success) {
      const details = validated.error.errors.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
      return Err(new StorageError('read', this.filePath, `invalid ${this.label} records (${details.join('; ')})`));
    }

    logDebug(`[store] Loaded ${validated.data.length} ${this.label} record(s)`, { path: this.filePath });
    return Ok(validated.data);
  }

  async save(records: readonly T[]): Promise<Result<void, StorageError>> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, `${JSON.stringify(records, null, JSON_INDENT)}\n`, 'utf8');
      return Ok(undefined);
    } catch (error) {
      return Err(new StorageError('write', this.filePath, getErrorMessage(error), toError(error)));
    }
  }
}
