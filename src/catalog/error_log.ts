/**
 * @fileoverview Persistent error log
 *
 * Append-only list of `{ timestamp, error }` entries. Each append rewrites the
 * whole file. Failing to persist the log is reported to telemetry and never
 * thrown, so logging an error cannot itself fail an operation.
 */

import { getErrorMessage } from '../core/errors.js';
import { ErrorEntryListSchema } from '../storage/schema.js';
import { JsonRecordStore } from '../storage/json_store.js';
import { logError, logWarning } from '../telemetry/logger.js';
import type { ErrorEntry } from '../types.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export class ErrorLog {
  private constructor(
    private readonly store: JsonRecordStore<ErrorEntry>,
    private readonly list: ErrorEntry[],
    private readonly now: Clock,
  ) {}

  static async open(filePath: string, now: Clock = systemClock): Promise<ErrorLog> {
    const store = new JsonRecordStore(filePath, ErrorEntryListSchema, 'error log');
    const loaded = await store.load();
    if (loaded.ok) {
      return new ErrorLog(store, loaded.value, now);
    }
    logWarning('[error-log] Existing error log unreadable; starting a new one', {
      path: filePath,
      error: loaded.error.message,
    });
    const log = new ErrorLog(store, [], now);
    await log.log(`Failed to load error log: ${loaded.error.message}`);
    return log;
  }

  get filePath(): string {
    return this.store.filePath;
  }

  async log(message: string): Promise<ErrorEntry> {
    const entry: ErrorEntry = { timestamp: this.now().toISOString(), error: message };
    this.list.push(entry);
    const saved = await this.store.save(this.list);
    if (!saved.ok) {
      logError('[error-log] Failed to persist error log', {
        path: this.store.filePath,
        error: saved.error.message,
        entry: message,
      });
    }
    return { ...entry };
  }

  async record(error: unknown): Promise<ErrorEntry> {
    return this.log(getErrorMessage(error));
  }

  entries(): ErrorEntry[] {
    return this.list.map((entry) => ({ ...entry }));
  }
}
