/**
 * @fileoverview Session lock on the catalog file
 *
 * One process owns a catalog at a time. The lock lives beside the data file
 * as `<file>.lock`; a second session fails instead of overwriting the first.
 * Once the lock is compromised (its directory removed or taken over), the
 * holder must stop writing.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import lockfile from 'proper-lockfile';
import { StorageError, getErrorMessage, toError } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';

const LOCK_STALE_TIMEOUT_MS = 30_000;
const LOCK_UPDATE_INTERVAL_MS = 10_000;

export type ReleaseLock = () => Promise<void>;

export interface SessionLock {
  release: ReleaseLock;
  /** The error that compromised the lock, or `null` while it is still held. */
  compromised(): Error | null;
}

export interface SessionLockOptions {
  /**
   * How often the lock's mtime is refreshed and checked. proper-lockfile
   * clamps this to at least one second.
   */
  updateIntervalMs?: number;
}

export function lockPathFor(filePath: string): string {
  return `${filePath}.lock`;
}

export async function acquireSessionLock(filePath: string, options: SessionLockOptions = {}): Promise<SessionLock> {
  const lockfilePath = lockPathFor(filePath);
  await fs.mkdir(path.dirname(lockfilePath), { recursive: true });

  let compromisedError: Error | null = null;
  let release: ReleaseLock;
  try {
    // The data file may not exist yet, so skip realpath resolution.
    release = await lockfile.lock(filePath, {
      lockfilePath,
      realpath: false,
      stale: LOCK_STALE_TIMEOUT_MS,
      update: options.updateIntervalMs ?? LOCK_UPDATE_INTERVAL_MS,
      retries: 0,
      onCompromised: (err) => {
        compromisedError = toError(err);
        logWarning('[lock] Catalog lock compromised; refusing further writes', {
          path: lockfilePath,
          error: compromisedError.message,
        });
      },
    });
  } catch (error) {
    throw new StorageError('lock', filePath, `catalog is locked by another session (${getErrorMessage(error)})`, toError(error));
  }
  logDebug('[lock] Acquired catalog lock', { path: lockfilePath });

  let released = false;
  return {
    compromised: () => compromisedError,
    release: async () => {
      if (released) return;
      released = true;
      // proper-lockfile already dropped a compromised lock; the directory may belong to someone else now.
      if (compromisedError) return;
      try {
        await release();
        logDebug('[lock] Released catalog lock', { path: lockfilePath });
      } catch (error) {
        logWarning('[lock] Failed to release catalog lock', { path: lockfilePath, error: getErrorMessage(error) });
      }
    },
  };
}
