import { Catalog } from '../../catalog/catalog.js';
import type { Clock } from '../../catalog/error_log.js';
import type { CatalogConfig } from '../../config/index.js';

export interface CommandOptions {
  config: CatalogConfig;
  args: string[];
  json?: boolean;
  /** Test hook for timestamps and year validation. */
  now?: Clock;
}

/**
 * Open the catalog for one command and always release the session lock.
 */
export async function withCatalog<T>(options: CommandOptions, fn: (catalog: Catalog) => Promise<T>): Promise<T> {
  const catalog = await Catalog.open({
    dataFile: options.config.dataFile,
    errorLogFile: options.config.errorLogFile,
    now: options.now,
  });
  try {
    return await fn(catalog);
  } finally {
    await catalog.close();
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
