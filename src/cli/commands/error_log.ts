import { formatErrorEntry } from '../format.js';
import { printJson, withCatalog, type CommandOptions } from './session.js';

/**
 * Show what the catalog has written to its error log.
 */
export async function errorLogCommand(options: CommandOptions): Promise<void> {
  await withCatalog(options, async (catalog) => {
    const entries = catalog.errorEntries();
    if (options.json) {
      printJson(entries);
      return;
    }
    if (entries.length === 0) {
      console.log('No errors logged.');
      return;
    }
    for (const entry of entries) {
      console.log(formatErrorEntry(entry));
    }
  });
}
