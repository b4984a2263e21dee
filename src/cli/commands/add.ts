import { formatBook } from '../format.js';
import { invalidArgument } from '../errors.js';
import { printJson, withCatalog, type CommandOptions } from './session.js';

export async function addCommand(options: CommandOptions): Promise<void> {
  const [title, author, year, ...extra] = options.args;
  if (title === undefined || author === undefined || year === undefined || extra.length > 0) {
    throw invalidArgument('add expects exactly <title> <author> <year>', { args: options.args });
  }

  await withCatalog(options, async (catalog) => {
    const result = await catalog.add({ title, author, year });
    if (!result.ok) throw result.error;
    if (options.json) {
      printJson(result.value);
    } else {
      console.log(`Book added: ${formatBook(result.value)}`);
    }
  });
}
