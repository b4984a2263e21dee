import { parseBookId } from '../../catalog/validation.js';
import { formatBook } from '../format.js';
import { invalidArgument } from '../errors.js';
import { printJson, withCatalog, type CommandOptions } from './session.js';

export async function removeCommand(options: CommandOptions): Promise<void> {
  const [idText] = options.args;
  if (idText === undefined || options.args.length !== 1) {
    throw invalidArgument('remove expects exactly <id>', { args: options.args });
  }

  await withCatalog(options, async (catalog) => {
    const id = parseBookId(idText);
    if (!id.ok) {
      await catalog.reject(id.error);
      throw id.error;
    }
    const result = await catalog.remove(id.value);
    if (!result.ok) throw result.error;
    if (options.json) {
      printJson(result.value);
    } else {
      console.log(`Book removed: ${formatBook(result.value)}`);
    }
  });
}
