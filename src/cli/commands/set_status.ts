import { parseBookId } from '../../catalog/validation.js';
import { formatBook } from '../format.js';
import { invalidArgument } from '../errors.js';
import { printJson, withCatalog, type CommandOptions } from './session.js';

export async function setStatusCommand(options: CommandOptions): Promise<void> {
  const [idText, status] = options.args;
  if (idText === undefined || status === undefined || options.args.length !== 2) {
    throw invalidArgument('set-status expects <id> <available|checked_out>', { args: options.args });
  }

  await withCatalog(options, async (catalog) => {
    const id = parseBookId(idText);
    if (!id.ok) {
      await catalog.reject(id.error);
      throw id.error;
    }
    const result = await catalog.updateStatus(id.value, status);
    if (!result.ok) throw result.error;
    if (options.json) {
      printJson(result.value);
    } else {
      console.log(`Status updated: ${formatBook(result.value)}`);
    }
  });
}
