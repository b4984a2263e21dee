import { parseSearchField } from '../../catalog/validation.js';
import { formatBookTable } from '../format.js';
import { invalidArgument } from '../errors.js';
import { printJson, withCatalog, type CommandOptions } from './session.js';

export async function searchCommand(options: CommandOptions): Promise<void> {
  const [fieldText, ...queryWords] = options.args;
  if (fieldText === undefined || queryWords.length === 0) {
    throw invalidArgument('search expects <title|author|year> <query>', { args: options.args });
  }
  const query = queryWords.join(' ');

  await withCatalog(options, async (catalog) => {
    const field = parseSearchField(fieldText);
    if (!field.ok) {
      await catalog.reject(field.error);
      throw field.error;
    }
    const matches = [...catalog.search(query, field.value)];
    if (options.json) {
      printJson(matches);
      return;
    }
    if (matches.length === 0) {
      console.log('No books match the query.');
      return;
    }
    for (const line of formatBookTable(matches)) {
      console.log(line);
    }
  });
}
