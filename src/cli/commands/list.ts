import { formatBookTable } from '../format.js';
import { printJson, withCatalog, type CommandOptions } from './session.js';

export async function listCommand(options: CommandOptions): Promise<void> {
  await withCatalog(options, async (catalog) => {
    const books = catalog.listAll();
    if (options.json) {
      printJson(books);
      return;
    }
    if (books.length === 0) {
      console.log('The catalog is empty.');
      return;
    }
    for (const line of formatBookTable(books)) {
      console.log(line);
    }
  });
}
