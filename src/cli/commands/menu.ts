import { CatalogMenu } from '../menu.js';
import { createLinePrompter, type Prompter, type Writer } from '../prompter.js';
import { withCatalog, type CommandOptions } from './session.js';

export interface MenuCommandOptions extends CommandOptions {
  prompter?: Prompter;
  write?: Writer;
}

export async function menuCommand(options: MenuCommandOptions): Promise<void> {
  const write: Writer = options.write ?? ((text) => {
    process.stdout.write(text);
  });
  const prompter = options.prompter ?? createLinePrompter(process.stdin, write);

  try {
    await withCatalog(options, async (catalog) => {
      await new CatalogMenu(catalog, prompter, write).run();
    });
  } finally {
    prompter.close();
  }
}
