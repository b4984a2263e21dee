/**
 * @fileoverview Interactive catalog menu
 *
 * One loop: show the menu, read a choice, run the operation, print the
 * outcome, repeat until the user exits or input ends. Operation failures are
 * printed and the loop carries on.
 */

import type { Catalog } from '../catalog/catalog.js';
import { parseBookId, parseSearchField } from '../catalog/validation.js';
import { getErrorMessage, type CatalogError } from '../core/errors.js';
import { logError } from '../telemetry/logger.js';
import { formatBook, formatBookTable } from './format.js';
import type { Prompter, Writer } from './prompter.js';

export const BACK_COMMAND = 'back';

export const MENU_ENTRIES = [
  { key: '1', label: 'Add a book' },
  { key: '2', label: 'Remove a book' },
  { key: '3', label: 'Search books' },
  { key: '4', label: 'List all books' },
  { key: '5', label: 'Change book status' },
  { key: '0', label: 'Exit' },
] as const;

export type MenuChoice = (typeof MENU_ENTRIES)[number]['key'];

export function renderMenu(): string {
  return ['', 'Menu:', ...MENU_ENTRIES.map((entry) => `${entry.key}. ${entry.label}`)].join('\n');
}

function isMenuChoice(value: string): value is MenuChoice {
  return MENU_ENTRIES.some((entry) => entry.key === value);
}

export class CatalogMenu {
  private inputEnded = false;

  constructor(
    private readonly catalog: Catalog,
    private readonly prompter: Prompter,
    private readonly write: Writer,
  ) {}

  async run(): Promise<void> {
    this.println(`Type "${BACK_COMMAND}" at the first prompt of an action to return to the menu.`);
    for (;;) {
      this.println(renderMenu());
      const answer = await this.prompter.ask('Choose an action: ');
      if (answer === null) {
        this.println('');
        this.println('Input closed. Exiting.');
        return;
      }
      const choice = answer.trim();
      if (!isMenuChoice(choice)) {
        this.println(`Unknown choice "${choice}". Try again.`);
        continue;
      }
      if (choice === '0') {
        this.println('Goodbye.');
        return;
      }

      try {
        await this.dispatch(choice);
      } catch (error) {
        logError('[menu] Unexpected failure', { choice, error: getErrorMessage(error) });
        await this.catalog.errors.record(error);
        this.println(`Unexpected error: ${getErrorMessage(error)}`);
      }

      if (this.inputEnded) {
        this.println('');
        this.println('Input closed. Exiting.');
        return;
      }
    }
  }

  private async dispatch(choice: Exclude<MenuChoice, '0'>): Promise<void> {
    switch (choice) {
      case '1':
        return this.addBook();
      case '2':
        return this.removeBook();
      case '3':
        return this.searchBooks();
      case '4':
        return this.listBooks();
      case '5':
        return this.changeStatus();
    }
  }

  private async addBook(): Promise<void> {
    const title = await this.askField('Title: ', { allowBack: true });
    if (title === null) return;
    const author = await this.askField('Author: ');
    if (author === null) return;
    const year = await this.askField('Year: ');
    if (year === null) return;

    const result = await this.catalog.add({ title, author, year });
    if (result.ok) {
      this.println(`Book added: ${formatBook(result.value)}`);
    } else {
      this.printError(result.error);
    }
  }

  private async removeBook(): Promise<void> {
    const id = await this.askId('Book id to remove: ');
    if (id === null) return;

    const result = await this.catalog.remove(id);
    if (result.ok) {
      this.println(`Book removed: ${formatBook(result.value)}`);
    } else {
      this.printError(result.error);
    }
  }

  private async searchBooks(): Promise<void> {
    const fieldText = await this.askField('Search by (title, author, year): ', { allowBack: true });
    if (fieldText === null) return;
    const field = parseSearchField(fieldText);
    if (!field.ok) {
      await this.catalog.reject(field.error);
      this.printError(field.error);
      return;
    }
    const query = await this.askField('Query: ');
    if (query === null) return;

    const matches = [...this.catalog.search(query, field.value)];
    if (matches.length === 0) {
      this.println('No books match the query.');
      return;
    }
    this.printLines(formatBookTable(matches));
  }

  private async listBooks(): Promise<void> {
    const books = this.catalog.listAll();
    if (books.length === 0) {
      this.println('The catalog is empty.');
      return;
    }
    this.printLines(formatBookTable(books));
  }

  private async changeStatus(): Promise<void> {
    const id = await this.askId('Book id: ');
    if (id === null) return;
    const status = await this.askField('New status (available/checked_out): ');
    if (status === null) return;

    const result = await this.catalog.updateStatus(id, status);
    if (result.ok) {
      this.println(`Status updated: ${formatBook(result.value)}`);
    } else {
      this.printError(result.error);
    }
  }

  /**
   * One line of input, or null when input ended. Only the first prompt of an
   * action treats "back" as a way out; later prompts take it literally.
   */
  private async askField(prompt: string, { allowBack = false }: { allowBack?: boolean } = {}): Promise<string | null> {
    const answer = await this.prompter.ask(prompt);
    if (answer === null) {
      this.inputEnded = true;
      return null;
    }
    if (allowBack && answer.trim().toLowerCase() === BACK_COMMAND) {
      return null;
    }
    return answer;
  }

  private async askId(prompt: string): Promise<number | null> {
    const text = await this.askField(prompt, { allowBack: true });
    if (text === null) return null;
    const id = parseBookId(text);
    if (!id.ok) {
      await this.catalog.reject(id.error);
      this.printError(id.error);
      return null;
    }
    return id.value;
  }

  private printError(error: CatalogError): void {
    this.println(`Error: ${error.message}`);
  }

  private printLines(lines: string[]): void {
    for (const line of lines) {
      this.println(line);
    }
  }

  private println(text: string): void {
    this.write(`${text}\n`);
  }
}
