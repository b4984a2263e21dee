import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CatalogMenu, renderMenu } from '../menu.js';
import type { Prompter } from '../prompter.js';
import { Catalog } from '../../catalog/catalog.js';

const FIXED_TIME = new Date('2025-01-02T03:04:05.000Z');

function scriptedPrompter(answers: string[]): Prompter & { prompts: string[]; closed: boolean } {
  const queue = [...answers];
  return {
    prompts: [],
    closed: false,
    async ask(prompt: string): Promise<string | null> {
      this.prompts.push(prompt);
      return queue.shift() ?? null;
    },
    close(): void {
      this.closed = true;
    },
  };
}

describe('renderMenu', () => {
  it('lists the numbered actions', () => {
    expect(renderMenu()).toBe(
      [
        '',
        'Menu:',
        '1. Add a book',
        '2. Remove a book',
        '3. Search books',
        '4. List all books',
        '5. Change book status',
        '0. Exit',
      ].join('\n'),
    );
  });
});

describe('CatalogMenu', () => {
  let root: string;
  let catalog: Catalog;
  let output: string;

  const write = (text: string): void => {
    output += text;
  };
  const lines = (): string[] => output.split('\n');

  async function runWith(answers: string[]): Promise<ReturnType<typeof scriptedPrompter>> {
    const prompter = scriptedPrompter(answers);
    await new CatalogMenu(catalog, prompter, write).run();
    return prompter;
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'catalog-menu-'));
    catalog = await Catalog.open({
      dataFile: join(root, 'library.json'),
      errorLogFile: join(root, 'error_log.json'),
      now: () => FIXED_TIME,
    });
    output = '';
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await catalog.close();
    await rm(root, { recursive: true, force: true });
  });

  it('adds, checks out, lists and removes a book', async () => {
    await runWith(['1', '1984', 'Orwell', '1949', '5', '1', 'checked_out', '4', '2', '1', '4', '0']);

    const printed = lines();
    expect(printed).toContain('Book added: #1 "1984" by Orwell (1949) [available]');
    expect(printed).toContain('Status updated: #1 "1984" by Orwell (1949) [checked_out]');
    expect(printed).toContain('ID | Title | Author | Year | Status');
    expect(printed).toContain('1  | 1984  | Orwell | 1949 | checked_out');
    expect(printed).toContain('Book removed: #1 "1984" by Orwell (1949) [checked_out]');
    expect(printed).toContain('The catalog is empty.');
    expect(printed[printed.length - 2]).toBe('Goodbye.');
    expect(catalog.listAll()).toEqual([]);
  });

  it('returns to the menu when the user types back', async () => {
    const prompter = await runWith(['1', 'Back', '4', '0']);

    expect(prompter.prompts).toEqual(['Choose an action: ', 'Title: ', 'Choose an action: ', 'Choose an action: ']);
    expect(catalog.size).toBe(0);
    expect(catalog.errorEntries()).toEqual([]);
  });

  it('takes back as text after the first prompt of an action', async () => {
    await catalog.add({ title: 'Back', author: 'Henry Green', year: '1946' });

    const prompter = await runWith(['1', 'Loving', 'Back', '1945', '3', 'title', 'back', '2', 'back', '0']);

    expect(prompter.prompts).toEqual([
      'Choose an action: ',
      'Title: ',
      'Author: ',
      'Year: ',
      'Choose an action: ',
      'Search by (title, author, year): ',
      'Query: ',
      'Choose an action: ',
      'Book id to remove: ',
      'Choose an action: ',
    ]);
    const printed = lines();
    expect(printed).toContain('Book added: #2 "Loving" by Back (1945) [available]');
    expect(printed).toContain('1  | Back  | Henry Green | 1946 | available');
    expect(printed).not.toContain('No books match the query.');
    expect(catalog.size).toBe(2);
    expect(catalog.errorEntries()).toEqual([]);
  });

  it('reports and logs an invalid id', async () => {
    await runWith(['2', 'abc', '0']);

    expect(lines()).toContain('Error: Invalid book id "abc"');
    expect(catalog.errorEntries()).toEqual([
      { timestamp: '2025-01-02T03:04:05.000Z', error: 'Invalid book id "abc"' },
    ]);
  });

  it('reports a missing book', async () => {
    await runWith(['2', '9', '0']);

    expect(lines()).toContain('Error: Book with id 9 not found');
    expect(catalog.errorEntries().map((entry) => entry.error)).toEqual(['Book with id 9 not found']);
  });

  it('searches by a chosen field', async () => {
    await catalog.add({ title: 'Dune', author: 'Frank Herbert', year: '1965' });
    await catalog.add({ title: 'Emma', author: 'Jane Austen', year: '1815' });

    await runWith(['3', 'isbn', '3', 'title', 'dune', '3', 'author', 'nobody', '0']);

    const printed = lines();
    expect(printed).toContain('Error: Invalid search field "isbn". Use one of: title, author, year');
    expect(printed).toContain('1  | Dune  | Frank Herbert | 1965 | available');
    expect(printed).not.toContain('2  | Emma  | Jane Austen   | 1815 | available');
    expect(printed).toContain('No books match the query.');
  });

  it('reports an invalid status', async () => {
    await catalog.add({ title: 'Dune', author: 'Frank Herbert', year: '1965' });

    await runWith(['5', '1', 'lost', '0']);

    expect(lines()).toContain('Error: Invalid status "lost". Allowed values: available, checked_out');
    expect(catalog.findById(1)?.status).toBe('available');
  });

  it('reports an invalid year', async () => {
    await runWith(['1', 'Dune', 'Frank Herbert', 'someday', '0']);

    expect(lines()).toContain('Error: Invalid year "someday": expected digits only');
    expect(catalog.size).toBe(0);
  });

  it('asks again after an unknown choice', async () => {
    await runWith(['7', '0']);

    expect(lines()).toContain('Unknown choice "7". Try again.');
  });

  it('exits when input ends at the menu', async () => {
    await runWith([]);

    const printed = lines();
    expect(printed[printed.length - 2]).toBe('Input closed. Exiting.');
  });

  it('exits when input ends inside an operation', async () => {
    const prompter = await runWith(['1', 'Dune']);

    expect(prompter.prompts).toEqual(['Choose an action: ', 'Title: ', 'Author: ']);
    expect(lines()).toContain('Input closed. Exiting.');
    expect(catalog.size).toBe(0);
  });

  it('keeps running after an unexpected failure', async () => {
    vi.spyOn(catalog, 'listAll').mockImplementation(() => {
      throw new Error('disk on fire');
    });

    await runWith(['4', '0']);

    const printed = lines();
    expect(printed).toContain('Unexpected error: disk on fire');
    expect(printed[printed.length - 2]).toBe('Goodbye.');
    expect(catalog.errorEntries().map((entry) => entry.error)).toEqual(['disk on fire']);
  });
});
