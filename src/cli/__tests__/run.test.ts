import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runCli } from '../run.js';
import { getHelpText } from '../help.js';
import { acquireSessionLock } from '../../storage/lock.js';

describe('runCli', () => {
  let root: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  const logged = (): unknown[] => consoleLogSpy.mock.calls.map((call) => call[0]);
  const errorOutput = (): unknown[] => consoleErrorSpy.mock.calls.map((call) => call[0]);
  const jsonError = (): { error: Record<string, unknown> } => JSON.parse(String(errorOutput()[0]));

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'catalog-cli-'));
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('reports an unknown option as an invalid argument', async () => {
    const exitCode = await runCli(['list', '--bogus'], {});

    expect(exitCode).toBe(50);
    expect(errorOutput()).toHaveLength(1);
    const text = String(errorOutput()[0]);
    expect(text.startsWith("Error [EINVALID_ARGUMENT]: Unknown option '--bogus'")).toBe(true);
    expect(text).toContain("  - Run 'catalog-keeper help <command>' for usage information");
    expect(logged()).toEqual([]);
  });

  it('prints an unknown command as a JSON envelope on stderr', async () => {
    const exitCode = await runCli(['frobnicate', '--json'], {});

    expect(exitCode).toBe(50);
    expect(logged()).toEqual([]);
    const { error } = jsonError();
    expect(error).toMatchObject({
      code: 'EINVALID_ARGUMENT',
      message: 'Unknown command: frobnicate',
      retryable: false,
      recoveryHints: [
        "Run 'catalog-keeper help' for usage information",
        'Available commands: menu, add, remove, search, list, set-status, errors',
      ],
      context: { command: 'frobnicate' },
    });
  });

  it('prints the version', async () => {
    expect(await runCli(['--version'], {})).toBe(0);
    expect(logged()).toEqual(['catalog-keeper 0.1.0']);
  });

  it('prints help for a command', async () => {
    expect(await runCli(['help', 'add'], {})).toBe(0);
    expect(logged()).toEqual([getHelpText('add')]);

    consoleLogSpy.mockClear();
    expect(await runCli(['search', '--help'], {})).toBe(0);
    expect(logged()).toEqual([getHelpText('search')]);
  });

  it('runs a command against the chosen workspace', async () => {
    const exitCode = await runCli(['add', 'Dune', 'Frank Herbert', '1965', '-w', root], {});

    expect(exitCode).toBe(0);
    expect(logged()).toEqual(['Book added: #1 "Dune" by Frank Herbert (1965) [available]']);
    const onDisk = JSON.parse(await readFile(join(root, 'library.json'), 'utf8'));
    expect(onDisk).toEqual([{ id: 1, title: 'Dune', author: 'Frank Herbert', year: '1965', status: 'available' }]);
  });

  it('takes the data file from the environment', async () => {
    const exitCode = await runCli(['add', 'Emma', 'Jane Austen', '1815', '-w', root], {
      CATALOG_DATA_FILE: 'books.json',
    });

    expect(exitCode).toBe(0);
    const onDisk = JSON.parse(await readFile(join(root, 'books.json'), 'utf8'));
    expect(onDisk).toHaveLength(1);
  });

  it('maps a catalog error to its envelope and exit code', async () => {
    const exitCode = await runCli(['remove', '9', '--json', '-w', root], {});

    expect(exitCode).toBe(10);
    const { error } = jsonError();
    expect(error).toMatchObject({
      code: 'ENOT_FOUND',
      message: 'Book with id 9 not found',
      context: { bookId: 9, command: 'remove' },
    });
  });

  it('reports a catalog held by another session as locked', async () => {
    const lock = await acquireSessionLock(join(root, 'library.json'));
    try {
      const exitCode = await runCli(['list', '-w', root], {});

      expect(exitCode).toBe(21);
      expect(String(errorOutput()[0]).startsWith('Error [ESTORAGE_LOCKED]: Storage lock failed for ')).toBe(true);
      expect(logged()).toEqual([]);
    } finally {
      await lock.release();
    }
  });
});
