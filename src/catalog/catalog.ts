/**
 * @fileoverview Catalog operations
 *
 * The catalog is an ordered in-memory list of books backed by one JSON file.
 * Mutations persist the whole list. Failures come back as `Err` values and
 * are written to the error log before they are returned.
 */

import { CatalogError, NotFoundError, StorageError } from '../core/errors.js';
import { Err, Ok, unwrapOr, type Result } from '../core/result.js';
import { BookListSchema } from '../storage/schema.js';
import { JsonRecordStore } from '../storage/json_store.js';
import { acquireSessionLock, type SessionLock } from '../storage/lock.js';
import { logDebug } from '../telemetry/logger.js';
import { DEFAULT_BOOK_STATUS, type Book, type ErrorEntry, type NewBook, type SearchField } from '../types.js';
import { ErrorLog, systemClock, type Clock } from './error_log.js';
import { parseBookStatus, parseYear, requireText } from './validation.js';

export interface CatalogOptions {
  dataFile: string;
  errorLogFile: string;
  /** Source of timestamps and of the current year for validation. */
  now?: Clock;
  /** Refresh interval of the session lock, in milliseconds. */
  lockUpdateIntervalMs?: number;
}

export type CatalogResult<T> = Result<T, CatalogError>;

/**
 * Next id after the largest in use, or 1 for an empty catalog.
 */
export function nextBookId(books: readonly Book[]): number {
  return books.reduce((max, book) => Math.max(max, book.id), 0) + 1;
}

function* matchBooks(books: readonly Book[], query: string, field: SearchField): Generator<Book, void, undefined> {
  const needle = query.trim().toLowerCase();
  for (const book of books) {
    if (book[field].toLowerCase().includes(needle)) {
      yield { ...book };
    }
  }
}

export class Catalog {
  private closed = false;

  private constructor(
    private readonly store: JsonRecordStore<Book>,
    private readonly books: Book[],
    readonly errors: ErrorLog,
    private readonly lock: SessionLock,
    private readonly now: Clock,
  ) {}

  static async open(options: CatalogOptions): Promise<Catalog> {
    const now = options.now ?? systemClock;
    const lock = await acquireSessionLock(options.dataFile, { updateIntervalMs: options.lockUpdateIntervalMs });
    try {
      const errors = await ErrorLog.open(options.errorLogFile, now);
      const store = new JsonRecordStore(options.dataFile, BookListSchema, 'book');
      const loaded = await store.load();
      if (!loaded.ok) {
        await errors.record(loaded.error);
      }
      const books = unwrapOr(loaded, []);
      logDebug('[catalog] Opened catalog', { path: options.dataFile, books: books.length });
      return new Catalog(store, books, errors, lock, now);
    } catch (error) {
      await lock.release();
      throw error;
    }
  }

  get dataFile(): string {
    return this.store.filePath;
  }

  get size(): number {
    return this.books.length;
  }

  /** False once the session lock has been lost; every mutation is refused from then on. */
  get writable(): boolean {
    return this.lock.compromised() === null;
  }

  async add(input: NewBook): Promise<CatalogResult<Book>> {
    const locked = this.checkLock();
    if (locked) return this.reject(locked);
    const title = requireText('title', input.title);
    if (!title.ok) return this.reject(title.error);
    const author = requireText('author', input.author);
    if (!author.ok) return this.reject(author.error);
    const year = parseYear(input.year, this.now());
    if (!year.ok) return this.reject(year.error);

    const book: Book = {
      id: nextBookId(this.books),
      title: title.value,
      author: author.value,
      year: year.value,
      status: DEFAULT_BOOK_STATUS,
    };
    this.books.push(book);
    return this.persist(book);
  }

  async remove(id: number): Promise<CatalogResult<Book>> {
    const locked = this.checkLock();
    if (locked) return this.reject(locked);
    const index = this.books.findIndex((book) => book.id === id);
    if (index === -1) {
      return this.reject(new NotFoundError(id));
    }
    const [removed] = this.books.splice(index, 1);
    return this.persist(removed);
  }

  /**
   * Lazily yield books whose `field` contains `query`, ignoring case. The
   * sequence walks a snapshot taken at call time; call again to restart.
   */
  search(query: string, field: SearchField): Generator<Book, void, undefined> {
    return matchBooks([...this.books], query, field);
  }

  listAll(): Book[] {
    return this.books.map((book) => ({ ...book }));
  }

  findById(id: number): Book | undefined {
    const book = this.books.find((candidate) => candidate.id === id);
    return book ? { ...book } : undefined;
  }

  async updateStatus(id: number, status: string): Promise<CatalogResult<Book>> {
    const parsed = parseBookStatus(status);
    if (!parsed.ok) {
      return this.reject(parsed.error);
    }
    const locked = this.checkLock();
    if (locked) return this.reject(locked);
    const book = this.books.find((candidate) => candidate.id === id);
    if (!book) {
      return this.reject(new NotFoundError(id));
    }
    book.status = parsed.value;
    return this.persist(book);
  }

  /**
   * Write a failure to the error log and hand it back as an `Err`.
   */
  async reject(error: CatalogError): Promise<Result<never, CatalogError>> {
    await this.errors.record(error);
    return Err(error);
  }

  errorEntries(): ErrorEntry[] {
    return this.errors.entries();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.lock.release();
  }

  private checkLock(): StorageError | null {
    const compromised = this.lock.compromised();
    if (!compromised) return null;
    return new StorageError(
      'lock',
      this.dataFile,
      `session lock lost; refusing to overwrite changes made by another session (${compromised.message})`,
      compromised,
    );
  }

  private async persist(book: Book): Promise<CatalogResult<Book>> {
    // Last check before the file is overwritten.
    const locked = this.checkLock();
    if (locked) return this.reject(locked);
    const saved = await this.store.save(this.books);
    if (!saved.ok) {
      return this.reject(
        new StorageError(
          'write',
          saved.error.filePath,
          `change kept in memory but not saved (${saved.error.cause?.message ?? saved.error.message})`,
          saved.error.cause,
        ),
      );
    }
    return Ok({ ...book });
  }
}
