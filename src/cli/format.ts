/**
 * @fileoverview Plain-text rendering of catalog records
 */

import type { Book, ErrorEntry } from '../types.js';

export const BOOK_TABLE_HEADERS = ['ID', 'Title', 'Author', 'Year', 'Status'];

/**
 * Lay out rows under headers with columns padded to the widest cell.
 */
export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
    return Math.max(h.length, maxRowWidth);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const lines = [headerLine, separator];
  for (const row of rows) {
    lines.push(row.map((cell, i) => (cell ?? '').padEnd(widths[i])).join(' | '));
  }
  return lines.map((line) => line.trimEnd());
}

export function bookRow(book: Book): string[] {
  return [String(book.id), book.title, book.author, book.year, book.status];
}

export function formatBookTable(books: readonly Book[]): string[] {
  return renderTable(BOOK_TABLE_HEADERS, books.map(bookRow));
}

export function formatBook(book: Book): string {
  return `#${book.id} "${book.title}" by ${book.author} (${book.year}) [${book.status}]`;
}

export function formatErrorEntry(entry: ErrorEntry): string {
  return `${entry.timestamp}  ${entry.error}`;
}
