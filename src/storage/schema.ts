/**
 * @fileoverview Zod schemas for the persisted catalog files
 *
 * Files written by earlier versions stored `year` as a number and the status
 * in Russian ("в наличии", "выдана"). Both are read and come back in the
 * current form; saving writes the current form only.
 */

import { z } from 'zod';
import { BOOK_STATUSES, type Book, type BookStatus, type ErrorEntry } from '../types.js';

export const LEGACY_STATUS_ALIASES: ReadonlyMap<string, BookStatus> = new Map<string, BookStatus>([
  ['в наличии', 'available'],
  ['выдана', 'checked_out'],
]);

export const BookStatusSchema = z.enum(BOOK_STATUSES);

const StoredStatusSchema = z.preprocess(
  (value) => (typeof value === 'string' ? LEGACY_STATUS_ALIASES.get(value) ?? value : value),
  BookStatusSchema,
);

export const BookSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  author: z.string(),
  year: z.union([z.string(), z.number().int()]).transform((year) => String(year)),
  status: StoredStatusSchema,
});

export const BookListSchema: z.ZodType<Book[], z.ZodTypeDef, unknown> = z
  .array(BookSchema)
  .superRefine((books, ctx) => {
    const seen = new Set<number>();
    books.forEach((book, index) => {
      if (seen.has(book.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate book id ${book.id}`,
        });
      }
      seen.add(book.id);
    });
  });

export const ErrorEntrySchema = z.object({
  timestamp: z.string(),
  error: z.string(),
});

export const ErrorEntryListSchema: z.ZodType<ErrorEntry[], z.ZodTypeDef, unknown> = z.array(ErrorEntrySchema);
