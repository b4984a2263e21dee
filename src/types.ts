/**
 * @fileoverview Catalog record types
 */

export const BOOK_STATUSES = ['available', 'checked_out'] as const;

export type BookStatus = (typeof BOOK_STATUSES)[number];

export const DEFAULT_BOOK_STATUS: BookStatus = 'available';

export interface Book {
  id: number;
  title: string;
  author: string;
  /** Publication year, kept as text. */
  year: string;
  status: BookStatus;
}

export interface NewBook {
  title: string;
  author: string;
  year: string;
}

export const SEARCH_FIELDS = ['title', 'author', 'year'] as const;

export type SearchField = (typeof SEARCH_FIELDS)[number];

export interface ErrorEntry {
  /** ISO-8601 time the failure was recorded. */
  timestamp: string;
  error: string;
}
