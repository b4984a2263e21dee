/**
 * @fileoverview Input parsing for catalog operations
 *
 * Console and command-line input arrives as text; these turn it into typed
 * values or a CatalogError describing what was wrong.
 */

import { InvalidStatusError, ValidationError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { BOOK_STATUSES, SEARCH_FIELDS, type BookStatus, type SearchField } from '../types.js';

export const MIN_YEAR = 1000;

export function isBookStatus(value: string): value is BookStatus {
  return BOOK_STATUSES.some((status) => status === value);
}

export function isSearchField(value: string): value is SearchField {
  return SEARCH_FIELDS.some((field) => field === value);
}

export function parseBookStatus(value: string): Result<BookStatus, InvalidStatusError> {
  const status = value.trim();
  return isBookStatus(status) ? Ok(status) : Err(new InvalidStatusError(status, BOOK_STATUSES));
}

export function parseSearchField(value: string): Result<SearchField, ValidationError> {
  const field = value.trim().toLowerCase();
  if (isSearchField(field)) {
    return Ok(field);
  }
  return Err(new ValidationError('field', `Invalid search field "${value.trim()}". Use one of: ${SEARCH_FIELDS.join(', ')}`));
}

export function parseBookId(value: string): Result<number, ValidationError> {
  const text = value.trim();
  if (!/^\d+$/.test(text) || Number(text) < 1 || !Number.isSafeInteger(Number(text))) {
    return Err(new ValidationError('id', `Invalid book id "${text}"`));
  }
  return Ok(Number(text));
}

/**
 * Years are whole numbers from MIN_YEAR up to the current year.
 */
export function parseYear(value: string, now: Date = new Date()): Result<string, ValidationError> {
  const text = value.trim();
  const currentYear = now.getFullYear();
  if (!/^\d+$/.test(text)) {
    return Err(new ValidationError('year', `Invalid year "${text}": expected digits only`));
  }
  const year = Number(text);
  if (year < MIN_YEAR || year > currentYear) {
    return Err(new ValidationError('year', `Invalid year "${text}": expected ${MIN_YEAR}-${currentYear}`));
  }
  return Ok(String(year));
}

export function requireText(field: string, value: string): Result<string, ValidationError> {
  const text = value.trim();
  return text.length > 0 ? Ok(text) : Err(new ValidationError(field, `The ${field} must not be empty`));
}
