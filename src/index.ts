/**
 * @fileoverview catalog-keeper public API
 *
 * ```typescript
 * import { Catalog, resolveCatalogConfig } from 'catalog-keeper';
 *
 * const config = resolveCatalogConfig({ workspace: '/path/to/shelf' });
 * const catalog = await Catalog.open(config);
 * const added = await catalog.add({ title: 'Dune', author: 'Frank Herbert', year: '1965' });
 * await catalog.close();
 * ```
 *
 * @packageDocumentation
 */

export const CATALOG_VERSION = {
  major: 0,
  minor: 1,
  patch: 0,
  string: '0.1.0',
} as const;

export { Catalog, nextBookId, type CatalogOptions, type CatalogResult } from './catalog/catalog.js';
export { ErrorLog, systemClock, type Clock } from './catalog/error_log.js';
export {
  parseBookId,
  parseBookStatus,
  parseSearchField,
  parseYear,
  requireText,
  isBookStatus,
  isSearchField,
  MIN_YEAR,
} from './catalog/validation.js';
export {
  resolveCatalogConfig,
  DEFAULT_DATA_FILENAME,
  DEFAULT_ERROR_LOG_FILENAME,
  type CatalogConfig,
  type CatalogConfigOptions,
} from './config/index.js';
export {
  CatalogError,
  NotFoundError,
  InvalidStatusError,
  ValidationError,
  StorageError,
  type CatalogErrorCode,
  type StorageOperation,
} from './core/errors.js';
export { Ok, Err, unwrap, unwrapOr, type Result } from './core/result.js';
export { JsonRecordStore } from './storage/json_store.js';
export {
  BOOK_STATUSES,
  SEARCH_FIELDS,
  DEFAULT_BOOK_STATUS,
  type Book,
  type BookStatus,
  type ErrorEntry,
  type NewBook,
  type SearchField,
} from './types.js';
