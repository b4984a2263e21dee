/**
 * @fileoverview catalog-keeper configuration
 *
 * Precedence: explicit options (CLI flags), then environment variables, then
 * defaults. Relative file paths resolve against the workspace directory.
 */

import * as path from 'path';
import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { LOG_LEVELS, type LogLevel } from '../telemetry/logger.js';

export const DEFAULT_DATA_FILENAME = 'library.json';
export const DEFAULT_ERROR_LOG_FILENAME = 'error_log.json';

export const ENV_DATA_FILE = 'CATALOG_DATA_FILE';
export const ENV_ERROR_LOG = 'CATALOG_ERROR_LOG';
export const ENV_LOG_LEVEL = 'CATALOG_LOG_LEVEL';

export interface CatalogConfig {
  workspace: string;
  dataFile: string;
  errorLogFile: string;
  logLevel: LogLevel;
}

export interface CatalogConfigOptions {
  workspace?: string;
  dataFile?: string;
  errorLogFile?: string;
  logLevel?: string;
}

const nonBlank = z.string().trim().min(1);

const ConfigInputSchema = z.object({
  workspace: nonBlank,
  dataFile: nonBlank,
  errorLogFile: nonBlank,
  logLevel: z.enum(LOG_LEVELS),
});

function firstDefined(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.length > 0);
}

export function resolveCatalogConfig(
  options: CatalogConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): CatalogConfig {
  const parsed = ConfigInputSchema.safeParse({
    workspace: options.workspace ?? process.cwd(),
    dataFile: firstDefined(options.dataFile, env[ENV_DATA_FILE]) ?? DEFAULT_DATA_FILENAME,
    errorLogFile: firstDefined(options.errorLogFile, env[ENV_ERROR_LOG]) ?? DEFAULT_ERROR_LOG_FILENAME,
    logLevel: firstDefined(options.logLevel, env[ENV_LOG_LEVEL]) ?? 'info',
  });
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const field = issue ? issue.path.join('.') : 'config';
    throw new ValidationError(field, `Invalid configuration for ${field}: ${issue?.message ?? 'unknown problem'}`);
  }

  const workspace = path.resolve(parsed.data.workspace);
  return {
    workspace,
    dataFile: path.resolve(workspace, parsed.data.dataFile),
    errorLogFile: path.resolve(workspace, parsed.data.errorLogFile),
    logLevel: parsed.data.logLevel,
  };
}
