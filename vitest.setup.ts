/**
 * Centralized Vitest Setup for catalog-keeper
 *
 * Telemetry goes to stderr and would drown the reporter output, so it is
 * silenced unless CATALOG_TEST_VERBOSE is set. Tests that assert on log
 * output set their own level.
 */

import { afterAll, beforeEach } from 'vitest';
import { resetLogLevel, setLogLevel } from './src/telemetry/logger.js';

const VERBOSE = process.env.CATALOG_TEST_VERBOSE === 'true';

beforeEach(() => {
  setLogLevel(VERBOSE ? 'debug' : 'silent');
});

afterAll(() => {
  resetLogLevel();
});
