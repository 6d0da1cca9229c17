/**
 * Global test setup for Vitest.
 *
 * Runs before all tests. Keeps logging quiet and clears configuration
 * a developer shell may carry.
 */

import { beforeEach, vi } from 'vitest';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
delete process.env.APP_LOG_FILE;
delete process.env.ALL_DAY_EVENTS;

beforeEach(() => {
  vi.clearAllMocks();
});
