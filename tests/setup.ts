/**
 * Global test setup
 * Runs before each test file. Environment variables come from vitest.config.ts
 * so they are in place before any module reads them.
 */

import { vi } from 'vitest';

// Suppress console output during tests
global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};
