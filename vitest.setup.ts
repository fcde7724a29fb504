/**
 * Global Vitest Setup
 *
 * Runs before each test to ensure clean environment and prevent test pollution.
 */

import chalk from 'chalk';
import { beforeEach } from 'vitest';

// Assertions compare plain text
chalk.level = 0;

beforeEach(() => {
  // Debug logging and other branchgate switches must not leak between tests
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('BRANCHGATE_')) {
      delete process.env[key];
    }
  }
});
