/**
 * Global Vitest Setup
 *
 * Runs before each test to ensure clean environment and prevent test pollution.
 */

import { beforeEach } from 'vitest';

beforeEach(() => {
  // Settings and debug switches would change logger and loader behavior
  delete process.env.BRANCH_GATE_CONFIG;
  delete process.env.BRANCH_GATE_DEBUG;
});
