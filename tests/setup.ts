/**
 * Global test setup
 * Isolates each test from the environment and from earlier log entries
 */

import { beforeEach } from 'vitest';
import { logger } from '../src/logger.js';

const ENV_PREFIX = 'POSTSIGNAL_';

beforeEach(() => {
  // Tests build their configuration explicitly
  for (const key of Object.keys(process.env)) {
    if (key.startsWith(ENV_PREFIX)) delete process.env[key];
  }
  logger.clear();
});
