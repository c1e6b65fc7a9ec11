/**
 * Test Setup
 * Global test configuration and utilities
 */

import { vi } from 'vitest';
import pino from 'pino';
import { setLogger } from '../src/core/logger.js';

setLogger(pino({ level: 'silent' }));

// Mock nanoid for deterministic IDs in tests
vi.mock('nanoid', () => {
  let counter = 0;
  return {
    nanoid: (size?: number) => {
      counter++;
      return `id${counter}`.padEnd(size ?? 21, '0');
    },
  };
});
