/**
 * Test Setup
 * Global test configuration and utilities
 */

import { beforeEach, vi } from 'vitest';
import pino from 'pino';
import { setLogger } from '../src/core/logger.js';
import { resetEnforcement } from '../src/verification/mode.js';

// Mock nanoid for deterministic IDs in tests
vi.mock('nanoid', () => ({
  nanoid: (size?: number) => {
    const chars = 'abcdefghijklmnopqrstuvwxyz0123456789';
    const len = size ?? 21;
    let result = '';
    for (let i = 0; i < len; i++) {
      result += chars[Math.floor(Math.random() * chars.length)];
    }
    return result;
  },
}));

// Violations are logged at error level; keep test output quiet
setLogger(pino({ level: 'silent' }));

beforeEach(() => {
  resetEnforcement({});
});
