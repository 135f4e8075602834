/**
 * Tests for logger creation
 */

import { describe, it, expect } from 'vitest';
import { createLogger, levelFromEnv } from './logger.js';

describe('logger', () => {
  describe('levelFromEnv', () => {
    it('should read GF256_LOG_LEVEL', () => {
      expect(levelFromEnv({ GF256_LOG_LEVEL: 'debug' })).toBe('debug');
    });

    it('should ignore case and surrounding whitespace', () => {
      expect(levelFromEnv({ GF256_LOG_LEVEL: ' WARN ' })).toBe('warn');
    });

    it('should ignore unknown levels', () => {
      expect(levelFromEnv({ GF256_LOG_LEVEL: 'verbose' })).toBeUndefined();
    });

    it('should return undefined when unset', () => {
      expect(levelFromEnv({})).toBeUndefined();
    });
  });

  describe('createLogger', () => {
    it('should use the given level', () => {
      expect(createLogger({ level: 'info' }).level).toBe('info');
    });

    it('should attach the logger name to records', () => {
      const logger = createLogger({ level: 'info', name: 'reconstruct' });

      expect(logger.bindings()).toMatchObject({ name: 'reconstruct' });
    });
  });
});
