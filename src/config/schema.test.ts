/**
 * Unit tests for configuration schema
 */

import { describe, it, expect } from '@jest/globals';
import { CacheConfigSchema, ConfigSchema, LogFormatSchema, LogLevelSchema, LoggingConfigSchema } from './schema.js';

describe('Configuration Schema', () => {
  describe('LogLevelSchema', () => {
    it('should accept valid log levels', () => {
      expect(() => LogLevelSchema.parse('debug')).not.toThrow();
      expect(() => LogLevelSchema.parse('info')).not.toThrow();
      expect(() => LogLevelSchema.parse('warn')).not.toThrow();
      expect(() => LogLevelSchema.parse('error')).not.toThrow();
    });

    it('should reject invalid log levels', () => {
      expect(() => LogLevelSchema.parse('trace')).toThrow();
    });
  });

  describe('LogFormatSchema', () => {
    it('should reject invalid log formats', () => {
      expect(() => LogFormatSchema.parse('xml')).toThrow();
    });
  });

  describe('CacheConfigSchema', () => {
    it('should require a TTL', () => {
      expect(CacheConfigSchema.safeParse({ path: '/tmp/x' }).success).toBe(false);
    });

    it('should reject fractional and negative TTLs', () => {
      expect(CacheConfigSchema.safeParse({ path: '/tmp/x', ttl: 1.5 }).success).toBe(false);
      expect(CacheConfigSchema.safeParse({ path: '/tmp/x', ttl: -1 }).success).toBe(false);
    });
  });

  describe('LoggingConfigSchema', () => {
    it('should fill in defaults', () => {
      expect(LoggingConfigSchema.parse({})).toEqual({ level: 'warn', format: 'simple', silent: false });
    });
  });

  describe('ConfigSchema', () => {
    it('should accept a complete configuration', () => {
      const config = ConfigSchema.parse({
        cache: { path: '/tmp/inventory.json', ttl: 3600 },
        xen: { host: 'xen01' },
        logging: {},
      });

      expect(config.xen).toEqual({ host: 'xen01', username: '', password: '' });
    });
  });
});
