import { describe, it, expect, afterEach } from 'vitest';
import { config, getConfigSummary } from '../../src/core/config';
import {
  parseEnum,
  parseIntWithValidation,
  parsePort,
  parsePositiveInt,
  parseString,
} from '../../src/core/config.utils';

describe('Configuration', () => {
  const touched = ['TEST_CFG_INT', 'TEST_CFG_PORT', 'TEST_CFG_LEVEL', 'TEST_CFG_PATH'];

  afterEach(() => {
    for (const key of touched) {
      delete process.env[key];
    }
  });

  describe('parseIntWithValidation', () => {
    it('should parse integers with surrounding whitespace', () => {
      expect(parseIntWithValidation('42')).toBe(42);
      expect(parseIntWithValidation(' 7 ')).toBe(7);
    });

    it('should reject non-integers', () => {
      expect(() => parseIntWithValidation('abc')).toThrow('Invalid integer: abc');
      expect(() => parseIntWithValidation('1.5')).toThrow('Invalid integer: 1.5');
    });

    it('should enforce bounds', () => {
      expect(() => parseIntWithValidation('0', 1)).toThrow('Value 0 is below minimum 1');
      expect(() => parseIntWithValidation('70000', 1, 65535)).toThrow('Value 70000 is above maximum 65535');
    });
  });

  describe('environment parsers', () => {
    it('should use the default when the variable is unset or blank', () => {
      expect(parsePositiveInt('TEST_CFG_INT', 5)).toBe(5);
      process.env['TEST_CFG_INT'] = '   ';
      expect(parsePositiveInt('TEST_CFG_INT', 5)).toBe(5);
    });

    it('should read valid values', () => {
      process.env['TEST_CFG_INT'] = '12';
      expect(parsePositiveInt('TEST_CFG_INT', 5)).toBe(12);
    });

    it('should fall back to the default for invalid values', () => {
      process.env['TEST_CFG_INT'] = '-3';
      expect(parsePositiveInt('TEST_CFG_INT', 5)).toBe(5);
      process.env['TEST_CFG_PORT'] = '99999';
      expect(parsePort('TEST_CFG_PORT', 3000)).toBe(3000);
    });

    it('should restrict enums to the allowed values', () => {
      process.env['TEST_CFG_LEVEL'] = 'debug';
      expect(parseEnum('TEST_CFG_LEVEL', 'info', ['info', 'debug'])).toBe('debug');
      process.env['TEST_CFG_LEVEL'] = 'loud';
      expect(parseEnum('TEST_CFG_LEVEL', 'info', ['info', 'debug'])).toBe('info');
    });

    it('should trim strings', () => {
      process.env['TEST_CFG_PATH'] = '  /srv/catalog.json ';
      expect(parseString('TEST_CFG_PATH', 'data/catalog.json')).toBe('/srv/catalog.json');
    });
  });

  describe('config', () => {
    it('should be frozen', () => {
      expect(Object.isFrozen(config)).toBe(true);
    });

    it('should pick up the log level from the environment', () => {
      expect(config.LOG_LEVEL).toBe('silent');
    });

    it('should summarize the settings that matter at startup', () => {
      const summary = getConfigSummary();
      expect(summary['retry']).toEqual({
        baseMs: config.RETRY_BASE_MS,
        times: config.RETRY_TIMES,
        jitterMs: config.RETRY_JITTER_MS,
      });
      expect(summary['logLevel']).toBe('silent');
    });
  });
});
