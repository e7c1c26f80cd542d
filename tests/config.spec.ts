import { describe, it, expect, afterEach } from 'vitest';
import { DEFAULT_CONFIG, LogLevel, envBool, envInt, loadConfig } from '../src/index.js';

const VARS = ['SINGLETON_LOG_LEVEL', 'SINGLETON_LOG_ENABLED', 'SINGLETON_TYPE_GUARD', 'SINGLETON_TEST_VALUE'];

describe('config', () => {
  afterEach(() => {
    for (const name of VARS) delete process.env[name];
  });

  describe('loadConfig', () => {
    it('uses the defaults', () => {
      expect(loadConfig()).toEqual({
        logging: { level: LogLevel.WARN, enabled: true, timestamp: true },
        typeGuard: true,
      });
      expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('applies overrides', () => {
      const config = loadConfig({ logging: { level: LogLevel.DEBUG, timestamp: false }, typeGuard: false });

      expect(config.logging).toEqual({ level: LogLevel.DEBUG, enabled: true, timestamp: false });
      expect(config.typeGuard).toBe(false);
    });

    it('lets the environment win over overrides', () => {
      process.env.SINGLETON_LOG_LEVEL = '4';
      process.env.SINGLETON_LOG_ENABLED = 'false';
      process.env.SINGLETON_TYPE_GUARD = 'yes';

      const config = loadConfig({ logging: { level: LogLevel.ERROR, enabled: true }, typeGuard: false });

      expect(config.logging.level).toBe(4);
      expect(config.logging.enabled).toBe(false);
      expect(config.typeGuard).toBe(true);
    });

    it('freezes the result', () => {
      const config = loadConfig();

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.logging)).toBe(true);
    });
  });

  describe('env helpers', () => {
    it('parses integers and falls back on garbage', () => {
      process.env.SINGLETON_TEST_VALUE = '12';
      expect(envInt('SINGLETON_TEST_VALUE', 3)).toBe(12);

      process.env.SINGLETON_TEST_VALUE = 'twelve';
      expect(envInt('SINGLETON_TEST_VALUE', 3)).toBe(3);
    });

    it('parses booleans', () => {
      expect(envBool('SINGLETON_TEST_VALUE', true)).toBe(true);

      for (const truthy of ['true', '1', 'yes']) {
        process.env.SINGLETON_TEST_VALUE = truthy;
        expect(envBool('SINGLETON_TEST_VALUE', false)).toBe(true);
      }

      process.env.SINGLETON_TEST_VALUE = 'off';
      expect(envBool('SINGLETON_TEST_VALUE', true)).toBe(false);
    });
  });
});
