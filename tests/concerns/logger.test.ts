import { describe, it, expect } from 'vitest';
import { createLogger, getLoggerOptionsFromEnv, isLogLevel } from '../../src/concerns/logger.js';

describe('logger', () => {
  describe('createLogger', () => {
    it('should default to info', () => {
      expect(createLogger().level).toBe('info');
    });

    it('should use the given level', () => {
      expect(createLogger({ level: 'debug' }).level).toBe('debug');
    });

    it('should attach bindings', () => {
      const logger = createLogger({ level: 'silent', bindings: { component: 'election' } });

      expect(logger.bindings()).toMatchObject({ component: 'election' });
    });
  });

  describe('getLoggerOptionsFromEnv', () => {
    it('should let the environment override the level', () => {
      const options = getLoggerOptionsFromEnv({ level: 'info', name: 'LeaderElection' }, { ELECTION_LOG_LEVEL: 'WARN' });

      expect(options).toEqual({ level: 'warn', name: 'LeaderElection' });
    });

    it('should ignore an unknown level', () => {
      const options = getLoggerOptionsFromEnv({ level: 'info' }, { ELECTION_LOG_LEVEL: 'loud' });

      expect(options.level).toBe('info');
    });

    it('should read the format', () => {
      expect(getLoggerOptionsFromEnv({}, { ELECTION_LOG_FORMAT: 'Pretty' }).format).toBe('pretty');
      expect(getLoggerOptionsFromEnv({}, { ELECTION_LOG_FORMAT: 'yaml' }).format).toBeUndefined();
    });

    it('should not modify the given options', () => {
      const configOptions = { level: 'info' as const };
      getLoggerOptionsFromEnv(configOptions, { ELECTION_LOG_LEVEL: 'error' });

      expect(configOptions.level).toBe('info');
    });
  });

  describe('isLogLevel', () => {
    it('should accept pino levels only', () => {
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('trace')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });
});
