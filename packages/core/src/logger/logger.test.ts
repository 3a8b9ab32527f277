import { createLogger, resolveLogLevel, isLogLevel } from './logger';

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('resolveLogLevel', () => {
    it('should prefer the explicit level', () => {
      expect(resolveLogLevel('debug', { LOG_LEVEL: 'error', NODE_ENV: 'test' })).toBe('debug');
    });

    it('should use LOG_LEVEL when it is a known level', () => {
      expect(resolveLogLevel(undefined, { LOG_LEVEL: 'warn', NODE_ENV: 'test' })).toBe('warn');
    });

    it('should ignore an unknown LOG_LEVEL', () => {
      expect(resolveLogLevel(undefined, { LOG_LEVEL: 'loud' })).toBe('info');
    });

    it('should be silent under test when nothing else is set', () => {
      expect(resolveLogLevel(undefined, { NODE_ENV: 'test' })).toBe('silent');
    });
  });

  describe('isLogLevel', () => {
    it('should accept levels and reject anything else', () => {
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });

  describe('ConsoleLogger', () => {
    it('should prefix messages and route them to the matching console method', () => {
      const log = createLogger('[Test] ', 'debug');

      log.info('hello', 1);
      log.warn('careful');
      log.error('broken');

      expect(logSpy).toHaveBeenCalledWith('[Test] hello', 1);
      expect(warnSpy).toHaveBeenCalledWith('[Test] careful');
      expect(errorSpy).toHaveBeenCalledWith('[Test] broken');
    });

    it('should drop messages below the configured level', () => {
      const log = createLogger('', 'warn');

      log.debug('noise');
      log.info('noise');
      log.warn('kept');

      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith('kept');
    });

    it('should log nothing when silent', () => {
      const log = createLogger('', 'silent');

      log.error('hidden');

      expect(errorSpy).not.toHaveBeenCalled();
    });
  });
});
