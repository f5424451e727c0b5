import { createLogger, formatFields, resolveLogLevel } from './logger';

describe('Logger', () => {
  const originalLogLevel = process.env['LOG_LEVEL'];
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation();
    warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (originalLogLevel === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = originalLogLevel;
    }
  });

  describe('formatFields', () => {
    it('should render key=value pairs after a leading space', () => {
      expect(formatFields({ worker: 2, repo: 'api' })).toBe(' worker=2 repo=api');
    });

    it('should quote values containing whitespace', () => {
      expect(formatFields({ error: 'exit code 128' })).toBe(' error="exit code 128"');
    });

    it('should skip undefined values and return empty string without fields', () => {
      expect(formatFields({ repo: undefined })).toBe('');
      expect(formatFields()).toBe('');
    });
  });

  describe('createLogger', () => {
    it('should prefix messages and route levels to the matching console method', () => {
      const logger = createLogger('[Test] ', 'debug');

      logger.debug('debugging');
      logger.info('cloning', { repo: 'api' });
      logger.warn('diverged');
      logger.error('failed', { worker: 1 });

      expect(logSpy).toHaveBeenNthCalledWith(1, '[Test] debugging');
      expect(logSpy).toHaveBeenNthCalledWith(2, '[Test] cloning repo=api');
      expect(warnSpy).toHaveBeenCalledWith('[Test] diverged');
      expect(errorSpy).toHaveBeenCalledWith('[Test] failed worker=1');
    });

    it('should drop messages below the configured level', () => {
      const logger = createLogger('', 'warn');

      logger.info('hidden');
      logger.warn('shown');

      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith('shown');
    });

    it('should print nothing when silent', () => {
      const logger = createLogger('', 'silent');

      logger.error('nothing');

      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe('resolveLogLevel', () => {
    it('should prefer the explicit level', () => {
      process.env['LOG_LEVEL'] = 'error';
      expect(resolveLogLevel('debug')).toBe('debug');
    });

    it('should read LOG_LEVEL when no level is given', () => {
      process.env['LOG_LEVEL'] = 'warn';
      expect(resolveLogLevel()).toBe('warn');
    });

    it('should fall back to silent under the test environment', () => {
      delete process.env['LOG_LEVEL'];
      expect(resolveLogLevel()).toBe('silent');
    });
  });
});
