import * as LoggerModule from './index';
import { createLogger, isLogLevel } from './index';

describe('createLogger', () => {
  const originalLevel = process.env['LOG_LEVEL'];
  let consoleLog: jest.SpyInstance;
  let consoleWarn: jest.SpyInstance;
  let consoleError: jest.SpyInstance;

  beforeEach(() => {
    delete process.env['LOG_LEVEL'];
    consoleLog = jest.spyOn(console, 'log').mockImplementation();
    consoleWarn = jest.spyOn(console, 'warn').mockImplementation();
    consoleError = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = originalLevel;
    }
    jest.restoreAllMocks();
  });

  it('should prefix messages and drop those below the level', () => {
    const logger = createLogger('[Test] ', 'info');

    logger.debug('hidden');
    logger.info('shown', 3);

    expect(consoleLog).toHaveBeenCalledTimes(1);
    expect(consoleLog).toHaveBeenCalledWith('[Test] shown', 3);
  });

  it('should take the level from LOG_LEVEL', () => {
    process.env['LOG_LEVEL'] = 'warn';
    const logger = createLogger('');

    logger.info('hidden');
    logger.warn('careful');

    expect(consoleLog).not.toHaveBeenCalled();
    expect(consoleWarn).toHaveBeenCalledWith('careful');
  });

  it('should stay silent under the test environment by default', () => {
    createLogger('[Test] ').error('quiet');

    expect(consoleError).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('loud')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe('logger module', () => {
  it('should expose only the factory and the level guard', () => {
    expect(Object.keys(LoggerModule).sort()).toEqual(['createLogger', 'isLogLevel']);
  });
});
