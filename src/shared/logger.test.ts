import { Logger, LogLevel, createLogger, parseLogLevel } from './logger';
import { GameError, GameErrorCode } from './errors';

describe('Logger', () => {
  let consoleDebugSpy: jest.SpyInstance;
  let consoleLogSpy: jest.SpyInstance;
  let consoleWarnSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleDebugSpy = jest.spyOn(console, 'debug').mockImplementation();
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('levels', () => {
    it('should route each level to its console method with the context prefix', () => {
      const logger = new Logger('ArenaServer', LogLevel.DEBUG);

      logger.debug('debug message');
      logger.info('info message', { port: 4444 });
      logger.warn('warn message');
      logger.error('error message');

      expect(consoleDebugSpy).toHaveBeenCalledWith('[ArenaServer] debug message', '');
      expect(consoleLogSpy).toHaveBeenCalledWith('[ArenaServer] info message', { port: 4444 });
      expect(consoleWarnSpy).toHaveBeenCalledWith('[ArenaServer] warn message', '');
      expect(consoleErrorSpy).toHaveBeenCalledWith('[ArenaServer] error message', '');
    });

    it('should drop messages below the minimum level', () => {
      const logger = new Logger('ArenaServer', LogLevel.WARN);

      logger.debug('debug');
      logger.info('info');
      logger.warn('warn');

      expect(consoleDebugSpy).not.toHaveBeenCalled();
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
    });

    it('should keep falsy data other than undefined', () => {
      const logger = new Logger('Ctx');

      logger.info('zero', 0);

      expect(consoleLogSpy).toHaveBeenCalledWith('[Ctx] zero', 0);
    });
  });

  describe('error serialization', () => {
    it('should flatten Error objects', () => {
      const logger = new Logger('Ctx', LogLevel.ERROR);

      logger.error('failed', new Error('Test error'));

      expect(consoleErrorSpy).toHaveBeenCalledWith('[Ctx] failed', {
        name: 'Error',
        message: 'Test error',
        stack: expect.any(String),
      });
    });

    it('should include the code of a GameError', () => {
      const logger = new Logger('Ctx');

      logger.warn('send failed', new GameError('Transport is closed', GameErrorCode.TRANSPORT_CLOSED, 410));

      expect(consoleWarnSpy).toHaveBeenCalledWith('[Ctx] send failed', {
        name: 'GameError',
        message: 'Transport is closed',
        code: GameErrorCode.TRANSPORT_CLOSED,
        stack: expect.any(String),
      });
    });

    it('should pass plain data through', () => {
      const logger = new Logger('Ctx');

      logger.error('failed', { slot: 2 });

      expect(consoleErrorSpy).toHaveBeenCalledWith('[Ctx] failed', { slot: 2 });
    });
  });

  describe('child', () => {
    it('should nest the context and keep the level', () => {
      const child = new Logger('Engine', LogLevel.WARN).child('Broadcaster');

      child.info('hidden');
      child.warn('visible');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).toHaveBeenCalledWith('[Engine:Broadcaster] visible', '');
    });
  });
});

describe('parseLogLevel', () => {
  it('should accept level names in any case', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' WARN ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('Error')).toBe(LogLevel.ERROR);
  });

  it('should fall back for missing or unknown values', () => {
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    expect(parseLogLevel('', LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });
});

describe('createLogger', () => {
  const original = process.env.LOG_LEVEL;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = original;
    }
    jest.restoreAllMocks();
  });

  it('should read the minimum level from LOG_LEVEL', () => {
    const consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    const consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
    process.env.LOG_LEVEL = 'warn';

    const logger = createLogger('Ctx');
    logger.info('hidden');
    logger.warn('shown');

    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect(consoleWarnSpy).toHaveBeenCalledWith('[Ctx] shown', '');
  });
});
